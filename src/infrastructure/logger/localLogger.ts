import { promises as fs } from "node:fs";
import path from "node:path";
import type { LoggerPort } from "../../interfaces/ports";

export type LogLevel = "info" | "warn" | "error";

export type LogEntry = {
  timestamp: string;
  level: LogLevel;
  runId: string;
  message: string;
  pid: number;
};

export class LocalLogger implements LoggerPort {
  constructor(private baseDir: string, private options: { console?: boolean } = {}) {}

  async info(runId: string, message: string) {
    await this.append(runId, "info", message);
  }

  async warn(runId: string, message: string) {
    await this.append(runId, "warn", message);
  }

  async error(runId: string, message: string) {
    await this.append(runId, "error", message);
  }

  private async append(runId: string, level: LogLevel, message: string) {
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      runId,
      message,
      pid: process.pid
    };
    if (this.options.console) {
      console[level](`[${runId}] ${message}`);
    }

    const filePath = path.join(this.baseDir, `${runId}.log`);
    try {
      await fs.mkdir(this.baseDir, { recursive: true });
      await fs.appendFile(filePath, `${JSON.stringify(entry)}\n`);
    } catch (error) {
      console.error("Logger write failed", error);
    }
  }
}
