import { spawn } from "node:child_process";
import { ExternalToolError } from "../../domain/errors";

export interface RunOptions {
  timeoutMs: number;
  captureStdout?: boolean;
}

/**
 * Runs an external tool to completion. Resolves with captured stdout; rejects
 * with an {@link ExternalToolError} carrying the tail of stderr when the tool
 * cannot start, exits non-zero or outlives `timeoutMs`.
 */
export function runProcess(cmd: string, args: string[], options: RunOptions) {
  return new Promise<string>((resolve, reject) => {
    const tail = createLogTail();
    let stdout = "";
    let timedOut = false;
    const proc = spawn(cmd, args, { stdio: ["ignore", "pipe", "pipe"] });

    proc.stdout.on("data", (data: Buffer) => {
      if (options.captureStdout) {
        stdout += data.toString("utf8");
      }
    });
    proc.stderr.on("data", (data: Buffer) => tail.push(data, cmd));

    const timer = setTimeout(() => {
      timedOut = true;
      proc.kill("SIGTERM");
    }, options.timeoutMs);

    proc.on("error", (error) => {
      clearTimeout(timer);
      reject(new ExternalToolError(cmd, null, `${cmd} failed to start: ${error.message}`));
    });
    proc.on("close", (code) => {
      clearTimeout(timer);
      if (timedOut) {
        reject(new ExternalToolError(cmd, code, `${cmd} timed out after ${options.timeoutMs}ms\n${tail.toString()}`));
        return;
      }
      if (code === 0) {
        resolve(stdout);
        return;
      }
      reject(new ExternalToolError(cmd, code, `${cmd} exited with code ${code}\n${tail.toString()}`));
    });
  });
}

export function createLogTail(maxLines = 80) {
  const lines: string[] = [];
  return {
    push(chunk: Buffer, tag: string) {
      const text = chunk.toString("utf8");
      for (const line of text.split(/\r?\n/)) {
        if (!line) continue;
        lines.push(`[${tag}] ${line}`);
        if (lines.length > maxLines) {
          lines.shift();
        }
      }
    },
    toString() {
      return lines.join("\n");
    }
  };
}
