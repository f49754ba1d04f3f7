import path from "node:path";
import { z } from "zod";
import { ConfigurationError } from "../domain/errors";

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);

const blankToUndefined = (value: unknown) => (typeof value === "string" && value.trim() === "" ? undefined : value);

const EnvSchema = z.object({
  STORAGE_PATH: z.string().optional(),
  LOGS_PATH: z.string().optional(),
  REDIS_URL: z.string().default("redis://localhost:6379"),
  EXTRACTION_FPS: z.coerce.number().positive().default(1),
  WHISPER_PROVIDER: z.enum(["mock", "whisper"]).default("whisper"),
  WHISPER_CMD: z.string().min(1).default("whisper"),
  WHISPER_MODEL: z.string().min(1).default("small"),
  WHISPER_DEVICE: z.string().optional(),
  WHISPER_LANGUAGE: z.string().min(2).optional(),
  WHISPER_TIMEOUT_MS: positiveInt(3_600_000),
  FFMPEG_TIMEOUT_MS: positiveInt(600_000),
  AUDIO_SAMPLE_RATE: positiveInt(16_000),
  WORKER_CONCURRENCY: positiveInt(1),
  LOG_TO_CONSOLE: z.enum(["true", "false"]).default("true")
});

export interface AppConfig {
  storagePath: string;
  logsPath: string;
  redisUrl: string;
  extractionFps: number;
  whisper: {
    provider: "mock" | "whisper";
    cmd: string;
    model: string;
    device: string | null;
    language: string | null;
    timeoutMs: number;
  };
  ffmpegTimeoutMs: number;
  audioSampleRate: number;
  workerConcurrency: number;
  logToConsole: boolean;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env, cwd = process.cwd()): Readonly<AppConfig> {
  const cleaned = Object.fromEntries(Object.entries(env).map(([key, value]) => [key, blankToUndefined(value)]));
  const parsed = EnvSchema.safeParse(cleaned);
  if (!parsed.success) {
    const details = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`).join("; ");
    throw new ConfigurationError(`Invalid environment configuration: ${details}`);
  }

  const values = parsed.data;
  return Object.freeze({
    storagePath: values.STORAGE_PATH ?? path.join(cwd, "storage"),
    logsPath: values.LOGS_PATH ?? path.join(cwd, "logs"),
    redisUrl: values.REDIS_URL,
    extractionFps: values.EXTRACTION_FPS,
    whisper: Object.freeze({
      provider: values.WHISPER_PROVIDER,
      cmd: values.WHISPER_CMD,
      model: values.WHISPER_MODEL,
      device: values.WHISPER_DEVICE ?? null,
      language: values.WHISPER_LANGUAGE ?? null,
      timeoutMs: values.WHISPER_TIMEOUT_MS
    }),
    ffmpegTimeoutMs: values.FFMPEG_TIMEOUT_MS,
    audioSampleRate: values.AUDIO_SAMPLE_RATE,
    workerConcurrency: values.WORKER_CONCURRENCY,
    logToConsole: values.LOG_TO_CONSOLE === "true"
  });
}
