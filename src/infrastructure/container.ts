import path from "node:path";
import { LocalStorage } from "./storage/localStorage";
import { RedisQueue } from "./queue/redisQueue";
import { LocalLogger } from "./logger/localLogger";
import { WhisperTranscriber } from "./transcription/whisperTranscriber";
import { SubtitleService } from "./transcription/subtitles";
import { FfmpegAudioExtractor } from "./media/ffmpegAudioExtractor";
import { FfmpegFrameExtractor } from "./media/ffmpegFrameExtractor";
import { loadConfig, type AppConfig } from "./config";
import type { AlignmentDependencies } from "../application/alignmentService";

let cached: AlignmentDependencies | null = null;
let cachedConfig: Readonly<AppConfig> | null = null;

export function getConfig(): Readonly<AppConfig> {
  if (!cachedConfig) {
    cachedConfig = loadConfig();
  }
  return cachedConfig;
}

export function getDependencies(): AlignmentDependencies {
  if (cached) {
    return cached;
  }

  const config = getConfig();
  const logger = new LocalLogger(config.logsPath, { console: config.logToConsole });

  cached = {
    audio: new FfmpegAudioExtractor(logger, { timeoutMs: config.ffmpegTimeoutMs, sampleRate: config.audioSampleRate }),
    frames: new FfmpegFrameExtractor({ timeoutMs: config.ffmpegTimeoutMs }),
    transcriber: new WhisperTranscriber(path.join(config.storagePath, "transcripts"), config.whisper, logger),
    storage: new LocalStorage(process.cwd()),
    subtitles: new SubtitleService(),
    logger
  };

  return cached;
}

// Opens a Redis connection; only callers that enqueue should ask for it.
export function createQueue() {
  return new RedisQueue(getConfig().redisUrl);
}
