import type { AlignmentEntry, FrameExtraction, ProcessVideoInput, TranscribeOptions, TranscriptSegment } from "../domain/types";

export interface AudioExtractorPort {
  extract(videoPath: string, outputPath: string, options: { runId: string; sampleRate?: number }): Promise<string>;
}

export interface FrameExtractorPort {
  extract(videoPath: string, outputDir: string, options: { fps: number }): Promise<FrameExtraction>;
  probeFps(videoPath: string): Promise<number>;
}

export interface TranscriptionPort {
  transcribe(audioPath: string, options: TranscribeOptions): Promise<TranscriptSegment[]>;
}

export interface StoragePort {
  ensureDir(dir: string): Promise<string>;
  writeFile(path: string, data: Buffer): Promise<void>;
  readFile(path: string): Promise<Buffer>;
  exists(path: string): Promise<boolean>;
  size(path: string): Promise<number>;
  resolvePath(path: string): string;
}

export interface JobQueuePort {
  enqueueProcessVideo(input: ProcessVideoInput): Promise<string>;
  close(): Promise<void>;
}

export interface LoggerPort {
  info(runId: string, message: string): Promise<void>;
  warn(runId: string, message: string): Promise<void>;
  error(runId: string, message: string): Promise<void>;
}

export interface SubtitlePort {
  toSrt(entries: readonly AlignmentEntry[]): string;
}
