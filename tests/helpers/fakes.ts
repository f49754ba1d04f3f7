import { promises as fs } from "node:fs";
import path from "node:path";
import type { FrameExtraction, ProcessVideoInput, TranscribeOptions, TranscriptSegment } from "../../src/domain/types";
import type {
  AudioExtractorPort,
  FrameExtractorPort,
  JobQueuePort,
  LoggerPort,
  TranscriptionPort
} from "../../src/interfaces/ports";

export type LoggedEntry = { level: "info" | "warn" | "error"; runId: string; message: string };

export class MemoryLogger implements LoggerPort {
  entries: LoggedEntry[] = [];

  async info(runId: string, message: string) {
    this.entries.push({ level: "info", runId, message });
  }

  async warn(runId: string, message: string) {
    this.entries.push({ level: "warn", runId, message });
  }

  async error(runId: string, message: string) {
    this.entries.push({ level: "error", runId, message });
  }

  messages(level: LoggedEntry["level"]) {
    return this.entries.filter((entry) => entry.level === level).map((entry) => entry.message);
  }
}

export class MockAudioExtractor implements AudioExtractorPort {
  calls: string[] = [];

  constructor(private content: string) {}

  async extract(videoPath: string, outputPath: string, _: { runId: string; sampleRate?: number }) {
    this.calls.push(videoPath);
    await fs.mkdir(path.dirname(outputPath), { recursive: true });
    await fs.writeFile(outputPath, this.content);
    return outputPath;
  }
}

export class MockFrameExtractor implements FrameExtractorPort {
  extractCalls: { videoPath: string; outputDir: string; fps: number }[] = [];

  constructor(private frameCount: number, private fps: number) {}

  async extract(videoPath: string, outputDir: string, options: { fps: number }): Promise<FrameExtraction> {
    this.extractCalls.push({ videoPath, outputDir, fps: options.fps });
    const framePaths = Array.from({ length: this.frameCount }, (_, i) => path.join(outputDir, `frame_${String(i).padStart(4, "0")}.jpg`));
    return { framePaths, frameCount: this.frameCount };
  }

  async probeFps(_: string) {
    return this.fps;
  }
}

export class MockTranscriber implements TranscriptionPort {
  calls: { audioPath: string; options: TranscribeOptions }[] = [];

  constructor(private segments: TranscriptSegment[]) {}

  async transcribe(audioPath: string, options: TranscribeOptions) {
    this.calls.push({ audioPath, options });
    return this.segments;
  }
}

export class MockQueue implements JobQueuePort {
  queued: ProcessVideoInput[] = [];

  async enqueueProcessVideo(input: ProcessVideoInput) {
    this.queued.push(input);
    return `queued-${this.queued.length}`;
  }

  async close() {}
}
