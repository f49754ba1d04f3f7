import { promises as fs } from "node:fs";
import path from "node:path";
import { InputNotFound } from "../../domain/errors";
import type { AudioExtractorPort, LoggerPort } from "../../interfaces/ports";
import { fileExists } from "../storage/localStorage";
import { hasAudioStream, probeStreams } from "./ffprobe";
import { runProcess } from "./process";

export class FfmpegAudioExtractor implements AudioExtractorPort {
  constructor(
    private readonly logger: LoggerPort,
    private readonly options: { timeoutMs: number; sampleRate: number }
  ) {}

  /**
   * Writes the primary audio track as mono WAV. A video without an audio
   * stream yields an empty file at `outputPath`.
   */
  async extract(videoPath: string, outputPath: string, options: { runId: string; sampleRate?: number }) {
    if (!(await fileExists(videoPath))) {
      throw new InputNotFound(videoPath, "Video file");
    }
    await fs.mkdir(path.dirname(outputPath), { recursive: true });

    const streams = await probeStreams(videoPath, this.options.timeoutMs);
    if (!hasAudioStream(streams)) {
      await this.logger.warn(options.runId, `No audio stream detected in ${videoPath}; skipping extraction.`);
      await fs.writeFile(outputPath, Buffer.alloc(0));
      return outputPath;
    }

    const sampleRate = options.sampleRate ?? this.options.sampleRate;
    const args = [
      "-y",
      "-hide_banner",
      "-loglevel",
      "warning",
      "-i",
      videoPath,
      "-vn",
      "-ac",
      "1",
      "-ar",
      String(sampleRate),
      "-f",
      "wav",
      outputPath
    ];
    await runProcess("ffmpeg", args, { timeoutMs: this.options.timeoutMs });
    return outputPath;
  }
}
