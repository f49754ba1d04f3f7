import { promises as fs } from "node:fs";
import path from "node:path";
import { ConfigurationError, InputNotFound } from "../../domain/errors";
import type { FrameExtraction } from "../../domain/types";
import type { FrameExtractorPort } from "../../interfaces/ports";
import { fileExists } from "../storage/localStorage";
import { probeStreams, selectVideoFps } from "./ffprobe";
import { runProcess } from "./process";

export const FRAME_PATTERN = "frame_%04d.jpg";
const FRAME_FILE = /^frame_(\d+)\.jpg$/;

export type ProcessRunner = typeof runProcess;

export class FfmpegFrameExtractor implements FrameExtractorPort {
  private readonly run: ProcessRunner;

  constructor(private readonly options: { timeoutMs: number; run?: ProcessRunner }) {
    this.run = options.run ?? runProcess;
  }

  async extract(videoPath: string, outputDir: string, options: { fps: number }): Promise<FrameExtraction> {
    if (!Number.isFinite(options.fps) || options.fps <= 0) {
      throw new ConfigurationError(`extraction_fps must be a finite number > 0, got ${options.fps}.`);
    }
    await assertVideoExists(videoPath);
    await fs.mkdir(outputDir, { recursive: true });
    // ffmpeg -y only overwrites the frames it writes; older ones would inflate the count.
    await clearFrames(outputDir);

    const args = [
      "-y",
      "-hide_banner",
      "-loglevel",
      "warning",
      "-i",
      videoPath,
      "-vf",
      `fps=${options.fps}`,
      "-q:v",
      "2",
      "-start_number",
      "0",
      path.join(outputDir, FRAME_PATTERN)
    ];
    await this.run("ffmpeg", args, { timeoutMs: this.options.timeoutMs });

    const framePaths = await listFrames(outputDir);
    return { framePaths, frameCount: framePaths.length };
  }

  async probeFps(videoPath: string) {
    await assertVideoExists(videoPath);
    const streams = await probeStreams(videoPath, this.options.timeoutMs);
    return selectVideoFps(streams, videoPath);
  }
}

export async function listFrames(outputDir: string) {
  const names = await fs.readdir(outputDir);
  return names
    .flatMap((name) => {
      const match = FRAME_FILE.exec(name);
      return match ? [{ name, index: Number(match[1]) }] : [];
    })
    .sort((a, b) => a.index - b.index)
    .map((frame) => path.join(outputDir, frame.name));
}

export async function clearFrames(outputDir: string) {
  const stale = await listFrames(outputDir);
  await Promise.all(stale.map((framePath) => fs.rm(framePath, { force: true })));
  return stale.length;
}

async function assertVideoExists(videoPath: string) {
  if (!(await fileExists(videoPath))) {
    throw new InputNotFound(videoPath, "Video file");
  }
}
