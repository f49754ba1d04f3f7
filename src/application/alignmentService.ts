import path from "node:path";
import { randomUUID } from "node:crypto";
import { errorMessage, InputNotFound } from "../domain/errors";
import type { AlignmentEntry, ProcessVideoInput, ProcessVideoResult, RunMetadata, TranscriptSegment } from "../domain/types";
import type {
  AudioExtractorPort,
  FrameExtractorPort,
  JobQueuePort,
  LoggerPort,
  StoragePort,
  SubtitlePort,
  TranscriptionPort
} from "../interfaces/ports";
import { align, findOvershoot } from "./alignment";
import { readAlignmentFile, writeAlignmentFile, writeMetadataFile } from "./alignmentFile";

export const ALIGNMENT_FILE = "alignment.json";
export const METADATA_FILE = "metadata.json";
export const SUBTITLE_FILE = "alignment.srt";
export const AUDIO_FILE = "audio.wav";
export const FRAMES_DIR = "frames";

export interface AlignmentDependencies {
  audio: AudioExtractorPort;
  frames: FrameExtractorPort;
  transcriber: TranscriptionPort;
  storage: StoragePort;
  subtitles: SubtitlePort;
  logger: LoggerPort;
}

/**
 * Runs the whole pipeline for one video: audio, transcript, frames, source
 * FPS, alignment. Writes `alignment.json` and `metadata.json` into
 * `outputDir`, plus `alignment.srt` when `subtitles` is set.
 */
export async function processVideo(input: ProcessVideoInput, deps: AlignmentDependencies): Promise<ProcessVideoResult> {
  const runId = input.runId ?? randomUUID();
  const videoPath = deps.storage.resolvePath(input.videoPath);

  try {
    if (!(await deps.storage.exists(videoPath))) {
      throw new InputNotFound(videoPath, "Video file");
    }
    const outputDir = await deps.storage.ensureDir(input.outputDir);
    await deps.logger.info(runId, `Processing ${videoPath} into ${outputDir}.`);

    const audioPath = await deps.audio.extract(videoPath, path.join(outputDir, AUDIO_FILE), { runId });
    const segments = await transcribeAudio(runId, audioPath, input, deps);

    await deps.logger.info(runId, `Extracting frames at ${input.extractionFps} fps.`);
    const frameDir = path.join(outputDir, FRAMES_DIR);
    const { frameCount } = await deps.frames.extract(videoPath, frameDir, { fps: input.extractionFps });
    const videoFps = await deps.frames.probeFps(videoPath);
    await deps.logger.info(runId, `Extracted ${frameCount} frames; source video runs at ${videoFps} fps.`);

    const alignment: AlignmentEntry[] = segments.length ? align(segments, videoFps, input.extractionFps) : [];
    await reportOvershoot(runId, alignment, frameCount, deps);

    const alignmentPath = path.join(outputDir, ALIGNMENT_FILE);
    await writeAlignmentFile(alignmentPath, alignment, deps.storage);

    const metadata: RunMetadata = {
      video_path: videoPath,
      audio_path: audioPath,
      frame_dir: frameDir,
      frame_count: frameCount,
      video_fps: videoFps,
      extraction_fps: input.extractionFps
    };
    const metadataPath = path.join(outputDir, METADATA_FILE);
    await writeMetadataFile(metadataPath, metadata, deps.storage);

    let srtPath: string | null = null;
    if (input.subtitles) {
      srtPath = path.join(outputDir, SUBTITLE_FILE);
      await deps.storage.writeFile(srtPath, Buffer.from(deps.subtitles.toSrt(alignment), "utf-8"));
    }

    await deps.logger.info(runId, `Aligned ${alignment.length} segments.`);
    return { runId, alignment, metadata, alignmentPath, metadataPath, srtPath };
  } catch (error) {
    await deps.logger.error(runId, errorMessage(error));
    throw error;
  }
}

/** Reads an alignment file and writes it out as SubRip subtitles. */
export async function convertAlignmentToSrt(
  alignmentPath: string,
  srtPath: string,
  deps: Pick<AlignmentDependencies, "storage" | "subtitles">
) {
  const alignment = await readAlignmentFile(deps.storage.resolvePath(alignmentPath), deps.storage);
  const output = deps.storage.resolvePath(srtPath);
  await deps.storage.writeFile(output, Buffer.from(deps.subtitles.toSrt(alignment), "utf-8"));
  return output;
}

/** Queues the run when a queue is given, otherwise runs it in this process. */
export async function submitVideo(
  input: ProcessVideoInput,
  deps: AlignmentDependencies,
  queue?: JobQueuePort | null
): Promise<{ runId: string; result: ProcessVideoResult | null }> {
  if (!queue) {
    const result = await processVideo(input, deps);
    return { runId: result.runId, result };
  }
  const runId = await queue.enqueueProcessVideo(input);
  await deps.logger.info(runId, "Run queued.");
  return { runId, result: null };
}

async function transcribeAudio(
  runId: string,
  audioPath: string,
  input: ProcessVideoInput,
  deps: AlignmentDependencies
): Promise<TranscriptSegment[]> {
  const audioSize = await deps.storage.size(audioPath);
  if (audioSize === 0) {
    await deps.logger.warn(runId, `No audio content found in ${input.videoPath}; alignment will be empty.`);
    return [];
  }
  await deps.logger.info(runId, "Starting transcription.");
  const segments = await deps.transcriber.transcribe(audioPath, {
    runId,
    model: input.model,
    language: input.language ?? null
  });
  await deps.logger.info(runId, `Transcribed ${segments.length} segments.`);
  return segments;
}

async function reportOvershoot(runId: string, alignment: AlignmentEntry[], frameCount: number, deps: AlignmentDependencies) {
  const overshoot = findOvershoot(alignment, frameCount);
  if (!overshoot.length) {
    return;
  }
  await deps.logger.warn(
    runId,
    `${overshoot.length} entries reference frames beyond the ${frameCount} extracted; indices left unclamped.`
  );
}
