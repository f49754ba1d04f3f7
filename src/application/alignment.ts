import { ConfigurationError, InvalidSegment } from "../domain/errors";
import type { AlignmentEntry, TranscriptSegment } from "../domain/types";

export const DEFAULT_EXTRACTION_FPS = 1.0;

/**
 * Maps transcript segments onto indices of frames sampled at `extractionFps`
 * frames per second of source video. `videoFps` is carried on each entry as
 * metadata only and does not take part in the index computation.
 *
 * Frame indices are `Math.floor(seconds * extractionFps)`. Negative, non-finite
 * or inverted segment times are rejected with {@link InvalidSegment}; nothing is
 * clamped. `end_frame` may point past the last frame that was actually
 * extracted, see {@link clampToFrameCount}.
 */
export function align(
  segments: readonly TranscriptSegment[],
  videoFps: number,
  extractionFps = DEFAULT_EXTRACTION_FPS
): AlignmentEntry[] {
  assertPositiveRate("video_fps", videoFps);
  assertPositiveRate("extraction_fps", extractionFps);

  return segments.map((segment, index) => {
    validateSegment(segment, index);
    return {
      text: segment.text,
      start_time: segment.start_time,
      end_time: segment.end_time,
      start_frame: frameIndex(segment.start_time, extractionFps),
      end_frame: frameIndex(segment.end_time, extractionFps),
      video_fps: videoFps
    };
  });
}

export function frameIndex(seconds: number, extractionFps: number) {
  return Math.floor(seconds * extractionFps);
}

export function validateSegment(segment: TranscriptSegment, index: number) {
  const { start_time: start, end_time: end } = segment;
  if (!Number.isFinite(start)) {
    throw new InvalidSegment(index, "start_time", `start_time must be a finite number, got ${start}.`);
  }
  if (!Number.isFinite(end)) {
    throw new InvalidSegment(index, "end_time", `end_time must be a finite number, got ${end}.`);
  }
  if (start < 0) {
    throw new InvalidSegment(index, "start_time", `start_time must be >= 0, got ${start}.`);
  }
  if (end < start) {
    throw new InvalidSegment(index, "end_time", `end_time ${end} is before start_time ${start}.`);
  }
}

/**
 * Caps frame indices at the last frame that exists on disk. Leaves entries
 * already inside the inventory untouched.
 */
export function clampToFrameCount(entries: readonly AlignmentEntry[], frameCount: number): AlignmentEntry[] {
  if (!Number.isInteger(frameCount) || frameCount < 0) {
    throw new ConfigurationError(`frame_count must be a non-negative integer, got ${frameCount}.`);
  }
  if (!entries.length) {
    return [];
  }
  if (frameCount === 0) {
    throw new ConfigurationError("Cannot clamp alignment entries against an empty frame inventory.");
  }
  const last = frameCount - 1;
  return entries.map((entry) => {
    if (entry.end_frame <= last) {
      return entry;
    }
    return {
      ...entry,
      start_frame: Math.min(entry.start_frame, last),
      end_frame: last
    };
  });
}

export function findOvershoot(entries: readonly AlignmentEntry[], frameCount: number) {
  return entries.filter((entry) => entry.end_frame >= frameCount);
}

function assertPositiveRate(name: "video_fps" | "extraction_fps", value: number) {
  if (!Number.isFinite(value) || value <= 0) {
    throw new ConfigurationError(`${name} must be a finite number > 0, got ${value}.`);
  }
}
