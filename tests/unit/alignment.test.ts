import { describe, expect, it } from "vitest";
import { align, clampToFrameCount, findOvershoot, frameIndex } from "../../src/application/alignment";
import { ConfigurationError, InvalidSegment } from "../../src/domain/errors";
import type { TranscriptSegment } from "../../src/domain/types";
import { toSrt } from "../../src/infrastructure/transcription/srt";
import { captureError } from "../helpers/captureError";

const segment = (text: string, start_time: number, end_time: number): TranscriptSegment => ({ text, start_time, end_time });

describe("align", () => {
  it("maps a zero-length segment at the origin to frame 0 for any extraction rate", () => {
    for (const fps of [0.5, 1, 2.5, 30]) {
      const [entry] = align([segment("x", 0, 0)], 25, fps);
      expect(entry.start_frame).toBe(0);
      expect(entry.end_frame).toBe(0);
    }
  });

  it("floors time multiplied by the extraction rate", () => {
    expect(align([segment("a", 2.5, 3.74)], 30, 1)[0]).toMatchObject({ start_frame: 2, end_frame: 3 });
    expect(align([segment("a", 2.5, 3.74)], 30, 2)[0]).toMatchObject({ start_frame: 5, end_frame: 7 });
    expect(align([segment("a", 2.5, 5)], 30, 0.5)[0]).toMatchObject({ start_frame: 1, end_frame: 2 });
    expect(frameIndex(0.99, 1)).toBe(0);
  });

  it("aligns the two-segment example", () => {
    const entries = align([segment("hello", 0.52, 2.34), segment("world", 2.34, 4.1)], 30, 1);
    expect(entries).toEqual([
      { text: "hello", start_time: 0.52, end_time: 2.34, start_frame: 0, end_frame: 2, video_fps: 30 },
      { text: "world", start_time: 2.34, end_time: 4.1, start_frame: 2, end_frame: 4, video_fps: 30 }
    ]);
  });

  it("emits entry fields in file order", () => {
    const [entry] = align([segment("a", 1, 2)], 24);
    expect(Object.keys(entry)).toEqual(["text", "start_time", "end_time", "start_frame", "end_frame", "video_fps"]);
  });

  it("defaults the extraction rate to one frame per second", () => {
    expect(align([segment("a", 7.9, 12.2)], 60)[0]).toMatchObject({ start_frame: 7, end_frame: 12 });
  });

  it("does not use the source frame rate to compute indices", () => {
    const segments = [segment("a", 1.2, 3.7)];
    const slow = align(segments, 23.976, 2);
    const fast = align(segments, 60, 2);
    expect(slow[0]).toMatchObject({ start_frame: 2, end_frame: 7, video_fps: 23.976 });
    expect(fast[0]).toMatchObject({ start_frame: 2, end_frame: 7, video_fps: 60 });
  });

  it("preserves input order and keeps start frames non-decreasing", () => {
    const segments = [segment("a", 0, 1.5), segment("b", 1.5, 1.5), segment("c", 1.9, 4), segment("d", 3, 6), segment("e", 6.01, 9)];
    const entries = align(segments, 30, 1);
    expect(entries.map((entry) => entry.text)).toEqual(["a", "b", "c", "d", "e"]);
    expect(entries.map((entry) => entry.start_frame)).toEqual([0, 1, 1, 3, 6]);
    for (let i = 1; i < entries.length; i += 1) {
      expect(entries[i].start_frame).toBeGreaterThanOrEqual(entries[i - 1].start_frame);
    }
  });

  it("returns an empty list for no segments", () => {
    expect(align([], 30, 1)).toEqual([]);
  });

  it("rejects negative start times", () => {
    const error = captureError(() => align([segment("x", -1, 0)], 30, 1), InvalidSegment);
    expect(error).toMatchObject({ code: "INVALID_SEGMENT", index: 0, field: "start_time" });
    expect(error.message).toBe("Segment 0: start_time must be >= 0, got -1.");
  });

  it("rejects a segment that ends before it starts and names its index", () => {
    const error = captureError(() => align([segment("ok", 0, 1), segment("bad", 5, 4)], 30, 1), InvalidSegment);
    expect(error).toMatchObject({ index: 1, field: "end_time" });
    expect(error.message).toBe("Segment 1: end_time 4 is before start_time 5.");
  });

  it("rejects non-finite times", () => {
    expect(() => align([segment("x", Number.NaN, 1)], 30, 1)).toThrow(InvalidSegment);
    expect(() => align([segment("x", 0, Number.POSITIVE_INFINITY)], 30, 1)).toThrow(InvalidSegment);
  });

  it("rejects non-positive frame rates before looking at segments", () => {
    expect(() => align([], 0, 1)).toThrow(ConfigurationError);
    expect(() => align([segment("x", 0, 1)], 30, -1)).toThrow("extraction_fps must be a finite number > 0, got -1.");
    expect(() => align([segment("x", -5, 1)], 30, 0)).toThrow(ConfigurationError);
  });

  it("leaves end frames past the extracted inventory unclamped", () => {
    const entries = align([segment("late", 8.5, 12.2)], 30, 1);
    expect(entries[0]).toMatchObject({ start_frame: 8, end_frame: 12 });
    expect(findOvershoot(entries, 10)).toEqual(entries);
    expect(findOvershoot(entries, 13)).toEqual([]);
  });

  it("is deterministic through subtitle formatting", () => {
    const segments = [segment("hello", 0.52, 2.34), segment("world", 2.34, 4.1)];
    const first = toSrt(align(segments, 29.97, 1));
    const second = toSrt(align(segments, 29.97, 1));
    expect(second).toBe(first);
  });
});

describe("clampToFrameCount", () => {
  const entries = align([segment("a", 0, 4.5), segment("b", 8, 12), segment("c", 11, 15)], 30, 1);

  it("caps indices at the last extracted frame", () => {
    const clamped = clampToFrameCount(entries, 10);
    expect(clamped.map((entry) => [entry.start_frame, entry.end_frame])).toEqual([
      [0, 4],
      [8, 9],
      [9, 9]
    ]);
    expect(clamped[0]).toBe(entries[0]);
    expect(entries[2]).toMatchObject({ start_frame: 11, end_frame: 15 });
  });

  it("accepts an empty list against an empty inventory", () => {
    expect(clampToFrameCount([], 0)).toEqual([]);
  });

  it("rejects invalid frame counts", () => {
    expect(() => clampToFrameCount(entries, 0)).toThrow(ConfigurationError);
    expect(() => clampToFrameCount(entries, -1)).toThrow(ConfigurationError);
    expect(() => clampToFrameCount(entries, 2.5)).toThrow("frame_count must be a non-negative integer, got 2.5.");
  });
});
