import { z } from "zod";

export const TranscriptSegmentSchema = z.object({
  text: z.string(),
  start_time: z.number(),
  end_time: z.number()
});

export type TranscriptSegment = Readonly<z.infer<typeof TranscriptSegmentSchema>>;

// start_time is left unbounded here; a negative value fails later as an InvalidTimestamp.
export const AlignmentEntrySchema = z
  .object({
    text: z.string(),
    start_time: z.number(),
    end_time: z.number(),
    start_frame: z.number().int().nonnegative(),
    end_frame: z.number().int().nonnegative(),
    video_fps: z.number().positive()
  })
  .superRefine((entry, ctx) => {
    if (entry.end_time < entry.start_time) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["end_time"],
        message: `end_time ${entry.end_time} is before start_time ${entry.start_time}`
      });
    }
    if (entry.end_frame < entry.start_frame) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["end_frame"],
        message: `end_frame ${entry.end_frame} is before start_frame ${entry.start_frame}`
      });
    }
  });

export type AlignmentEntry = Readonly<z.infer<typeof AlignmentEntrySchema>>;

export const RunMetadataSchema = z.object({
  video_path: z.string(),
  audio_path: z.string(),
  frame_dir: z.string(),
  frame_count: z.number().int().nonnegative(),
  video_fps: z.number(),
  extraction_fps: z.number()
});

export type RunMetadata = Readonly<z.infer<typeof RunMetadataSchema>>;

export interface FrameExtraction {
  framePaths: string[];
  frameCount: number;
}

export interface TranscribeOptions {
  runId: string;
  model: string;
  language?: string | null;
}

export interface ProcessVideoInput {
  videoPath: string;
  outputDir: string;
  extractionFps: number;
  model: string;
  language?: string | null;
  subtitles?: boolean;
  runId?: string;
}

export interface ProcessVideoResult {
  runId: string;
  alignment: AlignmentEntry[];
  metadata: RunMetadata;
  alignmentPath: string;
  metadataPath: string;
  srtPath: string | null;
}
