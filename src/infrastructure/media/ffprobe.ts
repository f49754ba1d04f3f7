import { z } from "zod";
import { MediaProbeError } from "../../domain/errors";
import { runProcess } from "./process";

const ProbeStreamSchema = z.object({
  codec_type: z.string().optional(),
  avg_frame_rate: z.string().optional(),
  r_frame_rate: z.string().optional()
});

const ProbeResultSchema = z.object({
  streams: z.array(ProbeStreamSchema).default([])
});

export type ProbeStream = z.infer<typeof ProbeStreamSchema>;

export async function probeStreams(videoPath: string, timeoutMs: number): Promise<ProbeStream[]> {
  const args = ["-v", "error", "-show_entries", "stream=codec_type,avg_frame_rate,r_frame_rate", "-of", "json", videoPath];
  const output = await runProcess("ffprobe", args, { timeoutMs, captureStdout: true });
  return parseProbeOutput(output, videoPath);
}

export function parseProbeOutput(output: string, videoPath: string): ProbeStream[] {
  let json: unknown;
  try {
    json = JSON.parse(output);
  } catch (error) {
    const summary = output.trim().replaceAll(/\s+/g, " ");
    const suffix = summary ? ` ${summary}` : "";
    throw new MediaProbeError(`ffprobe returned invalid JSON for ${videoPath}.${suffix}`, { cause: error });
  }
  const parsed = ProbeResultSchema.safeParse(json);
  if (!parsed.success) {
    throw new MediaProbeError(`Unexpected ffprobe output for ${videoPath}: ${parsed.error.message}`);
  }
  return parsed.data.streams;
}

export function hasAudioStream(streams: readonly ProbeStream[]) {
  return streams.some((stream) => stream.codec_type === "audio");
}

/**
 * Nominal frame rate of the first video stream: `avg_frame_rate`, falling back
 * to `r_frame_rate` when the average is missing or `0/0`.
 */
export function selectVideoFps(streams: readonly ProbeStream[], videoPath: string) {
  const stream = streams.find((candidate) => candidate.codec_type === "video");
  if (!stream) {
    throw new MediaProbeError(`No video stream found in ${videoPath}`);
  }
  const fps = parseFrameRate(stream.avg_frame_rate) ?? parseFrameRate(stream.r_frame_rate);
  if (fps === null) {
    throw new MediaProbeError(`Unable to determine frame rate of ${videoPath}`);
  }
  return fps;
}

/** `"30000/1001"` → 29.97…; `"25"` → 25; missing, `0/0` or non-positive → null. */
export function parseFrameRate(value: string | undefined): number | null {
  if (!value) {
    return null;
  }
  const [numRaw, denRaw] = value.split("/");
  const num = Number(numRaw);
  const den = denRaw === undefined ? 1 : Number(denRaw);
  if (!Number.isFinite(num) || !Number.isFinite(den) || den === 0) {
    return null;
  }
  const fps = num / den;
  return fps > 0 ? fps : null;
}
