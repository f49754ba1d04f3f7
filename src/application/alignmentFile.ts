import { z, type ZodIssue } from "zod";
import { InputNotFound, MalformedInput } from "../domain/errors";
import { AlignmentEntrySchema, type AlignmentEntry, type RunMetadata } from "../domain/types";
import type { StoragePort } from "../interfaces/ports";

const AlignmentFileSchema = z.array(AlignmentEntrySchema);

// Field order is part of the file format.
const toAlignmentRecord = (entry: AlignmentEntry): AlignmentEntry => ({
  text: entry.text,
  start_time: entry.start_time,
  end_time: entry.end_time,
  start_frame: entry.start_frame,
  end_frame: entry.end_frame,
  video_fps: entry.video_fps
});

const toMetadataRecord = (metadata: RunMetadata): RunMetadata => ({
  video_path: metadata.video_path,
  audio_path: metadata.audio_path,
  frame_dir: metadata.frame_dir,
  frame_count: metadata.frame_count,
  video_fps: metadata.video_fps,
  extraction_fps: metadata.extraction_fps
});

export function serializeAlignment(entries: readonly AlignmentEntry[]) {
  return JSON.stringify(entries.map(toAlignmentRecord), null, 2);
}

export function serializeMetadata(metadata: RunMetadata) {
  return JSON.stringify(toMetadataRecord(metadata), null, 2);
}

export function parseAlignment(raw: string, source: string): AlignmentEntry[] {
  let payload: unknown;
  try {
    payload = JSON.parse(raw);
  } catch (error) {
    const reason = error instanceof Error ? error.message : "invalid JSON";
    throw new MalformedInput(source, `not valid JSON (${reason}).`, [], { cause: error });
  }

  const parsed = AlignmentFileSchema.safeParse(payload);
  if (!parsed.success) {
    const [first] = parsed.error.issues;
    const detail = first ? describeIssue(first) : "validation failed.";
    throw new MalformedInput(source, detail, parsed.error.issues);
  }
  return parsed.data.map(toAlignmentRecord);
}

export async function readAlignmentFile(filePath: string, storage: StoragePort) {
  if (!(await storage.exists(filePath))) {
    throw new InputNotFound(filePath, "Alignment file");
  }
  const raw = await storage.readFile(filePath);
  return parseAlignment(raw.toString("utf-8"), filePath);
}

export async function writeAlignmentFile(filePath: string, entries: readonly AlignmentEntry[], storage: StoragePort) {
  await storage.writeFile(filePath, Buffer.from(serializeAlignment(entries), "utf-8"));
}

export async function writeMetadataFile(filePath: string, metadata: RunMetadata, storage: StoragePort) {
  await storage.writeFile(filePath, Buffer.from(serializeMetadata(metadata), "utf-8"));
}

function describeIssue(issue: ZodIssue) {
  const [index, field] = issue.path;
  if (index === undefined) {
    return "expected a JSON array of alignment entries.";
  }
  if (field === undefined) {
    return `entry ${index}: ${issue.message}.`;
  }
  const missing = issue.code === "invalid_type" && issue.received === "undefined";
  return missing
    ? `entry ${index} is missing required field "${field}".`
    : `entry ${index}, field "${field}": ${issue.message}.`;
}
