export { align, clampToFrameCount, frameIndex, DEFAULT_EXTRACTION_FPS } from "./application/alignment";
export {
  parseAlignment,
  readAlignmentFile,
  serializeAlignment,
  serializeMetadata,
  writeAlignmentFile,
  writeMetadataFile
} from "./application/alignmentFile";
export { convertAlignmentToSrt, processVideo, submitVideo } from "./application/alignmentService";
export type { AlignmentDependencies } from "./application/alignmentService";
export { formatTimestamp, toSrt } from "./infrastructure/transcription/srt";
export { parseFrameRate } from "./infrastructure/media/ffprobe";
export { loadConfig } from "./infrastructure/config";
export type { AppConfig } from "./infrastructure/config";
export { getDependencies } from "./infrastructure/container";
export * from "./domain/errors";
export * from "./domain/types";
