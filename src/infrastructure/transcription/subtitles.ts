import type { SubtitlePort } from "../../interfaces/ports";
import type { AlignmentEntry } from "../../domain/types";
import { toSrt } from "./srt";

export class SubtitleService implements SubtitlePort {
  toSrt(entries: readonly AlignmentEntry[]) {
    return toSrt(entries);
  }
}
