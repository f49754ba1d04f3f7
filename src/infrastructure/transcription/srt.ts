import { InvalidTimestamp } from "../../domain/errors";
import type { AlignmentEntry } from "../../domain/types";

export const INAUDIBLE = "[inaudible]";

/**
 * One cue per entry, numbered from 1 in input order. Cue text is written
 * verbatim; subtitle control sequences inside it are not escaped.
 */
export function toSrt(entries: readonly AlignmentEntry[]): string {
  return entries
    .map((entry, index) => {
      const start = formatTimestamp(entry.start_time);
      const end = formatTimestamp(entry.end_time);
      return `${index + 1}\n${start} --> ${end}\n${cueText(entry.text)}\n`;
    })
    .join("\n");
}

export function formatTimestamp(seconds: number) {
  if (!Number.isFinite(seconds) || seconds < 0) {
    throw new InvalidTimestamp(seconds);
  }
  const totalMs = Math.round(seconds * 1000);
  const hrs = Math.floor(totalMs / 3_600_000);
  const mins = Math.floor((totalMs % 3_600_000) / 60_000);
  const secs = Math.floor((totalMs % 60_000) / 1000);
  const ms = totalMs % 1000;
  return `${pad(hrs)}:${pad(mins)}:${pad(secs)},${pad(ms, 3)}`;
}

// An empty body would terminate the cue early.
function cueText(text: string) {
  return text.trim() ? text : INAUDIBLE;
}

function pad(value: number, size = 2) {
  return value.toString().padStart(size, "0");
}
