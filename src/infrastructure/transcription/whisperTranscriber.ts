import path from "node:path";
import { promises as fs } from "node:fs";
import { z } from "zod";
import { InputNotFound, MalformedInput } from "../../domain/errors";
import type { TranscribeOptions, TranscriptSegment } from "../../domain/types";
import type { LoggerPort, TranscriptionPort } from "../../interfaces/ports";
import { runProcess } from "../media/process";
import { fileExists } from "../storage/localStorage";

export type WhisperProvider = "mock" | "whisper";

export interface WhisperSettings {
  provider: WhisperProvider;
  cmd: string;
  device?: string | null;
  timeoutMs: number;
}

const WhisperOutputSchema = z.object({
  segments: z
    .array(
      z.object({
        text: z.string().default(""),
        start: z.number().default(0),
        end: z.number().default(0)
      })
    )
    .default([])
});

export const MOCK_SEGMENTS: readonly TranscriptSegment[] = [
  { text: "Frame align demo transcript.", start_time: 0, end_time: 6 },
  { text: "Replace this with Whisper output.", start_time: 6, end_time: 14 }
];

export class WhisperTranscriber implements TranscriptionPort {
  constructor(
    private readonly outputDir: string,
    private readonly settings: WhisperSettings,
    private readonly logger: LoggerPort
  ) {}

  async transcribe(audioPath: string, options: TranscribeOptions): Promise<TranscriptSegment[]> {
    if (!(await fileExists(audioPath))) {
      throw new InputNotFound(audioPath, "Audio file");
    }
    const stats = await fs.stat(audioPath);
    if (stats.size === 0) {
      await this.logger.warn(options.runId, `Audio file ${audioPath} is empty; no transcription generated.`);
      return [];
    }

    if (this.settings.provider === "mock") {
      return [...MOCK_SEGMENTS];
    }

    if (!this.settings.device || this.settings.device === "cpu") {
      await this.logger.warn(options.runId, "Whisper running on CPU. Expect slower transcription.");
    }

    const runDir = path.join(this.outputDir, options.runId);
    await fs.mkdir(runDir, { recursive: true });

    const args = [
      audioPath,
      "--model",
      options.model,
      "--output_format",
      "json",
      "--output_dir",
      runDir,
      "--word_timestamps",
      "True",
      "--verbose",
      "False"
    ];
    if (options.language) {
      args.push("--language", options.language);
    }
    if (this.settings.device) {
      args.push("--device", this.settings.device);
    }

    await runProcess(this.settings.cmd, args, { timeoutMs: this.settings.timeoutMs });

    const jsonPath = path.join(runDir, `${path.parse(audioPath).name}.json`);
    const raw = await fs.readFile(jsonPath, "utf-8");
    return parseWhisperOutput(raw, jsonPath);
  }
}

/** Trims segment text, drops segments left empty, renames `start`/`end`. */
export function parseWhisperOutput(raw: string, source: string): TranscriptSegment[] {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error) {
    throw new MalformedInput(source, "Whisper output is not valid JSON.", [], { cause: error });
  }
  const parsed = WhisperOutputSchema.safeParse(json);
  if (!parsed.success) {
    throw new MalformedInput(source, parsed.error.message, parsed.error.issues);
  }

  return parsed.data.segments.flatMap((segment) => {
    const text = segment.text.trim();
    if (!text) {
      return [];
    }
    return [{ text, start_time: segment.start, end_time: segment.end }];
  });
}
