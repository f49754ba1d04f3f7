import type { ZodIssue } from "zod";

export type AlignErrorCode =
  | "INVALID_SEGMENT"
  | "INVALID_TIMESTAMP"
  | "MALFORMED_INPUT"
  | "INPUT_NOT_FOUND"
  | "CONFIGURATION_ERROR"
  | "MEDIA_PROBE_ERROR"
  | "EXTERNAL_TOOL_ERROR";

export class AlignError extends Error {
  constructor(readonly code: AlignErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class InvalidSegment extends AlignError {
  constructor(readonly index: number, readonly field: "start_time" | "end_time", message: string) {
    super("INVALID_SEGMENT", `Segment ${index}: ${message}`);
  }
}

export class InvalidTimestamp extends AlignError {
  constructor(readonly value: number) {
    super("INVALID_TIMESTAMP", `Cannot format timestamp ${value}: expected a finite number of seconds >= 0.`);
  }
}

export class MalformedInput extends AlignError {
  constructor(readonly source: string, message: string, readonly issues: ZodIssue[] = [], options?: { cause?: unknown }) {
    super("MALFORMED_INPUT", `Malformed input in ${source}: ${message}`, options);
  }
}

export class InputNotFound extends AlignError {
  constructor(readonly path: string, what: string) {
    super("INPUT_NOT_FOUND", `${what} does not exist: ${path}`);
  }
}

export class ConfigurationError extends AlignError {
  constructor(message: string) {
    super("CONFIGURATION_ERROR", message);
  }
}

export class MediaProbeError extends AlignError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("MEDIA_PROBE_ERROR", message, options);
  }
}

export class ExternalToolError extends AlignError {
  constructor(readonly tool: string, readonly exitCode: number | null, message: string) {
    super("EXTERNAL_TOOL_ERROR", message);
  }
}

export function errorMessage(error: unknown) {
  return error instanceof Error ? error.message : "Unknown error";
}
