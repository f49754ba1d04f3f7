import { ConfigurationError } from "../src/domain/errors";

export type CliArgs = Record<string, string | boolean>;

/** `--key=value` becomes a string, a bare `--flag` becomes `true`. */
export function parseArgs(argv: readonly string[]): CliArgs {
  const opts: CliArgs = {};
  for (const arg of argv) {
    const m = arg.match(/^--([^=]+)(=(.*))?$/);
    if (m) {
      const key = m[1];
      const val = m[3] ?? true;
      opts[key] = val;
    }
  }
  return opts;
}

export function stringArg(args: CliArgs, key: string) {
  const value = args[key];
  return typeof value === "string" && value.length ? value : null;
}

export function numberArg(args: CliArgs, key: string, fallback: number) {
  const raw = stringArg(args, key);
  if (raw === null) {
    return fallback;
  }
  const parsed = Number(raw);
  if (!Number.isFinite(parsed)) {
    throw new ConfigurationError(`--${key} must be a number, got "${raw}".`);
  }
  return parsed;
}
