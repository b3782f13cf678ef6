import type { DiagnosticEvent } from "./types";

export class ConfigError extends Error {
  name = "ConfigError";

  constructor(
    message: string,
    public readonly path: string,
    public readonly sensitive: boolean,
    public readonly diagnostics?: DiagnosticEvent[]
  ) {
    super(message);
  }
}

/** Raised by strict fields; `variable` is the first missing one in declaration order. */
export class MissingRequiredValueError extends ConfigError {
  name = "MissingRequiredValueError";

  constructor(
    public readonly variable: string,
    path: string,
    public readonly missing: string[] = [variable],
    diagnostics?: DiagnosticEvent[]
  ) {
    super(`${variable} environment variable is not set`, path, false, diagnostics);
  }
}

export function formatValue(value: unknown, sensitive: boolean): string {
  if (sensitive) return "[REDACTED]";
  if (value === undefined) return "undefined";
  return JSON.stringify(value);
}
