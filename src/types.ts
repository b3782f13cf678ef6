import type { ZodTypeAny, z } from "zod";

export type EnvSource = Record<string, string | undefined>;

export type FieldPolicy = "default" | "strict";

export type LayerState = "unloaded" | "loaded";

/** Where a field's current value came from: "initial", "env:NAME" or "default" */
export type ConfigSource = string;

export interface FieldConfig<T extends ZodTypeAny = ZodTypeAny> {
  type: T;
  env: string;
  default?: string;
  policy?: FieldPolicy;
  sensitive?: boolean;
  doc?: string;
}

export type LayerDefinition = Record<string, FieldConfig>;

export type Values = Record<string, unknown>;

export type Empty = Record<never, never>;

/** Infer own field values from a definition */
export type InferDefinition<D extends LayerDefinition> = {
  [K in keyof D]: D[K] extends FieldConfig<infer Z> ? z.infer<Z> : never;
};

export interface DebugEntry {
  value: unknown;
  source: ConfigSource;
}

export type DiagnosticEvent =
  | { type: "reload"; layer: string; phase: "start" | "done" | "failed" }
  | { type: "sourceDecision"; key: string; picked: ConfigSource; tried: string[] }
  | { type: "note"; message: string; meta?: Record<string, unknown> };
