import { z } from "zod";
import { ConfigError } from "./errors";
import { loadEnv, isUnset } from "./loaders/env";
import type { DiagnosticsCollector } from "./diagnostics";
import type { EnvSource, FieldPolicy } from "./types";

export interface LayerOptions {
  /** Variable lookup, defaults to process.env. Never written to. */
  env?: EnvSource;
  /** Policy for fields that don't pin their own */
  policy?: FieldPolicy;
  collector?: DiagnosticsCollector;
}

export const POLICY_ENV = "CONFIG_POLICY";

const policySchema = z.enum(["default", "strict"]);

export function policyFromEnv(env: EnvSource = process.env): FieldPolicy {
  const raw = loadEnv(POLICY_ENV, env);
  if (isUnset(raw)) return "default";

  const result = policySchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigError(
      `Invalid config at '${POLICY_ENV}': expected "default" or "strict" (value: ${JSON.stringify(raw)})`,
      POLICY_ENV,
      false
    );
  }
  return result.data;
}
