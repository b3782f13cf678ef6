import type { EnvSource } from "../types";

export function loadEnv(name: string, env: EnvSource = process.env): string | undefined {
  return env[name];
}

export function isUnset(value: string | undefined): value is undefined | "" {
  return value === undefined || value === "";
}
