import type { ZodTypeAny } from "zod";
import { ConfigError } from "./errors";
import type { FieldConfig, LayerDefinition } from "./types";

export function field<T extends ZodTypeAny>(config: FieldConfig<T>): FieldConfig<T> {
  return { ...config };
}

/** Checks that no two fields of a layer read the same variable. */
export function defineLayer<const D extends LayerDefinition>(definition: D): D {
  const seen = new Map<string, string>();
  for (const [key, config] of Object.entries(definition)) {
    const previous = seen.get(config.env);
    if (previous !== undefined) {
      throw new ConfigError(
        `Fields '${previous}' and '${key}' both read ${config.env}`,
        key,
        false
      );
    }
    seen.set(config.env, key);
  }
  return definition;
}
