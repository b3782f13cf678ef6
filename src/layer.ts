import { loadEnv, isUnset } from "./loaders/env";
import { ConfigError, MissingRequiredValueError, formatValue } from "./errors";
import type { LayerOptions } from "./options";
import type {
  ConfigSource,
  DebugEntry,
  Empty,
  FieldConfig,
  FieldPolicy,
  InferDefinition,
  LayerDefinition,
  LayerState,
  Values,
} from "./types";

export interface Layer<V extends Values = Values> {
  readonly name: string;
  readonly state: LayerState;
  readonly inner: Layer | undefined;
  reload(): void;
  values(): V;
  sources(): Record<string, ConfigSource>;
  toDebugObject(): Record<string, DebugEntry>;
}

export interface ConfigLayerParams<D extends LayerDefinition, IV extends Values> {
  name: string;
  definition: D;
  initial: InferDefinition<D>;
  inner?: Layer<IV>;
  options?: LayerOptions;
}

interface FieldPick {
  config: FieldConfig;
  value: string;
  source: ConfigSource;
  tried: string[];
}

const EMPTY: Empty = {};

/**
 * One node of a configuration chain. Owns the fields in `definition` and
 * optionally wraps an inner layer, whose fields stay readable through
 * `values()` and `get()`.
 *
 * `reload()` reloads the inner layer first, then reads own fields from the
 * environment. Own fields are committed all at once or not at all.
 */
export class ConfigLayer<D extends LayerDefinition, IV extends Values = Empty>
  implements Layer<IV & InferDefinition<D>>
{
  readonly name: string;
  readonly inner: Layer<IV> | undefined;
  private readonly definition: D;
  private readonly options: LayerOptions;
  private current: InferDefinition<D>;
  private currentSources: Record<string, ConfigSource>;
  private currentState: LayerState = "unloaded";

  constructor(params: ConfigLayerParams<D, IV>) {
    this.name = params.name;
    this.definition = params.definition;
    this.inner = params.inner;
    this.options = params.options ?? {};

    const innerKeys = new Set(Object.keys(params.inner?.values() ?? EMPTY));
    for (const key of Object.keys(params.definition)) {
      if (innerKeys.has(key)) {
        throw new ConfigError(
          `Field '${key}' of layer '${params.name}' is already defined by an inner layer`,
          `${params.name}.${key}`,
          false
        );
      }
    }

    this.current = { ...params.initial };
    this.currentSources = Object.fromEntries(
      Object.keys(params.definition).map((key) => [key, "initial"] as const)
    );
  }

  get state(): LayerState {
    return this.currentState;
  }

  protected get own(): InferDefinition<D> {
    return this.current;
  }

  reload(): void {
    const collector = this.options.collector;
    collector?.addReload(this.name, "start");

    try {
      this.inner?.reload();
    } catch (e) {
      collector?.addReload(this.name, "failed");
      throw e;
    }

    const env = this.options.env ?? process.env;
    const picks = new Map<string, FieldPick>();
    const missing: { key: string; env: string }[] = [];

    for (const [key, config] of this.fields()) {
      const policy: FieldPolicy = config.policy ?? this.options.policy ?? "default";
      const envSource = `env:${config.env}`;
      const tried = [envSource];

      const envValue = loadEnv(config.env, env);
      if (!isUnset(envValue)) {
        picks.set(key, { config, value: envValue, source: envSource, tried });
        continue;
      }

      if (policy === "default" && config.default !== undefined) {
        tried.push("default");
        picks.set(key, { config, value: config.default, source: "default", tried });
        continue;
      }

      missing.push({ key, env: config.env });
    }

    if (missing.length > 0) {
      const [first] = missing;
      const names = missing.map((m) => m.env);
      collector?.addNote(`${this.name}: missing required environment variables`, { missing: names });
      collector?.addReload(this.name, "failed");
      throw new MissingRequiredValueError(
        first.env,
        `${this.name}.${first.key}`,
        names,
        collector?.getReloadEvents()
      );
    }

    const next: Values = {};
    const nextSources: Record<string, ConfigSource> = {};

    for (const [key, pick] of picks) {
      const { config } = pick;
      const sensitive = config.sensitive ?? false;
      const path = `${this.name}.${key}`;
      const result = config.type.safeParse(pick.value);
      if (!result.success) {
        collector?.addReload(this.name, "failed");
        throw new ConfigError(
          `Invalid config at '${path}': ${result.error.issues[0]?.message} (value: ${formatValue(pick.value, sensitive)})`,
          path,
          sensitive,
          collector?.getReloadEvents()
        );
      }
      next[key] = result.data;
      nextSources[key] = pick.source;
    }

    // Values were produced field by field from `definition`.
    this.current = next as InferDefinition<D>;
    this.currentSources = nextSources;
    this.currentState = "loaded";

    if (collector) {
      for (const [key, pick] of picks) {
        collector.addSourceDecision(`${this.name}.${key}`, pick.source, pick.tried);
      }
      collector.addReload(this.name, "done");
    }
  }

  values(): IV & InferDefinition<D> {
    // IV is Empty exactly when there is no inner layer.
    const innerValues = (this.inner?.values() ?? EMPTY) as IV;
    return { ...innerValues, ...this.current };
  }

  get<K extends keyof (IV & InferDefinition<D>)>(key: K): (IV & InferDefinition<D>)[K] {
    return this.values()[key];
  }

  sources(): Record<string, ConfigSource> {
    return { ...this.inner?.sources(), ...this.currentSources };
  }

  toDebugObject(): Record<string, DebugEntry> {
    const result: Record<string, DebugEntry> = { ...this.inner?.toDebugObject() };
    const own = new Map<string, unknown>(Object.entries(this.current));
    for (const [key, config] of this.fields()) {
      const value = own.get(key);
      result[key] = {
        value: config.sensitive ? "[REDACTED]" : value,
        source: this.currentSources[key] ?? "initial",
      };
    }
    return result;
  }

  toString(): string {
    const redacted = Object.fromEntries(
      Object.entries(this.toDebugObject()).map(([key, entry]) => [key, entry.value])
    );
    return JSON.stringify(redacted, null, 2);
  }

  /** Own fields in declaration order */
  private fields(): [string, FieldConfig][] {
    return Object.entries(this.definition);
  }
}
