import { BaseConfig, DatabaseConfig, MotdConfig, type HostValues, type DatabaseValues } from "./layers";
import type { Layer } from "./layer";
import type { LayerOptions } from "./options";
import type { Empty } from "./types";

/** Layers from outermost to base. */
export function chainOf(layer: Layer): Layer[] {
  const chain: Layer[] = [];
  let current: Layer | undefined = layer;
  while (current !== undefined) {
    chain.push(current);
    current = current.inner;
  }
  return chain;
}

export type AppChain = MotdConfig<Empty & HostValues & DatabaseValues>;

/** base (http://webapp:8080) → database (http://mongodb:27017) → motd, sharing `options`. */
export function createAppChain(options?: LayerOptions): AppChain {
  const base = new BaseConfig("http://webapp", "8080", options);
  const db = new DatabaseConfig(base, "http://mongodb", "27017", options);
  return new MotdConfig(db, "Hello, World!", options);
}
