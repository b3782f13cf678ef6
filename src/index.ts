export { ConfigLayer } from "./layer";
export { BaseConfig, DatabaseConfig, MotdConfig, baseDefinition, databaseDefinition, motdDefinition } from "./layers";
export { chainOf, createAppChain } from "./chain";
export { field, defineLayer } from "./schema";
export { policyFromEnv, POLICY_ENV } from "./options";
export { loadEnv } from "./loaders/env";
export { ConfigError, MissingRequiredValueError } from "./errors";
export { DiagnosticsCollector } from "./diagnostics";
export type { Layer, ConfigLayerParams } from "./layer";
export type { HostConfig, HostValues, DatabaseValues, MotdValues } from "./layers";
export type { AppChain } from "./chain";
export type { LayerOptions } from "./options";
export type {
  ConfigSource,
  DebugEntry,
  DiagnosticEvent,
  EnvSource,
  FieldConfig,
  FieldPolicy,
  InferDefinition,
  LayerDefinition,
  LayerState,
} from "./types";
