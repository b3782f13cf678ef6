import { z } from "zod";
import { defineLayer, field } from "./schema";
import { ConfigLayer, type Layer } from "./layer";
import type { LayerOptions } from "./options";
import type { Empty, InferDefinition } from "./types";

export const baseDefinition = defineLayer({
  address: field({ type: z.string(), env: "ADDRESS", default: "http://localhost", doc: "Host address" }),
  port: field({ type: z.string(), env: "PORT", default: "8081", doc: "Host port" }),
});

export const databaseDefinition = defineLayer({
  dbAddress: field({ type: z.string(), env: "DB_ADDRESS", default: "http://localhost" }),
  dbPort: field({ type: z.string(), env: "DB_PORT", default: "37017" }),
});

export const motdDefinition = defineLayer({
  // Never required, whatever the layer policy.
  motd: field({ type: z.string(), env: "MOTD", default: "Have a Nice Day!", policy: "default" }),
});

export type HostValues = InferDefinition<typeof baseDefinition>;
export type DatabaseValues = InferDefinition<typeof databaseDefinition>;
export type MotdValues = InferDefinition<typeof motdDefinition>;

/** A layer that can answer for the host address and port, directly or by forwarding. */
export interface HostConfig<V extends HostValues = HostValues> extends Layer<V> {
  getHost(): string;
  getPort(): string;
}

export class BaseConfig extends ConfigLayer<typeof baseDefinition, Empty> implements HostConfig<HostValues> {
  constructor(address: string, port: string, options?: LayerOptions) {
    super({ name: "base", definition: baseDefinition, initial: { address, port }, options });
  }

  getHost(): string {
    return this.own.address;
  }

  getPort(): string {
    return this.own.port;
  }
}

export class DatabaseConfig<IV extends HostValues = HostValues>
  extends ConfigLayer<typeof databaseDefinition, IV>
  implements HostConfig<IV & DatabaseValues>
{
  private readonly host: HostConfig<IV>;

  constructor(inner: HostConfig<IV>, dbAddress: string, dbPort: string, options?: LayerOptions) {
    super({ name: "database", definition: databaseDefinition, initial: { dbAddress, dbPort }, inner, options });
    this.host = inner;
  }

  getHost(): string {
    return this.host.getHost();
  }

  getPort(): string {
    return this.host.getPort();
  }

  getDBAddress(): string {
    return this.own.dbAddress;
  }

  getDBPort(): string {
    return this.own.dbPort;
  }
}

export class MotdConfig<IV extends HostValues = HostValues>
  extends ConfigLayer<typeof motdDefinition, IV>
  implements HostConfig<IV & MotdValues>
{
  private readonly host: HostConfig<IV>;

  constructor(inner: HostConfig<IV>, motd: string, options?: LayerOptions) {
    super({ name: "motd", definition: motdDefinition, initial: { motd }, inner, options });
    this.host = inner;
  }

  getHost(): string {
    return this.host.getHost();
  }

  getPort(): string {
    return this.host.getPort();
  }

  getMotd(): string {
    return this.own.motd;
  }
}
