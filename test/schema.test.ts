import { describe, it, expect } from "vitest";
import { z } from "zod";
import { defineLayer, field } from "../src/schema";
import { ConfigError } from "../src/errors";

describe("field()", () => {
  it("keeps every option", () => {
    const type = z.string();
    expect(field({ type, env: "MOTD", default: "hi", policy: "default", sensitive: false, doc: "greeting" })).toEqual({
      type,
      env: "MOTD",
      default: "hi",
      policy: "default",
      sensitive: false,
      doc: "greeting",
    });
  });
});

describe("defineLayer()", () => {
  it("returns the definition unchanged", () => {
    const definition = {
      address: field({ type: z.string(), env: "ADDRESS" }),
      port: field({ type: z.string(), env: "PORT" }),
    };
    expect(defineLayer(definition)).toBe(definition);
  });

  it("rejects two fields reading the same variable", () => {
    const build = () =>
      defineLayer({
        host: field({ type: z.string(), env: "ADDRESS" }),
        address: field({ type: z.string(), env: "ADDRESS" }),
      });
    expect(build).toThrow(ConfigError);
    expect(build).toThrow("Fields 'host' and 'address' both read ADDRESS");
  });
});
