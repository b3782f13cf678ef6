import { describe, it, expect } from "vitest";
import { ConfigError, MissingRequiredValueError, formatValue } from "../src/errors";

describe("ConfigError", () => {
  it("stores path and sensitive flag", () => {
    const err = new ConfigError("bad value", "base.port", true);
    expect(err.path).toBe("base.port");
    expect(err.sensitive).toBe(true);
    expect(err.message).toBe("bad value");
    expect(err.name).toBe("ConfigError");
    expect(err.diagnostics).toBeUndefined();
  });

  it("is instanceof Error", () => {
    expect(new ConfigError("msg", "key", false)).toBeInstanceOf(Error);
  });
});

describe("MissingRequiredValueError", () => {
  it("names the missing variable", () => {
    const err = new MissingRequiredValueError("PORT", "base.port");
    expect(err.message).toBe("PORT environment variable is not set");
    expect(err.variable).toBe("PORT");
    expect(err.path).toBe("base.port");
    expect(err.sensitive).toBe(false);
    expect(err.name).toBe("MissingRequiredValueError");
  });

  it("defaults missing to the single variable", () => {
    expect(new MissingRequiredValueError("DB_PORT", "database.dbPort").missing).toEqual(["DB_PORT"]);
  });

  it("keeps every missing variable when given", () => {
    const err = new MissingRequiredValueError("ADDRESS", "base.address", ["ADDRESS", "PORT"]);
    expect(err.missing).toEqual(["ADDRESS", "PORT"]);
    expect(err.message).toBe("ADDRESS environment variable is not set");
  });

  it("is a ConfigError", () => {
    const err = new MissingRequiredValueError("PORT", "base.port");
    expect(err).toBeInstanceOf(ConfigError);
    expect(err).toBeInstanceOf(Error);
  });
});

describe("formatValue()", () => {
  it("redacts sensitive values", () => {
    expect(formatValue("test-secret", true)).toBe("[REDACTED]");
  });

  it("shows non-sensitive strings quoted", () => {
    expect(formatValue("http://localhost", false)).toBe('"http://localhost"');
  });

  it("shows undefined as 'undefined'", () => {
    expect(formatValue(undefined, false)).toBe("undefined");
  });

  it("shows numbers without quotes", () => {
    expect(formatValue(8081, false)).toBe("8081");
  });
});
