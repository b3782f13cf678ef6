import { describe, it, expect } from "vitest";
import * as confchain from "../src/index";

describe("package entry", () => {
  it("exports the public surface", () => {
    expect(Object.keys(confchain).sort()).toEqual([
      "BaseConfig",
      "ConfigError",
      "ConfigLayer",
      "DatabaseConfig",
      "DiagnosticsCollector",
      "MissingRequiredValueError",
      "MotdConfig",
      "POLICY_ENV",
      "baseDefinition",
      "chainOf",
      "createAppChain",
      "databaseDefinition",
      "defineLayer",
      "field",
      "loadEnv",
      "motdDefinition",
      "policyFromEnv",
    ]);
  });

  it("builds a working chain from the entry point", () => {
    const chain = confchain.createAppChain({ env: { MOTD: "hi" } });
    chain.reload();
    expect(chain.getMotd()).toBe("hi");
  });
});
