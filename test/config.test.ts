import { describe, expect, it } from "vitest";

import {
  DEFAULT_SCHEMA_COMMAND,
  DEFAULT_SCHEMA_PATH,
  loadSchemaGuardConfig,
  parseEmitterCommand
} from "../src/core/config.js";
import { ConfigError } from "../src/core/errors.js";

describe("schema guard config", () => {
  it("falls back to defaults for an empty environment", () => {
    expect(loadSchemaGuardConfig({})).toEqual({
      schemaPath: DEFAULT_SCHEMA_PATH,
      emitterCommand: DEFAULT_SCHEMA_COMMAND,
      timeoutMs: 600_000
    });
  });

  it("reads overrides from the environment", () => {
    const config = loadSchemaGuardConfig({
      COMPASS_SCHEMA_PATH: " schema/compass.json ",
      COMPASS_SCHEMA_COMMAND: "./target/release/compass-schema",
      COMPASS_SCHEMA_TIMEOUT_SEC: "30"
    });

    expect(config).toEqual({
      schemaPath: "schema/compass.json",
      emitterCommand: "./target/release/compass-schema",
      timeoutMs: 30_000
    });
  });

  it("rejects invalid values", () => {
    expect(() => loadSchemaGuardConfig({ COMPASS_SCHEMA_TIMEOUT_SEC: "soon" })).toThrow(ConfigError);
    expect(() => loadSchemaGuardConfig({ COMPASS_SCHEMA_TIMEOUT_SEC: "0" })).toThrow(
      /^Invalid schema guard environment: COMPASS_SCHEMA_TIMEOUT_SEC: /
    );
    expect(() => loadSchemaGuardConfig({ COMPASS_SCHEMA_PATH: "   " })).toThrow(ConfigError);
  });
});

describe("parseEmitterCommand", () => {
  it("splits the command on whitespace", () => {
    expect(parseEmitterCommand(DEFAULT_SCHEMA_COMMAND)).toEqual({
      command: "cargo",
      args: ["run", "--quiet", "--manifest-path", "rust/Cargo.toml", "--bin", "compass-schema"]
    });
    expect(parseEmitterCommand("  compass-schema  ")).toEqual({ command: "compass-schema", args: [] });
  });

  it("rejects an empty command", () => {
    expect(() => parseEmitterCommand("   ")).toThrow("Schema emitter command must not be empty.");
  });
});
