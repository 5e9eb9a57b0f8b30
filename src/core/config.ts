import { z } from "zod";

import { ConfigError } from "./errors.js";
import type { EmitterCommand } from "./types.js";

export const DEFAULT_SCHEMA_PATH = "docs/compass-config-schema.json";
export const DEFAULT_SCHEMA_COMMAND = "cargo run --quiet --manifest-path rust/Cargo.toml --bin compass-schema";
const DEFAULT_SCHEMA_TIMEOUT_SEC = 600;

const schemaGuardEnvSchema = z.object({
  COMPASS_SCHEMA_PATH: z.string().trim().min(1).default(DEFAULT_SCHEMA_PATH),
  COMPASS_SCHEMA_COMMAND: z.string().trim().min(1).default(DEFAULT_SCHEMA_COMMAND),
  COMPASS_SCHEMA_TIMEOUT_SEC: z.coerce.number().int().min(1).max(3600).default(DEFAULT_SCHEMA_TIMEOUT_SEC)
});

export interface SchemaGuardConfig {
  schemaPath: string;
  emitterCommand: string;
  timeoutMs: number;
}

export function loadSchemaGuardConfig(env: NodeJS.ProcessEnv = process.env): SchemaGuardConfig {
  const parsed = schemaGuardEnvSchema.safeParse({
    COMPASS_SCHEMA_PATH: env.COMPASS_SCHEMA_PATH,
    COMPASS_SCHEMA_COMMAND: env.COMPASS_SCHEMA_COMMAND,
    COMPASS_SCHEMA_TIMEOUT_SEC: env.COMPASS_SCHEMA_TIMEOUT_SEC
  });
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
    throw new ConfigError(`Invalid schema guard environment: ${issues.join("; ")}`, {
      details: { issues }
    });
  }
  return {
    schemaPath: parsed.data.COMPASS_SCHEMA_PATH,
    emitterCommand: parsed.data.COMPASS_SCHEMA_COMMAND,
    timeoutMs: parsed.data.COMPASS_SCHEMA_TIMEOUT_SEC * 1000
  };
}

export function parseEmitterCommand(raw: string): EmitterCommand {
  const [command, ...args] = raw.trim().split(/\s+/).filter((token) => token.length > 0);
  if (!command) {
    throw new ConfigError("Schema emitter command must not be empty.");
  }
  return { command, args };
}
