import { resolve } from "node:path";

import { log, spinner } from "@clack/prompts";

import { loadSchemaGuardConfig, parseEmitterCommand } from "../core/config.js";
import { SchemaOutOfDateError } from "../core/errors.js";
import type { SchemaGuardOptions } from "../core/schema-guard.js";
import { checkSchema, updateSchema } from "../core/schema-guard.js";
import type { SchemaCheckResult, SchemaCommandOptions, SchemaUpdateResult } from "../core/types.js";
import { toDisplayPath } from "./shared.js";

const SCHEMA_OUT_OF_DATE_MESSAGE = "Schema is out of date. Run ./scripts/update-schema.sh";

function resolveGuardOptions(options: SchemaCommandOptions): SchemaGuardOptions {
  const config = loadSchemaGuardConfig();
  return {
    cwd: resolve(process.cwd(), options.cwd ?? "."),
    schemaPath: options.schema ?? config.schemaPath,
    emitter: parseEmitterCommand(options.emitter ?? config.emitterCommand),
    timeoutMs: config.timeoutMs
  };
}

async function withEmitterSpinner<T>(guard: SchemaGuardOptions, task: () => Promise<T>): Promise<T> {
  const emitSpinner = spinner({ indicator: "dots" });
  emitSpinner.start(`Generating schema with \`${[guard.emitter.command, ...guard.emitter.args].join(" ")}\`...`);
  try {
    const result = await task();
    emitSpinner.stop("Schema generated.");
    return result;
  } catch (error) {
    emitSpinner.error("Schema generation failed.");
    throw error;
  }
}

export async function runSchemaCheck(options: SchemaCommandOptions): Promise<SchemaCheckResult> {
  const guard = resolveGuardOptions(options);
  const result = await withEmitterSpinner(guard, () => checkSchema(guard));
  const displayPath = toDisplayPath(result.schemaPath);

  if (result.status === "out-of-date") {
    log.error(SCHEMA_OUT_OF_DATE_MESSAGE);
    throw new SchemaOutOfDateError(SCHEMA_OUT_OF_DATE_MESSAGE, {
      details: { path: displayPath, reported: true }
    });
  }

  log.success(`Schema \`${displayPath}\` is up to date.`);
  return result;
}

export async function runSchemaUpdate(options: SchemaCommandOptions): Promise<SchemaUpdateResult> {
  const guard = resolveGuardOptions(options);
  const result = await withEmitterSpinner(guard, () => updateSchema(guard));
  const displayPath = toDisplayPath(result.schemaPath);

  if (result.status === "unchanged") {
    log.info(`Schema \`${displayPath}\` already up to date; left untouched.`);
  } else if (result.status === "created") {
    log.success(`Created schema \`${displayPath}\`.`);
  } else {
    log.success(`Updated schema \`${displayPath}\`.`);
  }
  return result;
}
