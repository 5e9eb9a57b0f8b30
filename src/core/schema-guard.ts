import { readFile, writeFile } from "node:fs/promises";
import { resolve } from "node:path";

import { FileWriteError, MissingBaselineError, SubprocessFailureError } from "./errors.js";
import type { CommandRunner } from "./process.js";
import { runCommand } from "./process.js";
import type { EmitterCommand, SchemaCheckResult, SchemaUpdateResult } from "./types.js";

export interface SchemaGuardOptions {
  cwd: string;
  schemaPath: string;
  emitter: EmitterCommand;
  timeoutMs?: number;
  runner?: CommandRunner;
}

function isMissingFileError(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

export async function generateSchema(options: SchemaGuardOptions): Promise<Buffer> {
  const runner = options.runner ?? runCommand;
  const { command, args } = options.emitter;
  const result = await runner(command, args, { cwd: options.cwd, timeoutMs: options.timeoutMs });
  if (!result.ok) {
    const stderrTail = result.stderr.trim();
    throw new SubprocessFailureError(
      `Schema emitter \`${[command, ...args].join(" ")}\` failed (${result.reason ?? "unknown reason"}).`,
      { details: { command, args, ...(stderrTail ? { stderr: stderrTail } : {}) } }
    );
  }
  return result.stdout;
}

async function readBaseline(schemaPath: string): Promise<Buffer> {
  try {
    return await readFile(schemaPath);
  } catch (error) {
    const reason = isMissingFileError(error) ? "does not exist" : "could not be read";
    throw new MissingBaselineError(`Committed schema ${schemaPath} ${reason}.`, {
      cause: error,
      details: { path: schemaPath }
    });
  }
}

/** Compares a freshly emitted schema with the committed one. Never writes. */
export async function checkSchema(options: SchemaGuardOptions): Promise<SchemaCheckResult> {
  const schemaPath = resolve(options.cwd, options.schemaPath);
  const baseline = await readBaseline(schemaPath);
  const current = await generateSchema(options);
  return {
    status: baseline.equals(current) ? "up-to-date" : "out-of-date",
    schemaPath
  };
}

/**
 * Accepts the freshly emitted schema as the new baseline. The committed file is
 * only rewritten when its bytes differ, so an up-to-date file keeps its mtime.
 */
export async function updateSchema(options: SchemaGuardOptions): Promise<SchemaUpdateResult> {
  const schemaPath = resolve(options.cwd, options.schemaPath);
  const current = await generateSchema(options);

  let baseline: Buffer | null = null;
  try {
    baseline = await readFile(schemaPath);
  } catch (error) {
    if (!isMissingFileError(error)) {
      throw new MissingBaselineError(`Committed schema ${schemaPath} could not be read.`, {
        cause: error,
        details: { path: schemaPath }
      });
    }
  }

  if (baseline?.equals(current)) {
    return { status: "unchanged", schemaPath };
  }
  try {
    await writeFile(schemaPath, current);
  } catch (error) {
    throw new FileWriteError(`Could not write committed schema ${schemaPath}.`, {
      cause: error,
      details: { path: schemaPath }
    });
  }
  return { status: baseline === null ? "created" : "updated", schemaPath };
}
