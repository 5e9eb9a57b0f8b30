import type { SchemaCheckStatus, SchemaUpdateStatus } from "./common.js";

export interface SchemaCommandOptions {
  schema?: string;
  emitter?: string;
  cwd?: string;
  format?: string;
}

export interface EmitterCommand {
  command: string;
  args: string[];
}

export interface SchemaCheckResult {
  status: SchemaCheckStatus;
  schemaPath: string;
}

export interface SchemaUpdateResult {
  status: SchemaUpdateStatus;
  schemaPath: string;
}
