export type { SchemaCheckStatus, SchemaUpdateStatus, TraversalExtension } from "./types/common.js";
export type { FileArtifact } from "./types/artifacts.js";
export type {
  TraversalCommandOptions,
  TraversalGenerationInput,
  TraversalNames
} from "./types/traversal.js";
export type {
  EmitterCommand,
  SchemaCheckResult,
  SchemaCommandOptions,
  SchemaUpdateResult
} from "./types/schema.js";
