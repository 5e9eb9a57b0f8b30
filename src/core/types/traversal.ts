import type { TraversalExtension } from "./common.js";

/**
 * Identifiers derived from a PascalCase model name. `module` is the snake_case
 * directory name; the rest are the type names used across the generated files.
 */
export interface TraversalNames {
  pascal: string;
  module: string;
  builder: string;
  service: string;
  model: string;
  config: string;
  params: string;
  engine: string;
}

export interface TraversalCommandOptions {
  extensions?: string;
  force?: boolean;
  format?: string;
}

export interface TraversalGenerationInput {
  name: string;
  targetDir: string;
  extension: TraversalExtension;
  force: boolean;
}
