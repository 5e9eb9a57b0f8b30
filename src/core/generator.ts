import { join } from "node:path";

import { deriveTraversalNames } from "./naming.js";
import { renderTraversalModule } from "./templates.js";
import type { FileArtifact, TraversalGenerationInput } from "./types.js";
import type { ModuleWriteProgress } from "./write.js";
import { writeModuleFiles } from "./write.js";

export interface GeneratedTraversalModule {
  moduleName: string;
  moduleDir: string;
  files: FileArtifact[];
}

export interface GenerateTraversalOptions {
  onProgress?: (event: ModuleWriteProgress) => void;
}

export async function generateTraversalModule(
  input: TraversalGenerationInput,
  options: GenerateTraversalOptions = {}
): Promise<GeneratedTraversalModule> {
  const names = deriveTraversalNames(input.name);
  const files = renderTraversalModule(names.pascal, input.extension);
  await writeModuleFiles(input.targetDir, files, {
    force: input.force,
    ...(options.onProgress ? { onProgress: options.onProgress } : {})
  });
  return {
    moduleName: names.module,
    moduleDir: join(input.targetDir, names.module),
    files
  };
}
