import { posix } from "node:path";

import { includesEngine, includesTypedConfig } from "./extensions.js";
import { deriveTraversalNames } from "./naming.js";
import { buildTraversalStub } from "./templates/traversal/stub.js";
import { buildConfigFile, buildEngineFile, buildParamsFile } from "./templates/traversal/typed.js";
import type { FileArtifact, TraversalExtension } from "./types.js";

export const TRAVERSAL_STUB_FILE = "mod.rs";

/**
 * Renders the files of a traversal model module, keyed by path relative to the
 * target directory. Pure: the same name and extension always yield the same text.
 */
export function renderTraversalModule(name: string, extension: TraversalExtension): FileArtifact[] {
  const names = deriveTraversalNames(name);
  const inModule = (file: string): string => posix.join(names.module, file);

  const files: FileArtifact[] = [
    { path: inModule(TRAVERSAL_STUB_FILE), content: buildTraversalStub(names, extension) }
  ];

  if (includesTypedConfig(extension)) {
    files.push({ path: inModule("config.rs"), content: buildConfigFile(names) });
    files.push({ path: inModule("params.rs"), content: buildParamsFile(names) });
  }

  if (includesEngine(extension)) {
    files.push({ path: inModule("engine.rs"), content: buildEngineFile(names) });
  }

  return files;
}
