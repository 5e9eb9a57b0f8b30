import { resolve } from "node:path";

import { log, spinner } from "@clack/prompts";

import { resolveExtension } from "../core/extensions.js";
import type { GeneratedTraversalModule } from "../core/generator.js";
import { generateTraversalModule } from "../core/generator.js";
import { validateModelName } from "../core/naming.js";
import type { TraversalCommandOptions } from "../core/types.js";
import { toDisplayPath } from "./shared.js";

export async function runTraversal(
  nameArg: string,
  pathArg: string,
  options: TraversalCommandOptions
): Promise<GeneratedTraversalModule> {
  const name = validateModelName(nameArg);
  const extension = resolveExtension(options.extensions);
  const targetDir = resolve(process.cwd(), pathArg);
  const force = options.force ?? false;

  const writeSpinner = spinner({ indicator: "dots" });
  writeSpinner.start(`Generating ${name} traversal module in \`${toDisplayPath(targetDir)}\`...`);

  let generated: GeneratedTraversalModule;
  try {
    generated = await generateTraversalModule(
      { name, targetDir, extension, force },
      {
        onProgress(event) {
          writeSpinner.message(`Writing files ${event.current}/${event.total}: ${event.path}`);
        }
      }
    );
    writeSpinner.stop("Module files written.");
  } catch (error) {
    writeSpinner.error("Module generation failed.");
    throw error;
  }

  log.success(`Generated TraversalModel module at \`${toDisplayPath(generated.moduleDir)}\`.`);
  for (const file of generated.files) {
    log.info(`  ${file.path}`);
  }
  if (force) {
    log.warn("Existing files were overwritten because --force was set.");
  }
  log.step("Next steps:");
  log.info(`1. Add 'mod ${generated.moduleName};' to the parent module`);
  log.info("2. Implement the trait methods marked with todo!()");
  log.info("3. Register the builder with inventory::submit! in your plugin registration");

  return generated;
}
