import { log } from "@clack/prompts";
import { Command, CommanderError, Option } from "commander";

import { runSchemaCheck, runSchemaUpdate } from "./commands/schema.js";
import { runTraversal } from "./commands/traversal.js";
import type { CliOutputFormat } from "./core/errors.js";
import { CLI_OUTPUT_FORMATS, normalizeError, toJsonErrorPayload } from "./core/errors.js";
import { TRAVERSAL_EXTENSIONS } from "./core/extensions.js";
import type { SchemaCommandOptions, TraversalCommandOptions } from "./core/types.js";
import packageJson from "../package.json" with { type: "json" };

const CLI_VERSION = packageJson.version;

function formatOption(): Option {
  return new Option("--format <format>", "Error output format").choices(CLI_OUTPUT_FORMATS).default("text");
}

function addSchemaOptions(command: Command): Command {
  return command
    .option("--schema <file>", "Committed schema file (default: $COMPASS_SCHEMA_PATH or docs/compass-config-schema.json)")
    .option("--emitter <command>", "Command printing the current schema to stdout (default: $COMPASS_SCHEMA_COMMAND)")
    .option("--cwd <dir>", "Directory the emitter runs in and paths resolve against")
    .addOption(formatOption());
}

export function createProgram(format: CliOutputFormat): Command {
  const program = new Command();

  program
    .name("compass-codegen")
    .description("Code generation tools for RouteE Compass plugin development.")
    .version(CLI_VERSION)
    .exitOverride();

  // the JSON payload replaces commander's own usage message on stderr
  if (format === "json") {
    program.configureOutput({ writeErr: () => undefined });
  }

  program
    .command("traversal")
    .description("Generate a new TraversalModel module.")
    .argument("<name>", "Name of the traversal model in PascalCase (e.g. EnergyCost)")
    .argument("<path>", "Existing parent directory where the module should be created (e.g. src)")
    .option("--extensions <extension>", `${TRAVERSAL_EXTENSIONS.join(" | ")} (default: none)`)
    .option("-f, --force", "Overwrite existing files", false)
    .addOption(formatOption())
    .action(async (nameArg: string, pathArg: string, rawOptions: TraversalCommandOptions) => {
      await runTraversal(nameArg, pathArg, rawOptions);
    });

  const schema = program.command("schema").description("Keep the committed Compass configuration schema in sync.");

  addSchemaOptions(
    schema.command("check").description("Fail when the committed schema differs from freshly generated output.")
  ).action(async (rawOptions: SchemaCommandOptions) => {
    await runSchemaCheck(rawOptions);
  });

  addSchemaOptions(
    schema.command("update").description("Regenerate the schema and accept it as the committed baseline.")
  ).action(async (rawOptions: SchemaCommandOptions) => {
    await runSchemaUpdate(rawOptions);
  });

  return program;
}

/**
 * The output format has to be known before commander parses anything, since
 * usage errors are raised during parsing.
 */
export function outputFormatFromArgv(argv: readonly string[]): CliOutputFormat {
  const index = argv.findIndex((token) => token === "--format" || token.startsWith("--format="));
  if (index === -1) return "text";
  const token = argv[index] ?? "";
  const value = token === "--format" ? argv[index + 1] : token.slice("--format=".length);
  return value?.trim().toLowerCase() === "json" ? "json" : "text";
}

/** Runs the CLI against a full argv (node, script, ...args) and returns the exit code. */
export async function runCli(argv: string[]): Promise<number> {
  const format = outputFormatFromArgv(argv);
  try {
    await createProgram(format).parseAsync(argv);
    return 0;
  } catch (error) {
    if (error instanceof CommanderError && error.exitCode === 0) return 0;
    const normalized = normalizeError(error);
    if (format === "json") {
      process.stderr.write(`${JSON.stringify(toJsonErrorPayload(normalized), null, 2)}\n`);
    } else if (!(error instanceof CommanderError) && normalized.details?.reported !== true) {
      log.error(normalized.message, { output: process.stderr });
    }
    return normalized.exitCode;
  }
}
