import { InvalidNameError } from "./errors.js";
import { toSnakeCase } from "./text.js";
import type { TraversalNames } from "./types.js";
import rustKeywords from "./data/rust-keywords.json" with { type: "json" };

const PASCAL_CASE_PATTERN = /^[A-Z][A-Za-z0-9]*$/;
const RESERVED_MODULE_NAMES: ReadonlySet<string> = new Set(rustKeywords);

export function validateModelName(name: string): string {
  if (name.length === 0) {
    throw new InvalidNameError("Model name must not be empty. Use PascalCase, e.g. EnergyCost.");
  }
  if (!PASCAL_CASE_PATTERN.test(name)) {
    throw new InvalidNameError(
      `Invalid model name "${name}". Use PascalCase: start with an uppercase letter, then letters and digits only (e.g. EnergyCost).`,
      { details: { name } }
    );
  }
  const moduleName = toSnakeCase(name);
  if (RESERVED_MODULE_NAMES.has(moduleName)) {
    throw new InvalidNameError(
      `Invalid model name "${name}": its module name "${moduleName}" is a reserved Rust keyword. Choose a more specific name (e.g. ${name}Cost).`,
      { details: { name, moduleName } }
    );
  }
  return name;
}

export function deriveTraversalNames(name: string): TraversalNames {
  const pascal = validateModelName(name);
  return {
    pascal,
    module: toSnakeCase(pascal),
    builder: `${pascal}Builder`,
    service: `${pascal}Service`,
    model: `${pascal}Model`,
    config: `${pascal}Config`,
    params: `${pascal}Params`,
    engine: `${pascal}Engine`
  };
}
