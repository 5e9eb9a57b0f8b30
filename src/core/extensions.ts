import { z } from "zod";

import { UnknownExtensionError } from "./errors.js";
import type { TraversalExtension } from "./types.js";

export const TRAVERSAL_EXTENSIONS = ["none", "typed-config", "typed-config-and-engine"] as const;

const traversalExtensionSchema = z.enum(TRAVERSAL_EXTENSIONS);

export function resolveExtension(flag: string | undefined): TraversalExtension {
  if (flag === undefined) return "none";
  const parsed = traversalExtensionSchema.safeParse(flag.trim());
  if (!parsed.success) {
    throw new UnknownExtensionError(
      `Unknown --extensions value "${flag}". Expected one of: ${TRAVERSAL_EXTENSIONS.join(", ")}.`,
      { details: { value: flag } }
    );
  }
  return parsed.data;
}

export function includesTypedConfig(extension: TraversalExtension): boolean {
  return extension === "typed-config" || extension === "typed-config-and-engine";
}

export function includesEngine(extension: TraversalExtension): boolean {
  return extension === "typed-config-and-engine";
}
