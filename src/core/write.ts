import { access, mkdir, stat, writeFile } from "node:fs/promises";
import { dirname, join } from "node:path";

import { FileWriteError } from "./errors.js";
import type { FileArtifact } from "./types.js";

function normalize(path: string): string {
  return path.replaceAll("\\", "/");
}

export interface ModuleWriteProgress {
  current: number;
  total: number;
  path: string;
}

export interface WriteModuleOptions {
  force?: boolean;
  onProgress?: (event: ModuleWriteProgress) => void;
}

function describeFsError(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

async function pathExists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

export async function assertTargetDirectory(targetDir: string): Promise<void> {
  let isDirectory: boolean;
  try {
    isDirectory = (await stat(targetDir)).isDirectory();
  } catch (error) {
    throw new FileWriteError(`Target path does not exist: ${targetDir}`, {
      cause: error,
      details: { path: targetDir }
    });
  }
  if (!isDirectory) {
    throw new FileWriteError(`Target path is not a directory: ${targetDir}`, { details: { path: targetDir } });
  }
}

/**
 * Writes every artifact under `targetDir`. Without `force`, all destinations are
 * checked first and an existing file aborts the run before anything is written.
 * A later I/O failure leaves already written files in place.
 */
export async function writeModuleFiles(
  targetDir: string,
  files: FileArtifact[],
  options: WriteModuleOptions = {}
): Promise<string[]> {
  const force = options.force ?? false;
  await assertTargetDirectory(targetDir);

  if (!force) {
    for (const file of files) {
      const absolutePath = join(targetDir, file.path);
      if (await pathExists(absolutePath)) {
        throw new FileWriteError(`path '${absolutePath}' already exists. to overwrite, use the --force flag`, {
          details: { path: normalize(file.path) }
        });
      }
    }
  }

  const directories = new Set<string>();
  for (const file of files) {
    directories.add(normalize(dirname(file.path)));
  }
  for (const directory of directories) {
    if (directory === "." || directory === "") continue;
    try {
      await mkdir(join(targetDir, directory), { recursive: true });
    } catch (error) {
      throw new FileWriteError(`Could not create directory ${join(targetDir, directory)}: ${describeFsError(error)}`, {
        cause: error,
        details: { path: directory }
      });
    }
  }

  const written: string[] = [];
  for (const file of files) {
    const absolutePath = join(targetDir, file.path);
    try {
      await writeFile(absolutePath, file.content, { encoding: "utf8", flag: force ? "w" : "wx" });
    } catch (error) {
      throw new FileWriteError(`Could not write ${absolutePath}: ${describeFsError(error)}`, {
        cause: error,
        details: { path: normalize(file.path), written: [...written] }
      });
    }
    written.push(normalize(file.path));
    options.onProgress?.({
      current: written.length,
      total: files.length,
      path: normalize(file.path)
    });
  }
  return written;
}
