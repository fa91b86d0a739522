import { mkdir, mkdtemp, open, readdir, rename, rm, rmdir, stat, writeFile } from "node:fs/promises";
import type { FileHandle } from "node:fs/promises";
import { basename, dirname, join } from "node:path";

import { IOError, errnoCode, toIOError } from "./errors.js";
import type { RenderedFile } from "./types.js";

function normalize(path: string): string {
  return path.replaceAll("\\", "/");
}

export type MaterializeStage = "directories" | "files";

export interface MaterializeProgress {
  stage: MaterializeStage;
  current: number;
  total: number;
  path: string;
}

export interface MaterializeOptions {
  /** Replace a non-empty module directory instead of refusing. */
  overwrite?: boolean;
  onProgress?: (event: MaterializeProgress) => void;
}

export interface MaterializeOutcome {
  modulePath: string;
  directories: string[];
  filesWritten: number;
  bytesWritten: number;
  elapsedMs: number;
}

type TargetState = "missing" | "empty" | "occupied";

const IGNORED_ENTRIES = new Set([".DS_Store"]);
const EXECUTABLE_SUFFIXES = [".sh"];

export function lockPathFor(moduleDir: string): string {
  return join(dirname(moduleDir), `.${basename(moduleDir)}.lock`);
}

export function stagingPrefixFor(moduleDir: string): string {
  return join(dirname(moduleDir), `.${basename(moduleDir)}.partial-`);
}

export function plannedDirectories(directories: readonly string[], files: readonly RenderedFile[]): string[] {
  const planned = new Set<string>();
  for (const directory of directories) {
    planned.add(normalize(directory));
  }
  for (const file of files) {
    planned.add(normalize(dirname(file.path)));
  }
  return Array.from(planned).filter((directory) => directory !== "." && directory !== "");
}

async function acquireLock(moduleDir: string): Promise<() => Promise<void>> {
  const lockPath = lockPathFor(moduleDir);
  let handle: FileHandle;
  try {
    handle = await open(lockPath, "wx");
  } catch (error) {
    if (errnoCode(error) === "EEXIST") {
      throw new IOError("InProgress", `Another generation of "${moduleDir}" is in progress (lock file ${lockPath}).`, {
        cause: error,
        details: { modulePath: moduleDir, lockPath }
      });
    }
    throw toIOError(error, `creating lock file ${lockPath}`);
  }

  try {
    await handle.writeFile(`${process.pid}\n`, "utf8");
  } catch (error) {
    await handle.close();
    await rm(lockPath, { force: true });
    throw toIOError(error, `writing lock file ${lockPath}`);
  }
  await handle.close();

  return async () => {
    await rm(lockPath, { force: true });
  };
}

async function inspectTarget(moduleDir: string, overwrite: boolean): Promise<TargetState> {
  let isDirectory: boolean;
  try {
    isDirectory = (await stat(moduleDir)).isDirectory();
  } catch (error) {
    if (errnoCode(error) === "ENOENT") return "missing";
    throw toIOError(error, `inspecting ${moduleDir}`);
  }

  if (!isDirectory) {
    throw new IOError("AlreadyExists", `Target path "${moduleDir}" exists and is not a directory.`, {
      details: { modulePath: moduleDir }
    });
  }

  const entries = (await readdir(moduleDir)).filter((entry) => !IGNORED_ENTRIES.has(entry));
  if (entries.length === 0) return "empty";

  if (!overwrite) {
    throw new IOError(
      "AlreadyExists",
      `Module directory "${moduleDir}" already exists and is not empty (${entries.length} entries). Use --force to overwrite.`,
      { details: { modulePath: moduleDir, entries: entries.length } }
    );
  }
  return "occupied";
}

// rmdir refuses a directory that gained entries after inspection; those entries are never deleted.
async function removeEmptyTarget(moduleDir: string): Promise<void> {
  for (const entry of IGNORED_ENTRIES) {
    await rm(join(moduleDir, entry), { force: true });
  }
  try {
    await rmdir(moduleDir);
  } catch (error) {
    const code = errnoCode(error);
    if (code === "ENOTEMPTY" || code === "EEXIST") {
      throw new IOError("AlreadyExists", `Module directory "${moduleDir}" gained entries during generation. Nothing was replaced.`, {
        cause: error,
        details: { modulePath: moduleDir }
      });
    }
    throw error;
  }
}

async function restoreBackup(backupDir: string, moduleDir: string, failure: unknown): Promise<void> {
  try {
    await rename(backupDir, moduleDir);
  } catch (restoreError) {
    const reason = restoreError instanceof Error ? restoreError.message : String(restoreError);
    throw new IOError(
      "WriteFailure",
      `Failed while writing module ${moduleDir}; the previous directory is kept at ${backupDir} (restore failed: ${reason})`,
      { cause: failure, details: { modulePath: moduleDir, backupPath: backupDir } }
    );
  }
}

function fileMode(path: string): number {
  return EXECUTABLE_SUFFIXES.some((suffix) => path.endsWith(suffix)) ? 0o755 : 0o644;
}

async function writeStaging(
  stagingDir: string,
  directories: string[],
  files: readonly RenderedFile[],
  onProgress: MaterializeOptions["onProgress"]
): Promise<number> {
  let createdDirectories = 0;
  for (const directory of directories) {
    await mkdir(join(stagingDir, directory), { recursive: true });
    createdDirectories += 1;
    onProgress?.({
      stage: "directories",
      current: createdDirectories,
      total: directories.length,
      path: directory
    });
  }

  let bytesWritten = 0;
  let writtenFiles = 0;
  for (const file of files) {
    await writeFile(join(stagingDir, file.path), file.content, { encoding: "utf8", flag: "wx", mode: fileMode(file.path) });
    bytesWritten += file.byteSize;
    writtenFiles += 1;
    onProgress?.({
      stage: "files",
      current: writtenFiles,
      total: files.length,
      path: file.path
    });
  }
  return bytesWritten;
}

/**
 * Writes a module directory in one step: everything lands in a sibling staging directory first and is
 * renamed onto `moduleDir` only once every file is on disk. On failure nothing is left behind and a
 * replaced directory is restored.
 */
export async function materializeModule(
  moduleDir: string,
  directories: readonly string[],
  files: readonly RenderedFile[],
  options: MaterializeOptions = {}
): Promise<MaterializeOutcome> {
  const startedAt = performance.now();
  const parentDir = dirname(moduleDir);
  const planned = plannedDirectories(directories, files);

  try {
    await mkdir(parentDir, { recursive: true });
  } catch (error) {
    throw toIOError(error, `creating output directory ${parentDir}`);
  }

  const releaseLock = await acquireLock(moduleDir);
  try {
    const state = await inspectTarget(moduleDir, options.overwrite === true);

    let stagingDir: string | undefined;
    let backupDir: string | undefined;
    let bytesWritten: number;
    try {
      stagingDir = await mkdtemp(stagingPrefixFor(moduleDir));
      bytesWritten = await writeStaging(stagingDir, planned, files, options.onProgress);

      if (state === "occupied") {
        const previousDir = `${stagingDir}.previous`;
        await rename(moduleDir, previousDir);
        backupDir = previousDir;
      } else if (state === "empty") {
        await removeEmptyTarget(moduleDir);
      }
      await rename(stagingDir, moduleDir);
    } catch (error) {
      if (stagingDir) {
        await rm(stagingDir, { recursive: true, force: true });
      }
      if (backupDir) {
        // The target was moved aside but never replaced.
        await restoreBackup(backupDir, moduleDir, error);
      }
      throw toIOError(error, `writing module ${moduleDir}`);
    }

    if (backupDir) {
      await rm(backupDir, { recursive: true, force: true });
    }

    return {
      modulePath: moduleDir,
      directories: planned,
      filesWritten: files.length,
      bytesWritten,
      elapsedMs: performance.now() - startedAt
    };
  } finally {
    await releaseLock();
  }
}
