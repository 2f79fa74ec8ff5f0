/**
 * Proxy Sheets – Shared Logging & Filesystem Helpers
 *
 * PURPOSE:
 *   Centralizes the tagged log helpers and the file utilities every step relies on:
 *   directory creation, existence probes, and atomic writes so that no reader ever
 *   observes a half-written manifest or PDF.
 *
 * CONTEXT:
 *   - Every log line is tagged with the step that produced it, e.g. `[sourceLoader]`.
 *   - Atomic writes go to `<target>.partial` first and are renamed into place.
 */

import fs from 'fs';
import path from 'path';

import { logger } from './logger';

/**
 * Logs a debug-level message with a context tag (step/module name).
 */
export function logDebug(tag: string, message: string) {
  logger.debug(`[${tag}] ${message}`);
}

/**
 * Logs an info-level message with a context tag (step/module name).
 * Example: logInfo('sourceLoader', 'Loaded 1834 printings from 12 files')
 */
export function logInfo(tag: string, message: string) {
  logger.info(`[${tag}] ${message}`);
}

/**
 * Logs a warn-level message with a context tag. Used for overrides that amend existing records.
 */
export function logWarn(tag: string, message: string) {
  logger.warn(`[${tag}] ${message}`);
}

/**
 * Logs an error-level message with a context tag (step/module name).
 * Example: logError('prepare', 'MergeConflictError: printing 01001 declared twice (ids: 01001)')
 */
export function logError(tag: string, message: string) {
  logger.error(`[${tag}] ${message}`);
}

/**
 * Ensures the specified directory exists; creates it recursively if missing.
 */
export async function ensureDirExists(dirPath: string): Promise<void> {
  await fs.promises.mkdir(dirPath, { recursive: true });
}

/** True when the path exists and is a regular file. */
export async function fileExists(filePath: string): Promise<boolean> {
  try {
    const stat = await fs.promises.stat(filePath);
    return stat.isFile();
  } catch {
    return false;
  }
}

/** True when the path exists and is a directory. */
export async function dirExists(dirPath: string): Promise<boolean> {
  try {
    const stat = await fs.promises.stat(dirPath);
    return stat.isDirectory();
  } catch {
    return false;
  }
}

/**
 * Writes `data` to `<filePath>.partial` and renames it over `filePath`.
 * The temporary file is removed when the write fails.
 */
export async function writeFileAtomic(filePath: string, data: string | Buffer): Promise<void> {
  await ensureDirExists(path.dirname(path.resolve(filePath)));
  const tempPath = `${filePath}.partial`;
  try {
    await fs.promises.writeFile(tempPath, data);
    await fs.promises.rename(tempPath, filePath);
  } catch (err) {
    await fs.promises.rm(tempPath, { force: true });
    throw err;
  }
}

/**
 * Writes several files as one unit: every `<path>.partial` is written before any rename.
 * When a write fails, all temporary files are removed and no target is touched.
 */
export async function writeFilesAtomic(files: ReadonlyArray<{ path: string; data: string | Buffer }>): Promise<void> {
  const staged: string[] = [];
  try {
    for (const file of files) {
      await ensureDirExists(path.dirname(path.resolve(file.path)));
      const tempPath = `${file.path}.partial`;
      staged.push(tempPath);
      await fs.promises.writeFile(tempPath, file.data);
    }
  } catch (err) {
    await Promise.all(staged.map((tempPath) => fs.promises.rm(tempPath, { force: true })));
    throw err;
  }
  for (const file of files) {
    await fs.promises.rename(`${file.path}.partial`, file.path);
  }
}
