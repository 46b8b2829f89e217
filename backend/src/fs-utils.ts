/**
 * Filesystem helpers shared by the stores, the migration and the config loader.
 */

import { access, readFile, stat } from "node:fs/promises";
import { mkdirSync, renameSync, unlinkSync, writeFileSync } from "node:fs";
import { basename, dirname, join } from "node:path";

/**
 * Checks whether a regular file exists at the given path.
 */
export async function fileExists(filePath: string): Promise<boolean> {
  try {
    await access(filePath);
    const stats = await stat(filePath);
    return stats.isFile();
  } catch {
    return false;
  }
}

/**
 * True if `error` is a Node system error with the given code (e.g. "ENOENT").
 */
export function hasErrorCode(error: unknown, code: string): boolean {
  return error instanceof Error && "code" in error && error.code === code;
}

/**
 * Write a file atomically using the temp+rename pattern.
 * The directory is created if missing. Throws if the write fails.
 */
export function writeFileAtomicSync(path: string, content: string): void {
  const dir = dirname(path);
  const tempPath = join(dir, `.${basename(path)}.${Date.now()}.tmp`);

  try {
    mkdirSync(dir, { recursive: true });
    writeFileSync(tempPath, content, "utf-8");
    renameSync(tempPath, path);
  } catch (e) {
    try {
      unlinkSync(tempPath);
    } catch {
      // Temp file may never have been created
    }
    throw e;
  }
}

export type JsonDocument = { raw: unknown } | { error: string };

/**
 * Read a JSON document. Returns null when the file does not exist and
 * `{ error }` when it is not valid JSON; other read errors are thrown.
 */
export async function readJsonDocument(path: string): Promise<JsonDocument | null> {
  let content: string;
  try {
    content = await readFile(path, "utf-8");
  } catch (e) {
    if (hasErrorCode(e, "ENOENT")) {
      return null;
    }
    throw e;
  }

  try {
    return { raw: JSON.parse(content) };
  } catch (e) {
    return { error: e instanceof Error ? e.message : String(e) };
  }
}
