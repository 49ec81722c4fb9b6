/**
 * Data File I/O
 *
 * Reading and atomic writing of the JSON files in the config directory.
 */

import { readFile, writeFile, rename, unlink, mkdir } from "node:fs/promises";
import { basename, dirname, join } from "node:path";
import { createLogger } from "../logger.js";

const log = createLogger("data-files");

/**
 * Read a UTF-8 file, or null if it does not exist.
 * Other read errors propagate.
 */
export async function readTextFile(path: string): Promise<string | null> {
  try {
    return await readFile(path, "utf-8");
  } catch (e) {
    if ((e as NodeJS.ErrnoException).code === "ENOENT") {
      return null;
    }
    throw e;
  }
}

/**
 * Result of JSON.parse on file content.
 */
export type JsonParseResult = { success: true; value: unknown } | { success: false; error: string };

export function parseJson(content: string): JsonParseResult {
  try {
    return { success: true, value: JSON.parse(content) };
  } catch (e) {
    const message = e instanceof Error ? e.message : String(e);
    return { success: false, error: message };
  }
}

/**
 * Write a value as 2-space indented JSON via a temp file and rename.
 */
export async function writeJsonFile(path: string, value: unknown): Promise<void> {
  const dir = dirname(path);
  const tempPath = join(dir, `.${basename(path)}.${process.pid}.${Date.now()}.tmp`);

  try {
    await mkdir(dir, { recursive: true });
    await writeFile(tempPath, JSON.stringify(value, null, 2), "utf-8");
    await rename(tempPath, path);
    log.debug(`Wrote ${path}`);
  } catch (e) {
    // Clean up temp file on error
    try {
      await unlink(tempPath);
    } catch {
      // Ignore cleanup errors
    }
    throw e;
  }
}
