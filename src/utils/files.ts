/**
 * File utilities for keel
 */

import fs, { type FileHandle } from "node:fs/promises";
import path from "node:path";
import crypto from "node:crypto";
import { IOFailureError, errnoCode, toError } from "./errors.js";

/**
 * Ensure a directory exists, creating it if necessary
 */
export async function ensureDir(dirPath: string): Promise<void> {
  try {
    await fs.mkdir(dirPath, { recursive: true });
  } catch (error) {
    throw new IOFailureError(`Failed to create directory: ${dirPath}`, {
      path: dirPath,
      operation: "write",
      cause: toError(error),
    });
  }
}

/**
 * Read a file as text, or null when it does not exist
 */
export async function readTextFileIfExists(filePath: string): Promise<string | null> {
  try {
    return await fs.readFile(filePath, "utf-8");
  } catch (error) {
    if (errnoCode(error) === "ENOENT") {
      return null;
    }
    throw new IOFailureError(`Failed to read file: ${filePath}`, {
      path: filePath,
      operation: "read",
      cause: toError(error),
    });
  }
}

/**
 * Get string hash (SHA-256)
 */
export function getStringHash(content: string): string {
  return crypto.createHash("sha256").update(content).digest("hex");
}

/**
 * Flush a directory entry table to disk. Not every platform can open a
 * directory for syncing; those skip it.
 */
export async function syncDirectory(dirPath: string): Promise<void> {
  let handle: FileHandle | undefined;
  try {
    handle = await fs.open(dirPath, "r");
    await handle.sync();
  } catch {
    return;
  } finally {
    await handle?.close();
  }
}

/**
 * Atomic write: write to a unique temp file in the same directory, fsync,
 * then rename over the target. Readers see either the old or the new content.
 */
export async function atomicWriteFile(
  filePath: string,
  content: string,
  options: { mode?: number } = {},
): Promise<void> {
  const dir = path.dirname(filePath);
  const tempPath = `${filePath}.${process.pid}-${crypto.randomUUID()}.tmp`;

  await ensureDir(dir);

  let handle: FileHandle | undefined;
  try {
    handle = await fs.open(tempPath, "wx", options.mode ?? 0o600);
    await handle.writeFile(content, "utf-8");
    await handle.sync();
    await handle.close();
    handle = undefined;
    await fs.rename(tempPath, filePath);
  } catch (error) {
    await handle?.close().catch(() => undefined);
    await fs.rm(tempPath, { force: true }).catch(() => undefined);

    throw new IOFailureError(`Failed to write file atomically: ${filePath}`, {
      path: filePath,
      operation: "write",
      cause: toError(error),
    });
  }

  await syncDirectory(dir);
}
