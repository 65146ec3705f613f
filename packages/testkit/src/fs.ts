/**
 * File system test utilities
 */

import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import type { SnapshotInput } from "@recipefind/sdk";

/**
 * Create a unique temporary directory for testing
 * @param prefix - Prefix for the temp directory (default: "recipefind-test-")
 * @returns Absolute path to temp directory
 */
export async function createTempDir(prefix = "recipefind-test-"): Promise<string> {
  return await mkdtemp(join(tmpdir(), prefix));
}

/**
 * Remove a directory recursively
 * @param path - Path to remove
 */
export async function removeDir(path: string): Promise<void> {
  await rm(path, { recursive: true, force: true });
}

/**
 * Execute a function with a clean temp directory
 * @param fn - Function to execute with temp directory path
 * @returns Result of fn
 */
export async function withTempDir<T>(fn: (dir: string) => Promise<T>): Promise<T> {
  const dir = await createTempDir();
  try {
    return await fn(dir);
  } finally {
    await removeDir(dir);
  }
}

/**
 * Write a metadata snapshot file
 * @returns Absolute path of the written file
 */
export async function writeSnapshot(
  dir: string,
  snapshot: SnapshotInput,
  fileName = "recipes.json"
): Promise<string> {
  const filePath = join(dir, fileName);
  await writeFile(filePath, JSON.stringify(snapshot, null, 2) + "\n", "utf-8");
  return filePath;
}
