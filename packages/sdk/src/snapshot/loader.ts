/**
 * Loading metadata snapshots from disk
 */

import * as fs from "node:fs/promises";
import type { ZodError } from "zod";
import { MetadataUnavailableError } from "../errors.js";
import { silentLogger, type Logger } from "../observability/logs.js";
import { SnapshotEngine } from "./engine.js";
import { SnapshotSchema, type Snapshot } from "./schema.js";

function formatIssues(error: ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    .join("; ");
}

/**
 * Validate raw JSON against the snapshot schema
 * @param source - Where the value came from, for error messages
 * @throws MetadataUnavailableError if the value is not a valid snapshot
 */
export function parseSnapshot(raw: unknown, source: string): Snapshot {
  const result = SnapshotSchema.safeParse(raw);
  if (!result.success) {
    throw new MetadataUnavailableError(
      `Invalid metadata snapshot in ${source}: ${formatIssues(result.error)}`,
      { cause: result.error }
    );
  }
  return result.data;
}

/**
 * Read a snapshot file
 * @throws MetadataUnavailableError if the file is missing, unreadable, or invalid
 */
export async function readSnapshot(filePath: string): Promise<Snapshot> {
  let content: string;
  try {
    content = await fs.readFile(filePath, "utf-8");
  } catch (err) {
    const missing = err instanceof Error && "code" in err && err.code === "ENOENT";
    throw new MetadataUnavailableError(
      missing
        ? `Metadata snapshot not found: ${filePath}`
        : `Failed to read metadata snapshot: ${filePath}`,
      { cause: err }
    );
  }

  // Strip BOM if present
  const cleaned = content.charCodeAt(0) === 0xfeff ? content.slice(1) : content;

  let raw: unknown;
  try {
    raw = JSON.parse(cleaned);
  } catch (err) {
    throw new MetadataUnavailableError(
      `Invalid JSON in metadata snapshot ${filePath}: ${err instanceof Error ? err.message : String(err)}`,
      { cause: err }
    );
  }

  return parseSnapshot(raw, filePath);
}

/**
 * Read a snapshot file and wrap it in a metadata engine
 */
export async function loadSnapshotEngine(
  filePath: string,
  logger: Logger = silentLogger
): Promise<SnapshotEngine> {
  const snapshot = await readSnapshot(filePath);
  logger.debug("snapshot.loaded", {
    details: { path: filePath, recipes: snapshot.recipes.length },
  });
  return new SnapshotEngine(snapshot, logger);
}
