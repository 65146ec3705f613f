/**
 * Environment and configuration resolution
 */

import * as path from "node:path";
import { homedir } from "node:os";
import { splitTargets } from "./arg.js";
import { CliError } from "./errors.js";

/**
 * Expand tilde (~) to home directory
 */
function expandTilde(input: string): string {
  if (!input.startsWith("~")) {
    return input;
  }

  if (input === "~") {
    return homedir();
  }

  const match = input.match(/^~([\\/]|$)(.*)/);
  if (!match) {
    // Leave "~user" style references untouched for now.
    return input;
  }

  const rest = match[2] ?? "";
  return path.join(homedir(), rest);
}

/**
 * Resolve the metadata snapshot path
 * Priority: CLI option > RECIPEFIND_METADATA env var > default "./recipes.json"
 */
export function resolveMetadataPath(cliPath?: string): string {
  const file = cliPath ?? process.env.RECIPEFIND_METADATA ?? "./recipes.json";
  return path.resolve(expandTilde(file));
}

/**
 * Resolve the scope targets
 * Priority: CLI option > BB_RECIPE_SCOPE env var > no scope
 */
export function resolveScope(cliScope?: string): string[] {
  if (cliScope !== undefined) {
    const targets = splitTargets(cliScope);
    if (targets.length === 0) {
      throw new CliError("--scope needs at least one target", { exitCode: 2 });
    }
    return targets;
  }
  return splitTargets(process.env.BB_RECIPE_SCOPE ?? "");
}

/**
 * Check if running in verbose mode
 */
export function isVerbose(): boolean {
  return process.env.RECIPEFIND_DEBUG === "1";
}
