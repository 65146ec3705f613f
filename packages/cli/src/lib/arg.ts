/**
 * Argument parsing and validation helpers
 */

import type { Namespace, SearchMode } from "@recipefind/sdk";

/**
 * Flags as parsed by commander
 */
export type SearchFlags = {
  ignoreCase?: boolean;
  word?: boolean;
  scope?: string;
  all?: boolean;
  substring?: boolean;
  exact?: boolean;
  regex?: boolean;
  wildcard?: boolean;
  recipes?: boolean;
  packages?: boolean;
  metadata?: string;
  json?: boolean;
  verbose?: boolean;
};

/**
 * Split a scope value into target names
 */
export function splitTargets(value: string): string[] {
  return value.split(/\s+/).filter(Boolean);
}

/**
 * Pick the match mode from the mutually exclusive mode flags
 */
export function resolveMode(flags: SearchFlags): SearchMode {
  if (flags.wildcard) return "wildcard";
  if (flags.regex) return "regex";
  if (flags.exact) return "exact";
  return "substring";
}

/**
 * Pick the namespace from the mutually exclusive namespace flags
 */
export function resolveNamespace(flags: SearchFlags): Namespace {
  if (flags.recipes) return "recipes";
  if (flags.packages) return "packages";
  return "all";
}
