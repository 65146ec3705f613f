/**
 * Per-recipe cascading match
 *
 * Tiers, in order:
 * 1. recipe name
 * 2. build-time provides (flat, always evaluated alongside the name)
 * 3. runtime: packages → rprovides → dynamic package patterns
 *
 * Without `all`, a recipe that already reported through its name or
 * provides skips the runtime tier, and within the runtime tier the first
 * level that matches stops the fallback.
 */

import { dedupe } from "./dedupe.js";
import { MetadataUnavailableError } from "./errors.js";
import type {
  Matcher,
  MatchOutcome,
  MetadataEngine,
  Namespace,
  ReverseIndices,
} from "./types.js";

export interface CascadeContext {
  matcher: Matcher;
  engine: MetadataEngine;
  indices: ReverseIndices;
  namespace: Namespace;
  all: boolean;
}

function collect(candidates: Iterable<string> | undefined, matcher: Matcher): string[] {
  const matched: string[] = [];
  if (!candidates) return matched;

  for (const candidate of candidates) {
    if (matcher.matches(candidate)) {
      matched.push(candidate);
    }
  }
  return matched;
}

function matchRuntime(fn: string, ctx: CascadeContext): string[] {
  const { matcher, indices, all } = ctx;

  const found = collect(indices.fnPackages.get(fn), matcher);
  if (found.length === 0 || all) {
    found.push(...collect(indices.fnRprovides.get(fn), matcher));
  }
  if (found.length === 0 || all) {
    found.push(...collect(indices.fnPackagesDynamic.get(fn), matcher));
  }

  return dedupe(found);
}

/**
 * Decide what to report for one filename
 * @returns The outcome, or undefined when nothing matched
 */
export function matchRecipe(fn: string, ctx: CascadeContext): MatchOutcome | undefined {
  const name = ctx.engine.recipeName(fn);
  if (name === undefined) {
    throw new MetadataUnavailableError(`No recipe name recorded for ${fn}`);
  }

  let nameMatched = false;
  let provides: string[] = [];

  if (ctx.namespace !== "packages") {
    nameMatched = ctx.matcher.matches(name);
    // A recipe always provides its own name; that is reported by the name tier
    provides = collect(ctx.engine.provides(fn), ctx.matcher).filter((p) => p !== name);
  }

  const reported = nameMatched || provides.length > 0;
  const runtime =
    ctx.namespace !== "recipes" && (!reported || ctx.all) ? matchRuntime(fn, ctx) : [];

  if (!reported && runtime.length === 0) {
    return undefined;
  }

  return { fn, name, nameMatched, provides, runtime };
}

/**
 * Render an outcome as output lines.
 *
 * A name match prints the bare name; otherwise a `<name>:` header introduces
 * the sections.
 */
export function formatOutcome(outcome: MatchOutcome): string[] {
  const lines = [outcome.nameMatched ? outcome.name : `${outcome.name}:`];

  if (outcome.provides.length > 0) {
    lines.push("  Provides:");
    for (const provide of outcome.provides) {
      lines.push(`    ${provide}`);
    }
  }

  if (outcome.runtime.length > 0) {
    lines.push("  Packages:");
    for (const item of outcome.runtime) {
      lines.push(`    ${item}`);
    }
  }

  return lines;
}
