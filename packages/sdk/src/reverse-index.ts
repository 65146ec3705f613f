/**
 * Reverse index construction
 *
 * Invariants:
 * - Built fresh per search, never mutated afterwards
 * - Per-filename lists follow the iteration order of the source map
 * - Package lists keep duplicates; deduplication happens at report time
 */

import type { MetadataEngine, ReverseIndices } from "./types.js";

function invertToLists(
  forward: ReadonlyMap<string, ReadonlySet<string>>
): Map<string, string[]> {
  const inverted = new Map<string, string[]>();

  for (const [name, fns] of forward) {
    for (const fn of fns) {
      const list = inverted.get(fn);
      if (list) {
        list.push(name);
      } else {
        inverted.set(fn, [name]);
      }
    }
  }

  return inverted;
}

function invertToSets(
  forward: ReadonlyMap<string, ReadonlySet<string>>
): Map<string, Set<string>> {
  const inverted = new Map<string, Set<string>>();

  for (const [name, fns] of forward) {
    for (const fn of fns) {
      const set = inverted.get(fn);
      if (set) {
        set.add(name);
      } else {
        inverted.set(fn, new Set([name]));
      }
    }
  }

  return inverted;
}

/**
 * Invert the engine's runtime maps into per-filename indices
 */
export function buildReverseIndices(engine: MetadataEngine): ReverseIndices {
  return {
    fnRprovides: invertToSets(engine.runtimeProviders()),
    fnPackages: invertToLists(engine.packages()),
    fnPackagesDynamic: invertToLists(engine.dynamicPackages()),
  };
}
