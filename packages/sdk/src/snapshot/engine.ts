/**
 * Metadata engine backed by a parsed snapshot
 *
 * Invariants:
 * - Every recipe provides its own name
 * - A package is a runtime provide of the recipe that produces it
 * - Forward maps keep the snapshot's declaration order
 * - Filename lists handed to the search are sorted by recipe name
 */

import { MetadataUnavailableError } from "../errors.js";
import { silentLogger, type Logger } from "../observability/logs.js";
import type { MetadataEngine } from "../types.js";
import type { RecipeEntry, Snapshot } from "./schema.js";

/**
 * Numeric-aware version comparison ("1.10" sorts after "1.9")
 */
export function compareVersions(a: string, b: string): number {
  return a.localeCompare(b, "en", { numeric: true, sensitivity: "base" });
}

function compareStrings(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

function addTo(map: Map<string, Set<string>>, key: string, fn: string): void {
  const set = map.get(key);
  if (set) {
    set.add(fn);
  } else {
    map.set(key, new Set([fn]));
  }
}

export class SnapshotEngine implements MetadataEngine {
  readonly #recipes = new Map<string, RecipeEntry>();
  readonly #provides = new Map<string, Set<string>>();
  readonly #providers = new Map<string, Set<string>>();
  readonly #rproviders = new Map<string, Set<string>>();
  readonly #packages = new Map<string, Set<string>>();
  readonly #dynamic = new Map<string, Set<string>>();
  readonly #preferred = new Map<string, string>();
  readonly #logger: Logger;

  constructor(snapshot: Snapshot, logger: Logger = silentLogger) {
    this.#logger = logger;
    const byName = new Map<string, RecipeEntry[]>();

    for (const recipe of snapshot.recipes) {
      const { fn } = recipe;
      this.#recipes.set(fn, recipe);

      const provides = new Set([recipe.pn, ...recipe.provides]);
      this.#provides.set(fn, provides);
      for (const provide of provides) {
        addTo(this.#providers, provide, fn);
      }

      for (const pkg of recipe.packages) {
        addTo(this.#packages, pkg, fn);
        addTo(this.#rproviders, pkg, fn);
      }
      for (const rprovides of Object.values(recipe.rprovides)) {
        for (const rprovide of rprovides) {
          addTo(this.#rproviders, rprovide, fn);
        }
      }
      for (const pattern of recipe.packagesDynamic) {
        addTo(this.#dynamic, pattern, fn);
      }

      const candidates = byName.get(recipe.pn);
      if (candidates) {
        candidates.push(recipe);
      } else {
        byName.set(recipe.pn, [recipe]);
      }
    }

    for (const [pn, candidates] of byName) {
      this.#preferred.set(pn, this.pickPreferred(pn, candidates, snapshot.preferredVersions[pn]));
    }
  }

  private pickPreferred(pn: string, candidates: RecipeEntry[], wanted: string | undefined): string {
    if (wanted !== undefined) {
      const match = candidates.find((recipe) => recipe.pv === wanted);
      if (match) return match.fn;
      this.#logger.warn("snapshot.preferred_version_missing", {
        message: `No ${pn} recipe has version ${wanted}`,
      });
    }

    let best = candidates[0];
    for (const recipe of candidates.slice(1)) {
      if (compareVersions(recipe.pv ?? "", best?.pv ?? "") > 0) {
        best = recipe;
      }
    }
    if (!best) {
      throw new MetadataUnavailableError(`No recipes named ${pn}`);
    }
    return best.fn;
  }

  recipeName(fn: string): string | undefined {
    return this.#recipes.get(fn)?.pn;
  }

  provides(fn: string): ReadonlySet<string> {
    return this.#provides.get(fn) ?? new Set();
  }

  runtimeProviders(): ReadonlyMap<string, ReadonlySet<string>> {
    return this.#rproviders;
  }

  packages(): ReadonlyMap<string, ReadonlySet<string>> {
    return this.#packages;
  }

  dynamicPackages(): ReadonlyMap<string, ReadonlySet<string>> {
    return this.#dynamic;
  }

  preferredFilenames(): string[] {
    return this.sortByName(this.#preferred.values());
  }

  preferredFilenamesForScope(targets: readonly string[]): string[] {
    const selected = new Set<string>();
    const queue: string[] = [];

    for (const target of targets) {
      const fn = this.findProvider(target);
      if (fn === undefined) {
        throw new MetadataUnavailableError(`Nothing provides "${target}"`);
      }
      if (!selected.has(fn)) {
        selected.add(fn);
        queue.push(fn);
      }
    }

    for (let fn = queue.shift(); fn !== undefined; fn = queue.shift()) {
      for (const dep of this.#recipes.get(fn)?.depends ?? []) {
        const provider = this.findProvider(dep);
        if (provider === undefined) {
          this.#logger.debug("scope.unresolved_dependency", {
            details: { recipe: this.recipeName(fn), dependency: dep },
          });
          continue;
        }
        if (!selected.has(provider)) {
          selected.add(provider);
          queue.push(provider);
        }
      }
    }

    return this.sortByName(selected);
  }

  /**
   * Preferred filename providing a build-time name. A recipe named like the
   * target wins, then a provider that is its recipe's preferred version,
   * then the preferred version of the first provider's recipe.
   */
  private findProvider(name: string): string | undefined {
    const named = this.#preferred.get(name);
    if (named !== undefined) return named;

    const candidates = [...(this.#providers.get(name) ?? [])];
    const preferredOf = (fn: string): string | undefined => {
      const pn = this.recipeName(fn);
      return pn === undefined ? undefined : this.#preferred.get(pn);
    };

    const direct = candidates.find((fn) => preferredOf(fn) === fn);
    if (direct !== undefined) return direct;

    const first = candidates[0];
    return first === undefined ? undefined : preferredOf(first);
  }

  private sortByName(fns: Iterable<string>): string[] {
    return [...fns].sort(
      (a, b) =>
        compareStrings(this.recipeName(a) ?? "", this.recipeName(b) ?? "") || compareStrings(a, b)
    );
  }
}
