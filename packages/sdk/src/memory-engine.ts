/**
 * Metadata engine over plain in-memory records, for callers that already
 * hold their metadata as maps
 */

import { MetadataUnavailableError } from "./errors.js";
import type { MetadataEngine } from "./types.js";

export interface InMemoryMetadata {
  /** filename → recipe name and build-time provides, in reporting order */
  recipes: Record<string, { pn: string; provides?: string[] }>;
  /** runtime provide → filenames */
  rproviders?: Record<string, string[]>;
  /** package → filenames */
  packages?: Record<string, string[]>;
  /** dynamic package pattern → filenames */
  packagesDynamic?: Record<string, string[]>;
  /** scope target → filenames it requires, already resolved */
  scopes?: Record<string, string[]>;
}

function toMap(record: Record<string, string[]> | undefined): Map<string, Set<string>> {
  return new Map(
    Object.entries(record ?? {}).map(([key, fns]): [string, Set<string>] => [key, new Set(fns)])
  );
}

export class InMemoryEngine implements MetadataEngine {
  readonly #metadata: InMemoryMetadata;
  readonly #rproviders: Map<string, Set<string>>;
  readonly #packages: Map<string, Set<string>>;
  readonly #dynamic: Map<string, Set<string>>;

  constructor(metadata: InMemoryMetadata) {
    this.#metadata = metadata;
    this.#rproviders = toMap(metadata.rproviders);
    this.#packages = toMap(metadata.packages);
    this.#dynamic = toMap(metadata.packagesDynamic);
  }

  recipeName(fn: string): string | undefined {
    return this.#metadata.recipes[fn]?.pn;
  }

  provides(fn: string): ReadonlySet<string> {
    return new Set(this.#metadata.recipes[fn]?.provides ?? []);
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
    return Object.keys(this.#metadata.recipes);
  }

  preferredFilenamesForScope(targets: readonly string[]): string[] {
    const fns = new Set<string>();
    for (const target of targets) {
      const required = this.#metadata.scopes?.[target];
      if (!required) {
        throw new MetadataUnavailableError(`Nothing provides "${target}"`);
      }
      required.forEach((fn) => fns.add(fn));
    }
    return [...fns];
  }
}
