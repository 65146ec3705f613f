/**
 * Core types for recipe lookup
 */

/**
 * Match mode for comparing the pattern against a candidate name
 */
export type SearchMode = "substring" | "exact" | "regex" | "wildcard";

/**
 * Namespace restriction: every namespace, recipe names and provides only,
 * or runtime packages only
 */
export type Namespace = "all" | "recipes" | "packages";

/**
 * Pattern flags
 */
export interface PatternFlags {
  /** Compare case-insensitively */
  ignoreCase: boolean;
  /** Anchor the pattern at word boundaries (regex and wildcard modes only) */
  wordBoundary: boolean;
}

/**
 * Compiled predicate over candidate names. Immutable and stateless.
 */
export interface Matcher {
  matches(candidate: string): boolean;
}

/**
 * A pattern together with the matcher compiled from it
 */
export interface SearchPattern extends Matcher {
  readonly text: string;
  readonly mode: SearchMode;
  readonly flags: Readonly<PatternFlags>;
}

/**
 * Read-only view of a build system's recipe metadata.
 *
 * Map iteration order is significant: reverse indices are built in the
 * order the source keys are returned.
 */
export interface MetadataEngine {
  /** Recipe name for a filename */
  recipeName(fn: string): string | undefined;

  /** Build-time provides of a filename */
  provides(fn: string): ReadonlySet<string>;

  /** Runtime provide name → filenames producing it */
  runtimeProviders(): ReadonlyMap<string, ReadonlySet<string>>;

  /** Package name → filenames producing it */
  packages(): ReadonlyMap<string, ReadonlySet<string>>;

  /** Dynamic package pattern → filenames producing matching packages */
  dynamicPackages(): ReadonlyMap<string, ReadonlySet<string>>;

  /** Preferred filename of every recipe, in reporting order */
  preferredFilenames(): string[];

  /**
   * Preferred filenames required to build the given targets, in reporting order
   * @throws MetadataUnavailableError if a target cannot be resolved
   */
  preferredFilenamesForScope(targets: readonly string[]): string[];
}

/**
 * Per-filename indices inverted from the engine's forward maps
 */
export interface ReverseIndices {
  /** filename → runtime provide names */
  readonly fnRprovides: ReadonlyMap<string, ReadonlySet<string>>;
  /** filename → package names, duplicates across source keys preserved */
  readonly fnPackages: ReadonlyMap<string, readonly string[]>;
  /** filename → dynamic package patterns */
  readonly fnPackagesDynamic: ReadonlyMap<string, readonly string[]>;
}

/**
 * What was reported for one filename
 */
export interface MatchOutcome {
  fn: string;
  name: string;
  nameMatched: boolean;
  provides: string[];
  /** packages → rprovides → dynamic patterns, deduplicated */
  runtime: string[];
}

/**
 * Search request, fully resolved by the caller
 */
export interface SearchRequest {
  /** Raw pattern text, or a compiled pattern (mode and flags below then do not apply) */
  pattern: string | SearchPattern;
  mode?: SearchMode;
  ignoreCase?: boolean;
  wordBoundary?: boolean;
  namespace?: Namespace;
  /** Disable the early-stop short circuits */
  all?: boolean;
  /** Restrict the search to the build requirements of these targets */
  scope?: readonly string[];
}

/**
 * Search result
 */
export interface SearchResult {
  /** Number of filenames examined */
  examined: number;
  outcomes: MatchOutcome[];
}
