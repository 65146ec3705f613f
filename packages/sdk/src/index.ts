/**
 * Recipe lookup SDK
 *
 * Pattern matching and cascading result aggregation over build system
 * recipe metadata
 */

// Re-export types
export type {
  SearchMode,
  Namespace,
  PatternFlags,
  Matcher,
  SearchPattern,
  MetadataEngine,
  ReverseIndices,
  MatchOutcome,
  SearchRequest,
  SearchResult,
} from "./types.js";

// Core
export { compilePattern, globToRegexSource, SEARCH_MODES } from "./pattern.js";
export { buildReverseIndices } from "./reverse-index.js";
export { matchRecipe, formatOutcome, type CascadeContext } from "./cascade.js";
export { dedupe } from "./dedupe.js";
export { search, searchLines } from "./search.js";

// Metadata engines
export { InMemoryEngine, type InMemoryMetadata } from "./memory-engine.js";
export { SnapshotEngine, compareVersions } from "./snapshot/engine.js";
export { readSnapshot, parseSnapshot, loadSnapshotEngine } from "./snapshot/loader.js";
export {
  SnapshotSchema,
  RecipeEntrySchema,
  type Snapshot,
  type SnapshotInput,
  type RecipeEntry,
} from "./snapshot/schema.js";

// Observability
export { Logger, silentLogger } from "./observability/logs.js";
export type { LogLevel, LogEntry, LogSink } from "./observability/logs.js";

// Errors
export {
  RecipeFindError,
  UsageError,
  PatternCompileError,
  MetadataUnavailableError,
} from "./errors.js";
