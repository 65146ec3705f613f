/**
 * Search orchestration
 *
 * Invariants:
 * - The pattern is compiled before any filename is examined
 * - Reverse indices are built once per search
 * - Outcomes follow the resolver's filename order
 */

import { formatOutcome, matchRecipe, type CascadeContext } from "./cascade.js";
import { silentLogger, type Logger } from "./observability/logs.js";
import { compilePattern } from "./pattern.js";
import { buildReverseIndices } from "./reverse-index.js";
import type { MatchOutcome, MetadataEngine, SearchRequest, SearchResult } from "./types.js";

interface PreparedSearch {
  fns: string[];
  context: CascadeContext;
}

function prepare(engine: MetadataEngine, request: SearchRequest, logger: Logger): PreparedSearch {
  const pattern =
    typeof request.pattern === "string"
      ? compilePattern(request.pattern, request.mode, {
          ignoreCase: request.ignoreCase,
          wordBoundary: request.wordBoundary,
        })
      : request.pattern;

  logger.debug("search.start", {
    details: {
      pattern: pattern.text,
      mode: pattern.mode,
      ...pattern.flags,
      namespace: request.namespace ?? "all",
      all: request.all ?? false,
    },
  });

  let fns: string[];
  if (request.scope && request.scope.length > 0) {
    fns = engine.preferredFilenamesForScope(request.scope);
    logger.debug("search.scope", {
      details: { targets: [...request.scope], recipes: fns.length },
    });
  } else {
    fns = engine.preferredFilenames();
  }

  return {
    fns,
    context: {
      matcher: pattern,
      engine,
      indices: buildReverseIndices(engine),
      namespace: request.namespace ?? "all",
      all: request.all ?? false,
    },
  };
}

function* outcomes(prepared: PreparedSearch): Generator<MatchOutcome> {
  for (const fn of prepared.fns) {
    const outcome = matchRecipe(fn, prepared.context);
    if (outcome) {
      yield outcome;
    }
  }
}

/**
 * Run a search and collect every outcome
 * @throws UsageError, PatternCompileError before any filename is examined
 * @throws MetadataUnavailableError if the scope cannot be resolved
 */
export function search(
  engine: MetadataEngine,
  request: SearchRequest,
  logger: Logger = silentLogger
): SearchResult {
  const prepared = prepare(engine, request, logger);
  const collected = [...outcomes(prepared)];

  logger.debug("search.done", {
    details: { examined: prepared.fns.length, matched: collected.length },
  });

  return { examined: prepared.fns.length, outcomes: collected };
}

/**
 * Run a search and yield output lines as each filename is processed.
 *
 * Preparation (pattern compilation, scope resolution) happens eagerly, so
 * errors surface from this call before any line is produced.
 */
export function searchLines(
  engine: MetadataEngine,
  request: SearchRequest,
  logger: Logger = silentLogger
): Iterable<string> {
  const prepared = prepare(engine, request, logger);

  return (function* () {
    let matched = 0;
    for (const outcome of outcomes(prepared)) {
      matched++;
      yield* formatOutcome(outcome);
    }
    logger.debug("search.done", {
      details: { examined: prepared.fns.length, matched },
    });
  })();
}
