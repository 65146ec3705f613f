/**
 * Pattern compilation
 *
 * Every search mode compiles to a single immutable predicate. Wildcard
 * patterns are translated to an anchored regular expression and evaluated
 * as regex from then on.
 */

import picomatch from "picomatch";
import { PatternCompileError, UsageError } from "./errors.js";
import type { Matcher, PatternFlags, SearchMode, SearchPattern } from "./types.js";

export const SEARCH_MODES: readonly SearchMode[] = ["substring", "exact", "regex", "wildcard"];

const DEFAULT_FLAGS: PatternFlags = { ignoreCase: false, wordBoundary: false };

// Names are not paths: `*` crosses "/", and negation, braces and extglobs stay literal
const GLOB_OPTIONS: picomatch.PicomatchOptions = {
  dot: true,
  bash: true,
  nonegate: true,
  nobrace: true,
  noextglob: true,
  strictSlashes: true,
  contains: true,
  fastpaths: false,
};

/**
 * Split a glob at its `?` wildcards, skipping escaped ones and bracket expressions
 */
function splitAtSingleWildcards(glob: string): string[] {
  const parts: string[] = [];
  let current = "";
  let inBracket = false;

  for (let i = 0; i < glob.length; i++) {
    const ch = glob.charAt(i);
    if (ch === "\\" && i + 1 < glob.length) {
      current += ch + glob.charAt(i + 1);
      i++;
      continue;
    }
    if (inBracket) {
      if (ch === "]") inBracket = false;
    } else if (ch === "[") {
      inBracket = true;
    } else if (ch === "?") {
      parts.push(current);
      current = "";
      continue;
    }
    current += ch;
  }

  parts.push(current);
  return parts;
}

/**
 * Translate a glob into regex source anchored at both ends.
 *
 * picomatch's `?` never matches "/", so single-character wildcards are
 * split out and joined back as `.`.
 */
export function globToRegexSource(glob: string): string {
  try {
    const body = splitAtSingleWildcards(glob)
      .map((part) => (part === "" ? "" : picomatch.makeRe(part, GLOB_OPTIONS).source))
      .join(".");
    return `^${body}$`;
  } catch (err) {
    throw new PatternCompileError(glob, err instanceof Error ? err.message : String(err), {
      cause: err,
    });
  }
}

function compileRegex(pattern: string, source: string, flags: PatternFlags): Matcher {
  const wrapped = flags.wordBoundary ? `\\b(?:${source})\\b` : source;

  let regex: RegExp;
  try {
    regex = new RegExp(wrapped, flags.ignoreCase ? "i" : "");
  } catch (err) {
    throw new PatternCompileError(pattern, err instanceof Error ? err.message : String(err), {
      cause: err,
    });
  }

  // No "g" flag, so test() keeps no lastIndex state between candidates
  return { matches: (candidate) => regex.test(candidate) };
}

function compileLiteral(pattern: string, exact: boolean, ignoreCase: boolean): Matcher {
  if (ignoreCase) {
    const folded = pattern.toLowerCase();
    return exact
      ? { matches: (candidate) => candidate.toLowerCase() === folded }
      : { matches: (candidate) => candidate.toLowerCase().includes(folded) };
  }

  return exact
    ? { matches: (candidate) => candidate === pattern }
    : { matches: (candidate) => candidate.includes(pattern) };
}

function compileMatcher(text: string, mode: SearchMode, flags: PatternFlags): Matcher {
  switch (mode) {
    case "substring":
    case "exact":
      if (flags.wordBoundary) {
        throw new UsageError("--word can only be used with --regex or --wildcard");
      }
      return compileLiteral(text, mode === "exact", flags.ignoreCase);
    case "regex":
      return compileRegex(text, text, flags);
    case "wildcard":
      return compileRegex(text, globToRegexSource(text), flags);
  }
}

/**
 * Compile a pattern into a matcher
 * @throws UsageError if the pattern is empty or word boundaries are requested in a literal mode
 * @throws PatternCompileError if the regex or glob is malformed
 */
export function compilePattern(
  text: string,
  mode: SearchMode = "substring",
  flags: Partial<PatternFlags> = {}
): SearchPattern {
  const resolved: PatternFlags = {
    ignoreCase: flags.ignoreCase ?? DEFAULT_FLAGS.ignoreCase,
    wordBoundary: flags.wordBoundary ?? DEFAULT_FLAGS.wordBoundary,
  };

  if (text.length === 0) {
    throw new UsageError("Search pattern must not be empty");
  }

  const matcher = compileMatcher(text, mode, resolved);

  return Object.freeze({
    text,
    mode,
    flags: Object.freeze(resolved),
    matches: matcher.matches,
  });
}
