/**
 * Search — scans the file set for the current query.
 *
 * Produces the full result sequence for one tick: cache-backed reads,
 * per-line matching and windowing of each hit for the display width.
 */

import { INVALID_PATTERN_MESSAGE } from "../config.js";
import type { Logger } from "../debug.js";
import type { ResultEntry, ResultSequence } from "../types.js";
import type { ContentCache } from "./content-cache.js";
import { findMatches, splitLines } from "./line-matcher.js";
import { type Query, compileQuery } from "./query.js";
import { windowLine } from "./window.js";

export const INVALID_PATTERN_ENTRY: ResultEntry = Object.freeze({
  file: "",
  line: INVALID_PATTERN_MESSAGE,
  ranges: [],
});

export function isInvalidPatternEntry(entry: ResultEntry): boolean {
  return entry.file === "" && entry.line === INVALID_PATTERN_MESSAGE;
}

export interface SearchOptions {
  /** Width budget for line text (see `displayBudget`). */
  width: number;
  logger?: Logger;
}

/**
 * Compute the result sequence for `query` over `files`.
 *
 * An empty pattern lists every file once without reading it. An invalid
 * pattern yields the single sentinel entry without reading anything.
 * Unreadable files are skipped for this scan only.
 */
export function searchFiles(
  files: readonly string[],
  query: Query,
  cache: ContentCache,
  options: SearchOptions
): ResultSequence {
  if (query.pattern.length === 0) {
    return files.map((file) => ({ file, line: "", ranges: [] }));
  }

  const compiled = compileQuery(query);
  if (compiled.kind === "invalid") {
    options.logger?.(`invalid pattern ${JSON.stringify(query.pattern)}: ${compiled.error}`);
    return [INVALID_PATTERN_ENTRY];
  }

  const results: ResultEntry[] = [];
  for (const file of files) {
    const loaded = cache.getOrLoad(file);
    if (!loaded.ok) {
      options.logger?.(`skipping ${file}: ${loaded.error.message}`);
      continue;
    }

    for (const line of splitLines(loaded.text)) {
      const ranges = findMatches(line, compiled.regex);
      if (ranges.length === 0) continue;
      const shown = windowLine(line, ranges, options.width);
      results.push({ file, line: shown.text, ranges: shown.ranges });
    }
  }
  return results;
}
