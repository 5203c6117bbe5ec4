/**
 * Result line rendering.
 *
 * Row layout:  <path, white><padding><line text, cyan with magenta matches>
 * The line text is right-aligned against the terminal edge.
 */

import { truncateToWidth, visibleWidth } from "@mariozechner/pi-tui";
import { KEYGREP_CONFIG, PROMPT_LABEL } from "../config.js";
import { isInvalidPatternEntry } from "../engine/search.js";
import { FG_CYAN, FG_MAGENTA, FG_RED, FG_WHITE, RESET, paint } from "../terminal/ansi.js";
import type { ResultEntry, ResultSequence } from "../types.js";

export const CURSOR = "█";

/** Clip `line` to `width` visible columns. */
export function clipToWidth(line: string, width: number): string {
  return visibleWidth(line) > width ? truncateToWidth(line, width, "") : line;
}

/** Shorten a path to the path column, keeping its tail behind an ellipsis. */
export function formatPath(path: string, width: number): string {
  const { PATH_COLUMN_WIDTH, ELLIPSIS } = KEYGREP_CONFIG;
  const max = Math.min(PATH_COLUMN_WIDTH, Math.floor(width / 2));
  if (path.length <= max) return path;
  const keep = Math.max(0, max - ELLIPSIS.length);
  return ELLIPSIS + path.slice(path.length - keep);
}

/** Colour `line`, painting each range as a match. */
export function highlightLine(line: string, ranges: ResultEntry["ranges"]): string {
  let out = "";
  let last = 0;
  for (const [start, end] of ranges) {
    if (start > last) out += FG_CYAN + line.slice(last, start);
    out += FG_MAGENTA + line.slice(start, end);
    last = end;
  }
  if (last < line.length) out += FG_CYAN + line.slice(last);
  return out + RESET;
}

export function renderEntry(entry: ResultEntry, width: number): string {
  if (isInvalidPatternEntry(entry)) {
    return clipToWidth(paint(FG_RED, entry.line), width);
  }

  const path = formatPath(entry.file, width);
  const padding = Math.max(0, width - visibleWidth(path) - visibleWidth(entry.line));
  const row = paint(FG_WHITE, path) + " ".repeat(padding) + highlightLine(entry.line, entry.ranges);
  return clipToWidth(row, width);
}

export function renderPrompt(query: string, width: number, withCursor = false): string {
  return clipToWidth(PROMPT_LABEL + query + (withCursor ? CURSOR : ""), width);
}

/** Prompt row, gap row, then at most `maxRows` result rows. */
export function renderBlock(
  query: string,
  entries: ResultSequence,
  width: number,
  maxRows: number
): string[] {
  return [
    renderPrompt(query, width),
    "",
    ...entries.slice(0, maxRows).map((entry) => renderEntry(entry, width)),
  ];
}
