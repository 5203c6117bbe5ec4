/**
 * Window & highlight remapper.
 *
 * Long lines are cut down to a window around their first match so the text
 * that made the line match stays on screen. Widths are terminal columns, so
 * wide characters count double. The window keeps up to CONTEXT_CHARS
 * characters of left context (less when the budget cannot hold both the
 * context and the match), then fills the width budget forward. It only cuts
 * between code points. Cut ends are marked with an ellipsis, and match
 * ranges are shifted from original-line coordinates into display
 * coordinates.
 *
 *   original:  ......................[ctx][match]......................
 *                                   ^startPos               ^endPos
 *   display:   ...[ctx][match]..........................
 *              ^prefixOffset = 3
 */

import { visibleWidth } from "@mariozechner/pi-tui";
import { KEYGREP_CONFIG } from "../config.js";
import type { MatchRange } from "./line-matcher.js";

export interface DisplayWindow {
  /** Text shown to the user, ellipses included. */
  text: string;
  /** Match ranges in `text` coordinates. */
  ranges: MatchRange[];
  /** First original offset kept. */
  startPos: number;
  /** One past the last original offset kept. */
  endPos: number;
  /** Length of the leading ellipsis, 0 when the window starts at the line start. */
  prefixOffset: number;
}

/** Width left for line text once the path column is reserved. */
export function displayBudget(terminalWidth: number): number {
  return Math.max(0, terminalWidth - KEYGREP_CONFIG.PATH_COLUMN_MARGIN);
}

/** The character starting at code-unit offset `i`, a surrogate pair kept whole. */
function charAt(line: string, i: number): string {
  const code = line.charCodeAt(i);
  const next = line.charCodeAt(i + 1);
  const pair = code >= 0xd800 && code <= 0xdbff && next >= 0xdc00 && next <= 0xdfff;
  return line.slice(i, pair ? i + 2 : i + 1);
}

/** The character ending at code-unit offset `i`, a surrogate pair kept whole. */
function charBefore(line: string, i: number): string {
  const code = line.charCodeAt(i - 1);
  const prev = line.charCodeAt(i - 2);
  const pair = code >= 0xdc00 && code <= 0xdfff && prev >= 0xd800 && prev <= 0xdbff;
  return line.slice(pair ? i - 2 : i - 1, i);
}

/**
 * Fit `line` into `width` columns around its first match and remap `ranges`.
 * Lines that already fit are returned unchanged.
 */
export function windowLine(line: string, ranges: readonly MatchRange[], width: number): DisplayWindow {
  const { CONTEXT_CHARS, ELLIPSIS } = KEYGREP_CONFIG;

  let text = line;
  let startPos = 0;
  let endPos = line.length;
  let prefixOffset = 0;

  if (visibleWidth(line) > width) {
    const [anchor, anchorEnd] = ranges[0] ?? [0, 0];

    // Narrow budgets give up left context before the anchor match
    const contextBudget = Math.max(0, width - visibleWidth(line.slice(anchor, anchorEnd)));
    let contextChars = 0;
    let contextCols = 0;
    startPos = anchor;
    while (startPos > 0 && contextChars < CONTEXT_CHARS) {
      const ch = charBefore(line, startPos);
      const cols = visibleWidth(ch);
      if (contextCols + cols > contextBudget) break;
      startPos -= ch.length;
      contextChars++;
      contextCols += cols;
    }

    // The first character is always taken, so a zero budget still shows the anchor
    let filled = 0;
    endPos = startPos;
    while (endPos < line.length) {
      const ch = charAt(line, endPos);
      const cols = visibleWidth(ch);
      if (endPos > startPos && filled + cols > width) break;
      endPos += ch.length;
      filled += cols;
    }

    text = line.slice(startPos, endPos);
    if (startPos > 0) {
      text = ELLIPSIS + text;
      prefixOffset = ELLIPSIS.length;
    }
    if (endPos < line.length) {
      text += ELLIPSIS;
    }
  }

  // Ranges stop where the kept text does, never covering the trailing ellipsis
  const bodyEnd = prefixOffset + (endPos - startPos);
  const remapped: MatchRange[] = [];
  for (const [start, end] of ranges) {
    if (start < startPos) continue;
    const newStart = start - startPos + prefixOffset;
    const newEnd = Math.min(end - startPos + prefixOffset, bodyEnd);
    if (newStart < bodyEnd) {
      remapped.push([newStart, newEnd]);
    }
  }

  return { text, ranges: remapped, startPos, endPos, prefixOffset };
}
