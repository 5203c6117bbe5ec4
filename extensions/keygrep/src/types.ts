/**
 * Keygrep types — shared type definitions.
 */
import type { MatchRange } from "./engine/line-matcher.js";

/** One matching line, shaped for display. */
export interface ResultEntry {
  /** Source file path; empty for the invalid-pattern sentinel. */
  readonly file: string;
  /** Possibly truncated, ellipsis-decorated line text. */
  readonly line: string;
  /** Highlight ranges in `line` coordinates. */
  readonly ranges: readonly MatchRange[];
}

/** Results in file order, then line order. */
export type ResultSequence = readonly ResultEntry[];

/** Decoded key press driving the search session */
export type KeyEvent =
  | { type: "char"; char: string }
  | { type: "backspace" }
  | { type: "enter" }
  | { type: "escape" };

export interface KeygrepOptions {
  caseInsensitive: boolean;
  /** Extensions to treat as text; undefined means the built-in set. */
  extensions?: string[];
}
