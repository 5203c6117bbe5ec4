/**
 * SearchSession — per-keystroke search state machine.
 *
 *   editing ──char/backspace──▶ editing      (query edited, rescan next tick)
 *   editing ──enter──────────▶ editing      (results committed, fresh query below)
 *   editing ──escape─────────▶ terminated
 *
 * The session owns the file set and the content cache. Each tick recomputes
 * the results from the current query before comparing them with what was
 * last handed to the renderer, so a redraw never reflects a stale query.
 */

import { KEYGREP_CONFIG } from "../config.js";
import type { Logger } from "../debug.js";
import type { KeyEvent, ResultSequence } from "../types.js";
import { ContentCache } from "./content-cache.js";
import { changed } from "./differ.js";
import { searchFiles } from "./search.js";
import { displayBudget } from "./window.js";

/** Results frozen on screen by a commit. */
export interface CommittedBlock {
  readonly query: string;
  readonly entries: ResultSequence;
  /** Entries actually drawn, clamped to the visible rows at commit time. */
  readonly shown: number;
}

export type SessionStatus = "editing" | "terminated";

export interface SearchSessionOptions {
  files: readonly string[];
  caseInsensitive?: boolean;
  cache?: ContentCache;
  logger?: Logger;
}

/** Row of the first result below the initial prompt and its gap row. */
export const FIRST_RESULTS_ROW = KEYGREP_CONFIG.BLOCK_CHROME_ROWS;

/** Result rows that fit on a terminal of `terminalRows` rows. */
export function visibleResultRows(terminalRows: number): number {
  return Math.max(0, terminalRows - KEYGREP_CONFIG.RESERVED_ROWS);
}

export class SearchSession {
  readonly files: readonly string[];
  readonly cache: ContentCache;
  readonly caseInsensitive: boolean;

  private _query = "";
  private _status: SessionStatus = "editing";
  private current: ResultSequence = [];
  private rendered: ResultSequence = [];
  private readonly blocks: CommittedBlock[] = [];
  private startRow: number = FIRST_RESULTS_ROW;
  private readonly logger?: Logger;

  constructor(options: SearchSessionOptions) {
    this.files = options.files;
    this.caseInsensitive = options.caseInsensitive ?? false;
    this.cache = options.cache ?? new ContentCache();
    this.logger = options.logger;
  }

  get query(): string {
    return this._query;
  }

  get status(): SessionStatus {
    return this._status;
  }

  /** Results last handed to the renderer. */
  get results(): ResultSequence {
    return this.rendered;
  }

  get committed(): readonly CommittedBlock[] {
    return this.blocks;
  }

  /** Row, within the session's output, of the live block's first result. */
  get resultsStartRow(): number {
    return this.startRow;
  }

  /**
   * Apply one key press. `visibleRows` bounds how many results a commit
   * records as drawn.
   */
  handleKey(event: KeyEvent, visibleRows: number): void {
    if (this._status === "terminated") return;

    switch (event.type) {
      case "char":
        this._query += event.char;
        break;
      case "backspace":
        this._query = Array.from(this._query).slice(0, -1).join("");
        break;
      case "enter":
        this.commit(visibleRows);
        break;
      case "escape":
        this._status = "terminated";
        this.logger?.("session terminated");
        break;
    }
  }

  /**
   * Recompute results for the current query at `terminalWidth`.
   * Returns true when they differ from the last rendered results.
   */
  tick(terminalWidth: number): boolean {
    this.current = searchFiles(
      this.files,
      { pattern: this._query, caseInsensitive: this.caseInsensitive },
      this.cache,
      { width: displayBudget(terminalWidth), logger: this.logger }
    );
    if (!changed(this.rendered, this.current)) return false;
    this.rendered = this.current;
    return true;
  }

  /** Freeze the current results and start a fresh query below them. */
  commit(visibleRows: number): void {
    const shown = Math.min(this.current.length, Math.max(0, visibleRows));
    this.blocks.push({ query: this._query, entries: this.current, shown });
    this.startRow += shown + KEYGREP_CONFIG.BLOCK_CHROME_ROWS;
    this.logger?.(`committed ${JSON.stringify(this._query)}: ${shown}/${this.current.length} shown`);

    this._query = "";
    this.current = [];
    this.rendered = [];
  }
}
