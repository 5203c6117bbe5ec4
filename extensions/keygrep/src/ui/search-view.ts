/**
 * SearchView — pi-tui component drawing a search session.
 *
 * Output rows:
 *   committed blocks   (prompt, gap, frozen results — as drawn at commit)
 *   live prompt
 *   gap
 *   live results       (clamped to the visible rows)
 *
 * The session is re-ticked on every key press and every POLL_INTERVAL_MS.
 * Styled result lines are rebuilt only when the differ reports a change,
 * and the poll only requests a render in that case.
 */

import type { Component } from "@mariozechner/pi-tui";
import { KEYGREP_CONFIG } from "../config.js";
import { type SearchSession, visibleResultRows } from "../engine/session.js";
import { decodeKeys } from "./keys.js";
import { clipToWidth, renderBlock, renderEntry, renderPrompt } from "./render.js";

/** The slice of pi-tui's TUI the view draws through. */
export interface ViewHost {
  readonly terminal: { readonly columns: number; readonly rows: number };
  requestRender(force?: boolean): void;
}

export class SearchView implements Component {
  private width: number;
  private frozen: string[] = [];
  private liveLines: string[] | null = null;
  private timer: ReturnType<typeof setInterval> | null = null;

  constructor(
    private readonly host: ViewHost,
    private readonly session: SearchSession,
    private readonly done: () => void
  ) {
    this.width = host.terminal.columns;
    this.session.tick(this.width);
    this.timer = setInterval(() => this.poll(), KEYGREP_CONFIG.POLL_INTERVAL_MS);
  }

  private get visibleRows(): number {
    return visibleResultRows(this.host.terminal.rows);
  }

  private poll(): void {
    if (this.session.tick(this.width)) {
      this.liveLines = null;
      this.host.requestRender();
    }
  }

  // ── Input ───────────────────────────────────────────────────────────

  handleInput(data: string): void {
    for (const event of decodeKeys(data)) {
      if (event.type === "enter") {
        this.freezeLiveBlock();
      }
      this.session.handleKey(event, this.visibleRows);
      if (this.session.status === "terminated") {
        this.dispose();
        this.done();
        return;
      }
    }

    if (this.session.tick(this.width)) {
      this.liveLines = null;
    }
    // The prompt changed even when the results did not
    this.host.requestRender();
  }

  private freezeLiveBlock(): void {
    this.frozen.push(
      ...renderBlock(this.session.query, this.session.results, this.width, this.visibleRows)
    );
  }

  // ── Render ──────────────────────────────────────────────────────────

  invalidate(): void {
    this.liveLines = null;
  }

  render(width: number): string[] {
    if (width !== this.width) {
      this.width = width;
      this.session.tick(width);
      this.liveLines = null;
    }

    if (!this.liveLines) {
      this.liveLines = this.session.results
        .slice(0, this.visibleRows)
        .map((entry) => renderEntry(entry, width));
    }

    const promptRow = this.session.resultsStartRow - KEYGREP_CONFIG.BLOCK_CHROME_ROWS;
    return [
      ...this.frozen.slice(0, promptRow).map((line) => clipToWidth(line, width)),
      renderPrompt(this.session.query, width, true),
      "",
      ...this.liveLines,
    ];
  }

  dispose(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }
}
