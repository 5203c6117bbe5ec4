import { describe, expect, it, vi } from "vitest";
import { MemorySource } from "../tests/memory-source.js";
import type { KeyEvent } from "../types.js";
import { ContentCache } from "./content-cache.js";
import { FIRST_RESULTS_ROW, SearchSession, visibleResultRows } from "./session.js";

const ROWS = 20;

function createSession(logger?: (msg: string) => void) {
  const source = new MemorySource({ "a.txt": "hello world", "b.txt": "nothing here" });
  const cache = new ContentCache(source, 10);
  const session = new SearchSession({ files: ["a.txt", "b.txt"], cache, logger });
  return { session, source, cache };
}

function type(session: SearchSession, text: string) {
  for (const char of text) session.handleKey({ type: "char", char }, ROWS);
}

describe("visibleResultRows", () => {
  it("reserves the prompt, gap and bottom rows", () => {
    expect(visibleResultRows(24)).toBe(21);
    expect(visibleResultRows(2)).toBe(0);
  });
});

describe("SearchSession", () => {
  it("starts editing an empty query", () => {
    const { session } = createSession();
    expect(session.status).toBe("editing");
    expect(session.query).toBe("");
    expect(session.results).toEqual([]);
    expect(session.resultsStartRow).toBe(FIRST_RESULTS_ROW);
  });

  it("reports a change only when the results differ", () => {
    const { session } = createSession();

    expect(session.tick(80)).toBe(true);
    expect(session.results).toEqual([
      { file: "a.txt", line: "", ranges: [] },
      { file: "b.txt", line: "", ranges: [] },
    ]);
    expect(session.tick(80)).toBe(false);
  });

  it("rescans for the typed query", () => {
    const { session } = createSession();
    session.tick(80);

    type(session, "wor");
    expect(session.query).toBe("wor");
    expect(session.tick(80)).toBe(true);
    expect(session.results).toEqual([{ file: "a.txt", line: "hello world", ranges: [[6, 9]] }]);
  });

  it("never compares against a stale query", () => {
    const { session } = createSession();
    type(session, "x");
    session.tick(80);
    expect(session.results).toEqual([]);

    session.handleKey({ type: "backspace" }, ROWS);
    expect(session.tick(80)).toBe(true);
    expect(session.results).toHaveLength(2);
  });

  it("backspace removes one character and is a no-op on an empty query", () => {
    const { session } = createSession();
    session.handleKey({ type: "backspace" }, ROWS);
    expect(session.query).toBe("");

    type(session, "a😀");
    session.handleKey({ type: "backspace" }, ROWS);
    expect(session.query).toBe("a");
  });

  it("shows the sentinel for an invalid pattern without reading files", () => {
    const { session, source } = createSession();
    type(session, "(");
    session.tick(80);

    expect(session.results).toEqual([{ file: "", line: "Invalid regex pattern", ranges: [] }]);
    expect(source.reads).toEqual([]);
  });

  it("enter freezes the results and starts a new query below them", () => {
    const logger = vi.fn();
    const { session } = createSession(logger);
    type(session, "o");
    session.tick(80);
    const frozen = session.results;

    session.handleKey({ type: "enter" }, 1);

    expect(session.committed).toEqual([{ query: "o", entries: frozen, shown: 1 }]);
    expect(session.resultsStartRow).toBe(FIRST_RESULTS_ROW + 1 + 2);
    expect(session.query).toBe("");
    expect(session.results).toEqual([]);
    expect(logger).toHaveBeenCalledWith('committed "o": 1/2 shown');

    expect(session.tick(80)).toBe(true);
    expect(session.results).toHaveLength(2);
  });

  it("advances the start row by every commit", () => {
    const { session } = createSession();
    session.tick(80);
    session.commit(ROWS);
    type(session, "zzz");
    session.tick(80);
    session.commit(ROWS);

    expect(session.committed.map((b) => b.shown)).toEqual([2, 0]);
    expect(session.resultsStartRow).toBe(FIRST_RESULTS_ROW + 4 + 2);
  });

  it("escape terminates and later keys are ignored", () => {
    const logger = vi.fn();
    const { session } = createSession(logger);
    const keys: KeyEvent[] = [{ type: "escape" }, { type: "char", char: "x" }, { type: "enter" }];
    for (const key of keys) session.handleKey(key, ROWS);

    expect(session.status).toBe("terminated");
    expect(session.query).toBe("");
    expect(session.committed).toEqual([]);
    expect(logger).toHaveBeenCalledWith("session terminated");
  });

  it("owns a default cache when none is given", () => {
    const session = new SearchSession({ files: [] });
    expect(session.cache.capacity).toBe(100);
    expect(session.caseInsensitive).toBe(false);
  });
});
