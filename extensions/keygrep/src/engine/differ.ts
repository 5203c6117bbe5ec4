import type { ResultEntry, ResultSequence } from "../types.js";

function entriesEqual(a: ResultEntry, b: ResultEntry): boolean {
  if (a.file !== b.file || a.line !== b.line || a.ranges.length !== b.ranges.length) {
    return false;
  }
  return a.ranges.every(([start, end], i) => start === b.ranges[i][0] && end === b.ranges[i][1]);
}

/** Structural equality: same entries in the same order. */
export function resultsEqual(a: ResultSequence, b: ResultSequence): boolean {
  if (a === b) return true;
  if (a.length !== b.length) return false;
  return a.every((entry, i) => entriesEqual(entry, b[i]));
}

/** Whether `next` needs a redraw over `prev`. */
export function changed(prev: ResultSequence, next: ResultSequence): boolean {
  return !resultsEqual(prev, next);
}
