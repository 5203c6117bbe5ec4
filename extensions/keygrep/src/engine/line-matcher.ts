/**
 * Line matcher — finds matching lines and the match spans within them.
 */

/** Half-open `[start, end)` interval of UTF-16 code units within a line. */
export type MatchRange = readonly [start: number, end: number];

/**
 * All non-overlapping matches of `regex` in `line`, leftmost first.
 * `regex` must carry the `g` flag; its `lastIndex` is left untouched.
 */
export function findMatches(line: string, regex: RegExp): MatchRange[] {
  const ranges: MatchRange[] = [];
  for (const m of line.matchAll(regex)) {
    const start = m.index ?? 0;
    ranges.push([start, start + m[0].length]);
  }
  return ranges;
}

/**
 * Split text into lines on `\n`, dropping a trailing `\r` from each line.
 * A final newline does not produce an extra empty line.
 */
export function splitLines(text: string): string[] {
  if (text.length === 0) return [];
  const lines = text.split("\n");
  if (lines[lines.length - 1] === "") lines.pop();
  return lines.map((line) => (line.endsWith("\r") ? line.slice(0, -1) : line));
}
