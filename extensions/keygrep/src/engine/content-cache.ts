/**
 * ContentCache — Least-recently-used store of file contents.
 *
 * Maps a file path to its full text so that re-scanning on every keystroke
 * does not go back to disk for files already read. Recency is tracked
 * through Map insertion order: a hit moves the entry to the back, and on
 * overflow the front entry (least recently used) is evicted.
 */

import { readFileSync } from "node:fs";
import { KEYGREP_CONFIG } from "../config.js";

/** Storage collaborator the cache reads through on a miss. */
export interface ContentSource {
  /** Return the full text of `path`, or throw when it cannot be read. */
  read(path: string): string;
}

export type LoadResult = { ok: true; text: string } | { ok: false; error: Error };

const utf8 = new TextDecoder("utf-8", { fatal: true });

/** Reads files from disk, rejecting content that is not valid UTF-8. */
export const fileSystemSource: ContentSource = {
  read(path) {
    return utf8.decode(readFileSync(path));
  },
};

export class ContentCache {
  private cache = new Map<string, string>();

  constructor(
    private readonly source: ContentSource = fileSystemSource,
    readonly capacity: number = KEYGREP_CONFIG.CACHE_CAPACITY
  ) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Cache capacity must be a positive integer, got ${capacity}`);
    }
  }

  getOrLoad(path: string): LoadResult {
    const cached = this.cache.get(path);
    if (cached !== undefined) {
      this.touch(path, cached);
      return { ok: true, text: cached };
    }

    let text: string;
    try {
      text = this.source.read(path);
    } catch (e) {
      return { ok: false, error: e instanceof Error ? e : new Error(String(e)) };
    }

    if (this.cache.size >= this.capacity) {
      const { value: oldest, done } = this.cache.keys().next();
      if (!done) this.cache.delete(oldest);
    }
    this.cache.set(path, text);
    return { ok: true, text };
  }

  /** Look up without changing recency. */
  peek(path: string): string | undefined {
    return this.cache.get(path);
  }

  has(path: string): boolean {
    return this.cache.has(path);
  }

  /** Cached paths, least recently used first. */
  keys(): string[] {
    return [...this.cache.keys()];
  }

  clear(): void {
    this.cache.clear();
  }

  get size(): number {
    return this.cache.size;
  }

  private touch(path: string, text: string): void {
    this.cache.delete(path);
    this.cache.set(path, text);
  }
}
