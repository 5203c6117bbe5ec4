/**
 * Keygrep configuration — constants shared by the engine and the view.
 */

/** Keygrep configuration constants */
export const KEYGREP_CONFIG = {
  CACHE_CAPACITY: 100,
  /** Characters of left context kept before the first match of a long line. */
  CONTEXT_CHARS: 20,
  PATH_COLUMN_WIDTH: 30,
  /** Path column plus padding, subtracted from the terminal width. */
  PATH_COLUMN_MARGIN: 33,
  ELLIPSIS: "...",
  POLL_INTERVAL_MS: 100,
  /** Prompt row, gap row and bottom margin. */
  RESERVED_ROWS: 3,
  /** Prompt row and gap row above each block of results. */
  BLOCK_CHROME_ROWS: 2,
} as const;

export const PROMPT_LABEL = "Search: ";

export const INVALID_PATTERN_MESSAGE = "Invalid regex pattern";
