/**
 * Keygrep debug logging.
 * Enable with KEYGREP_DEBUG=1 environment variable.
 */
import { appendFileSync, mkdirSync } from "node:fs";
import { join } from "node:path";

/** Sink for engine diagnostics. */
export type Logger = (msg: string) => void;

const KEYGREP_DEBUG = process.env.KEYGREP_DEBUG === "1";
let debugLogPath: string | null = null;

/**
 * Log debug message to ~/.local/share/keygrep/debug.log
 * Only active when KEYGREP_DEBUG=1 environment variable is set.
 */
export const debugLog: Logger = (msg) => {
  if (!KEYGREP_DEBUG) return;
  try {
    if (!debugLogPath) {
      const baseDir = join(process.env.HOME ?? "/tmp", ".local", "share", "keygrep");
      mkdirSync(baseDir, { recursive: true });
      debugLogPath = join(baseDir, "debug.log");
    }
    const ts = new Date().toISOString();
    appendFileSync(debugLogPath, `[${ts}] ${msg}\n`);
  } catch {
    // Debug logging must never break anything
  }
};
