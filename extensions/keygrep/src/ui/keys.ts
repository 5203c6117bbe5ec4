import { matchesKey } from "@mariozechner/pi-tui";
import type { KeyEvent } from "../types.js";

const isPrintable = (ch: string): boolean => {
  const code = ch.codePointAt(0) ?? 0;
  return code >= 0x20 && code !== 0x7f;
};

/**
 * Decode raw terminal input into session key events.
 * Pasted text arrives as one chunk and yields one event per character;
 * unrecognised escape sequences yield nothing.
 */
export function decodeKeys(data: string): KeyEvent[] {
  if (matchesKey(data, "escape") || matchesKey(data, "ctrl+c")) return [{ type: "escape" }];
  if (matchesKey(data, "enter")) return [{ type: "enter" }];
  if (matchesKey(data, "backspace")) return [{ type: "backspace" }];
  if (data.startsWith("\x1b")) return [];

  const chars = Array.from(data);
  if (!chars.every(isPrintable)) return [];
  return chars.map((char): KeyEvent => ({ type: "char", char }));
}
