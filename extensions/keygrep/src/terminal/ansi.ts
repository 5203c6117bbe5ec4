/**
 * ANSI SGR sequences used to colour result lines.
 */

export const RESET = "\x1b[0m";

export const FG_RED = "\x1b[31m";
export const FG_MAGENTA = "\x1b[35m";
export const FG_CYAN = "\x1b[36m";
export const FG_WHITE = "\x1b[37m";

/** Wrap `text` in a foreground colour, resetting afterwards. */
export const paint = (color: string, text: string): string => `${color}${text}${RESET}`;
