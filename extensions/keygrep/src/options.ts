/**
 * Option parsing shared by the CLI and the /keygrep command.
 */
import { Command, CommanderError } from "commander";
import { normalizeExtensions } from "./indexer.js";
import type { KeygrepOptions } from "./types.js";

export const VERSION = "0.1.0";

export class KeygrepOptionsError extends Error {
  constructor(
    message: string,
    readonly code: string
  ) {
    super(message);
    this.name = "KeygrepOptionsError";
  }
}

export interface ParseOptionsConfig {
  /** "node" skips the runtime and script entries of process.argv. */
  from: "node" | "user";
  /**
   * Throw KeygrepOptionsError instead of printing and exiting.
   * Required when parsing inside a host UI.
   */
  embedded?: boolean;
}

type RawOptions = {
  insensitiveToCase: boolean;
  extensions?: string[];
};

export function createProgram(): Command {
  return new Command()
    .name("keygrep")
    .description("Live regex search over the text files below the current directory")
    .version(VERSION)
    .option("-i, --insensitive-to-case", "case-insensitive matching", false)
    .option(
      "-e, --extensions <list...>",
      "extensions of files to search, comma or space separated (overrides the defaults)"
    );
}

/** Split "rs,md" style values and normalise each extension. */
function expandExtensions(values: readonly string[]): string[] {
  return normalizeExtensions(values.flatMap((v) => v.split(",")));
}

export function parseOptions(argv: readonly string[], config: ParseOptionsConfig): KeygrepOptions {
  const program = createProgram();
  if (config.embedded) {
    program.exitOverride().configureOutput({
      writeOut: () => {},
      writeErr: () => {},
    });
  }

  try {
    program.parse([...argv], { from: config.from });
  } catch (e) {
    if (e instanceof CommanderError) {
      const message = e.code === "commander.helpDisplayed" ? program.helpInformation() : e.message;
      throw new KeygrepOptionsError(message, e.code);
    }
    throw e;
  }

  const raw = program.opts<RawOptions>();
  const extensions = raw.extensions ? expandExtensions(raw.extensions) : undefined;
  return {
    caseInsensitive: raw.insensitiveToCase,
    extensions: extensions && extensions.length > 0 ? extensions : undefined,
  };
}

/** Tokenise a slash-command argument string. */
export function splitCommandArgs(args: string | undefined): string[] {
  return args?.trim().split(/\s+/).filter(Boolean) ?? [];
}
