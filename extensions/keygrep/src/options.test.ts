import { describe, expect, it } from "vitest";
import { KeygrepOptionsError, parseOptions, splitCommandArgs } from "./options.js";

const parse = (...argv: string[]) => parseOptions(argv, { from: "user", embedded: true });

describe("parseOptions", () => {
  it("defaults to case-sensitive search over the built-in extensions", () => {
    expect(parse()).toEqual({ caseInsensitive: false, extensions: undefined });
  });

  it("reads the case flag", () => {
    expect(parse("-i").caseInsensitive).toBe(true);
    expect(parse("--insensitive-to-case").caseInsensitive).toBe(true);
  });

  it("accepts comma and space separated extensions", () => {
    expect(parse("-e", "rs,.MD").extensions).toEqual(["rs", "md"]);
    expect(parse("--extensions", "rs", "md", "-i")).toEqual({
      caseInsensitive: true,
      extensions: ["rs", "md"],
    });
  });

  it("falls back to the defaults when the list is empty", () => {
    expect(parse("-e", ",").extensions).toBeUndefined();
  });

  it("skips the runtime and script entries of process.argv", () => {
    expect(parseOptions(["node", "keygrep", "-i"], { from: "node" }).caseInsensitive).toBe(true);
  });

  it("throws KeygrepOptionsError for unknown flags", () => {
    expect(() => parse("--bogus")).toThrow(KeygrepOptionsError);
    try {
      parse("--bogus");
    } catch (e) {
      expect(e).toBeInstanceOf(KeygrepOptionsError);
      if (e instanceof KeygrepOptionsError) {
        expect(e.code).toBe("commander.unknownOption");
        expect(e.message).toMatch(/unknown option '--bogus'/);
      }
    }
  });

  it("returns the help text as the error message for --help", () => {
    try {
      parse("--help");
      expect.unreachable();
    } catch (e) {
      expect(e).toBeInstanceOf(KeygrepOptionsError);
      if (e instanceof KeygrepOptionsError) {
        expect(e.code).toBe("commander.helpDisplayed");
        expect(e.message).toContain("Usage: keygrep");
      }
    }
  });
});

describe("splitCommandArgs", () => {
  it("splits on whitespace", () => {
    expect(splitCommandArgs("  -i   -e rs ")).toEqual(["-i", "-e", "rs"]);
  });

  it("handles missing arguments", () => {
    expect(splitCommandArgs(undefined)).toEqual([]);
    expect(splitCommandArgs("")).toEqual([]);
  });
});
