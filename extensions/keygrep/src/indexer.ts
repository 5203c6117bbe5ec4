/**
 * File indexer — collects the candidate files searched by a session.
 */
import { type Dirent, readdirSync, statSync } from "node:fs";
import type { Logger } from "./debug.js";

/** Extensions treated as text when none are given. */
export const DEFAULT_TEXT_EXTENSIONS: readonly string[] = [
  "txt",
  "md",
  "rs",
  "py",
  "js",
  "ts",
  "html",
  "css",
  "json",
  "yaml",
  "yml",
  "toml",
  "ini",
  "sh",
  "bash",
  "cpp",
  "c",
  "h",
  "java",
  "go",
  "rb",
  "php",
  "sql",
];

/** Strip leading dots and whitespace, lowercase, drop empties. */
export function normalizeExtensions(list: readonly string[]): string[] {
  return list.map((ext) => ext.trim().replace(/^\.+/, "").toLowerCase()).filter(Boolean);
}

const isHidden = (name: string): boolean => name.startsWith(".");

function extensionOf(name: string): string | null {
  const dot = name.lastIndexOf(".");
  // "Makefile" and ".bashrc" style names have no extension
  if (dot <= 0 || dot === name.length - 1) return null;
  return name.slice(dot + 1).toLowerCase();
}

function isRegularFile(path: string, entry: Dirent): boolean {
  if (entry.isFile()) return true;
  if (!entry.isSymbolicLink()) return false;
  try {
    return statSync(path).isFile();
  } catch {
    // Dangling link
    return false;
  }
}

/**
 * Walk `root` depth-first in name order and list text files.
 *
 * Hidden entries (names starting with ".") are skipped, hidden directories
 * included. Paths are reported as `root/relative/path`, so the default root
 * gives `./src/index.ts`. Directories that cannot be read are skipped.
 */
export function listCandidateFiles(
  root = ".",
  extensions: readonly string[] = DEFAULT_TEXT_EXTENSIONS,
  logger?: Logger
): string[] {
  const wanted = new Set(normalizeExtensions(extensions));
  const files: string[] = [];

  const walk = (dir: string) => {
    let entries: Dirent[];
    try {
      entries = readdirSync(dir, { withFileTypes: true });
    } catch (e) {
      logger?.(`cannot read directory ${dir}: ${e instanceof Error ? e.message : String(e)}`);
      return;
    }
    entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

    for (const entry of entries) {
      if (isHidden(entry.name)) continue;
      const path = `${dir}/${entry.name}`;
      if (entry.isDirectory()) {
        walk(path);
        continue;
      }
      const ext = extensionOf(entry.name);
      if (ext && wanted.has(ext) && isRegularFile(path, entry)) {
        files.push(path);
      }
    }
  };

  walk(root.endsWith("/") && root.length > 1 ? root.slice(0, -1) : root);
  return files;
}
