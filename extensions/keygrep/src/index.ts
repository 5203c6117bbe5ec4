/**
 * Keygrep — live regex search extension for Pi.
 *
 * Commands:
 *   - /keygrep [-i] [-e ext,...]: search the text files below the cwd as you type
 *
 * Keys: type to edit the pattern, Enter keeps the results on screen and
 * starts a new search below them, Esc closes.
 */

import type { ExtensionAPI, ExtensionFactory } from "@mariozechner/pi-coding-agent";
import { debugLog } from "./debug.js";
import { SearchSession } from "./engine/session.js";
import { listCandidateFiles } from "./indexer.js";
import { KeygrepOptionsError, parseOptions, splitCommandArgs } from "./options.js";
import type { KeygrepOptions } from "./types.js";
import { SearchView } from "./ui/search-view.js";

// ─── Extension ──────────────────────────────────────────────────────────────

const keygrepExtension: ExtensionFactory = (pi: ExtensionAPI) => {
  pi.registerCommand("keygrep", {
    description: "Live regex search over text files — Usage: /keygrep [-i] [-e ext,...]",
    handler: async (args, ctx) => {
      if (!ctx.hasUI) {
        ctx.ui.notify("UI not available", "error");
        return;
      }

      let options: KeygrepOptions;
      try {
        options = parseOptions(splitCommandArgs(args), { from: "user", embedded: true });
      } catch (e) {
        if (e instanceof KeygrepOptionsError) {
          ctx.ui.notify(e.message, "error");
          return;
        }
        throw e;
      }

      const files = listCandidateFiles(".", options.extensions, debugLog);
      debugLog(`/keygrep indexed ${files.length} files`);
      const session = new SearchSession({
        files,
        caseInsensitive: options.caseInsensitive,
        logger: debugLog,
      });

      await ctx.ui.custom<void>((tui, _theme, _kb, done) => {
        return new SearchView(tui, session, () => done(undefined));
      });
    },
  });
};

export default keygrepExtension;
