#!/usr/bin/env node
/**
 * keygrep — standalone entry point.
 *
 * Indexes the text files below the working directory, then runs the live
 * search view inline in the terminal until Escape (or Ctrl+C).
 */

import { ProcessTerminal, TUI } from "@mariozechner/pi-tui";
import { debugLog } from "./debug.js";
import { SearchSession } from "./engine/session.js";
import { listCandidateFiles } from "./indexer.js";
import { parseOptions } from "./options.js";
import { SearchView } from "./ui/search-view.js";

function main(): void {
  const options = parseOptions(process.argv, { from: "node" });
  const files = listCandidateFiles(".", options.extensions, debugLog);
  debugLog(`indexed ${files.length} files (cwd ${process.cwd()})`);

  const session = new SearchSession({
    files,
    caseInsensitive: options.caseInsensitive,
    logger: debugLog,
  });

  const tui = new TUI(new ProcessTerminal());
  const view = new SearchView(tui, session, () => {
    // Leaves the cursor below the last rendered line
    tui.stop();
    process.exit(0);
  });

  tui.addChild(view);
  tui.setFocus(view);
  tui.start();
}

try {
  main();
} catch (e) {
  console.error(e instanceof Error ? e.message : String(e));
  process.exit(1);
}
