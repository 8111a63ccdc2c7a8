#!/usr/bin/env node

/// # CLI
///
/// `docs-pipeline` regenerates the API docs and publishes them. run it
/// from the documentation source directory:
///
/// ```bash
/// docs-pipeline                        # document ../../src into ../../docs
/// docs-pipeline ../../mypkg            # document a different package
/// docs-pipeline --out ../../site       # publish somewhere else
/// docs-pipeline --strict --no-pause    # for CI: fail fast, don't wait
/// ```

import { createConsoleLogger } from "./log.js";
import { main } from "./main.js";
import { waitForKeypress } from "./pause.js";
import { runCommand } from "./process.js";

const code = await main(process.argv.slice(2), {
  runner: runCommand,
  logger: createConsoleLogger(),
  pause: () => waitForKeypress()
});

process.exit(code);
