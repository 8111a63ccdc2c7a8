/// # main
///
/// everything the CLI does, minus touching `process`. it takes the
/// arguments and its collaborators, and hands back an exit code, so the
/// exit paths can be checked without spawning the CLI.

import { parseArgs, resolveConfig, usage, type PipelineConfig } from "./config.js";
import { StepFailedError, UsageError } from "./errors.js";
import type { Logger } from "./log.js";
import type { CommandRunner } from "./process.js";
import { runPipeline } from "./pipeline.js";

export interface MainDeps {
  runner: CommandRunner;
  logger: Logger;
  /// blocks until the user lets the process go.
  pause: () => Promise<void>;
  /// where relative paths resolve from. defaults to `process.cwd()`.
  cwd?: string;
}

export async function main(argv: string[], deps: MainDeps): Promise<number> {
  const { runner, logger } = deps;
  let config: PipelineConfig;

  /// a bad flag and a dangerous `--out` are both the caller's mistake:
  /// say what's wrong, show the usage, and do nothing else.
  try {
    const parsed = parseArgs(argv);
    if (parsed.help) {
      logger.step(usage);
      return 0;
    }
    config = resolveConfig(parsed.options, deps.cwd);
  } catch (error) {
    if (error instanceof UsageError) {
      logger.error(error.message);
      logger.step(usage);
      return 1;
    }
    throw error;
  }

  try {
    await runPipeline(config, { runner, logger });
  } catch (error) {
    /// nothing was deleted, so there's nothing to wait around for either.
    if (error instanceof StepFailedError) {
      logger.error(`stopped: ${error.message}`);
      return 1;
    }
    throw error;
  }

  if (config.pause) {
    await deps.pause();
  }

  return 0;
}
