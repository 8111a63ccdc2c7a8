/// # the docs pipeline
///
/// five steps, always in this order:
///
/// 1. **apidoc**: the doc generator writes `.rst` stubs for every module
///    of the source package into the working directory.
/// 2. **build**: the site builder renders those stubs to html.
/// 3. **marker**: `.nojekyll` goes into the html output, so github pages
///    serves the `_static/` folders instead of hiding them.
/// 4. **clean**: the previously published docs are deleted outright.
/// 5. **publish**: the fresh html is copied into their place.
///
/// each step announces itself when it finishes. nothing branches and
/// nothing runs in parallel; a step starts only once the one before it
/// has returned.
///
/// ## when a step fails
///
/// by default a failure is reported and the pipeline keeps going. that's
/// how the docs have always been rebuilt, and it means a failed build
/// still wipes the old docs and publishes whatever the builder left
/// behind. `strict` mode stops at the first failure instead, before
/// anything destructive happens.

import { basename } from "path";
import type { PipelineConfig } from "./config.js";
import { StepFailedError } from "./errors.js";
import { copyMarker, copyTree, removeTree } from "./files.js";
import type { Logger } from "./log.js";
import { describeFailure, succeeded, type CommandRunner } from "./process.js";

export type StepName = "apidoc" | "build" | "marker" | "clean" | "publish";

export interface StepResult {
  name: StepName;
  ok: boolean;
  error?: string;
}

export interface PipelineResult {
  ok: boolean;
  steps: StepResult[];
}

export interface PipelineDeps {
  runner: CommandRunner;
  logger: Logger;
}

interface Step {
  name: StepName;
  /// printed once the step has finished, whether or not it succeeded.
  done: string;
  /// resolves to a failure reason, or `undefined` on success.
  run(): Promise<string | undefined>;
}

export const finishedMessage = "Build docs finished!";

export async function runPipeline(config: PipelineConfig, deps: PipelineDeps): Promise<PipelineResult> {
  const { runner, logger } = deps;

  /// subprocess steps fail on a bad exit; filesystem steps fail by
  /// throwing. both end up as a reason string so the loop below can treat
  /// every step the same.
  const tool = (command: string, args: string[]) => async (): Promise<string | undefined> => {
    const result = await runner(command, args, { cwd: config.workDir });
    return succeeded(result) ? undefined : describeFailure(result);
  };

  const steps: Step[] = [
    {
      name: "apidoc",
      done: "Generated API docs",
      run: tool(config.apidoc.command, [...config.apidoc.args, config.sourcePath])
    },
    {
      name: "build",
      done: "Made HTML",
      run: tool(config.builder.command, config.builder.args)
    },
    {
      name: "marker",
      done: `Copied ${basename(config.markerFile)}`,
      run: async () => {
        await copyMarker(config.markerFile, config.buildOutputDir);
        return undefined;
      }
    },
    {
      name: "clean",
      done: "Removed old docs",
      run: async () => {
        await removeTree(config.docsOutputDir, (message) => logger.detail(message));
        return undefined;
      }
    },
    {
      name: "publish",
      done: "Moved to docs folder",
      run: async () => {
        await copyTree(config.buildOutputDir, config.docsOutputDir);
        return undefined;
      }
    }
  ];

  const results: StepResult[] = [];

  for (const step of steps) {
    const error = await attempt(step);

    if (error === undefined) {
      results.push({ name: step.name, ok: true });
    } else {
      results.push({ name: step.name, ok: false, error });
      if (config.strict) {
        throw new StepFailedError(step.name, error);
      }
      logger.warn(`warning: ${error}`);
    }

    logger.step(step.done);
  }

  logger.step(finishedMessage);

  const failed = results.filter((r) => !r.ok).map((r) => r.name);
  if (failed.length > 0) {
    logger.warn(`warning: ${failed.length} step(s) failed: ${failed.join(", ")}`);
  }

  return { ok: failed.length === 0, steps: results };
}

/// a filesystem error becomes the step's failure reason. anything that
/// isn't an `Error` is a bug, not a failed step, so it propagates.
async function attempt(step: Step): Promise<string | undefined> {
  try {
    return await step.run();
  } catch (error) {
    if (error instanceof Error) {
      return error.message;
    }
    throw error;
  }
}
