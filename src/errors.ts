/// # errors
///
/// two failure kinds reach the top of the CLI: a command line we can't
/// make sense of, and a pipeline step that failed while running in strict
/// mode. everything else the tools print for themselves.

import type { StepName } from "./pipeline.js";

export class UsageError extends Error {
  override name = "UsageError";
}

export class StepFailedError extends Error {
  override name = "StepFailedError";

  constructor(readonly step: StepName, reason: string) {
    super(`step "${step}" failed: ${reason}`);
  }
}
