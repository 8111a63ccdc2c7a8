/// # docs-pipeline
///
/// regenerates a package's API documentation and publishes it: run the
/// doc generator, run the site builder, mark the output for github pages,
/// and swap it in for the previously published docs.
///
/// the CLI in `cli.ts` is a thin wrapper over `runPipeline`. everything
/// it uses is exported here for scripts that want to drive the pipeline
/// themselves (with their own paths, tools or logger).

export { runPipeline, finishedMessage } from "./pipeline.js";
export type { PipelineDeps, PipelineResult, StepName, StepResult } from "./pipeline.js";
export { resolveConfig, parseArgs, defaults, usage } from "./config.js";
export type { PipelineConfig, PipelineOptions, ParsedArgs, ToolCommand } from "./config.js";
export { runCommand, succeeded, describeFailure } from "./process.js";
export type { CommandRunner, CommandResult, RunOptions } from "./process.js";
export { copyMarker, removeTree, copyTree } from "./files.js";
export type { RemovedCallback } from "./files.js";
export { waitForKeypress, pausePrompt } from "./pause.js";
export type { PauseStreams } from "./pause.js";
export { createConsoleLogger } from "./log.js";
export type { Logger } from "./log.js";
export { UsageError, StepFailedError } from "./errors.js";
export { main } from "./main.js";
export type { MainDeps } from "./main.js";
