/// # logging
///
/// progress goes to stdout and failures to stderr, same as always. the
/// `Logger` interface exists so the pipeline can be handed a recording
/// logger in tests instead of the console.

import pc from "picocolors";

export interface Logger {
  /// a step finished. printed as-is.
  step(message: string): void;
  /// low-priority detail, like each entry removed from the old docs.
  detail(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export function createConsoleLogger(): Logger {
  return {
    step: (message) => console.log(message),
    detail: (message) => console.log(pc.dim(message)),
    warn: (message) => console.warn(pc.yellow(message)),
    error: (message) => console.error(pc.red(message))
  };
}
