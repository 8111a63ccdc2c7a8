/// # running the tools
///
/// the doc generator and the site builder are external programs. we spawn
/// them with inherited stdio so their output lands in the terminal exactly
/// as if they'd been run by hand, and wait for them to exit.
///
/// unlike a shell script, we look at how they exited. whether a failure
/// stops the pipeline is up to the caller; this module only reports it.

import { spawn } from "child_process";

export interface CommandResult {
  /// the full command line, for messages.
  command: string;
  exitCode: number | null;
  signal: NodeJS.Signals | null;
  /// set when the process couldn't be started at all (usually ENOENT).
  error?: Error;
}

export interface RunOptions {
  cwd: string;
}

/// the pipeline only ever talks to this signature, so tests can swap in
/// a runner that fakes the tools' output without leaving the process.
export type CommandRunner = (command: string, args: string[], options: RunOptions) => Promise<CommandResult>;

export const runCommand: CommandRunner = (command, args, { cwd }) => {
  const commandLine = [command, ...args].join(" ");

  return new Promise((resolve) => {
    const child = spawn(command, args, { cwd, stdio: "inherit" });

    /// a spawn failure still fires `close` afterwards on some platforms, so
    /// whichever event arrives first wins and the other is ignored.
    let settled = false;

    child.once("error", (error) => {
      if (settled) return;
      settled = true;
      resolve({ command: commandLine, exitCode: null, signal: null, error });
    });

    child.once("close", (exitCode, signal) => {
      if (settled) return;
      settled = true;
      resolve({ command: commandLine, exitCode, signal });
    });
  });
};

export function succeeded(result: CommandResult): boolean {
  return result.error === undefined && result.exitCode === 0;
}

export function describeFailure(result: CommandResult): string {
  if (result.error) {
    return `could not start ${result.command}: ${result.error.message}`;
  }
  if (result.signal) {
    return `${result.command} killed by ${result.signal}`;
  }
  return `${result.command} exited with code ${result.exitCode}`;
}
