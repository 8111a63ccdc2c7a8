/// # configuration
///
/// the pipeline runs from the documentation source directory, the one with
/// the site builder's `conf.py`/`Makefile` and the `.nojekyll` marker in it.
/// every other path is relative to that directory: the package being
/// documented and the published `docs/` folder both live two levels up in
/// the enclosing project.
///
/// there's no config file and no environment lookup. the defaults below
/// cover the usual layout, and a handful of flags cover the rest.

import { isAbsolute, relative, resolve, sep } from "path";
import { UsageError } from "./errors.js";

export interface ToolCommand {
  command: string;
  args: string[];
}

export interface PipelineConfig {
  /// where both tools run and where the marker file is read from.
  workDir: string;
  /// the package whose API gets documented.
  sourcePath: string;
  /// where the site builder writes html.
  buildOutputDir: string;
  markerFile: string;
  /// the published directory. wiped and recreated on every run.
  docsOutputDir: string;
  /// the source path is appended to these args at run time.
  apidoc: ToolCommand;
  builder: ToolCommand;
  /// wait for a keypress before exiting.
  pause: boolean;
  /// stop at the first failed step instead of carrying on.
  strict: boolean;
}

export interface PipelineOptions {
  workDir?: string;
  sourcePath?: string;
  buildOutputDir?: string;
  markerFile?: string;
  docsOutputDir?: string;
  apidoc?: ToolCommand;
  builder?: ToolCommand;
  pause?: boolean;
  strict?: boolean;
}

export const defaults = {
  sourcePath: "../../src",
  buildOutputDir: "_build/html",
  markerFile: ".nojekyll",
  docsOutputDir: "../../docs",
  apidoc: { command: "sphinx-apidoc", args: ["--ext-autodoc", "--force", "-o", "."] },
  builder: { command: "make", args: ["html"] }
} as const;

export function resolveConfig(options: PipelineOptions = {}, cwd: string = process.cwd()): PipelineConfig {
  const workDir = resolve(cwd, options.workDir ?? ".");

  const config: PipelineConfig = {
    workDir,
    sourcePath: resolve(workDir, options.sourcePath ?? defaults.sourcePath),
    buildOutputDir: resolve(workDir, options.buildOutputDir ?? defaults.buildOutputDir),
    markerFile: resolve(workDir, options.markerFile ?? defaults.markerFile),
    docsOutputDir: resolve(workDir, options.docsOutputDir ?? defaults.docsOutputDir),
    apidoc: options.apidoc ?? { command: defaults.apidoc.command, args: [...defaults.apidoc.args] },
    builder: options.builder ?? { command: defaults.builder.command, args: [...defaults.builder.args] },
    pause: options.pause ?? true,
    strict: options.strict ?? false
  };

  /// the published directory gets deleted wholesale before every publish.
  /// if it sits on top of anything the pipeline reads from, the clean step
  /// takes the inputs down with it.
  const inputs = [
    ["working directory", config.workDir],
    ["build output", config.buildOutputDir],
    ["source package", config.sourcePath]
  ] as const;

  for (const [label, path] of inputs) {
    if (isWithin(config.docsOutputDir, path)) {
      throw new UsageError(`output directory ${config.docsOutputDir} would delete the ${label} (${path})`);
    }
  }

  return config;
}

/// true when `path` is `dir` itself or anywhere beneath it.
function isWithin(dir: string, path: string): boolean {
  const rel = relative(dir, path);
  return !(rel === ".." || rel.startsWith(`..${sep}`) || isAbsolute(rel));
}

/// ## argument parsing
///
/// the flag set is small enough that a loop over `argv` reads better than
/// pulling in a parser. a bare word is the source path; everything else
/// has to be one of the known flags.

export interface ParsedArgs {
  help: boolean;
  options: PipelineOptions;
}

export function parseArgs(argv: string[]): ParsedArgs {
  const options: PipelineOptions = {};
  let help = false;

  let i = 0;

  while (i < argv.length) {
    const arg = argv[i++];

    /// flags that take a value consume the next argument. a missing value,
    /// or one that looks like another flag, is a usage error rather than
    /// something we guess around.
    const value = (): string => {
      const next = argv[i];
      if (next === undefined || next.startsWith("--")) {
        throw new UsageError(`${arg} needs a value`);
      }
      i++;
      return next;
    };

    switch (arg) {
      case "-h":
      case "--help":
        help = true;
        break;
      case "--out":
        options.docsOutputDir = value();
        break;
      case "--build-dir":
        options.buildOutputDir = value();
        break;
      case "--marker":
        options.markerFile = value();
        break;
      case "--no-pause":
        options.pause = false;
        break;
      case "--strict":
        options.strict = true;
        break;
      default:
        if (arg.startsWith("-")) {
          throw new UsageError(`unknown option: ${arg}`);
        }
        if (options.sourcePath !== undefined) {
          throw new UsageError(`unexpected argument: ${arg}`);
        }
        options.sourcePath = arg;
    }
  }

  return { help, options };
}

export const usage = `docs-pipeline - regenerate and publish API docs

run from the documentation source directory.

usage:
  docs-pipeline [source] [options]

arguments:
  source              package to document (default: ${defaults.sourcePath})

options:
  --out <dir>         published docs directory (default: ${defaults.docsOutputDir})
  --build-dir <dir>   site builder output (default: ${defaults.buildOutputDir})
  --marker <file>     marker copied into the output (default: ${defaults.markerFile})
  --no-pause          exit without waiting for a keypress
  --strict            stop at the first failed step
  -h, --help          show this message
`;
