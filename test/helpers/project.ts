/// shared fixtures for the pipeline tests: a throwaway project layout in a
/// temp directory, a fake runner that stands in for the doc generator and
/// the site builder, and a logger that records instead of printing.

import fs from "fs-extra";
import { mkdtemp } from "fs/promises";
import { tmpdir } from "os";
import { join, relative } from "path";
import type { Logger } from "../../src/log.js";
import type { CommandResult, CommandRunner } from "../../src/process.js";

export interface Project {
  root: string;
  /// `scripts/docs`, where the pipeline runs.
  workDir: string;
  /// `docs`, the published output.
  docsDir: string;
}

export async function createProject(): Promise<Project> {
  const root = await mkdtemp(join(tmpdir(), "docs-pipeline-"));
  const workDir = join(root, "scripts", "docs");

  await fs.outputFile(join(root, "src", "foo.py"), "def bar():\n    \"\"\"Say bar.\"\"\"\n");
  await fs.outputFile(join(workDir, ".nojekyll"), "");
  await fs.outputFile(join(workDir, "conf.py"), "project = 'foo'\n");

  return { root, workDir, docsDir: join(root, "docs") };
}

export interface Call {
  command: string;
  args: string[];
  cwd: string;
}

export interface FakeRunner {
  runner: CommandRunner;
  calls: Call[];
}

/// `sphinx-apidoc` writes one stub per module found in the source dir;
/// `make html` renders every stub to a page. `failBuild` makes the build
/// exit 2 without writing anything, like a broken `conf.py` would.
export function fakeTools(options: { failBuild?: boolean } = {}): FakeRunner {
  const calls: Call[] = [];

  const runner: CommandRunner = async (command, args, { cwd }) => {
    calls.push({ command, args, cwd });
    const result: CommandResult = { command: [command, ...args].join(" "), exitCode: 0, signal: null };

    if (command === "sphinx-apidoc") {
      const source = args[args.length - 1];
      for (const file of await fs.readdir(source)) {
        const module = file.replace(/\.py$/, "");
        await fs.outputFile(join(cwd, `${module}.rst`), `.. automodule:: ${module}\n`);
      }
      return result;
    }

    if (command === "make") {
      if (options.failBuild) {
        return { ...result, exitCode: 2 };
      }
      const html = join(cwd, "_build", "html");
      for (const file of await fs.readdir(cwd)) {
        if (!file.endsWith(".rst")) continue;
        const module = file.replace(/\.rst$/, "");
        await fs.outputFile(join(html, `${module}.html`), `<dt id="${module}.bar">${module}.bar()</dt>\n`);
      }
      await fs.outputFile(join(html, "index.html"), "<h1>foo</h1>\n");
      await fs.outputFile(join(html, "_static", "basic.css"), "body { margin: 0 }\n");
      return result;
    }

    return { ...result, exitCode: 127 };
  };

  return { runner, calls };
}

export interface RecordingLogger extends Logger {
  steps: string[];
  details: string[];
  warnings: string[];
  errors: string[];
}

export function recordingLogger(): RecordingLogger {
  const steps: string[] = [];
  const details: string[] = [];
  const warnings: string[] = [];
  const errors: string[] = [];

  return {
    steps,
    details,
    warnings,
    errors,
    step: (message) => steps.push(message),
    detail: (message) => details.push(message),
    warn: (message) => warnings.push(message),
    error: (message) => errors.push(message)
  };
}

/// every file under `dir`, keyed by its relative path.
export async function readTree(dir: string): Promise<Map<string, string>> {
  const files = new Map<string, string>();

  async function walk(path: string): Promise<void> {
    for (const entry of await fs.readdir(path)) {
      const full = join(path, entry);
      if ((await fs.stat(full)).isDirectory()) {
        await walk(full);
      } else {
        files.set(relative(dir, full), await fs.readFile(full, "utf-8"));
      }
    }
  }

  await walk(dir);
  return files;
}
