/// # filesystem housekeeping
///
/// three operations, all on whole directories: drop the marker into the
/// build output, wipe the published docs, copy the build output over.

import fs from "fs-extra";
import { basename, join } from "path";

/// the marker is copied, never generated, so a missing marker is an error
/// like any other failed copy. the build output directory must already
/// exist; we don't create it, because a missing build directory means
/// the site builder didn't run.
export async function copyMarker(markerPath: string, destDir: string): Promise<string> {
  if (!(await fs.pathExists(destDir))) {
    throw new Error(`build output not found: ${destDir}`);
  }

  const dest = join(destDir, basename(markerPath));
  await fs.copy(markerPath, dest, { overwrite: true, errorOnExist: false });
  return dest;
}

/// ## removeTree
///
/// forced, recursive and verbose. a directory that isn't there is fine:
/// there's nothing to remove. otherwise we walk the tree depth-first and
/// remove children before their parent, reporting every entry as it goes
/// so the terminal shows exactly what was deleted.
///
/// symlinks are removed, not followed. a link inside the old docs that
/// points somewhere else in the project must not take its target with it.

export type RemovedCallback = (message: string) => void;

export async function removeTree(dir: string, onRemoved: RemovedCallback = () => {}): Promise<string[]> {
  const removed: string[] = [];

  if (!(await exists(dir))) {
    return removed;
  }

  async function visit(path: string): Promise<void> {
    const stat = await fs.lstat(path);

    if (stat.isDirectory()) {
      const entries = (await fs.readdir(path)).sort();
      for (const entry of entries) {
        await visit(join(path, entry));
      }
      await fs.rmdir(path);
      onRemoved(`removed directory '${path}'`);
    } else {
      await fs.unlink(path);
      onRemoved(`removed '${path}'`);
    }

    removed.push(path);
  }

  await visit(dir);
  return removed;
}

/// copies the contents of `src` into `dest`, creating it as needed. files
/// already in `dest` survive, so the pipeline always removes it first.
export async function copyTree(src: string, dest: string): Promise<void> {
  if (!(await fs.pathExists(src))) {
    throw new Error(`nothing to copy: ${src} does not exist`);
  }

  await fs.copy(src, dest, { overwrite: true, errorOnExist: false, dereference: false });
}

/// `pathExists` follows symlinks, so a dangling link would look absent.
/// `lstat` sees the link itself.
async function exists(path: string): Promise<boolean> {
  try {
    await fs.lstat(path);
    return true;
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") {
      return false;
    }
    throw error;
  }
}
