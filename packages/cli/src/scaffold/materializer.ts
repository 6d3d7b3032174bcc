/**
 * Filesystem materializer
 *
 * Writes a layout plan under a working directory. The directory is replaced
 * on every run unless `reset` is false, so repeated runs give identical trees.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { homedir } from 'os';
import {
  ArtifactWriteFailedError,
  UnsafeResetError,
  WorkspaceLockedError,
} from '@lakestack/blueprint';
import { logDebug, logWarn } from '../logger';
import type { Artifact } from '../generators/types';
import type { LayoutPlan } from './planner';

export interface MaterializeOptions {
  /** Remove an existing working directory first (default true) */
  reset?: boolean;
  /** Base for relative roots and for the unsafe-reset check */
  cwd?: string;
  /** Take the advisory lock (default true); false when the caller already holds it */
  lock?: boolean;
  onWarn?: (message: string) => void;
}

export interface MaterializeResult {
  rootDir: string;
  reset: boolean;
  directories: string[];
  written: string[];
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

async function pathExists(target: string): Promise<boolean> {
  try {
    await fs.lstat(target);
    return true;
  } catch (error) {
    if (isErrnoException(error) && error.code === 'ENOENT') {
      return false;
    }
    throw error;
  }
}

/**
 * Advisory lock beside the working directory, so it survives the reset
 */
export function lockPathFor(rootDir: string): string {
  return `${rootDir}.lock`;
}

export async function acquireLock(rootDir: string): Promise<string> {
  const lockPath = lockPathFor(rootDir);
  await fs.mkdir(path.dirname(rootDir), { recursive: true });
  try {
    await fs.writeFile(lockPath, `${process.pid}\n`, { flag: 'wx' });
  } catch (error) {
    if (isErrnoException(error) && error.code === 'EEXIST') {
      throw new WorkspaceLockedError(lockPath);
    }
    throw error;
  }
  return lockPath;
}

export async function releaseLock(lockPath: string): Promise<void> {
  await fs.rm(lockPath, { force: true });
}

/**
 * Refuse to remove the filesystem root, the home directory, or anything
 * containing the current directory
 */
export function assertSafeReset(rootDir: string, cwd: string): void {
  const root = path.resolve(rootDir);
  const relative = path.relative(root, path.resolve(cwd));
  const containsCwd = relative === '' || (!relative.startsWith('..') && !path.isAbsolute(relative));

  if (root === path.parse(root).root || root === path.resolve(homedir()) || containsCwd) {
    throw new UnsafeResetError(root);
  }
}

/**
 * Write through a temporary sibling so the target never holds a partial file
 */
async function writeArtifact(rootDir: string, artifact: Artifact): Promise<void> {
  const target = path.join(rootDir, artifact.path);
  const temp = path.join(path.dirname(target), `.${path.basename(target)}.${process.pid}.tmp`);

  try {
    await fs.writeFile(temp, artifact.content, 'utf-8');
    if (artifact.executable) {
      await fs.chmod(temp, 0o755);
    }
    await fs.rename(temp, target);

    const readBack = await fs.readFile(target, 'utf-8');
    if (readBack !== artifact.content) {
      throw new Error('content read back does not match');
    }
  } catch (error) {
    await fs.rm(temp, { force: true });
    throw new ArtifactWriteFailedError(artifact.path, errorMessage(error));
  }
}

export async function materialize(
  plan: LayoutPlan,
  rootDir: string = plan.rootDir,
  options: MaterializeOptions = {}
): Promise<MaterializeResult> {
  const cwd = options.cwd ?? process.cwd();
  const root = path.resolve(cwd, rootDir);
  const reset = options.reset ?? true;
  const lockPath = options.lock === false ? undefined : await acquireLock(root);

  try {
    let didReset = false;
    if (reset && (await pathExists(root))) {
      assertSafeReset(root, cwd);
      const message = `Removing existing directory ${root}`;
      logWarn(message);
      options.onWarn?.(message);
      await fs.rm(root, { recursive: true, force: true });
      didReset = true;
    }

    await fs.mkdir(root, { recursive: true });
    for (const dir of plan.directories) {
      await fs.mkdir(path.join(root, dir), { recursive: true });
    }

    const written: string[] = [];
    for (const artifact of plan.artifacts) {
      await writeArtifact(root, artifact);
      written.push(artifact.path);
      logDebug(`Wrote ${artifact.path}`, { kind: artifact.kind, bytes: artifact.content.length });
    }

    return {
      rootDir: root,
      reset: didReset,
      directories: [...plan.directories],
      written,
    };
  } finally {
    if (lockPath) {
      await releaseLock(lockPath);
    }
  }
}
