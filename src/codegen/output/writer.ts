/**
 * Artifact writer
 *
 * Each artifact is written to a temporary sibling and renamed into place, so
 * a reader never sees a half-written file. Files whose bytes already match
 * are left alone.
 */

import { mkdir, readFile, rename, rm, writeFile } from 'fs/promises';
import { dirname, resolve } from 'path';
import { describeError, IOError, type DiagnosticCollector } from '../../errors.js';
import { logWarning } from '../../logger.js';
import type { PlannedArtifact } from './planner.js';

export type WriteStatus = 'written' | 'unchanged' | 'failed';

export interface WriteResult {
  written: string[];
  unchanged: string[];
  failed: string[];
}

let tempCounter = 0;

async function readExisting(path: string): Promise<string | null> {
  try {
    return await readFile(path, 'utf-8');
  } catch (error) {
    // fs errors may come from another realm, so no instanceof here
    if (typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT') {
      return null;
    }
    throw error;
  }
}

/**
 * Write one file atomically unless its content is already current
 */
export async function writeFileAtomic(path: string, content: string): Promise<Exclude<WriteStatus, 'failed'>> {
  if ((await readExisting(path)) === content) {
    return 'unchanged';
  }

  await mkdir(dirname(path), { recursive: true });
  tempCounter++;
  const temp = `${path}.${process.pid}.${tempCounter}.tmp`;

  try {
    await writeFile(temp, content, 'utf-8');
    await rename(temp, path);
  } catch (error) {
    try {
      await rm(temp, { force: true });
    } catch (cleanupError) {
      logWarning(`Could not remove ${temp}: ${describeError(cleanupError)}`);
    }
    throw error;
  }

  return 'written';
}

/**
 * Write every artifact under `rootDir`. A failing write is reported as an
 * `IOError` diagnostic and the remaining artifacts are still written.
 */
export async function writeArtifacts(
  rootDir: string,
  artifacts: readonly PlannedArtifact[],
  diagnostics: DiagnosticCollector
): Promise<WriteResult> {
  const result: WriteResult = { written: [], unchanged: [], failed: [] };

  for (const artifact of artifacts) {
    try {
      const status = await writeFileAtomic(resolve(rootDir, artifact.path), artifact.content);
      result[status].push(artifact.path);
    } catch (error) {
      diagnostics.report(new IOError(artifact.path, error), artifact.path);
      result.failed.push(artifact.path);
    }
  }

  return result;
}
