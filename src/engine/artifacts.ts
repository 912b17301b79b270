/**
 * Copies of step outputs: into a run's artifacts directory after a step
 * succeeds, and from an earlier run into a fresh run directory when a run
 * is seeded.
 */

import { promises as fs } from 'fs';
import path from 'path';
import { ArtifactSpec } from '../domain/flow';
import { RUN_FILES } from '../storage/run-store';
import { resolveArtifactPath } from './artifact-validator';

async function exists(target: string): Promise<boolean> {
  try {
    await fs.access(target);
    return true;
  } catch {
    return false;
  }
}

async function copyPath(source: string, destination: string): Promise<void> {
  await fs.mkdir(path.dirname(destination), { recursive: true });
  await fs.rm(destination, { recursive: true, force: true });
  await fs.cp(source, destination, { recursive: true, force: true });
}

/**
 * Copy each existing declared output into `<runDir>/artifacts/<basename>`.
 * Returns the artifact names written.
 */
export async function copyArtifactsToRun(
  runDirectory: string,
  outputs: readonly ArtifactSpec[],
): Promise<string[]> {
  const copied: string[] = [];
  const artifactsDir = path.join(runDirectory, RUN_FILES.artifacts);
  for (const spec of outputs) {
    const source = resolveArtifactPath(spec, runDirectory);
    if (!(await exists(source))) continue;
    const name = path.basename(source);
    await copyPath(source, path.join(artifactsDir, name));
    copied.push(name);
  }
  return copied;
}

/**
 * Copy declared outputs left by an earlier run into a new run directory,
 * keeping their relative paths. Returns the paths that were seeded.
 */
export async function seedRunDirectory(
  sourceRunDirectory: string,
  targetRunDirectory: string,
  outputs: readonly ArtifactSpec[],
): Promise<string[]> {
  const seeded: string[] = [];
  const seen = new Set<string>();
  for (const spec of outputs) {
    if (seen.has(spec.path)) continue;
    seen.add(spec.path);
    const source = resolveArtifactPath(spec, sourceRunDirectory);
    if (!(await exists(source))) continue;
    await copyPath(source, resolveArtifactPath(spec, targetRunDirectory));
    seeded.push(spec.path);
  }
  return seeded;
}
