/**
 * Artifact validator.
 *
 * Decides whether a file or directory on disk is usable as a completed
 * step's output: it must exist, be non-empty, and for structured kinds
 * parse to the expected shape. Presence alone is never enough.
 */

import { promises as fs, Stats } from 'fs';
import path from 'path';
import { ArtifactKind, ArtifactSpec } from '../domain/flow';
import { errorMessage } from '../domain/errors';

export interface ArtifactCheck {
  path: string;
  /** Absolute location that was inspected. */
  resolvedPath: string;
  valid: boolean;
  reason?: string;
}

/** Guess the artifact kind from a path's extension. */
export function inferArtifactKind(filePath: string): ArtifactKind {
  const ext = path.extname(filePath).toLowerCase();
  if (ext === '.json') return 'json';
  if (ext === '.csv') return 'csv';
  if (ext === '') return 'directory';
  return 'file';
}

/** Build an artifact spec, inferring the kind when it is not given. */
export function artifact(filePath: string, kind?: ArtifactKind): ArtifactSpec {
  return { path: filePath, kind: kind ?? inferArtifactKind(filePath) };
}

export function resolveArtifactPath(spec: ArtifactSpec, baseDir: string): string {
  return path.resolve(baseDir, spec.path);
}

/** Check one artifact against its spec. Never throws. */
export async function validateArtifact(spec: ArtifactSpec, baseDir: string): Promise<ArtifactCheck> {
  const resolvedPath = resolveArtifactPath(spec, baseDir);
  const fail = (reason: string): ArtifactCheck => ({ path: spec.path, resolvedPath, valid: false, reason });

  let stat: Stats;
  try {
    stat = await fs.stat(resolvedPath);
  } catch {
    return fail('missing');
  }

  if (spec.kind === 'directory') {
    if (!stat.isDirectory()) return fail('not a directory');
    let entries: string[];
    try {
      entries = await fs.readdir(resolvedPath);
    } catch (err) {
      return fail(`unreadable: ${errorMessage(err)}`);
    }
    if (entries.length === 0) return fail('empty directory');
    return { path: spec.path, resolvedPath, valid: true };
  }

  if (!stat.isFile()) return fail('not a file');
  if (stat.size === 0) return fail('empty');

  if (spec.kind === 'file') {
    return { path: spec.path, resolvedPath, valid: true };
  }

  let text: string;
  try {
    text = await fs.readFile(resolvedPath, 'utf8');
  } catch (err) {
    return fail(`unreadable: ${errorMessage(err)}`);
  }

  if (spec.kind === 'csv') {
    const header = text.split(/\r?\n/, 1)[0] ?? '';
    if (header.trim().length === 0) return fail('missing header line');
    return { path: spec.path, resolvedPath, valid: true };
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch {
    return fail('malformed JSON');
  }

  if (spec.kind === 'json-array' && !Array.isArray(parsed)) {
    return fail('expected a JSON array');
  }
  if (
    spec.kind === 'json-object' &&
    (parsed === null || typeof parsed !== 'object' || Array.isArray(parsed))
  ) {
    return fail('expected a JSON object');
  }
  return { path: spec.path, resolvedPath, valid: true };
}

/** Check several artifacts; the result keeps input order. */
export async function validateArtifacts(
  specs: readonly ArtifactSpec[],
  baseDir: string,
): Promise<ArtifactCheck[]> {
  return Promise.all(specs.map((spec) => validateArtifact(spec, baseDir)));
}

/** True when every spec is present and valid. An empty list is not "all valid". */
export async function allArtifactsValid(specs: readonly ArtifactSpec[], baseDir: string): Promise<boolean> {
  if (specs.length === 0) return false;
  const checks = await validateArtifacts(specs, baseDir);
  return checks.every((c) => c.valid);
}
