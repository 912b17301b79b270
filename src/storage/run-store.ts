/**
 * Run store interface.
 *
 * The durable, concurrently readable record of every run's status and log.
 * The run's controller is the only writer of a given run; any number of
 * observers read snapshots while it is active.
 */

import { RunRecord, RunSummary } from '../domain/run';

/** Generic list query options. */
export interface ListOptions {
  limit?: number;
  offset?: number;
}

/** One increment of a run log. */
export interface LogChunk {
  /** Text between `offset` and `nextOffset`. */
  content: string;
  /** Byte offset the read started at. */
  offset: number;
  /** Byte offset to pass on the next read. Never smaller than `offset`. */
  nextOffset: number;
  /** Total log size in bytes at the time of the read. */
  size: number;
}

/** A retrievable copy of a step output under the run's artifacts directory. */
export interface ArtifactEntry {
  name: string;
  path: string;
  type: 'file' | 'directory';
  /** Bytes; for directories the sum of contained files. */
  size: number;
  modifiedAt: string;
  /** Number of entries below a directory. */
  items?: number;
}

export interface RunStore {
  /** Allocate the run directory and persist the initial record. */
  create(record: RunRecord): Promise<RunRecord>;
  /** Persist a new snapshot of the record. Resolves once it is durable. */
  update(record: RunRecord): Promise<void>;
  /** Consistent snapshot of a run, or null. */
  get(runId: string): Promise<RunRecord | null>;
  /** Run summaries, newest first. */
  list(options?: ListOptions): Promise<RunSummary[]>;
  /** Append text to the run log; a trailing newline is added when missing. */
  appendLog(runId: string, text: string): Promise<void>;
  /** Read the log from a byte offset. Null when the run is unknown. */
  readLog(runId: string, fromOffset?: number, maxBytes?: number): Promise<LogChunk | null>;
  /** Artifacts copied into the run's artifacts directory. Null when the run is unknown. */
  listArtifacts(runId: string): Promise<ArtifactEntry[] | null>;
  /** Location of a run's private directory. */
  runDirectory(runId: string): string;
  /** Resolves once every pending write for the run has been attempted. */
  flush(runId: string): Promise<void>;
}

/** Apply offset/limit pagination. */
export function applyListOptions<T>(items: T[], options?: ListOptions): T[] {
  const offset = options?.offset ?? 0;
  const limit = options?.limit ?? 100;
  return items.slice(offset, offset + limit);
}

/** File names inside a run directory. */
export const RUN_FILES = {
  params: 'params.json',
  status: 'status.json',
  log: 'run.log',
  artifacts: 'artifacts',
} as const;
