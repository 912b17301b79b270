/**
 * File-backed run store.
 *
 * Every run owns `<root>/<runId>/` holding params.json, status.json,
 * run.log and artifacts/. Run records are indexed in memory; log content
 * is not, reads go to run.log by position. Disk writes are queued per run
 * so they land in the order they were issued.
 */

import { promises as fs } from 'fs';
import path from 'path';
import { RunRecord, RunState, RunSummary, StepState, summarizeRun } from '../domain/run';
import {
  EngineError,
  createTypedError,
  errorMessage,
  isRecord,
  runInterruptedError,
  runNotFoundError,
} from '../domain/errors';
import { isFlowKind } from '../domain/flow';
import { isTerminalRunState } from '../engine/state-machine';
import { logger as rootLogger, Logger } from '../logger';
import {
  ArtifactEntry,
  ListOptions,
  LogChunk,
  RUN_FILES,
  RunStore,
  applyListOptions,
} from './run-store';

const DEFAULT_READ_BYTES = 256 * 1024;
const NEWLINE = 0x0a;
/** Longest UTF-8 encoding of one character. */
const MAX_CHAR_BYTES = 4;

interface StoreEntry {
  record: RunRecord;
  /** Bytes appended to run.log, including writes still queued. */
  logSize: number;
  /** Tail of the per-run write queue. */
  writes: Promise<void>;
}

function deepCopy<T>(value: T): T {
  return structuredClone(value);
}

function isRunRecordLike(value: unknown): value is RunRecord {
  if (!isRecord(value)) return false;
  return (
    typeof value.runId === 'string' &&
    isFlowKind(value.flowKind) &&
    typeof value.createdAt === 'string' &&
    typeof value.overallState === 'string' &&
    Object.values<string>(RunState).includes(value.overallState) &&
    Array.isArray(value.steps) &&
    value.steps.every(
      (s: unknown) =>
        isRecord(s) &&
        typeof s.name === 'string' &&
        typeof s.state === 'string' &&
        Object.values<string>(StepState).includes(s.state),
    )
  );
}

async function writeFileAtomic(filePath: string, content: string): Promise<void> {
  const tmp = `${filePath}.${process.pid}.tmp`;
  await fs.writeFile(tmp, content, 'utf8');
  await fs.rename(tmp, filePath);
}

export interface FileRunStoreOptions {
  logger?: Logger;
}

export class FileRunStore implements RunStore {
  private readonly entries = new Map<string, StoreEntry>();
  private readonly log: Logger;

  constructor(
    private readonly rootDir: string,
    options: FileRunStoreOptions = {},
  ) {
    this.log = (options.logger ?? rootLogger).child({ module: 'run-store' });
  }

  get root(): string {
    return this.rootDir;
  }

  runDirectory(runId: string): string {
    return path.join(this.rootDir, runId);
  }

  async create(record: RunRecord): Promise<RunRecord> {
    if (this.entries.has(record.runId)) {
      throw new EngineError(
        createTypedError({
          code: 'RUN.ALREADY_EXISTS',
          message: `Run already exists: ${record.runId}`,
          runId: record.runId,
        }),
      );
    }
    const dir = this.runDirectory(record.runId);
    await fs.mkdir(path.join(dir, RUN_FILES.artifacts), { recursive: true });

    const params = {
      flow: record.flowKind,
      parameters: record.parameters,
      options: record.options,
      ...(record.seededFrom ? { seededFrom: record.seededFrom } : {}),
    };
    await fs.writeFile(path.join(dir, RUN_FILES.params), JSON.stringify(params, null, 2), 'utf8');
    await writeFileAtomic(path.join(dir, RUN_FILES.status), JSON.stringify(record, null, 2));
    await fs.writeFile(path.join(dir, RUN_FILES.log), '', { flag: 'a' });

    this.entries.set(record.runId, {
      record: deepCopy(record),
      logSize: 0,
      writes: Promise.resolve(),
    });
    this.log.debug('Run created', { runId: record.runId, dir });
    return deepCopy(record);
  }

  async update(record: RunRecord): Promise<void> {
    const entry = this.require(record.runId);
    const snapshot = deepCopy(record);
    entry.record = snapshot;
    const statusPath = path.join(this.runDirectory(record.runId), RUN_FILES.status);
    const content = JSON.stringify(snapshot, null, 2);
    await this.enqueue(record.runId, entry, () => writeFileAtomic(statusPath, content));
  }

  async get(runId: string): Promise<RunRecord | null> {
    const entry = this.entries.get(runId);
    return entry ? deepCopy(entry.record) : null;
  }

  async list(options?: ListOptions): Promise<RunSummary[]> {
    const summaries = [...this.entries.values()]
      .map((e) => summarizeRun(e.record))
      .sort((a, b) => {
        if (a.createdAt !== b.createdAt) return a.createdAt < b.createdAt ? 1 : -1;
        return a.runId < b.runId ? 1 : -1;
      });
    return applyListOptions(summaries, options);
  }

  async appendLog(runId: string, text: string): Promise<void> {
    const entry = this.require(runId);
    const normalized = text.endsWith('\n') ? text : `${text}\n`;
    const bytes = Buffer.from(normalized, 'utf8');
    entry.logSize += bytes.length;
    const logPath = path.join(this.runDirectory(runId), RUN_FILES.log);
    await this.enqueue(runId, entry, () => fs.appendFile(logPath, bytes));
  }

  async readLog(runId: string, fromOffset = 0, maxBytes = DEFAULT_READ_BYTES): Promise<LogChunk | null> {
    if (!Number.isInteger(fromOffset) || fromOffset < 0) {
      throw new EngineError(
        createTypedError({
          code: 'VALIDATION.OFFSET',
          message: `Log offset must be a non-negative integer, got ${fromOffset}`,
        }),
      );
    }
    const entry = this.entries.get(runId);
    if (!entry) return null;

    // everything appended before this read is on disk once the queue drains
    const size = entry.logSize;
    await entry.writes;
    if (fromOffset >= size) {
      return { content: '', offset: fromOffset, nextOffset: fromOffset, size };
    }

    const limit = Math.max(1, maxBytes);
    // a few bytes past the limit show where the next character starts
    const window = await readRange(
      path.join(this.runDirectory(runId), RUN_FILES.log),
      fromOffset,
      Math.min(size - fromOffset, limit + MAX_CHAR_BYTES - 1),
    );
    const end = chunkEnd(window, limit, fromOffset + window.length >= size);
    return {
      content: window.subarray(0, end).toString('utf8'),
      offset: fromOffset,
      nextOffset: fromOffset + end,
      size,
    };
  }

  async listArtifacts(runId: string): Promise<ArtifactEntry[] | null> {
    if (!this.entries.has(runId)) return null;
    const dir = path.join(this.runDirectory(runId), RUN_FILES.artifacts);
    let names: string[];
    try {
      names = await fs.readdir(dir);
    } catch {
      return [];
    }

    const artifacts: ArtifactEntry[] = [];
    for (const name of names) {
      const fullPath = path.join(dir, name);
      try {
        const stat = await fs.stat(fullPath);
        if (stat.isDirectory()) {
          const totals = await directoryTotals(fullPath);
          artifacts.push({
            name,
            path: fullPath,
            type: 'directory',
            size: totals.size,
            modifiedAt: new Date(Math.max(stat.mtimeMs, totals.latestMtimeMs)).toISOString(),
            items: totals.items,
          });
        } else if (stat.isFile()) {
          artifacts.push({
            name,
            path: fullPath,
            type: 'file',
            size: stat.size,
            modifiedAt: stat.mtime.toISOString(),
          });
        }
      } catch (err) {
        this.log.debug('Skipping unreadable artifact', { runId, name, error: errorMessage(err) });
      }
    }

    artifacts.sort((a, b) => {
      if (a.type !== b.type) return a.type === 'directory' ? -1 : 1;
      return a.name.toLowerCase().localeCompare(b.name.toLowerCase());
    });
    return artifacts;
  }

  async flush(runId: string): Promise<void> {
    const entry = this.entries.get(runId);
    if (entry) await entry.writes;
  }

  /**
   * Rehydrate runs persisted by earlier processes. A run that was still
   * active when its process stopped is closed as failed (interrupted).
   * Returns the number of runs loaded.
   */
  async load(): Promise<number> {
    await fs.mkdir(this.rootDir, { recursive: true });
    const names = await fs.readdir(this.rootDir);
    let loaded = 0;

    for (const name of names) {
      if (this.entries.has(name)) continue;
      const statusPath = path.join(this.rootDir, name, RUN_FILES.status);
      let parsed: unknown;
      try {
        parsed = JSON.parse(await fs.readFile(statusPath, 'utf8'));
      } catch {
        continue;
      }
      if (!isRunRecordLike(parsed) || parsed.runId !== name) {
        this.log.warn('Ignoring unrecognized run status file', { path: statusPath });
        continue;
      }

      let record = parsed;
      const interrupted = !isTerminalRunState(record.overallState);
      if (interrupted) record = markInterrupted(record);

      let logSize = 0;
      try {
        logSize = (await fs.stat(path.join(this.rootDir, name, RUN_FILES.log))).size;
      } catch {
        logSize = 0;
      }
      this.entries.set(name, { record, logSize, writes: Promise.resolve() });
      loaded += 1;

      if (interrupted) {
        this.log.warn('Run was interrupted by a previous shutdown', { runId: name });
        await this.update(record);
      }
    }
    return loaded;
  }

  private require(runId: string): StoreEntry {
    const entry = this.entries.get(runId);
    if (!entry) {
      throw new EngineError(runNotFoundError(runId));
    }
    return entry;
  }

  private enqueue(runId: string, entry: StoreEntry, task: () => Promise<void>): Promise<void> {
    const next = entry.writes.then(task);
    entry.writes = next.catch((err: unknown) => {
      this.log.error('Run store write failed', { runId, error: errorMessage(err) });
    });
    return next;
  }
}

async function readRange(filePath: string, position: number, length: number): Promise<Buffer> {
  let handle: fs.FileHandle;
  try {
    handle = await fs.open(filePath, 'r');
  } catch {
    return Buffer.alloc(0);
  }
  try {
    const buffer = Buffer.alloc(length);
    const { bytesRead } = await handle.read(buffer, 0, length, position);
    return buffer.subarray(0, bytesRead);
  } finally {
    await handle.close();
  }
}

function isContinuationByte(byte: number | undefined): boolean {
  return byte !== undefined && (byte & 0xc0) === 0x80;
}

/**
 * Where a read of at most `limit` bytes of `window` ends: after the last
 * complete line, or, when a single line is longer than the limit, on the
 * last character boundary. Never zero for a non-empty window.
 *
 */
function chunkEnd(window: Buffer, limit: number, reachesEnd: boolean): number {
  if (window.length === 0) return 0;
  if (window.length <= limit && reachesEnd) return window.length;
  const cut = Math.min(limit, window.length);
  const lastNewline = window.lastIndexOf(NEWLINE, cut - 1);
  if (lastNewline >= 0) return lastNewline + 1;

  let end = cut;
  while (end > 0 && isContinuationByte(window[end])) end -= 1;
  if (end > 0) return end;
  // the limit is smaller than the first character: return that character whole
  end = 1;
  while (end < window.length && isContinuationByte(window[end])) end += 1;
  return end;
}

function markInterrupted(record: RunRecord): RunRecord {
  const now = new Date().toISOString();
  const error = runInterruptedError(record.runId);
  return {
    ...record,
    overallState: RunState.Failed,
    updatedAt: now,
    endedAt: now,
    error,
    steps: record.steps.map((step) =>
      step.state === StepState.Running
        ? { ...step, state: StepState.Failed, endedAt: now, error: { ...error, stepId: step.name } }
        : step,
    ),
  };
}

async function directoryTotals(dir: string): Promise<{ size: number; items: number; latestMtimeMs: number }> {
  let size = 0;
  let items = 0;
  let latestMtimeMs = 0;
  const entries = await fs.readdir(dir, { withFileTypes: true });
  for (const dirent of entries) {
    const fullPath = path.join(dir, dirent.name);
    const stat = await fs.stat(fullPath);
    items += 1;
    latestMtimeMs = Math.max(latestMtimeMs, stat.mtimeMs);
    if (dirent.isDirectory()) {
      const nested = await directoryTotals(fullPath);
      size += nested.size;
      items += nested.items;
      latestMtimeMs = Math.max(latestMtimeMs, nested.latestMtimeMs);
    } else if (stat.isFile()) {
      size += stat.size;
    }
  }
  return { size, items, latestMtimeMs };
}
