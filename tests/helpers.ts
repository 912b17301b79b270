import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import { LogEntry, resetLogHandler, setLogHandler } from '../src/logger';
import { StepExecutionRequest, StepExecutor, StepOutcome } from '../src/engine/step-executor';
import { EngineError } from '../src/domain/errors';
import { DEFAULT_RUN_OPTIONS, RunRecord, RunState, StepState } from '../src/domain/run';

/** Fresh temporary directory; removed by `removeTempDir`. */
export async function makeTempDir(prefix = 'pipeline-test-'): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), prefix));
}

export async function removeTempDir(dir: string): Promise<void> {
  await fs.rm(dir, { recursive: true, force: true });
}

export async function writeFile(dir: string, relativePath: string, content: string): Promise<void> {
  const target = path.join(dir, relativePath);
  await fs.mkdir(path.dirname(target), { recursive: true });
  await fs.writeFile(target, content, 'utf8');
}

/** Capture engine log entries instead of printing them. */
export function captureLogs(): LogEntry[] {
  const entries: LogEntry[] = [];
  setLogHandler((entry) => entries.push(entry));
  return entries;
}

export function restoreLogs(): void {
  resetLogHandler();
}

/** What a scripted step does when the fake executor runs it. */
export interface ScriptedStep {
  /** Lines the "program" prints. */
  lines?: string[];
  /** Files written into the working directory, relative path -> content. */
  files?: Record<string, string>;
  exitCode?: number | null;
  signal?: NodeJS.Signals | null;
  timedOut?: boolean;
  launchError?: string;
  /** Resolve only after this promise settles. */
  gate?: Promise<void>;
}

/**
 * In-process stand-in for the child-process executor. Behaviour is keyed
 * by step name; unknown steps exit 0 without output.
 */
export class FakeStepExecutor implements StepExecutor {
  readonly requests: StepExecutionRequest[] = [];

  constructor(private readonly script: Record<string, ScriptedStep> = {}) {}

  async execute(request: StepExecutionRequest): Promise<StepOutcome> {
    this.requests.push(request);
    const step = this.script[request.stepName] ?? {};
    if (step.gate) await step.gate;
    for (const [file, content] of Object.entries(step.files ?? {})) {
      await writeFile(request.cwd, file, content);
    }
    const lines = step.lines ?? [];
    for (const line of lines) request.onLine(line);
    return {
      exitCode: step.exitCode === undefined ? 0 : step.exitCode,
      signal: step.signal ?? null,
      timedOut: step.timedOut ?? false,
      launchError: step.launchError,
      durationMs: 5,
      tail: lines.slice(-20),
    };
  }

  stepNames(): string[] {
    return this.requests.map((r) => r.stepName);
  }
}

/** A promise plus the function that resolves it. */
export function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

/** A pending run record with one pending result per step name. */
export function makeRecord(
  runId: string,
  runDirectory: string,
  stepNames: string[],
  overrides: Partial<RunRecord> = {},
): RunRecord {
  const now = '2024-05-01T10:00:00.000Z';
  return {
    runId,
    flowKind: 'jira',
    parameters: { project: 'SUP' },
    options: { ...DEFAULT_RUN_OPTIONS },
    createdAt: now,
    updatedAt: now,
    steps: stepNames.map((name) => ({ name, state: StepState.Pending, producedArtifacts: [] })),
    overallState: RunState.Pending,
    runDirectory,
    ...overrides,
  };
}

/** The EngineError code a promise rejects with, or undefined if it resolves or rejects otherwise. */
export async function rejectionCode(promise: Promise<unknown>): Promise<string | undefined> {
  try {
    await promise;
  } catch (err) {
    return err instanceof EngineError ? err.code : undefined;
  }
  return undefined;
}
