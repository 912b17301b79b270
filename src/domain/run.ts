/**
 * Run domain model.
 *
 * One execution of a flow definition with concrete parameters: the run
 * record, its per-step results and the state tables they move through.
 */

import { FlowKind } from './flow';
import { TypedError } from './errors';

/** Run lifecycle states. */
export enum RunState {
  Pending = 'pending',
  Running = 'running',
  Success = 'success',
  Failed = 'failed',
}

/** Step-level states. */
export enum StepState {
  Pending = 'pending',
  Running = 'running',
  Success = 'success',
  Skipped = 'skipped',
  Failed = 'failed',
}

/** Valid state transitions for runs. */
export const VALID_RUN_TRANSITIONS: Record<RunState, RunState[]> = {
  // pending -> failed: the run could not be set up
  [RunState.Pending]: [RunState.Running, RunState.Failed],
  [RunState.Running]: [RunState.Success, RunState.Failed],
  [RunState.Success]: [],
  [RunState.Failed]: [],
};

/** Valid state transitions for steps. */
export const VALID_STEP_TRANSITIONS: Record<StepState, StepState[]> = {
  [StepState.Pending]: [StepState.Running, StepState.Skipped],
  [StepState.Running]: [StepState.Success, StepState.Failed],
  [StepState.Success]: [],
  [StepState.Skipped]: [],
  [StepState.Failed]: [],
};

/** Flags that steer the skip policy for every step of a run. */
export interface RunOptions {
  /** Skip a step whose declared outputs already exist and validate. */
  skipExisting: boolean;
  /** Force every step to run; takes precedence over skipExisting. */
  overwrite: boolean;
  /** Ask append-capable programs to extend their outputs. */
  append: boolean;
}

export const DEFAULT_RUN_OPTIONS: RunOptions = {
  skipExisting: true,
  overwrite: false,
  append: false,
};

/** How a step's program ended. */
export interface ExitInfo {
  code: number | null;
  signal: string | null;
  timedOut: boolean;
}

export type SkipReason = 'outputs-valid' | 'disabled';

/** Result of a single step within a run. */
export interface StepResult {
  name: string;
  state: StepState;
  startedAt?: string;
  endedAt?: string;
  durationMs?: number;
  exit?: ExitInfo;
  /** Declared output paths, resolved against the run directory. */
  producedArtifacts: string[];
  skipReason?: SkipReason;
  /** Present only when the step failed; `message` is the error summary. */
  error?: TypedError;
}

/** A single execution of a flow. */
export interface RunRecord {
  runId: string;
  flowKind: FlowKind;
  /** Captured input parameters, secrets redacted. */
  parameters: Record<string, unknown>;
  options: RunOptions;
  createdAt: string;
  updatedAt: string;
  startedAt?: string;
  endedAt?: string;
  steps: StepResult[];
  overallState: RunState;
  runDirectory: string;
  /** Run that seeded this run's working files, if any. */
  seededFrom?: string;
  /** The error that ended the run, when failed. */
  error?: TypedError;
}

/** Compact listing entry for run history. */
export interface RunSummary {
  runId: string;
  flowKind: FlowKind;
  overallState: RunState;
  createdAt: string;
  endedAt?: string;
  stepCount: number;
  completedSteps: number;
  /** Name of the step currently running or the one that failed. */
  currentStep?: string;
  project?: string;
}

export function summarizeRun(record: RunRecord): RunSummary {
  const active =
    record.steps.find((s) => s.state === StepState.Running) ??
    record.steps.find((s) => s.state === StepState.Failed);
  const project = record.parameters.project;
  return {
    runId: record.runId,
    flowKind: record.flowKind,
    overallState: record.overallState,
    createdAt: record.createdAt,
    endedAt: record.endedAt,
    stepCount: record.steps.length,
    completedSteps: record.steps.filter(
      (s) => s.state === StepState.Success || s.state === StepState.Skipped,
    ).length,
    currentStep: active?.name,
    project: typeof project === 'string' ? project : undefined,
  };
}
