/**
 * Scheduler — admits runs under a concurrency bound and starts a Run
 * Controller for each as an independent async task.
 *
 * Admission is check-and-reserve with no await in between, so two
 * concurrent submits can never both take the last slot.
 */

import { v4 as uuid } from 'uuid';
import { FlowDefinition } from '../domain/flow';
import { DEFAULT_RUN_OPTIONS, RunOptions, RunRecord, RunState, RunSummary, StepState } from '../domain/run';
import {
  EngineError,
  admissionRejectedError,
  environmentValidationError,
  errorMessage,
  internalRunError,
  redactSecrets,
  runNotFoundError,
} from '../domain/errors';
import { RunStore, ListOptions } from '../storage/run-store';
import { collectSecrets, checkRequirements, environmentProblems } from '../environment';
import { logger as rootLogger, Logger } from '../logger';
import { RunController } from './run-controller';
import { StepExecutor } from './step-executor';
import { isTerminalRunState, transitionRunState } from './state-machine';
import { seedRunDirectory } from './artifacts';

export interface SchedulerConfig {
  maxConcurrentRuns: number;
  /** Default per-step budget in milliseconds; 0 disables it. */
  stepTimeoutMs: number;
  /** Program that runs the step scripts. */
  interpreter: string;
  /** Directory holding the step scripts. */
  scriptsDir: string;
  /** Reject flows whose required environment is incomplete. */
  checkEnvironment: boolean;
  /** Environment the step programs inherit; secrets are taken from it for masking. */
  environment?: NodeJS.ProcessEnv;
  logger?: Logger;
}

export interface SubmitOptions extends Partial<RunOptions> {
  /** Copy the declared outputs of this earlier run into the new run directory. */
  seedFromRunId?: string;
}

export interface SubmitRequest {
  flow: FlowDefinition;
  options?: SubmitOptions;
}

export interface RunStatusView {
  run: RunRecord;
  /** Whether the run is still being driven by this process. */
  active: boolean;
}

function pad(value: number, width = 2): string {
  return String(value).padStart(width, '0');
}

/**
 * Unique, lexically time-ordered run id:
 * `YYYYMMDD-HHMMSS-mmm-<flow>[-<project>]-<8 hex>` (UTC).
 */
export function generateRunId(flow: Pick<FlowDefinition, 'kind' | 'parameters'>, now: Date = new Date()): string {
  const date = `${now.getUTCFullYear()}${pad(now.getUTCMonth() + 1)}${pad(now.getUTCDate())}`;
  const time = `${pad(now.getUTCHours())}${pad(now.getUTCMinutes())}${pad(now.getUTCSeconds())}`;
  const millis = pad(now.getUTCMilliseconds(), 3);
  const project = flow.parameters.project;
  const projectPart =
    typeof project === 'string' && project.length > 0 ? `-${project.replace(/[^A-Za-z0-9_]/g, '')}` : '';
  const suffix = uuid().replace(/-/g, '').slice(0, 8);
  return `${date}-${time}-${millis}-${flow.kind}${projectPart}-${suffix}`;
}

export class Scheduler {
  /** Runs admitted and not yet terminal, including ones still being set up. */
  private readonly active = new Set<string>();
  private readonly completions = new Map<string, Promise<RunRecord>>();
  private readonly log: Logger;

  constructor(
    private readonly store: RunStore,
    private readonly executor: StepExecutor,
    private readonly config: SchedulerConfig,
  ) {
    this.log = (config.logger ?? rootLogger).child({ module: 'scheduler' });
  }

  get maxConcurrentRuns(): number {
    return this.config.maxConcurrentRuns;
  }

  /**
   * Admit a run and start it. Resolves with the initial record as soon as
   * the run is persisted; the run itself continues in the background.
   */
  async submit(request: SubmitRequest): Promise<RunRecord> {
    const { flow } = request;
    const { seedFromRunId, ...runOptions } = request.options ?? {};
    const options: RunOptions = {
      skipExisting: runOptions.skipExisting ?? DEFAULT_RUN_OPTIONS.skipExisting,
      overwrite: runOptions.overwrite ?? DEFAULT_RUN_OPTIONS.overwrite,
      append: runOptions.append ?? DEFAULT_RUN_OPTIONS.append,
    };
    const env = this.config.environment ?? process.env;

    if (this.config.checkEnvironment) {
      const problems = environmentProblems(checkRequirements(flow.environment, env));
      if (problems.length > 0) {
        throw new EngineError(environmentValidationError(flow.kind, problems));
      }
    }

    let seedSource: RunRecord | undefined;
    if (seedFromRunId !== undefined) {
      const source = await this.store.get(seedFromRunId);
      if (!source) throw new EngineError(runNotFoundError(seedFromRunId));
      seedSource = source;
    }

    // check and reserve in the same synchronous section
    if (this.active.size >= this.config.maxConcurrentRuns) {
      this.log.info('Run rejected at admission', { active: this.active.size, flow: flow.kind });
      throw new EngineError(admissionRejectedError(this.active.size, this.config.maxConcurrentRuns));
    }
    const runId = generateRunId(flow);
    this.active.add(runId);

    let record: RunRecord;
    try {
      record = await this.createRecord(runId, flow, options, seedSource);
    } catch (err) {
      this.active.delete(runId);
      throw err;
    }

    const controller = new RunController(this.store, this.executor, flow, record, {
      stepTimeoutMs: this.config.stepTimeoutMs,
      secrets: collectSecrets(flow.environment, env),
      variables: { interpreter: this.config.interpreter, scriptsDir: this.config.scriptsDir },
      logger: this.config.logger,
    });
    const completion = controller.run().finally(() => {
      this.active.delete(runId);
      this.completions.delete(runId);
    });
    this.completions.set(runId, completion);

    this.log.info('Run admitted', { runId, flow: flow.kind, active: this.active.size });
    return record;
  }

  private async createRecord(
    runId: string,
    flow: FlowDefinition,
    options: RunOptions,
    seedSource: RunRecord | undefined,
  ): Promise<RunRecord> {
    const now = new Date().toISOString();
    const pending: RunRecord = {
      runId,
      flowKind: flow.kind,
      parameters: redactSecrets({ ...flow.parameters }),
      options,
      createdAt: now,
      updatedAt: now,
      steps: flow.steps.map((step) => ({ name: step.name, state: StepState.Pending, producedArtifacts: [] })),
      overallState: RunState.Pending,
      runDirectory: this.store.runDirectory(runId),
      ...(seedSource ? { seededFrom: seedSource.runId } : {}),
    };
    await this.store.create(pending);

    try {
      if (seedSource) {
        const outputs = flow.steps.flatMap((step) => step.declaredOutputs);
        const seeded = await seedRunDirectory(seedSource.runDirectory, pending.runDirectory, outputs);
        await this.store.appendLog(
          runId,
          `[${new Date().toISOString()}] [engine] Seeded from ${seedSource.runId}: ${
            seeded.length > 0 ? seeded.join(', ') : 'no outputs found'
          }`,
        );
      }

      const transition = transitionRunState(pending.overallState, RunState.Running);
      if (!transition.success) throw new EngineError(transition.error);
      const running: RunRecord = {
        ...pending,
        overallState: transition.newState,
        startedAt: new Date().toISOString(),
        updatedAt: new Date().toISOString(),
      };
      await this.store.update(running);
      return running;
    } catch (err) {
      await this.abandon(pending, err);
      throw err;
    }
  }

  /** Close a run that could not be started, so no pending record is left behind. */
  private async abandon(pending: RunRecord, cause: unknown): Promise<void> {
    const now = new Date().toISOString();
    const error = internalRunError(pending.runId, `run could not be started: ${errorMessage(cause)}`);
    this.log.error('Run setup failed', { runId: pending.runId, error: errorMessage(cause) });
    const transition = transitionRunState(pending.overallState, RunState.Failed);
    if (!transition.success) return;
    try {
      await this.store.update({ ...pending, overallState: transition.newState, updatedAt: now, endedAt: now, error });
    } catch (err) {
      this.log.error('Could not record failed run setup', { runId: pending.runId, error: errorMessage(err) });
    }
  }

  /** Snapshot of a run and whether it is still active here. */
  async status(runId: string): Promise<RunStatusView> {
    const run = await this.store.get(runId);
    if (!run) throw new EngineError(runNotFoundError(runId));
    return { run, active: this.active.has(runId) };
  }

  listRuns(options?: ListOptions): Promise<RunSummary[]> {
    return this.store.list(options);
  }

  activeRunIds(): string[] {
    return [...this.active];
  }

  /** Resolve with the run's terminal record. */
  async waitForRun(runId: string): Promise<RunRecord> {
    const completion = this.completions.get(runId);
    if (completion) return completion;
    const run = await this.store.get(runId);
    if (!run) throw new EngineError(runNotFoundError(runId));
    if (!isTerminalRunState(run.overallState)) {
      this.log.warn('Run is not terminal and not driven by this process', { runId });
    }
    return run;
  }

  /** Resolve once no run is active. */
  async waitForIdle(): Promise<void> {
    while (this.completions.size > 0) {
      const pending = [...this.completions.values()];
      const results = await Promise.allSettled(pending);
      for (const result of results) {
        if (result.status === 'rejected') {
          this.log.error('Run task rejected', { error: errorMessage(result.reason) });
        }
      }
    }
  }
}
