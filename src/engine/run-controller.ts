/**
 * Run Controller — drives one run through its flow's steps in order.
 *
 * The controller is the only writer of its Run Record. Every step
 * transition is persisted before the next step begins. Step failures are
 * recorded on the record, never thrown; anything unexpected is contained
 * and fails the run with an internal error.
 */

import { FlowDefinition, StepDescriptor } from '../domain/flow';
import { RunRecord, RunState, StepResult, StepState } from '../domain/run';
import {
  EngineError,
  TypedError,
  errorMessage,
  internalRunError,
  maskSecretsInMessage,
  missingInputError,
  outputValidationError,
  processFailureError,
  signalFailureError,
  timeoutExceededError,
} from '../domain/errors';
import { RunStore } from '../storage/run-store';
import { logger as rootLogger, Logger } from '../logger';
import { decideSkip } from './skip-policy';
import { resolveArtifactPath, validateArtifacts } from './artifact-validator';
import { formatCommand, resolveCommand } from './command';
import { StepExecutor, StepOutcome, isSuccessfulOutcome } from './step-executor';
import { deriveRunState, isTerminalStepState, transitionRunState, transitionStepState } from './state-machine';
import { copyArtifactsToRun } from './artifacts';

export interface RunControllerOptions {
  /** Budget for steps that declare none; 0 disables it. */
  stepTimeoutMs: number;
  /** Values masked wherever they would appear in the run log. */
  secrets?: readonly string[];
  /** Engine variables available to command templates, e.g. interpreter and scriptsDir. */
  variables?: Readonly<Record<string, string>>;
  logger?: Logger;
}

/** Engine variable holding the run directory in command templates. */
export const RUN_DIR_VARIABLE = 'runDir';

function timestamp(): string {
  return new Date().toISOString();
}

export class RunController {
  private record: RunRecord;
  private readonly secrets: readonly string[];
  private readonly log: Logger;

  constructor(
    private readonly store: RunStore,
    private readonly executor: StepExecutor,
    private readonly flow: FlowDefinition,
    record: RunRecord,
    private readonly options: RunControllerOptions,
  ) {
    this.record = structuredClone(record);
    this.secrets = options.secrets ?? [];
    this.log = (options.logger ?? rootLogger).child({ module: 'run-controller', runId: record.runId });
  }

  get runId(): string {
    return this.record.runId;
  }

  /** Execute the run to a terminal state. Never rejects. */
  async run(): Promise<RunRecord> {
    try {
      return await this.execute();
    } catch (err) {
      return this.failInternal(err);
    }
  }

  private async execute(): Promise<RunRecord> {
    if (this.record.overallState === RunState.Pending) {
      this.setRunState(RunState.Running);
      this.record.startedAt = timestamp();
      await this.persist();
    }

    this.log.info('Run started', { flow: this.flow.kind, steps: this.flow.steps.length });
    await this.engineLog(`Run ${this.record.runId} started (flow ${this.flow.kind}, ${this.flow.steps.length} steps)`);

    for (let index = 0; index < this.flow.steps.length; index++) {
      const step = this.flow.steps[index];
      const error = await this.executeStep(index, step);
      if (error) {
        return this.finishFailed(error);
      }
    }

    const finalState = deriveRunState(this.record.steps);
    if (finalState !== RunState.Success) {
      // every step ended success or skipped, so anything else is an engine bug
      throw new Error(`Run ended with steps in state ${finalState}`);
    }
    this.setRunState(RunState.Success);
    this.record.endedAt = timestamp();
    await this.engineLog('Run completed successfully');
    await this.persist();
    this.log.info('Run succeeded');
    return structuredClone(this.record);
  }

  /** Run one step. Returns the error that failed it, if any. */
  private async executeStep(index: number, step: StepDescriptor): Promise<TypedError | undefined> {
    const runDirectory = this.record.runDirectory;
    const decision = await decideSkip(step, this.record.options, runDirectory);

    if (decision.action === 'skip') {
      this.updateStep(index, {
        state: this.stepTransition(index, StepState.Skipped),
        endedAt: timestamp(),
        skipReason: decision.reason,
        producedArtifacts: step.declaredOutputs.map((o) => resolveArtifactPath(o, runDirectory)),
      });
      const why = decision.reason === 'disabled' ? 'disabled' : 'outputs already present and valid';
      await this.engineLog(`Step ${step.name} skipped: ${why}`);
      await this.persist();
      return undefined;
    }

    const startedAt = timestamp();
    this.updateStep(index, { state: this.stepTransition(index, StepState.Running), startedAt });
    await this.engineLog(`Step ${step.name} started${decision.force ? ' (overwrite)' : ''}`);
    await this.persist();

    const inputs = await validateArtifacts(step.requiredInputs, runDirectory);
    const badInputs = inputs.filter((c) => !c.valid);
    if (badInputs.length > 0) {
      const error = missingInputError(
        step.name,
        badInputs.map((c) => ({ path: c.path, reason: c.reason ?? 'invalid' })),
      );
      return this.failStep(index, step, error, startedAt);
    }

    const command = resolveCommand(
      step.command,
      { ...this.flow.parameters, ...this.options.variables, [RUN_DIR_VARIABLE]: runDirectory },
      decision,
    );
    await this.engineLog(`$ ${formatCommand(command)}`);

    const timeoutMs = step.timeoutMs ?? this.options.stepTimeoutMs;
    const outcome = await this.executor.execute({
      runId: this.record.runId,
      stepName: step.name,
      command,
      cwd: runDirectory,
      timeoutMs,
      onLine: (line) => this.outputLine(line),
    });

    this.updateStep(index, {
      exit: { code: outcome.exitCode, signal: outcome.signal, timedOut: outcome.timedOut },
    });

    const processError = this.outcomeError(step, outcome, timeoutMs);
    if (processError) {
      return this.failStep(index, step, processError, startedAt);
    }

    const outputs = await validateArtifacts(step.declaredOutputs, runDirectory);
    const badOutputs = outputs.filter((c) => !c.valid);
    if (badOutputs.length > 0) {
      const error = outputValidationError(
        step.name,
        badOutputs.map((c) => ({ path: c.path, reason: c.reason ?? 'invalid' })),
        { logTail: this.maskTail(outcome.tail) },
      );
      return this.failStep(index, step, error, startedAt);
    }

    await this.collectArtifacts(step);
    const endedAt = timestamp();
    this.updateStep(index, {
      state: this.stepTransition(index, StepState.Success),
      endedAt,
      durationMs: Date.parse(endedAt) - Date.parse(startedAt),
      producedArtifacts: outputs.map((c) => c.resolvedPath),
    });
    await this.engineLog(`Step ${step.name} succeeded in ${(outcome.durationMs / 1000).toFixed(1)}s`);
    await this.persist();
    return undefined;
  }

  private outcomeError(step: StepDescriptor, outcome: StepOutcome, timeoutMs: number): TypedError | undefined {
    if (isSuccessfulOutcome(outcome)) return undefined;
    const details = { logTail: this.maskTail(outcome.tail), durationMs: outcome.durationMs };
    if (outcome.launchError !== undefined) {
      return processFailureError(step.name, null, {
        ...details,
        launchError: this.mask(outcome.launchError),
      });
    }
    if (outcome.timedOut) {
      return timeoutExceededError(step.name, timeoutMs, details);
    }
    if (outcome.exitCode === null && outcome.signal !== null) {
      return signalFailureError(step.name, outcome.signal, details);
    }
    return processFailureError(step.name, outcome.exitCode, details);
  }

  private async failStep(
    index: number,
    step: StepDescriptor,
    error: TypedError,
    startedAt: string,
  ): Promise<TypedError> {
    const endedAt = timestamp();
    const stepError: TypedError = { ...error, runId: this.record.runId };
    this.updateStep(index, {
      state: this.stepTransition(index, StepState.Failed),
      endedAt,
      durationMs: Date.parse(endedAt) - Date.parse(startedAt),
      error: stepError,
    });
    await this.engineLog(`Step ${step.name} failed: ${this.mask(error.message)}`);
    await this.persist();
    this.log.warn('Step failed', { step: step.name, code: error.code });
    return stepError;
  }

  private async finishFailed(error: TypedError): Promise<RunRecord> {
    this.setRunState(RunState.Failed);
    this.record.endedAt = timestamp();
    this.record.error = error;
    await this.engineLog('Run failed; remaining steps were not started');
    await this.persist();
    this.log.warn('Run failed', { code: error.code, step: error.stepId });
    return structuredClone(this.record);
  }

  /** Contain an unexpected exception: fail the run, keep what was recorded. */
  private async failInternal(err: unknown): Promise<RunRecord> {
    const message = this.mask(errorMessage(err));
    const error = internalRunError(this.record.runId, message);
    if (err instanceof EngineError) {
      error.details = { cause: err.typedError };
    }
    this.log.error('Run aborted by internal error', { error: message });

    const now = timestamp();
    this.record.steps = this.record.steps.map((step) =>
      step.state === StepState.Running ? { ...step, state: StepState.Failed, endedAt: now, error } : step,
    );
    this.record.overallState = RunState.Failed;
    this.record.endedAt = now;
    this.record.error = error;
    try {
      await this.engineLog(`Run failed with an internal error: ${message}`);
      await this.persist();
    } catch (persistErr) {
      this.log.error('Could not persist failed run', { error: errorMessage(persistErr) });
    }
    return structuredClone(this.record);
  }

  private async collectArtifacts(step: StepDescriptor): Promise<void> {
    try {
      const names = await copyArtifactsToRun(this.record.runDirectory, step.declaredOutputs);
      if (names.length > 0) await this.engineLog(`Artifacts saved: ${names.join(', ')}`);
    } catch (err) {
      // the working copy is still in the run directory
      this.log.warn('Artifact copy failed', { step: step.name, error: errorMessage(err) });
      await this.engineLog(`Warning: could not copy artifacts of ${step.name}: ${this.mask(errorMessage(err))}`);
    }
  }

  private stepTransition(index: number, target: StepState): StepState {
    const current = this.record.steps[index];
    if (!current) {
      throw new Error(`No step result at position ${index}`);
    }
    const result = transitionStepState(current.state, target);
    if (!result.success) {
      throw new EngineError({ ...result.error, stepId: current.name, runId: this.record.runId });
    }
    return result.newState;
  }

  private setRunState(target: RunState): void {
    const result = transitionRunState(this.record.overallState, target);
    if (!result.success) {
      throw new EngineError({ ...result.error, runId: this.record.runId });
    }
    this.record.overallState = result.newState;
  }

  private updateStep(index: number, patch: Partial<StepResult>): void {
    const current = this.record.steps[index];
    if (!current) {
      throw new Error(`No step result at position ${index}`);
    }
    if (isTerminalStepState(current.state)) {
      throw new Error(`Step ${current.name} is already ${current.state}`);
    }
    this.record.steps[index] = { ...current, ...patch };
  }

  private async persist(): Promise<void> {
    this.record.updatedAt = timestamp();
    // log lines written so far land on disk before the status that follows them
    await this.store.flush(this.record.runId);
    await this.store.update(this.record);
  }

  private outputLine(line: string): void {
    this.store
      .appendLog(this.record.runId, `[${timestamp()}] ${this.mask(line)}`)
      .catch((err: unknown) => {
        this.log.warn('Run log write failed', { error: errorMessage(err) });
      });
  }

  private async engineLog(message: string): Promise<void> {
    await this.store.appendLog(this.record.runId, `[${timestamp()}] [engine] ${message}`);
  }

  private mask(text: string): string {
    return maskSecretsInMessage(text, this.secrets);
  }

  private maskTail(tail: readonly string[]): string[] {
    return tail.map((line) => this.mask(line));
  }
}
