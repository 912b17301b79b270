/**
 * Run and Step state machines.
 *
 * Enforces valid state transitions for runs and steps,
 * producing typed errors on invalid transitions.
 */

import {
  RunState,
  StepState,
  StepResult,
  VALID_RUN_TRANSITIONS,
  VALID_STEP_TRANSITIONS,
} from '../domain/run';
import { TypedError, createTypedError } from '../domain/errors';

/** Result of a state transition attempt. */
export type TransitionResult<S> =
  | { success: true; newState: S }
  | { success: false; error: TypedError };

/** Attempt a run state transition. */
export function transitionRunState(current: RunState, target: RunState): TransitionResult<RunState> {
  const validTargets = VALID_RUN_TRANSITIONS[current];
  if (!validTargets.includes(target)) {
    return {
      success: false,
      error: createTypedError({
        code: 'RUN.INVALID_TRANSITION',
        message: `Invalid run state transition: ${current} -> ${target}`,
        details: { current, target, validTargets },
      }),
    };
  }
  return { success: true, newState: target };
}

/** Attempt a step state transition. */
export function transitionStepState(current: StepState, target: StepState): TransitionResult<StepState> {
  const validTargets = VALID_STEP_TRANSITIONS[current];
  if (!validTargets.includes(target)) {
    return {
      success: false,
      error: createTypedError({
        code: 'STEP.INVALID_TRANSITION',
        message: `Invalid step state transition: ${current} -> ${target}`,
        details: { current, target, validTargets },
      }),
    };
  }
  return { success: true, newState: target };
}

export function isTerminalRunState(state: RunState): boolean {
  return state === RunState.Success || state === RunState.Failed;
}

export function isTerminalStepState(state: StepState): boolean {
  return state === StepState.Success || state === StepState.Skipped || state === StepState.Failed;
}

/**
 * Overall run state implied by its step results once the run has started:
 * failed if any step failed, success if every step succeeded or was
 * skipped, running otherwise.
 */
export function deriveRunState(steps: readonly Pick<StepResult, 'state'>[]): RunState {
  if (steps.some((s) => s.state === StepState.Failed)) return RunState.Failed;
  if (steps.every((s) => s.state === StepState.Success || s.state === StepState.Skipped)) {
    return RunState.Success;
  }
  return RunState.Running;
}
