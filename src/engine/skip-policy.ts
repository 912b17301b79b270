/**
 * Skip policy — decides whether a step must execute, may be skipped, or
 * must be forced, before any process is launched.
 *
 * | enabled | skipExisting | overwrite | outputs valid | decision          |
 * |---------|--------------|-----------|---------------|-------------------|
 * | false   | *            | *         | *             | skip (disabled)   |
 * | true    | true         | false     | yes           | skip              |
 * | true    | true         | false     | no            | run               |
 * | true    | false        | *         | *             | run               |
 * | true    | *            | true      | *             | run (force)       |
 */

import { StepDescriptor } from '../domain/flow';
import { RunOptions, SkipReason } from '../domain/run';
import { allArtifactsValid } from './artifact-validator';

export type SkipDecision =
  | { action: 'skip'; reason: SkipReason }
  | {
      action: 'run';
      /** Overwrite was requested: the step runs regardless of existing outputs. */
      force: boolean;
      /** Add the program's append argument. */
      append: boolean;
      /** Add the program's overwrite argument. */
      overwriteFlag: boolean;
    };

export async function decideSkip(
  step: StepDescriptor,
  options: RunOptions,
  runDirectory: string,
): Promise<SkipDecision> {
  if (step.enabled === false) {
    return { action: 'skip', reason: 'disabled' };
  }

  const append = options.append && step.supportsAppend;

  if (options.overwrite) {
    return {
      action: 'run',
      force: true,
      append,
      overwriteFlag: step.supportsOverwriteFlag,
    };
  }

  if (options.skipExisting && (await allArtifactsValid(step.declaredOutputs, runDirectory))) {
    return { action: 'skip', reason: 'outputs-valid' };
  }

  return { action: 'run', force: false, append, overwriteFlag: false };
}
