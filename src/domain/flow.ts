/**
 * Flow domain model.
 *
 * A flow definition is the ordered list of step descriptors for one
 * ticket source. Each step is an opaque external program described only
 * by how to invoke it and which files it consumes and produces.
 */

export type FlowKind = 'jitbit' | 'jira';

export const FLOW_KINDS: readonly FlowKind[] = ['jitbit', 'jira'];

export function isFlowKind(value: unknown): value is FlowKind {
  return typeof value === 'string' && FLOW_KINDS.some((kind) => kind === value);
}

/** How an artifact on disk is judged usable. */
export type ArtifactKind = 'file' | 'json' | 'json-array' | 'json-object' | 'csv' | 'directory';

/** A file or directory a step consumes or produces, relative to the run directory. */
export interface ArtifactSpec {
  path: string;
  kind: ArtifactKind;
}

/**
 * One argument position of a command template.
 *
 * - A string is emitted as-is after `{placeholder}` substitution; every
 *   placeholder must resolve.
 * - An option emits `[option, value]` when every placeholder in `value`
 *   resolves, and nothing otherwise.
 * - A switch emits `[flag]` when the parameter named by `when` is truthy.
 */
export type ArgumentTemplate =
  | string
  | { option: string; value: string }
  | { flag: string; when: string };

export interface CommandTemplate {
  program: string;
  args: ArgumentTemplate[];
  /** Extra environment for the child process. */
  env?: Record<string, string>;
}

/** Static definition of one pipeline stage. */
export interface StepDescriptor {
  name: string;
  command: CommandTemplate;
  requiredInputs: ArtifactSpec[];
  declaredOutputs: ArtifactSpec[];
  supportsAppend: boolean;
  supportsOverwriteFlag: boolean;
  /** Per-step wall-clock budget; the engine default applies when omitted. */
  timeoutMs?: number;
  /** A disabled step is always skipped. Defaults to enabled. */
  enabled?: boolean;
}

/** An environment variable a flow's programs read. */
export interface EnvRequirement {
  /** Variable name, or several names of which one must be set. */
  keys: string[];
  required: boolean;
  format?: 'url' | 'email';
  description: string;
  secret: boolean;
}

/** The ordered steps for one workflow variant, built from validated parameters. */
export interface FlowDefinition {
  readonly kind: FlowKind;
  readonly steps: readonly StepDescriptor[];
  /** The validated parameters the steps' templates resolve against. */
  readonly parameters: Readonly<Record<string, unknown>>;
  readonly environment: readonly EnvRequirement[];
}

/** Deep-freeze a flow definition so it cannot change after it is built. */
export function freezeFlow(flow: FlowDefinition): FlowDefinition {
  for (const step of flow.steps) {
    for (const spec of [...step.requiredInputs, ...step.declaredOutputs]) Object.freeze(spec);
    Object.freeze(step.requiredInputs);
    Object.freeze(step.declaredOutputs);
    Object.freeze(step.command.args);
    if (step.command.env) Object.freeze(step.command.env);
    Object.freeze(step.command);
    Object.freeze(step);
  }
  Object.freeze(flow.steps);
  Object.freeze(flow.parameters);
  Object.freeze(flow.environment);
  return Object.freeze(flow);
}
