/**
 * Parameter validation for the flow catalog.
 *
 * Accepts loosely typed input (JSON bodies, CLI strings) and returns the
 * typed parameters a flow is built from, or throws a VALIDATION.PARAMETERS
 * error listing every problem found.
 */

import { EngineError, isRecord, parameterValidationError } from '../domain/errors';
import { FlowKind } from '../domain/flow';

export interface JitbitParameters {
  startId: number;
  llmLimit?: number;
  llmMaxCalls?: number;
  llmSaveInterval: number;
  newestFirst: boolean;
}

export interface JiraParameters {
  project: string;
  resolvedAfter: string;
  resolvedBefore?: string;
  jiraLimit?: number;
  llmLimit?: number;
  llmMaxCalls?: number;
  dedupThreshold: number;
  dedupThresholdLow: number;
  progress: boolean;
  skipDeduplication: boolean;
}

export const PARAMETER_DEFAULTS = {
  llmSaveInterval: 50,
  dedupThreshold: 0.84,
  dedupThresholdLow: 0.78,
} as const;

/** Describes one accepted parameter, for listings and help text. */
export interface ParameterInfo {
  name: string;
  type: 'integer' | 'number' | 'string' | 'date' | 'boolean';
  required: boolean;
  default?: string | number | boolean;
  description: string;
  choices?: string[];
}

export const JITBIT_PARAMETERS: readonly ParameterInfo[] = [
  { name: 'startId', type: 'integer', required: true, description: 'First ticket id to export (>= 1)' },
  { name: 'llmLimit', type: 'integer', required: false, description: 'Process at most this many tickets' },
  { name: 'llmMaxCalls', type: 'integer', required: false, description: 'Cap on language-model calls' },
  {
    name: 'llmSaveInterval',
    type: 'integer',
    required: false,
    default: PARAMETER_DEFAULTS.llmSaveInterval,
    description: 'Save progress every N tickets',
  },
  { name: 'newestFirst', type: 'boolean', required: false, default: false, description: 'Process newest tickets first' },
];

export function jiraParameterInfo(projects: readonly string[]): ParameterInfo[] {
  return [
    { name: 'project', type: 'string', required: true, choices: [...projects], description: 'Jira project key' },
    { name: 'resolvedAfter', type: 'date', required: true, description: 'Only tickets resolved on or after (YYYY-MM-DD)' },
    { name: 'resolvedBefore', type: 'date', required: false, description: 'Only tickets resolved before (YYYY-MM-DD)' },
    { name: 'jiraLimit', type: 'integer', required: false, description: 'Export at most this many tickets' },
    { name: 'llmLimit', type: 'integer', required: false, description: 'Process at most this many tickets' },
    { name: 'llmMaxCalls', type: 'integer', required: false, description: 'Cap on language-model calls' },
    {
      name: 'dedupThreshold',
      type: 'number',
      required: false,
      default: PARAMETER_DEFAULTS.dedupThreshold,
      description: 'Similarity above which tickets are duplicates (0-1)',
    },
    {
      name: 'dedupThresholdLow',
      type: 'number',
      required: false,
      default: PARAMETER_DEFAULTS.dedupThresholdLow,
      description: 'Similarity above which pairs are flagged for review (0-1)',
    },
    { name: 'progress', type: 'boolean', required: false, default: false, description: 'Show export progress' },
    {
      name: 'skipDeduplication',
      type: 'boolean',
      required: false,
      default: false,
      description: 'Render documents straight from the LLM output',
    },
  ];
}

type Issue = { field: string; message: string };

const DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;

/** Reads fields from raw input, collecting issues instead of throwing. */
class FieldReader {
  readonly issues: Issue[] = [];

  constructor(private readonly raw: Record<string, unknown>) {}

  private present(field: string): boolean {
    const value = this.raw[field];
    return value !== undefined && value !== null && value !== '';
  }

  integer(field: string, min: number, required: true): number;
  integer(field: string, min: number, required?: false): number | undefined;
  integer(field: string, min: number, required = false): number | undefined {
    if (!this.present(field)) {
      if (required) this.issues.push({ field, message: `${field} is required` });
      return undefined;
    }
    const value = this.raw[field];
    const parsed = typeof value === 'string' ? Number(value.trim()) : value;
    if (typeof parsed !== 'number' || !Number.isInteger(parsed)) {
      this.issues.push({ field, message: `${field} must be an integer` });
      return undefined;
    }
    if (parsed < min) {
      this.issues.push({ field, message: `${field} must be at least ${min}` });
      return undefined;
    }
    return parsed;
  }

  fraction(field: string, fallback: number): number {
    if (!this.present(field)) return fallback;
    const value = this.raw[field];
    const parsed = typeof value === 'string' ? Number(value.trim()) : value;
    if (typeof parsed !== 'number' || !Number.isFinite(parsed) || parsed < 0 || parsed > 1) {
      this.issues.push({ field, message: `${field} must be a number between 0 and 1` });
      return fallback;
    }
    return parsed;
  }

  boolean(field: string): boolean {
    if (!this.present(field)) return false;
    const value = this.raw[field];
    if (typeof value === 'boolean') return value;
    if (typeof value === 'string') {
      const lower = value.trim().toLowerCase();
      if (['true', '1', 'yes', 'on'].includes(lower)) return true;
      if (['false', '0', 'no', 'off'].includes(lower)) return false;
    }
    this.issues.push({ field, message: `${field} must be true or false` });
    return false;
  }

  date(field: string, required: true): string;
  date(field: string, required?: false): string | undefined;
  date(field: string, required = false): string | undefined {
    if (!this.present(field)) {
      if (required) this.issues.push({ field, message: `${field} is required (YYYY-MM-DD)` });
      return undefined;
    }
    const value = this.raw[field];
    if (typeof value !== 'string' || !isCalendarDate(value.trim())) {
      this.issues.push({ field, message: `${field} must be a date in YYYY-MM-DD format` });
      return undefined;
    }
    return value.trim();
  }

  choice(field: string, choices: readonly string[]): string | undefined {
    if (!this.present(field)) {
      this.issues.push({ field, message: `${field} is required (one of ${choices.join(', ')})` });
      return undefined;
    }
    const value = this.raw[field];
    if (typeof value !== 'string') {
      this.issues.push({ field, message: `${field} must be a string` });
      return undefined;
    }
    const match = choices.find((c) => c.toUpperCase() === value.trim().toUpperCase());
    if (match === undefined) {
      this.issues.push({ field, message: `${field} must be one of ${choices.join(', ')}` });
    }
    return match;
  }

  rejectUnknown(known: readonly ParameterInfo[]): void {
    const names = new Set(known.map((p) => p.name));
    for (const key of Object.keys(this.raw)) {
      if (!names.has(key)) this.issues.push({ field: key, message: `Unknown parameter: ${key}` });
    }
  }
}

function isCalendarDate(value: string): boolean {
  const match = DATE_PATTERN.exec(value);
  if (!match) return false;
  const [, y, m, d] = match;
  const date = new Date(Date.UTC(Number(y), Number(m) - 1, Number(d)));
  return (
    date.getUTCFullYear() === Number(y) && date.getUTCMonth() === Number(m) - 1 && date.getUTCDate() === Number(d)
  );
}

function fail(kind: FlowKind, issues: Issue[]): never {
  const summary = issues.map((i) => i.message).join('; ');
  throw new EngineError(parameterValidationError(`Invalid ${kind} parameters: ${summary}`, issues));
}

function asRecord(kind: FlowKind, raw: unknown): Record<string, unknown> {
  if (raw === undefined || raw === null) return {};
  if (!isRecord(raw)) fail(kind, [{ field: 'parameters', message: 'parameters must be an object' }]);
  return raw;
}

export function validateJitbitParameters(raw: unknown): JitbitParameters {
  const reader = new FieldReader(asRecord('jitbit', raw));
  reader.rejectUnknown(JITBIT_PARAMETERS);
  const startId = reader.integer('startId', 1, true);
  const params: JitbitParameters = {
    startId,
    llmLimit: reader.integer('llmLimit', 1),
    llmMaxCalls: reader.integer('llmMaxCalls', 1),
    llmSaveInterval: reader.integer('llmSaveInterval', 1) ?? PARAMETER_DEFAULTS.llmSaveInterval,
    newestFirst: reader.boolean('newestFirst'),
  };
  if (reader.issues.length > 0) fail('jitbit', reader.issues);
  return params;
}

export function validateJiraParameters(raw: unknown, projects: readonly string[]): JiraParameters {
  const reader = new FieldReader(asRecord('jira', raw));
  reader.rejectUnknown(jiraParameterInfo(projects));
  const project = reader.choice('project', projects);
  const resolvedAfter = reader.date('resolvedAfter', true);
  const resolvedBefore = reader.date('resolvedBefore');
  const dedupThreshold = reader.fraction('dedupThreshold', PARAMETER_DEFAULTS.dedupThreshold);
  const dedupThresholdLow = reader.fraction('dedupThresholdLow', PARAMETER_DEFAULTS.dedupThresholdLow);

  // YYYY-MM-DD strings order lexically
  if (resolvedAfter && resolvedBefore && resolvedBefore < resolvedAfter) {
    reader.issues.push({ field: 'resolvedBefore', message: 'resolvedBefore must not be before resolvedAfter' });
  }
  if (dedupThresholdLow > dedupThreshold) {
    reader.issues.push({
      field: 'dedupThresholdLow',
      message: 'dedupThresholdLow must not exceed dedupThreshold',
    });
  }

  const params: JiraParameters = {
    project: project ?? '',
    resolvedAfter,
    resolvedBefore,
    jiraLimit: reader.integer('jiraLimit', 1),
    llmLimit: reader.integer('llmLimit', 1),
    llmMaxCalls: reader.integer('llmMaxCalls', 1),
    dedupThreshold,
    dedupThresholdLow,
    progress: reader.boolean('progress'),
    skipDeduplication: reader.boolean('skipDeduplication'),
  };
  if (reader.issues.length > 0 || project === undefined) fail('jira', reader.issues);
  return params;
}
