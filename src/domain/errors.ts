/**
 * Typed error model.
 *
 * Step failures are recorded on the Run Record as typed errors rather than
 * thrown; operations that refuse a request (admission, validation, lookup)
 * throw an EngineError carrying the same structure.
 */

/** Typed suggested fix that callers can apply. */
export interface SuggestedFix {
  type: string;
  params: Record<string, unknown>;
  description?: string;
}

/** The core typed error structure returned in API responses and run records. */
export interface TypedError {
  /** Namespaced error code (e.g., "STEP.TIMEOUT_EXCEEDED"). */
  code: string;
  /** Human-readable summary. */
  message: string;
  /** Associated step name if applicable. */
  stepId?: string;
  /** Associated run if applicable. */
  runId?: string;
  /** Whether the same request is expected to succeed later without changes. */
  retryable: boolean;
  details?: Record<string, unknown>;
  suggestedFixes: SuggestedFix[];
}

/** Error codes used by the engine, keyed by taxonomy name. */
export const ERROR_CODES = {
  AdmissionRejected: 'RUN.ADMISSION_REJECTED',
  MissingInput: 'STEP.MISSING_INPUT',
  ProcessFailure: 'STEP.PROCESS_FAILURE',
  TimeoutExceeded: 'STEP.TIMEOUT_EXCEEDED',
  OutputValidationFailed: 'STEP.OUTPUT_VALIDATION_FAILED',
  ParameterValidation: 'VALIDATION.PARAMETERS',
  EnvironmentValidation: 'VALIDATION.ENVIRONMENT',
  RunNotFound: 'RUN.NOT_FOUND',
  RunInterrupted: 'RUN.INTERRUPTED',
  Internal: 'RUN.INTERNAL',
} as const;

/** Create a typed error with defaults. */
export function createTypedError(params: {
  code: string;
  message: string;
  stepId?: string;
  runId?: string;
  retryable?: boolean;
  details?: Record<string, unknown>;
  suggestedFixes?: SuggestedFix[];
}): TypedError {
  return {
    code: params.code,
    message: params.message,
    stepId: params.stepId,
    runId: params.runId,
    retryable: params.retryable ?? false,
    details: params.details,
    suggestedFixes: params.suggestedFixes ?? [],
  };
}

// --- Factories ---

export function admissionRejectedError(activeRuns: number, maxConcurrentRuns: number): TypedError {
  return createTypedError({
    code: ERROR_CODES.AdmissionRejected,
    message: `Concurrency limit reached: ${activeRuns} of ${maxConcurrentRuns} runs active`,
    retryable: true,
    details: { activeRuns, maxConcurrentRuns },
    suggestedFixes: [
      { type: 'WAIT_AND_RETRY', params: {}, description: 'Submit again once an active run has finished' },
    ],
  });
}

export function missingInputError(
  stepId: string,
  problems: Array<{ path: string; reason: string }>,
): TypedError {
  const listed = problems.map((p) => `${p.path} (${p.reason})`).join(', ');
  return createTypedError({
    code: ERROR_CODES.MissingInput,
    message: `Required input missing or invalid: ${listed}`,
    stepId,
    details: { inputs: problems },
    suggestedFixes: [
      { type: 'RUN_UPSTREAM_STEP', params: { paths: problems.map((p) => p.path) } },
    ],
  });
}

export function processFailureError(
  stepId: string,
  exitCode: number | null,
  details?: Record<string, unknown>,
): TypedError {
  return createTypedError({
    code: ERROR_CODES.ProcessFailure,
    message:
      exitCode === null
        ? 'Step program could not be started'
        : `Step program exited with code ${exitCode}`,
    stepId,
    details: { exitCode, ...details },
  });
}

export function signalFailureError(
  stepId: string,
  signal: string,
  details?: Record<string, unknown>,
): TypedError {
  return createTypedError({
    code: ERROR_CODES.ProcessFailure,
    message: `Step program was terminated by signal ${signal}`,
    stepId,
    details: { signal, ...details },
  });
}

export function timeoutExceededError(
  stepId: string,
  timeoutMs: number,
  details?: Record<string, unknown>,
): TypedError {
  return createTypedError({
    code: ERROR_CODES.TimeoutExceeded,
    message: `Step exceeded its time budget of ${timeoutMs}ms and was terminated`,
    stepId,
    details: { timeoutMs, ...details },
    suggestedFixes: [
      { type: 'INCREASE_TIMEOUT', params: { timeoutMs: timeoutMs * 2 } },
    ],
  });
}

export function outputValidationError(
  stepId: string,
  problems: Array<{ path: string; reason: string }>,
  details?: Record<string, unknown>,
): TypedError {
  const listed = problems.map((p) => `${p.path} (${p.reason})`).join(', ');
  return createTypedError({
    code: ERROR_CODES.OutputValidationFailed,
    message: `Step exited successfully but its outputs are invalid: ${listed}`,
    stepId,
    details: { outputs: problems, ...details },
  });
}

export function parameterValidationError(
  message: string,
  issues: Array<{ field: string; message: string }>,
): TypedError {
  return createTypedError({
    code: ERROR_CODES.ParameterValidation,
    message,
    details: { issues },
    suggestedFixes: issues.map((issue) => ({
      type: 'FIX_PARAMETER',
      params: { field: issue.field },
      description: issue.message,
    })),
  });
}

export function environmentValidationError(flowKind: string, missing: string[]): TypedError {
  return createTypedError({
    code: ERROR_CODES.EnvironmentValidation,
    message: `Environment incomplete for ${flowKind} flow: ${missing.join('; ')}`,
    details: { flowKind, problems: missing },
    suggestedFixes: [
      { type: 'PROVIDE_ENV', params: { flowKind }, description: 'Set the missing variables in the environment or .env file' },
    ],
  });
}

export function runNotFoundError(runId: string): TypedError {
  return createTypedError({
    code: ERROR_CODES.RunNotFound,
    message: `Run not found: ${runId}`,
    runId,
  });
}

export function runInterruptedError(runId: string): TypedError {
  return createTypedError({
    code: ERROR_CODES.RunInterrupted,
    message: 'Run was interrupted: the engine stopped before the run finished',
    runId,
    suggestedFixes: [
      { type: 'RESUBMIT', params: { seedFromRunId: runId }, description: 'Submit again, seeded from this run' },
    ],
  });
}

export function internalRunError(runId: string, message: string): TypedError {
  return createTypedError({
    code: ERROR_CODES.Internal,
    message: `Internal engine error: ${message}`,
    runId,
  });
}

/** Thrown by engine operations that refuse a request. */
export class EngineError extends Error {
  constructor(public readonly typedError: TypedError) {
    super(typedError.message);
    this.name = 'EngineError';
  }

  get code(): string {
    return this.typedError.code;
  }
}

/**
 * Mask a secret value, preserving only the last 4 characters for
 * identification. Secrets shorter than 8 characters are fully masked.
 */
export function maskSecret(secret: string): string {
  if (!secret || secret.length < 8) return '****';
  return '*'.repeat(secret.length - 4) + secret.slice(-4);
}

/** Replace every occurrence of the given secret values in a message. */
export function maskSecretsInMessage(message: string, secrets: readonly string[]): string {
  let result = message;
  for (const secret of secrets) {
    if (secret && secret.length > 0) {
      // split/join sidesteps regex escaping of the secret
      result = result.split(secret).join(maskSecret(secret));
    }
  }
  return result;
}

/** Parameter names treated as secrets when captured into params.json. */
const SENSITIVE_KEY_FRAGMENTS = ['token', 'key', 'password', 'secret'];

export function isSensitiveKey(key: string): boolean {
  const lower = key.toLowerCase();
  return SENSITIVE_KEY_FRAGMENTS.some((fragment) => lower.includes(fragment));
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/** Redact values of sensitive keys, recursing into nested objects. */
export function redactSecrets(input: Record<string, unknown>): Record<string, unknown> {
  const redacted: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(input)) {
    if (isSensitiveKey(key)) {
      redacted[key] = '[REDACTED]';
    } else if (isRecord(value)) {
      redacted[key] = redactSecrets(value);
    } else {
      redacted[key] = value;
    }
  }
  return redacted;
}

/** API error response wrapper. */
export interface ApiErrorResponse {
  error: TypedError;
}

/** Construct an API error response. */
export function apiError(error: TypedError): ApiErrorResponse {
  return { error };
}

/** Normalize an unknown thrown value into a message. */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
