/**
 * Environment checks for the external services the step programs talk to.
 *
 * The engine never reads these variables itself; it only verifies that a
 * flow's programs will find them, and learns which values to mask in run logs.
 */

import { EnvRequirement, FlowKind } from './domain/flow';

export type ServiceName = 'jitbit' | 'jira' | 'llm';

export interface EnvCheckResult {
  /** Variable name, or "A or B" for alternatives. */
  key: string;
  present: boolean;
  valid: boolean;
  ok: boolean;
  required: boolean;
  message: string;
}

export interface ServiceReport {
  ok: number;
  total: number;
  status: 'ok' | 'error';
  details: EnvCheckResult[];
}

const URL_PATTERN =
  /^https?:\/\/(?:(?:[A-Z0-9](?:[A-Z0-9-]{0,61}[A-Z0-9])?\.)+[A-Z]{2,}\.?|localhost|\d{1,3}\.\d{1,3}\.\d{1,3}\.\d{1,3})(?::\d+)?(?:\/?|[/?]\S+)$/i;
const EMAIL_PATTERN = /^[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}$/;

export function isValidUrl(value: string): boolean {
  return URL_PATTERN.test(value);
}

export function isValidEmail(value: string): boolean {
  return EMAIL_PATTERN.test(value);
}

export const JITBIT_ENVIRONMENT: readonly EnvRequirement[] = [
  { keys: ['JITBIT_API_TOKEN'], required: true, description: 'Jitbit API token', secret: true },
  { keys: ['JITBIT_BASE_URL'], required: true, format: 'url', description: 'Jitbit base URL', secret: false },
];

export const JIRA_ENVIRONMENT: readonly EnvRequirement[] = [
  { keys: ['JIRA_EMAIL'], required: true, format: 'email', description: 'Jira email address', secret: false },
  { keys: ['JIRA_API_TOKEN'], required: true, description: 'Jira API token', secret: true },
];

export const LLM_ENVIRONMENT: readonly EnvRequirement[] = [
  {
    keys: ['SCW_SECRET_KEY', 'SCW_API_KEY'],
    required: true,
    description: 'Scaleway secret or API key',
    secret: true,
  },
  {
    keys: ['SCW_OPENAI_BASE_URL'],
    required: true,
    format: 'url',
    description: 'Scaleway OpenAI-compatible base URL',
    secret: false,
  },
  { keys: ['LLM_MODEL'], required: false, description: 'LLM model name', secret: false },
];

export const SERVICE_ENVIRONMENT: Readonly<Record<ServiceName, readonly EnvRequirement[]>> = {
  jitbit: JITBIT_ENVIRONMENT,
  jira: JIRA_ENVIRONMENT,
  llm: LLM_ENVIRONMENT,
};

/** Variables each flow's programs read. */
export function flowEnvironment(kind: FlowKind): EnvRequirement[] {
  return [...SERVICE_ENVIRONMENT[kind], ...LLM_ENVIRONMENT];
}

function readVar(env: NodeJS.ProcessEnv, key: string): string {
  return (env[key] ?? '').trim();
}

function checkFormat(requirement: EnvRequirement, value: string): boolean {
  switch (requirement.format) {
    case 'url':
      return isValidUrl(value);
    case 'email':
      return isValidEmail(value);
    default:
      return true;
  }
}

/** Check one requirement. Alternatives pass when any of their keys is set. */
export function checkRequirement(requirement: EnvRequirement, env: NodeJS.ProcessEnv): EnvCheckResult {
  const key = requirement.keys.join(' or ');
  const setKey = requirement.keys.find((k) => readVar(env, k).length > 0);

  if (setKey === undefined) {
    const valid = !requirement.required;
    return {
      key,
      present: false,
      valid,
      ok: false,
      required: requirement.required,
      message: requirement.required
        ? `Missing required variable (${requirement.description})`
        : `Optional variable not set (${requirement.description})`,
    };
  }

  const valid = checkFormat(requirement, readVar(env, setKey));
  const format = requirement.format === undefined ? 'format' : `${requirement.format} format`;
  return {
    key: setKey,
    present: true,
    valid,
    ok: valid,
    required: requirement.required,
    message: valid
      ? `Present and valid (${requirement.description})`
      : `Present but invalid ${format} (${requirement.description})`,
  };
}

export function checkRequirements(
  requirements: readonly EnvRequirement[],
  env: NodeJS.ProcessEnv,
): EnvCheckResult[] {
  return requirements.map((r) => checkRequirement(r, env));
}

/**
 * Problems that block a flow: required variables that are missing and any
 * variable set to a malformed value. Optional variables left unset are fine.
 */
export function environmentProblems(results: readonly EnvCheckResult[]): string[] {
  return results.filter((r) => !r.valid).map((r) => `${r.key}: ${r.message}`);
}

/** Check the variables of one flow kind. */
export function checkEnvironment(kind: FlowKind, env: NodeJS.ProcessEnv = process.env): EnvCheckResult[] {
  return checkRequirements(flowEnvironment(kind), env);
}

/** Per-service summary for the status endpoint and the env-check command. */
export function environmentSummary(env: NodeJS.ProcessEnv = process.env): Record<ServiceName, ServiceReport> {
  const report = (requirements: readonly EnvRequirement[]): ServiceReport => {
    const details = checkRequirements(requirements, env);
    // an unset optional variable does not count against the service
    const counted = details.filter((d) => d.required || d.present);
    const ok = counted.filter((d) => d.ok).length;
    return { ok, total: counted.length, status: ok === counted.length ? 'ok' : 'error', details };
  };
  return {
    jitbit: report(JITBIT_ENVIRONMENT),
    jira: report(JIRA_ENVIRONMENT),
    llm: report(LLM_ENVIRONMENT),
  };
}

/** Values of secret variables that are set, for masking in run logs. */
export function collectSecrets(requirements: readonly EnvRequirement[], env: NodeJS.ProcessEnv): string[] {
  const secrets = new Set<string>();
  for (const requirement of requirements) {
    if (!requirement.secret) continue;
    for (const key of requirement.keys) {
      const value = readVar(env, key);
      if (value.length > 0) secrets.add(value);
    }
  }
  return [...secrets];
}
