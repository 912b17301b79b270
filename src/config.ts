/**
 * Runtime configuration read from environment variables.
 */

import path from 'path';
import { LogLevel, logger, parseLogLevel } from './logger';

export interface PipelineConfig {
  runsDir: string;
  maxConcurrentRuns: number;
  stepTimeoutMs: number;
  killGraceMs: number;
  scriptsDir: string;
  interpreter: string;
  host: string;
  port: number;
  checkEnvironment: boolean;
  jiraProjects: string[];
  logLevel: LogLevel;
}

export const DEFAULT_CONFIG: Readonly<Omit<PipelineConfig, 'runsDir' | 'scriptsDir'>> = {
  maxConcurrentRuns: 2,
  stepTimeoutMs: 3_600_000,
  killGraceMs: 5_000,
  interpreter: 'python3',
  host: '127.0.0.1',
  port: 8787,
  checkEnvironment: true,
  jiraProjects: ['SUP', 'TMS'],
  logLevel: LogLevel.Info,
};

/** Longest delay a Node.js timer honours; larger values fire after 1ms. */
export const MAX_TIMER_MS = 2_147_483_647;

function readInt(
  env: NodeJS.ProcessEnv,
  key: string,
  fallback: number,
  { min = 0, max = Number.MAX_SAFE_INTEGER }: { min?: number; max?: number } = {},
): number {
  const raw = env[key]?.trim();
  if (raw === undefined || raw === '') return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < min || value > max) {
    logger.warn('Ignoring invalid numeric setting', { key, value: raw, fallback });
    return fallback;
  }
  return value;
}

function readBool(env: NodeJS.ProcessEnv, key: string, fallback: boolean): boolean {
  const raw = env[key]?.trim().toLowerCase();
  if (raw === undefined || raw === '') return fallback;
  if (['1', 'true', 'yes', 'on'].includes(raw)) return true;
  if (['0', 'false', 'no', 'off'].includes(raw)) return false;
  logger.warn('Ignoring invalid boolean setting', { key, value: raw, fallback });
  return fallback;
}

function readList(env: NodeJS.ProcessEnv, key: string, fallback: string[]): string[] {
  const raw = env[key];
  if (raw === undefined) return [...fallback];
  const items = raw
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
  return items.length > 0 ? items : [...fallback];
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env, cwd: string = process.cwd()): PipelineConfig {
  const text = (key: string, fallback: string) => {
    const value = env[key]?.trim();
    return value ? value : fallback;
  };
  return {
    runsDir: path.resolve(cwd, text('PIPELINE_RUNS_DIR', 'runs')),
    maxConcurrentRuns: readInt(env, 'PIPELINE_MAX_CONCURRENT_RUNS', DEFAULT_CONFIG.maxConcurrentRuns, { min: 1 }),
    stepTimeoutMs: readInt(env, 'PIPELINE_STEP_TIMEOUT_MS', DEFAULT_CONFIG.stepTimeoutMs, { max: MAX_TIMER_MS }),
    killGraceMs: readInt(env, 'PIPELINE_KILL_GRACE_MS', DEFAULT_CONFIG.killGraceMs, { max: MAX_TIMER_MS }),
    scriptsDir: path.resolve(cwd, text('PIPELINE_SCRIPTS_DIR', '.')),
    interpreter: text('PIPELINE_INTERPRETER', DEFAULT_CONFIG.interpreter),
    host: text('PIPELINE_HOST', DEFAULT_CONFIG.host),
    port: readInt(env, 'PIPELINE_PORT', DEFAULT_CONFIG.port, { min: 0, max: 65_535 }),
    checkEnvironment: readBool(env, 'PIPELINE_CHECK_ENV', DEFAULT_CONFIG.checkEnvironment),
    jiraProjects: readList(env, 'PIPELINE_JIRA_PROJECTS', DEFAULT_CONFIG.jiraProjects),
    logLevel: parseLogLevel(env.PIPELINE_LOG_LEVEL, DEFAULT_CONFIG.logLevel),
  };
}
