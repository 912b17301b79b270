#!/usr/bin/env node

import { Command, CommanderError } from 'commander';
import { config as loadDotenv } from 'dotenv';
import { setTimeout as delay } from 'timers/promises';
import { PipelineConfig, loadConfig } from './config';
import { AppContext, VERSION, createAppContext, startServer } from './server';
import { buildFlowDefinition } from './flows/catalog';
import { FlowKind } from './domain/flow';
import { RunRecord, RunState, StepState } from './domain/run';
import { EngineError, ERROR_CODES, errorMessage } from './domain/errors';
import { SubmitOptions } from './engine/scheduler';
import { StepExecutor } from './engine/step-executor';
import { environmentSummary } from './environment';
import { setLogLevel } from './logger';

export const EXIT_CODES = {
  ok: 0,
  runFailed: 1,
  validation: 2,
  admissionRejected: 3,
} as const;

export interface CliDependencies {
  env?: NodeJS.ProcessEnv;
  cwd?: string;
  /** Replaces the child-process executor, e.g. in tests. */
  executor?: StepExecutor;
  stdout?: (text: string) => void;
  stderr?: (text: string) => void;
  /** Interval between log polls while following a run. */
  pollIntervalMs?: number;
}

interface CliState {
  exitCode: number;
}

interface RunFlags {
  skipExisting: boolean;
  overwrite?: boolean;
  append?: boolean;
  seedFrom?: string;
  quiet?: boolean;
}

function exitCodeFor(err: EngineError): number {
  if (err.code === ERROR_CODES.AdmissionRejected) return EXIT_CODES.admissionRejected;
  if (err.code.startsWith('VALIDATION.')) return EXIT_CODES.validation;
  return EXIT_CODES.runFailed;
}

/** Drop options the user did not give so defaults apply downstream. */
function definedOnly(values: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(values)) {
    if (value !== undefined) result[key] = value;
  }
  return result;
}

function describeRun(run: RunRecord): string {
  const lines = [`Run ${run.runId} (${run.flowKind}): ${run.overallState}`];
  for (const step of run.steps) {
    const duration = step.durationMs !== undefined ? ` ${(step.durationMs / 1000).toFixed(1)}s` : '';
    const extra =
      step.state === StepState.Skipped
        ? ` [${step.skipReason ?? 'skipped'}]`
        : step.error
          ? ` - ${step.error.message}`
          : '';
    lines.push(`  ${step.state.padEnd(8)} ${step.name}${duration}${extra}`);
  }
  if (run.error && run.error.stepId === undefined) lines.push(`  error: ${run.error.message}`);
  return lines.join('\n');
}

export function createProgram(deps: CliDependencies = {}, state: CliState = { exitCode: 0 }): Command {
  const env = deps.env ?? process.env;
  const cwd = deps.cwd ?? process.cwd();
  const out = deps.stdout ?? ((text: string) => process.stdout.write(text));
  const err = deps.stderr ?? ((text: string) => process.stderr.write(text));
  const pollIntervalMs = deps.pollIntervalMs ?? 250;

  const config = (): PipelineConfig => {
    const loaded = loadConfig(env, cwd);
    setLogLevel(loaded.logLevel);
    return loaded;
  };

  const openContext = async (): Promise<AppContext> => {
    const ctx = createAppContext(config(), { executor: deps.executor, environment: env });
    await ctx.store.load();
    return ctx;
  };

  const executeFlow = async (kind: FlowKind, parameters: Record<string, unknown>, flags: RunFlags) => {
    const ctx = await openContext();
    const options: SubmitOptions = {
      skipExisting: flags.skipExisting,
      overwrite: flags.overwrite ?? false,
      append: flags.append ?? false,
      ...(flags.seedFrom ? { seedFromRunId: flags.seedFrom } : {}),
    };

    let run: RunRecord;
    try {
      const flow = buildFlowDefinition(kind, definedOnly(parameters), { jiraProjects: ctx.config.jiraProjects });
      run = await ctx.scheduler.submit({ flow, options });
    } catch (e) {
      if (e instanceof EngineError) {
        err(`${e.message}\n`);
        state.exitCode = exitCodeFor(e);
        return;
      }
      throw e;
    }

    out(`Run ${run.runId} started in ${run.runDirectory}\n`);
    let finished = false;
    const completion = ctx.scheduler.waitForRun(run.runId).finally(() => {
      finished = true;
    });

    let offset = 0;
    for (;;) {
      const done = finished;
      const chunk = await ctx.store.readLog(run.runId, offset);
      if (chunk && chunk.content.length > 0) {
        if (!flags.quiet) out(chunk.content);
        offset = chunk.nextOffset;
        continue;
      }
      if (done) break;
      await delay(pollIntervalMs);
    }

    const final = await completion;
    out(`${describeRun(final)}\n`);
    state.exitCode = final.overallState === RunState.Success ? EXIT_CODES.ok : EXIT_CODES.runFailed;
  };

  const withRunFlags = (command: Command): Command =>
    command
      .option('--no-skip-existing', 'run steps even when their outputs are already valid')
      .option('--overwrite', 'force every step to run and overwrite its outputs')
      .option('--append', 'ask append-capable steps to extend their outputs')
      .option('--seed-from <runId>', 'start from the outputs of an earlier run')
      .option('-q, --quiet', 'do not print the run log while waiting');

  // subcommands copy these settings when they are created
  const program = new Command();
  program.exitOverride();
  program.configureOutput({ writeOut: out, writeErr: err });
  program.name('ticket-pipeline').description('Ticket export, summarization and document pipeline').version(VERSION);

  program
    .command('serve')
    .description('Start the HTTP API')
    .option('--host <host>', 'interface to bind')
    .option('--port <port>', 'port to listen on')
    .action(async (opts: { host?: string; port?: string }) => {
      const base = config();
      const port = opts.port !== undefined ? Number(opts.port) : base.port;
      if (!Number.isInteger(port) || port < 0) {
        err(`Invalid port: ${opts.port ?? ''}\n`);
        state.exitCode = EXIT_CODES.validation;
        return;
      }
      const ctx = createAppContext(
        { ...base, host: opts.host ?? base.host, port },
        { executor: deps.executor, environment: env },
      );
      await startServer(ctx);
    });

  program
    .command('env-check')
    .description('Check the environment variables the step programs need')
    .action(() => {
      const summary = environmentSummary(env);
      let allOk = true;
      for (const [service, report] of Object.entries(summary)) {
        out(`${service.toUpperCase()}: ${report.ok}/${report.total} ${report.status}\n`);
        for (const detail of report.details) {
          out(`  ${detail.ok ? 'ok ' : 'ERR'} ${detail.key}: ${detail.message}\n`);
        }
        if (report.status !== 'ok') allOk = false;
      }
      state.exitCode = allOk ? EXIT_CODES.ok : EXIT_CODES.runFailed;
    });

  withRunFlags(
    program
      .command('run-jitbit')
      .description('Run the Jitbit flow and wait for it to finish')
      .requiredOption('--start-id <id>', 'first ticket id to export')
      .option('--llm-limit <n>', 'process at most n tickets')
      .option('--llm-max-calls <n>', 'cap on language-model calls')
      .option('--save-interval <n>', 'save progress every n tickets')
      .option('--newest-first', 'process newest tickets first'),
  ).action(
    async (
      opts: RunFlags & {
        startId: string;
        llmLimit?: string;
        llmMaxCalls?: string;
        saveInterval?: string;
        newestFirst?: boolean;
      },
    ) => {
      await executeFlow(
        'jitbit',
        {
          startId: opts.startId,
          llmLimit: opts.llmLimit,
          llmMaxCalls: opts.llmMaxCalls,
          llmSaveInterval: opts.saveInterval,
          newestFirst: opts.newestFirst,
        },
        opts,
      );
    },
  );

  withRunFlags(
    program
      .command('run-jira')
      .description('Run the Jira flow and wait for it to finish')
      .requiredOption('--project <key>', 'Jira project key')
      .requiredOption('--resolved-after <date>', 'only tickets resolved on or after (YYYY-MM-DD)')
      .option('--resolved-before <date>', 'only tickets resolved before (YYYY-MM-DD)')
      .option('--jira-limit <n>', 'export at most n tickets')
      .option('--llm-limit <n>', 'process at most n tickets')
      .option('--llm-max-calls <n>', 'cap on language-model calls')
      .option('--threshold <x>', 'duplicate similarity threshold (0-1)')
      .option('--threshold-low <x>', 'review similarity threshold (0-1)')
      .option('--progress', 'show export progress')
      .option('--skip-dedup', 'render documents without deduplication'),
  ).action(
    async (
      opts: RunFlags & {
        project: string;
        resolvedAfter: string;
        resolvedBefore?: string;
        jiraLimit?: string;
        llmLimit?: string;
        llmMaxCalls?: string;
        threshold?: string;
        thresholdLow?: string;
        progress?: boolean;
        skipDedup?: boolean;
      },
    ) => {
      await executeFlow(
        'jira',
        {
          project: opts.project,
          resolvedAfter: opts.resolvedAfter,
          resolvedBefore: opts.resolvedBefore,
          jiraLimit: opts.jiraLimit,
          llmLimit: opts.llmLimit,
          llmMaxCalls: opts.llmMaxCalls,
          dedupThreshold: opts.threshold,
          dedupThresholdLow: opts.thresholdLow,
          progress: opts.progress,
          skipDeduplication: opts.skipDedup,
        },
        opts,
      );
    },
  );

  program
    .command('runs')
    .description('List recorded runs, newest first')
    .option('--limit <n>', 'number of runs to show', '20')
    .action(async (opts: { limit: string }) => {
      const ctx = await openContext();
      const limit = Number(opts.limit);
      const runs = await ctx.scheduler.listRuns({ limit: Number.isInteger(limit) && limit > 0 ? limit : 20 });
      if (runs.length === 0) {
        out('No runs recorded\n');
        return;
      }
      for (const run of runs) {
        out(`${run.runId}  ${run.overallState.padEnd(8)} ${run.completedSteps}/${run.stepCount}\n`);
      }
    });

  program
    .command('status <runId>')
    .description('Show the status of a run')
    .action(async (runId: string) => {
      const ctx = await openContext();
      const run = await ctx.store.get(runId);
      if (!run) {
        err(`Run not found: ${runId}\n`);
        state.exitCode = EXIT_CODES.runFailed;
        return;
      }
      out(`${describeRun(run)}\n`);
    });

  program
    .command('log <runId>')
    .description('Print the log of a run')
    .option('--offset <bytes>', 'start reading at this byte offset', '0')
    .action(async (runId: string, opts: { offset: string }) => {
      const ctx = await openContext();
      let offset = Number(opts.offset);
      for (;;) {
        const chunk = await ctx.store.readLog(runId, offset);
        if (!chunk) {
          err(`Run not found: ${runId}\n`);
          state.exitCode = EXIT_CODES.runFailed;
          return;
        }
        if (chunk.content.length === 0) break;
        out(chunk.content);
        offset = chunk.nextOffset;
      }
    });

  return program;
}

/** Parse and run one command line. Resolves with the process exit code. */
export async function runCli(argv: readonly string[], deps: CliDependencies = {}): Promise<number> {
  const state: CliState = { exitCode: EXIT_CODES.ok };
  const program = createProgram(deps, state);
  const err = deps.stderr ?? ((text: string) => process.stderr.write(text));

  try {
    await program.parseAsync([...argv], { from: 'user' });
  } catch (e) {
    if (e instanceof CommanderError) {
      // help and version exit with 0; usage errors count as validation errors
      return e.exitCode === 0 ? EXIT_CODES.ok : EXIT_CODES.validation;
    }
    if (e instanceof EngineError) {
      err(`${e.message}\n`);
      return exitCodeFor(e);
    }
    err(`${errorMessage(e)}\n`);
    return EXIT_CODES.runFailed;
  }
  return state.exitCode;
}

async function main(): Promise<void> {
  loadDotenv();
  process.exitCode = await runCli(process.argv.slice(2));
}

if (require.main === module) {
  void main();
}
