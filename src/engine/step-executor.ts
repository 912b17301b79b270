/**
 * Step executor — runs one step's program as an isolated child process.
 *
 * The child gets the run directory as its working directory and its own
 * process group, so a timeout can terminate everything it started.
 * Standard output and error are merged line by line and forwarded as they
 * arrive; that stream is the only view the engine has into an opaque
 * program's progress and retries.
 */

import { spawn, ChildProcess } from 'child_process';
import { ResolvedCommand } from './command';
import { errorMessage } from '../domain/errors';
import { logger as rootLogger, Logger } from '../logger';

/** Everything needed to launch one step. */
export interface StepExecutionRequest {
  runId: string;
  stepName: string;
  command: ResolvedCommand;
  cwd: string;
  /** Wall-clock budget; 0 disables the timeout. */
  timeoutMs: number;
  /** Receives each output line (stdout and stderr merged) as it is produced. */
  onLine: (line: string) => void;
}

/** How the child process ended. */
export interface StepOutcome {
  /** Exit code, or null when the process ended by signal or never started. */
  exitCode: number | null;
  signal: NodeJS.Signals | null;
  /** The engine terminated the process because its time budget ran out. */
  timedOut: boolean;
  /** Set when the program could not be started at all (e.g. ENOENT). */
  launchError?: string;
  durationMs: number;
  /** Last lines of output, for error summaries. */
  tail: string[];
}

export interface StepExecutor {
  execute(request: StepExecutionRequest): Promise<StepOutcome>;
}

export interface ProcessStepExecutorOptions {
  /** Delay between SIGTERM and SIGKILL after a timeout. */
  killGraceMs?: number;
  /** Number of trailing output lines kept for the outcome. */
  tailLines?: number;
  /** Base environment for children; defaults to the engine's own. */
  baseEnv?: NodeJS.ProcessEnv;
  logger?: Logger;
}

/** Whether the outcome is a clean exit. */
export function isSuccessfulOutcome(outcome: StepOutcome): boolean {
  return !outcome.timedOut && outcome.launchError === undefined && outcome.exitCode === 0;
}

/**
 * Splits a character stream into lines. `\n`, `\r\n` and a bare `\r`
 * all end a line; blank lines are dropped.
 */
export class LineSplitter {
  private pending = '';

  constructor(private readonly emit: (line: string) => void) {}

  push(chunk: string): void {
    let text = this.pending + chunk;
    let carry = '';
    // a trailing \r may be the first half of \r\n split across chunks
    if (text.endsWith('\r')) {
      carry = '\r';
      text = text.slice(0, -1);
    }
    const parts = text.split(/\r\n|\r|\n/);
    this.pending = (parts.pop() ?? '') + carry;
    for (const line of parts) this.emitLine(line);
  }

  flush(): void {
    const rest = this.pending.replace(/\r$/, '');
    this.pending = '';
    this.emitLine(rest);
  }

  private emitLine(line: string): void {
    const trimmed = line.trimEnd();
    if (trimmed.trim().length === 0) return;
    this.emit(trimmed);
  }
}

const DEFAULT_KILL_GRACE_MS = 5_000;
const DEFAULT_TAIL_LINES = 20;

/** Step executor backed by real child processes. */
export class ProcessStepExecutor implements StepExecutor {
  private readonly killGraceMs: number;
  private readonly tailLines: number;
  private readonly baseEnv: NodeJS.ProcessEnv;
  private readonly log: Logger;

  constructor(options: ProcessStepExecutorOptions = {}) {
    this.killGraceMs = options.killGraceMs ?? DEFAULT_KILL_GRACE_MS;
    this.tailLines = Math.max(1, options.tailLines ?? DEFAULT_TAIL_LINES);
    this.baseEnv = options.baseEnv ?? process.env;
    this.log = (options.logger ?? rootLogger).child({ module: 'step-executor' });
  }

  execute(request: StepExecutionRequest): Promise<StepOutcome> {
    const startedAt = Date.now();
    const tail: string[] = [];
    const log = this.log.child({ runId: request.runId, step: request.stepName });

    const record = (line: string) => {
      tail.push(line);
      if (tail.length > this.tailLines) tail.shift();
      try {
        request.onLine(line);
      } catch (err) {
        log.warn('Output listener failed', { error: errorMessage(err) });
      }
    };

    // Windows has no process groups to signal; kill the direct child there.
    const useProcessGroup = process.platform !== 'win32';

    let child: ChildProcess;
    try {
      child = spawn(request.command.program, request.command.args, {
        cwd: request.cwd,
        env: { ...this.baseEnv, ...request.command.env },
        stdio: ['ignore', 'pipe', 'pipe'],
        detached: useProcessGroup,
        windowsHide: true,
      });
    } catch (err) {
      return Promise.resolve({
        exitCode: null,
        signal: null,
        timedOut: false,
        launchError: errorMessage(err),
        durationMs: Date.now() - startedAt,
        tail,
      });
    }

    const terminate = (signal: NodeJS.Signals) => {
      const pid = child.pid;
      if (pid === undefined) return;
      try {
        if (useProcessGroup) {
          process.kill(-pid, signal);
        } else {
          child.kill(signal);
        }
      } catch (err) {
        // ESRCH: the group is already gone
        log.debug('Signal delivery failed', { signal, error: errorMessage(err) });
      }
    };

    return new Promise<StepOutcome>((resolve) => {
      let settled = false;
      let timedOut = false;
      let timeoutHandle: NodeJS.Timeout | undefined;
      let killHandle: NodeJS.Timeout | undefined;

      const stdout = new LineSplitter(record);
      const stderr = new LineSplitter(record);
      child.stdout?.setEncoding('utf8');
      child.stderr?.setEncoding('utf8');
      child.stdout?.on('data', (chunk: string) => stdout.push(chunk));
      child.stderr?.on('data', (chunk: string) => stderr.push(chunk));

      const finish = (result: Pick<StepOutcome, 'exitCode' | 'signal' | 'launchError'>) => {
        if (settled) return;
        settled = true;
        if (timeoutHandle) clearTimeout(timeoutHandle);
        if (killHandle) clearTimeout(killHandle);
        stdout.flush();
        stderr.flush();
        resolve({
          ...result,
          timedOut,
          durationMs: Date.now() - startedAt,
          tail: [...tail],
        });
      };

      child.once('error', (err) => {
        if (child.pid === undefined) {
          finish({ exitCode: null, signal: null, launchError: err.message });
          return;
        }
        log.warn('Child process error', { error: err.message });
      });

      // 'close' fires after the process exited and its output streams ended
      child.once('close', (code, signal) => {
        finish({ exitCode: code, signal });
      });

      if (request.timeoutMs > 0) {
        timeoutHandle = setTimeout(() => {
          timedOut = true;
          log.warn('Step timed out, terminating process group', { timeoutMs: request.timeoutMs });
          terminate('SIGTERM');
          killHandle = setTimeout(() => terminate('SIGKILL'), this.killGraceMs);
          killHandle.unref();
        }, request.timeoutMs);
      }
    });
  }
}
