import { EXIT_CODES, runCli } from '../src/cli';
import { FakeStepExecutor, ScriptedStep, captureLogs, makeTempDir, removeTempDir, restoreLogs } from './helpers';

const JIRA_SCRIPT: Record<string, ScriptedStep> = {
  'Export Jira Tickets': { files: { 'JIRA_relevante_Tickets.json': '[{"key": "SUP-1"}]' }, lines: ['Exported 1 ticket'] },
  'Process Jira Tickets with LLM': {
    files: { 'Ticket_Data_Jira.json': '[{"key": "SUP-1"}]', 'Not_Relevant_Jira.json': '[]' },
  },
  'Deduplicate Jira Tickets': {
    files: {
      'tickets_dedup_Jira.json': '[{"key": "SUP-1"}]',
      'duplicate_groups_Jira.json': '[]',
      'needs_review_Jira.csv': 'left,right,score\n',
    },
  },
  'Generate DOCX from Jira Tickets': { files: { 'documents/jira/SUP-1.docx': 'docx' } },
};

const COMPLETE_ENV = {
  JITBIT_API_TOKEN: 'test-jitbit-token',
  JITBIT_BASE_URL: 'https://support.example.com',
  JIRA_EMAIL: 'agent@example.com',
  JIRA_API_TOKEN: 'test-jira-token',
  SCW_SECRET_KEY: 'test-secret',
  SCW_OPENAI_BASE_URL: 'https://api.example.com/v1',
};

const JIRA_ARGS = ['run-jira', '--project', 'SUP', '--resolved-after', '2024-01-01'];

describe('cli', () => {
  let root: string;
  let stdout: string[];
  let stderr: string[];

  beforeEach(async () => {
    captureLogs();
    root = await makeTempDir();
    stdout = [];
    stderr = [];
  });

  afterEach(async () => {
    restoreLogs();
    await removeTempDir(root);
  });

  function cli(
    argv: string[],
    { env = {}, script = JIRA_SCRIPT }: { env?: NodeJS.ProcessEnv; script?: Record<string, ScriptedStep> } = {},
  ): Promise<number> {
    return runCli(argv, {
      env: { PIPELINE_RUNS_DIR: root, PIPELINE_CHECK_ENV: 'false', ...env },
      cwd: root,
      executor: new FakeStepExecutor(script),
      stdout: (text) => stdout.push(text),
      stderr: (text) => stderr.push(text),
      pollIntervalMs: 5,
    });
  }

  const printed = () => stdout.join('');

  test('run-jira follows the run to success', async () => {
    expect(await cli(JIRA_ARGS)).toBe(EXIT_CODES.ok);
    const output = printed();
    expect(output).toMatch(/^Run \S+-jira-SUP-[0-9a-f]{8} started in /);
    expect(output).toContain('Exported 1 ticket\n');
    expect(output).toMatch(/Run \S+ \(jira\): success\n/);
    expect(stderr).toEqual([]);
  });

  test('--quiet keeps the run log out of the output', async () => {
    expect(await cli([...JIRA_ARGS, '--quiet'])).toBe(EXIT_CODES.ok);
    expect(printed()).not.toContain('Exported 1 ticket');
    expect(printed()).toMatch(/\(jira\): success\n/);
  });

  test('a failing step exits 1 and names the error', async () => {
    const script = { ...JIRA_SCRIPT, 'Process Jira Tickets with LLM': { exitCode: 2 } };
    expect(await cli([...JIRA_ARGS, '-q'], { script })).toBe(EXIT_CODES.runFailed);
    expect(printed()).toContain('Process Jira Tickets with LLM');
    expect(printed()).toContain(' - Step program exited with code 2\n');
    expect(printed()).toMatch(/\(jira\): failed\n/);
  });

  test('invalid parameters exit 2 without starting a run', async () => {
    expect(await cli(['run-jira', '--project', 'XYZ', '--resolved-after', '2024-01-01'])).toBe(EXIT_CODES.validation);
    expect(stderr).toEqual(['Invalid jira parameters: project must be one of SUP, TMS\n']);
    expect(printed()).toBe('');
  });

  test('a missing required option is a usage error', async () => {
    expect(await cli(['run-jitbit'])).toBe(EXIT_CODES.validation);
    expect(stderr.join('')).toContain("required option '--start-id <id>' not specified");
  });

  test('an incomplete environment is refused when checks are on', async () => {
    expect(await cli(JIRA_ARGS, { env: { PIPELINE_CHECK_ENV: 'true' } })).toBe(EXIT_CODES.validation);
    expect(stderr.join('')).toContain('Environment incomplete for jira flow: JIRA_EMAIL: Missing required variable');
  });

  test('run-jitbit maps its options onto the flow parameters', async () => {
    expect(await cli(['run-jitbit', '--start-id', '0', '-q'])).toBe(EXIT_CODES.validation);
    expect(stderr).toEqual(['Invalid jitbit parameters: startId must be at least 1\n']);
  });

  test('env-check reports every service', async () => {
    expect(await cli(['env-check'], { env: COMPLETE_ENV })).toBe(EXIT_CODES.ok);
    expect(stdout[0]).toBe('JITBIT: 2/2 ok\n');
    expect(stdout).toContain('  ok  JIRA_EMAIL: Present and valid (Jira email address)\n');

    stdout = [];
    expect(await cli(['env-check'], { env: { ...COMPLETE_ENV, JIRA_EMAIL: '' } })).toBe(EXIT_CODES.runFailed);
    expect(stdout).toContain('JIRA: 1/2 error\n');
    expect(stdout).toContain('  ERR JIRA_EMAIL: Missing required variable (Jira email address)\n');
  });

  test('runs, status and log read the recorded history', async () => {
    expect(await cli(['runs'])).toBe(EXIT_CODES.ok);
    expect(stdout).toEqual(['No runs recorded\n']);

    await cli([...JIRA_ARGS, '-q']);
    const runId = /^Run (\S+) started/.exec(printed())?.[1] ?? '';
    expect(runId).not.toBe('');

    stdout = [];
    expect(await cli(['runs'])).toBe(EXIT_CODES.ok);
    expect(stdout).toEqual([`${runId}  success  4/4\n`]);

    stdout = [];
    expect(await cli(['status', runId])).toBe(EXIT_CODES.ok);
    expect(printed().split('\n')[0]).toBe(`Run ${runId} (jira): success`);

    stdout = [];
    expect(await cli(['log', runId])).toBe(EXIT_CODES.ok);
    expect(printed()).toContain('[engine] Run completed successfully\n');
    expect(printed()).toContain('Exported 1 ticket\n');
  });

  test('status and log of an unknown run exit 1', async () => {
    expect(await cli(['status', 'nope'])).toBe(EXIT_CODES.runFailed);
    expect(await cli(['log', 'nope'])).toBe(EXIT_CODES.runFailed);
    expect(stderr).toEqual(['Run not found: nope\n', 'Run not found: nope\n']);
  });

  test('a negative log offset is a validation error', async () => {
    await cli([...JIRA_ARGS, '-q']);
    const runId = /^Run (\S+) started/.exec(printed())?.[1] ?? '';
    expect(await cli(['log', runId, '--offset', '-1'])).toBe(EXIT_CODES.validation);
  });

  test('--version prints the version', async () => {
    expect(await cli(['--version'])).toBe(EXIT_CODES.ok);
    expect(stdout).toEqual(['0.1.0\n']);
  });
});
