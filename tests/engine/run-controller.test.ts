import path from 'path';
import { promises as fs } from 'fs';
import { RunController } from '../../src/engine/run-controller';
import { artifact } from '../../src/engine/artifact-validator';
import { StepExecutor, StepOutcome } from '../../src/engine/step-executor';
import { FileRunStore } from '../../src/storage/file-run-store';
import { FlowDefinition, StepDescriptor } from '../../src/domain/flow';
import { RunOptions, RunState, StepState } from '../../src/domain/run';
import {
  FakeStepExecutor,
  ScriptedStep,
  captureLogs,
  makeRecord,
  makeTempDir,
  removeTempDir,
  restoreLogs,
  writeFile,
} from '../helpers';

const SECRET = 'test-secret-value';
const MASKED = `${'*'.repeat(13)}alue`;

const exportStep: StepDescriptor = {
  name: 'Export',
  command: {
    program: '{interpreter}',
    args: ['{scriptsDir}/export.py', { option: '--project', value: '{project}' }],
  },
  requiredInputs: [],
  declaredOutputs: [artifact('export.json')],
  supportsAppend: true,
  supportsOverwriteFlag: false,
};

const processStep: StepDescriptor = {
  name: 'Process',
  command: { program: '{interpreter}', args: ['{scriptsDir}/process.py', '--input', 'export.json'] },
  requiredInputs: [artifact('export.json')],
  declaredOutputs: [artifact('processed.json')],
  supportsAppend: false,
  supportsOverwriteFlag: true,
};

const renderStep: StepDescriptor = {
  name: 'Render',
  command: { program: '{interpreter}', args: ['{scriptsDir}/render.py'] },
  requiredInputs: [artifact('processed.json')],
  declaredOutputs: [artifact('documents')],
  supportsAppend: false,
  supportsOverwriteFlag: false,
};

function flowOf(...steps: StepDescriptor[]): FlowDefinition {
  return { kind: 'jira', steps, parameters: { project: 'SUP' }, environment: [] };
}

const happyScript: Record<string, ScriptedStep> = {
  Export: { files: { 'export.json': '[{"id": 1}]' }, lines: ['exported 1 ticket'] },
  Process: { files: { 'processed.json': '[{"id": 1, "summary": "ok"}]' }, lines: ['processed 1'] },
  Render: { files: { 'documents/tickets_1.docx': 'docx' } },
};

class CrashingExecutor implements StepExecutor {
  async execute(): Promise<StepOutcome> {
    throw new Error(`executor crashed with ${SECRET}`);
  }
}

describe('RunController', () => {
  let root: string;
  let store: FileRunStore;

  beforeEach(async () => {
    captureLogs();
    root = await makeTempDir();
    store = new FileRunStore(root);
  });

  afterEach(async () => {
    restoreLogs();
    await removeTempDir(root);
  });

  async function start(
    flow: FlowDefinition,
    executor: StepExecutor,
    options: Partial<RunOptions> = {},
    prepare?: (runDir: string) => Promise<void>,
  ) {
    const runId = 'run-1';
    const runDir = store.runDirectory(runId);
    const record = makeRecord(
      runId,
      runDir,
      flow.steps.map((s) => s.name),
      { options: { skipExisting: true, overwrite: false, append: false, ...options } },
    );
    await store.create(record);
    if (prepare) await prepare(runDir);
    const controller = new RunController(store, executor, flow, record, {
      stepTimeoutMs: 1000,
      secrets: [SECRET],
      variables: { interpreter: 'python3', scriptsDir: '/opt/scripts' },
    });
    const result = await controller.run();
    return { result, runDir };
  }

  async function logLines(runId = 'run-1'): Promise<string[]> {
    const chunk = await store.readLog(runId);
    return (chunk?.content ?? '')
      .split('\n')
      .filter((line) => line.length > 0)
      .map((line) => line.replace(/^\[[^\]]+\] /, ''));
  }

  test('runs every step in order and ends in success', async () => {
    const executor = new FakeStepExecutor(happyScript);
    const { result, runDir } = await start(flowOf(exportStep, processStep, renderStep), executor);

    expect(result.overallState).toBe(RunState.Success);
    expect(result.steps.map((s) => s.state)).toEqual([StepState.Success, StepState.Success, StepState.Success]);
    expect(result.steps.map((s) => s.producedArtifacts)).toEqual([
      [path.join(runDir, 'export.json')],
      [path.join(runDir, 'processed.json')],
      [path.join(runDir, 'documents')],
    ]);
    expect(result.steps[0]?.exit).toEqual({ code: 0, signal: null, timedOut: false });
    expect(result.startedAt).toBeDefined();
    expect(result.endedAt).toBeDefined();
    expect(executor.stepNames()).toEqual(['Export', 'Process', 'Render']);

    const first = executor.requests[0];
    expect(first?.command.program).toBe('python3');
    expect(first?.command.args).toEqual(['/opt/scripts/export.py', '--project', 'SUP']);
    expect(first?.cwd).toBe(runDir);
    expect(first?.timeoutMs).toBe(1000);
  });

  test('writes an ordered run log', async () => {
    await start(flowOf(exportStep, processStep), new FakeStepExecutor(happyScript));
    expect(await logLines()).toEqual([
      '[engine] Run run-1 started (flow jira, 2 steps)',
      '[engine] Step Export started',
      '[engine] $ python3 /opt/scripts/export.py --project SUP',
      'exported 1 ticket',
      '[engine] Artifacts saved: export.json',
      '[engine] Step Export succeeded in 0.0s',
      '[engine] Step Process started',
      '[engine] $ python3 /opt/scripts/process.py --input export.json',
      'processed 1',
      '[engine] Artifacts saved: processed.json',
      '[engine] Step Process succeeded in 0.0s',
      '[engine] Run completed successfully',
    ]);
  });

  test('copies outputs into the artifacts directory', async () => {
    await start(flowOf(exportStep, processStep, renderStep), new FakeStepExecutor(happyScript));
    const artifacts = await store.listArtifacts('run-1');
    expect(artifacts?.map((a) => a.name)).toEqual(['documents', 'export.json', 'processed.json']);
  });

  test('persists the terminal record', async () => {
    const { result, runDir } = await start(flowOf(exportStep), new FakeStepExecutor(happyScript));
    const onDisk: unknown = JSON.parse(await fs.readFile(path.join(runDir, 'status.json'), 'utf8'));
    expect(onDisk).toEqual(JSON.parse(JSON.stringify(result)));
    expect(await store.get('run-1')).toEqual(result);
  });

  test('skips a step whose outputs are already valid without launching it', async () => {
    const executor = new FakeStepExecutor(happyScript);
    const { result, runDir } = await start(flowOf(exportStep, processStep), executor, {}, (dir) =>
      writeFile(dir, 'export.json', '[{"id": 7}]'),
    );

    expect(result.overallState).toBe(RunState.Success);
    expect(result.steps[0]).toMatchObject({
      state: StepState.Skipped,
      skipReason: 'outputs-valid',
      producedArtifacts: [path.join(runDir, 'export.json')],
    });
    expect(executor.stepNames()).toEqual(['Process']);
    expect(await logLines()).toContain('[engine] Step Export skipped: outputs already present and valid');
  });

  test('only the step without valid outputs runs when earlier outputs exist', async () => {
    const executor = new FakeStepExecutor(happyScript);
    const { result } = await start(flowOf(exportStep, processStep, renderStep), executor, {}, async (dir) => {
      await writeFile(dir, 'export.json', '[{"id": 1}]');
      await writeFile(dir, 'processed.json', '[{"id": 1, "summary": "ok"}]');
    });

    expect(result.steps.map((s) => s.state)).toEqual([StepState.Skipped, StepState.Skipped, StepState.Success]);
    expect(result.overallState).toBe(RunState.Success);
    expect(executor.stepNames()).toEqual(['Render']);
  });

  test('re-runs a step whose existing output is malformed', async () => {
    const executor = new FakeStepExecutor(happyScript);
    await start(flowOf(exportStep), executor, {}, (dir) => writeFile(dir, 'export.json', '[{"id": '));
    expect(executor.stepNames()).toEqual(['Export']);
  });

  test('overwrite forces steps and append reaches append-capable programs', async () => {
    const executor = new FakeStepExecutor(happyScript);
    await start(flowOf(exportStep), executor, { overwrite: true, append: true }, (dir) =>
      writeFile(dir, 'export.json', '[]'),
    );
    expect(executor.requests[0]?.command.args).toEqual(['/opt/scripts/export.py', '--project', 'SUP', '--append']);
    expect(await logLines()).toContain('[engine] Step Export started (overwrite)');
  });

  test('a disabled step is skipped', async () => {
    const executor = new FakeStepExecutor(happyScript);
    const { result } = await start(flowOf({ ...exportStep, enabled: false }), executor);
    expect(result.steps[0]?.state).toBe(StepState.Skipped);
    expect(result.steps[0]?.skipReason).toBe('disabled');
    expect(executor.requests).toHaveLength(0);
  });

  test('stops at the first failing step', async () => {
    const executor = new FakeStepExecutor({
      ...happyScript,
      Process: { exitCode: 2, lines: ['Traceback (most recent call last):', 'ValueError: bad row'] },
    });
    const { result } = await start(flowOf(exportStep, processStep, renderStep), executor);

    expect(result.overallState).toBe(RunState.Failed);
    expect(result.steps.map((s) => s.state)).toEqual([StepState.Success, StepState.Failed, StepState.Pending]);
    expect(executor.stepNames()).toEqual(['Export', 'Process']);

    const error = result.steps[1]?.error;
    expect(error).toMatchObject({
      code: 'STEP.PROCESS_FAILURE',
      message: 'Step program exited with code 2',
      stepId: 'Process',
      runId: 'run-1',
      details: { exitCode: 2, logTail: ['Traceback (most recent call last):', 'ValueError: bad row'] },
    });
    expect(result.error).toEqual(error);
    expect(result.steps[1]?.exit).toEqual({ code: 2, signal: null, timedOut: false });

    const lines = await logLines();
    expect(lines.slice(-2)).toEqual([
      '[engine] Step Process failed: Step program exited with code 2',
      '[engine] Run failed; remaining steps were not started',
    ]);
  });

  test('a clean exit with invalid outputs fails the step', async () => {
    const executor = new FakeStepExecutor({
      ...happyScript,
      Process: { files: { 'processed.json': '{"truncated": ' }, lines: ['done'] },
    });
    const { result } = await start(flowOf(exportStep, processStep), executor);

    expect(result.steps[1]?.error).toMatchObject({
      code: 'STEP.OUTPUT_VALIDATION_FAILED',
      message: 'Step exited successfully but its outputs are invalid: processed.json (malformed JSON)',
      details: { outputs: [{ path: 'processed.json', reason: 'malformed JSON' }], logTail: ['done'] },
    });
  });

  test('a missing required input fails the step before launch', async () => {
    const executor = new FakeStepExecutor(happyScript);
    const { result } = await start(flowOf(processStep, renderStep), executor);

    expect(executor.requests).toHaveLength(0);
    expect(result.steps.map((s) => s.state)).toEqual([StepState.Failed, StepState.Pending]);
    expect(result.error).toMatchObject({
      code: 'STEP.MISSING_INPUT',
      message: 'Required input missing or invalid: export.json (missing)',
      stepId: 'Process',
    });
  });

  test('a timed-out step fails with its own budget', async () => {
    const executor = new FakeStepExecutor({ Export: { timedOut: true, exitCode: null, signal: 'SIGTERM' } });
    const { result } = await start(flowOf({ ...exportStep, timeoutMs: 250 }), executor);

    expect(executor.requests[0]?.timeoutMs).toBe(250);
    expect(result.error).toMatchObject({
      code: 'STEP.TIMEOUT_EXCEEDED',
      message: 'Step exceeded its time budget of 250ms and was terminated',
      details: { timeoutMs: 250 },
    });
    expect(result.steps[0]?.exit).toEqual({ code: null, signal: 'SIGTERM', timedOut: true });
  });

  test('a timeout in a later step keeps the earlier step\'s outputs', async () => {
    const executor = new FakeStepExecutor({
      ...happyScript,
      Process: { timedOut: true, exitCode: null, signal: 'SIGTERM', lines: ['processing 1 of 40'] },
    });
    const { result, runDir } = await start(flowOf(exportStep, processStep), executor);

    expect(result.overallState).toBe(RunState.Failed);
    expect(result.steps.map((s) => s.state)).toEqual([StepState.Success, StepState.Failed]);
    expect(result.steps[1]?.error?.code).toBe('STEP.TIMEOUT_EXCEEDED');
    expect(result.steps[1]?.error?.message).toBe('Step exceeded its time budget of 1000ms and was terminated');
    expect(await fs.readFile(path.join(runDir, 'export.json'), 'utf8')).toBe('[{"id": 1}]');
    expect(await fs.readFile(path.join(runDir, 'artifacts', 'export.json'), 'utf8')).toBe('[{"id": 1}]');
  });

  test('a step killed by a signal fails', async () => {
    const executor = new FakeStepExecutor({ Export: { exitCode: null, signal: 'SIGKILL' } });
    const { result } = await start(flowOf(exportStep), executor);
    expect(result.error?.code).toBe('STEP.PROCESS_FAILURE');
    expect(result.error?.message).toBe('Step program was terminated by signal SIGKILL');
  });

  test('a program that cannot start fails the step', async () => {
    const executor = new FakeStepExecutor({ Export: { exitCode: null, launchError: 'spawn python3 ENOENT' } });
    const { result } = await start(flowOf(exportStep), executor);
    expect(result.error).toMatchObject({
      code: 'STEP.PROCESS_FAILURE',
      message: 'Step program could not be started',
      details: { exitCode: null, launchError: 'spawn python3 ENOENT' },
    });
  });

  test('masks secrets in program output and error tails', async () => {
    const executor = new FakeStepExecutor({
      Export: { exitCode: 1, lines: [`Authorization failed for token ${SECRET}`] },
    });
    const { result } = await start(flowOf(exportStep), executor);

    expect(await logLines()).toContain(`Authorization failed for token ${MASKED}`);
    expect(result.error?.details?.logTail).toEqual([`Authorization failed for token ${MASKED}`]);
  });

  test('contains an unexpected executor exception as an internal failure', async () => {
    const { result } = await start(flowOf(exportStep, processStep), new CrashingExecutor());

    expect(result.overallState).toBe(RunState.Failed);
    expect(result.error).toMatchObject({
      code: 'RUN.INTERNAL',
      message: `Internal engine error: executor crashed with ${MASKED}`,
      runId: 'run-1',
    });
    expect(result.steps.map((s) => s.state)).toEqual([StepState.Failed, StepState.Pending]);
    expect((await store.get('run-1'))?.overallState).toBe(RunState.Failed);
  });
});
