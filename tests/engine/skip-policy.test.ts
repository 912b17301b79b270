import { decideSkip } from '../../src/engine/skip-policy';
import { artifact } from '../../src/engine/artifact-validator';
import { StepDescriptor } from '../../src/domain/flow';
import { RunOptions } from '../../src/domain/run';
import { makeTempDir, removeTempDir, writeFile } from '../helpers';

function step(overrides: Partial<StepDescriptor> = {}): StepDescriptor {
  return {
    name: 'Process Tickets',
    command: { program: 'prog', args: [] },
    requiredInputs: [],
    declaredOutputs: [artifact('out.json')],
    supportsAppend: true,
    supportsOverwriteFlag: true,
    ...overrides,
  };
}

const options = (overrides: Partial<RunOptions> = {}): RunOptions => ({
  skipExisting: true,
  overwrite: false,
  append: false,
  ...overrides,
});

describe('decideSkip', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir();
  });

  afterEach(async () => {
    await removeTempDir(dir);
  });

  test('skips when outputs are present and valid', async () => {
    await writeFile(dir, 'out.json', '[1]');
    expect(await decideSkip(step(), options(), dir)).toEqual({ action: 'skip', reason: 'outputs-valid' });
  });

  test('runs when an output is missing', async () => {
    expect(await decideSkip(step(), options(), dir)).toEqual({
      action: 'run',
      force: false,
      append: false,
      overwriteFlag: false,
    });
  });

  test('runs when an existing output is malformed', async () => {
    await writeFile(dir, 'out.json', '{not json');
    expect((await decideSkip(step(), options(), dir)).action).toBe('run');
  });

  test('runs when skipExisting is off even if outputs are valid', async () => {
    await writeFile(dir, 'out.json', '[1]');
    expect((await decideSkip(step(), options({ skipExisting: false }), dir)).action).toBe('run');
  });

  test('overwrite forces the step and adds the overwrite flag when supported', async () => {
    await writeFile(dir, 'out.json', '[1]');
    expect(await decideSkip(step(), options({ overwrite: true }), dir)).toEqual({
      action: 'run',
      force: true,
      append: false,
      overwriteFlag: true,
    });
    expect(await decideSkip(step({ supportsOverwriteFlag: false }), options({ overwrite: true }), dir)).toEqual({
      action: 'run',
      force: true,
      append: false,
      overwriteFlag: false,
    });
  });

  test('append only for append-capable steps', async () => {
    expect(await decideSkip(step(), options({ append: true }), dir)).toMatchObject({ action: 'run', append: true });
    expect(await decideSkip(step({ supportsAppend: false }), options({ append: true }), dir)).toMatchObject({
      action: 'run',
      append: false,
    });
  });

  test('a step without declared outputs is never skipped for existing outputs', async () => {
    expect((await decideSkip(step({ declaredOutputs: [] }), options(), dir)).action).toBe('run');
  });

  test('a disabled step is always skipped', async () => {
    expect(await decideSkip(step({ enabled: false }), options({ overwrite: true }), dir)).toEqual({
      action: 'skip',
      reason: 'disabled',
    });
  });
});
