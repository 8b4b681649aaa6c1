/**
 * Tests for the migrate command.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import {
  MIGRATE_COMMAND,
  migrateCommand,
  migrateCore,
} from '../../commands/migrate.js';
import { EXIT_CODE } from '../../constants/exit-codes.js';
import { ProgressStateManager } from '../../utils/progress-state-manager.js';
import {
  createManualClock,
  createMockConfigLoader,
  createMockDisplay,
  createTempDir,
  removeTempDir,
  type ManualClock,
} from '../test-helpers.js';

const PROMPT = [
  '# Introduction',
  'Start with the status.',
  '# Before',
  'Before text.',
  '# Step 1',
  'Step one.',
  '# Step 2',
  'Step two.',
  '# After',
  'After text.',
].join('\n');

describe('migrate command', () => {
  let tempDir: string;
  let promptFile: string;
  let manual: ManualClock;
  let display: ReturnType<typeof createMockDisplay>;
  let configLoader: ReturnType<typeof createMockConfigLoader>;

  beforeEach(() => {
    tempDir = createTempDir('migrate');
    promptFile = path.join(tempDir, 'migration.md');
    fs.writeFileSync(promptFile, PROMPT);
    manual = createManualClock('2024-06-01T12:00:00.000Z');
    display = createMockDisplay();
    configLoader = createMockConfigLoader({ promptFile });
  });

  afterEach(() => {
    removeTempDir(tempDir);
  });

  async function migrate(
    step: string | undefined,
    options: Parameters<typeof migrateCore>[1]
  ): Promise<void> {
    await migrateCore(
      step,
      options,
      display,
      configLoader,
      tempDir,
      manual.clock
    );
  }

  it('shows the introduction by default', async () => {
    await migrate(undefined, {});

    expect(display.showMessage).toHaveBeenCalledWith('Start with the status.');
  });

  it('shows a single step', async () => {
    await migrate('2', {});

    expect(display.showMessage).toHaveBeenCalledWith('Step two.');
  });

  it('starts a step with the wrapper sections', async () => {
    await migrate(undefined, { start: '1' });

    expect(display.showMessage).toHaveBeenCalledWith(
      'Before text.\n\nStep one.\n\nAfter text.'
    );
    await expect(ProgressStateManager.currentStep(tempDir)).resolves.toBe('1');
  });

  it('finishes a step with a note', async () => {
    await migrate(undefined, { start: '1' });
    manual.advance(1000);
    await migrate(undefined, { finish: '1', note: 'all mapped' });

    expect(display.showMessage).toHaveBeenLastCalledWith('Completed step 1');
    const state = await ProgressStateManager.load(tempDir);
    expect(state?.steps['1']).toEqual({
      id: '1',
      status: 'completed',
      started_at: '2024-06-01T12:00:00.000Z',
      completed_at: '2024-06-01T12:00:01.000Z',
      notes: 'all mapped',
    });
  });

  it.each([
    ['--start', { start: '' }],
    ['--finish', { finish: '' }],
  ])('treats an empty %s value as not given', async (_flag, options) => {
    await migrate('2', options);

    expect(display.showMessage).toHaveBeenCalledWith('Step two.');
    expect(display.showError).not.toHaveBeenCalled();
    const state = await ProgressStateManager.load(tempDir);
    expect(state?.steps['2'].status).toBe('pending');
  });

  it('warns when --note is given without --finish', async () => {
    await migrate(undefined, { note: 'stray' });

    expect(display.showWarning).toHaveBeenCalledWith(
      '--note is only used together with --finish'
    );
    expect(display.showMessage).toHaveBeenCalledWith('Start with the status.');
  });

  it('shows status', async () => {
    await migrate(undefined, { start: '1' });
    await migrate(undefined, { status: true });

    expect(display.showMigrationStatus).toHaveBeenCalledWith({
      completed: 0,
      total: 2,
      currentStep: '1',
      startedAt: '2024-06-01T12:00:00.000Z',
      steps: [
        { id: '1', status: 'in_progress' },
        { id: '2', status: 'pending' },
      ],
    });
  });

  it('prints the bootstrap instruction', async () => {
    await migrate(undefined, { bootstrap: true });

    expect(display.showMessage).toHaveBeenCalledWith(
      `Execute '${MIGRATE_COMMAND} 1'. This will return instructions. Execute those instructions.`
    );
  });

  it('resets progress even when the prompt cannot be read', async () => {
    await migrate(undefined, { start: '1' });
    fs.unlinkSync(promptFile);

    await migrate(undefined, { reset: true });

    expect(display.showMessage).toHaveBeenLastCalledWith(
      'Migration progress reset.'
    );
    await expect(ProgressStateManager.exists(tempDir)).resolves.toBe(false);
  });

  it('gives reset precedence over other actions', async () => {
    await migrate(undefined, { reset: true, start: '1' });

    await expect(ProgressStateManager.exists(tempDir)).resolves.toBe(false);
  });

  describe('migrateCommand', () => {
    let cwdSpy: jest.SpyInstance;

    beforeEach(() => {
      cwdSpy = jest.spyOn(process, 'cwd').mockReturnValue(tempDir);
    });

    afterEach(() => {
      cwdSpy.mockRestore();
    });

    it('returns success for a known step', async () => {
      await expect(
        migrateCommand(undefined, { start: '2' }, display, configLoader)
      ).resolves.toBe(EXIT_CODE.SUCCESS);
    });

    it('reports an unknown step', async () => {
      const exitCode = await migrateCommand(
        undefined,
        { start: '9' },
        display,
        configLoader
      );

      expect(exitCode).toBe(EXIT_CODE.ERROR);
      expect(display.showError).toHaveBeenCalledWith("step '9' not found");
    });

    it('reports a prompt without steps', async () => {
      fs.writeFileSync(promptFile, '# Introduction\nNothing to do.');

      const exitCode = await migrateCommand(
        undefined,
        {},
        display,
        configLoader
      );

      expect(exitCode).toBe(EXIT_CODE.ERROR);
      expect(display.showError).toHaveBeenCalledWith('no steps found');
    });
  });
});
