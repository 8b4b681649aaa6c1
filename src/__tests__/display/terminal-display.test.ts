/**
 * Tests for TerminalDisplay output.
 */

jest.mock('ora', () => ({
  __esModule: true,
  default: () => ({
    start: () => ({ stop: () => undefined }),
  }),
}));

jest.mock('chalk', () => {
  const identity = (text: string): string => text;
  const chainable: object = new Proxy(identity, { get: () => chainable });
  return { __esModule: true, default: chainable };
});

import { defaultConfig } from '../../config/i-config.js';
import {
  formatTimestamp,
  TerminalDisplay,
} from '../../display/terminal-display.js';
import type { Requirement } from '../../types/requirement.js';
import { setTerminalColumns } from '../test-helpers.js';

const STAMP = '2024-06-01T12:00:01.000Z';

function requirement(path: string, done: boolean): Requirement {
  return {
    path,
    content: `content of ${path}`,
    step: '',
    created_at: STAMP,
    updated_at: STAMP,
    done,
    ...(done ? { done_at: STAMP } : {}),
  };
}

describe('formatTimestamp', () => {
  it('formats ISO timestamps in UTC', () => {
    expect(formatTimestamp(STAMP)).toBe('2024-06-01 12:00:01 UTC');
    expect(formatTimestamp('2024-06-01T14:00:01+02:00')).toBe(
      '2024-06-01 12:00:01 UTC'
    );
  });

  it('returns unreadable values unchanged', () => {
    expect(formatTimestamp('yesterday')).toBe('yesterday');
  });
});

describe('TerminalDisplay', () => {
  let display: TerminalDisplay;
  let logSpy: jest.SpyInstance;
  let errorSpy: jest.SpyInstance;
  let restoreColumns: () => void;

  function logged(): string[] {
    return logSpy.mock.calls.map((call: unknown[]) => String(call[0]));
  }

  beforeEach(() => {
    display = new TerminalDisplay();
    logSpy = jest.spyOn(console, 'log').mockImplementation();
    errorSpy = jest.spyOn(console, 'error').mockImplementation();
    restoreColumns = setTerminalColumns(120);
  });

  afterEach(() => {
    logSpy.mockRestore();
    errorSpy.mockRestore();
    restoreColumns();
  });

  it('prefixes success, warning and error messages', () => {
    display.showSuccess('saved');
    display.showWarning('careful');
    display.showError('boom');

    expect(logged()).toEqual(['✓ saved', 'Warning: careful']);
    expect(errorSpy).toHaveBeenCalledWith('Error: boom');
  });

  it('shows the configuration', () => {
    display.showConfig({ ...defaultConfig, coverage: { cli: ['*/cli'] } });

    expect(logged()).toEqual([
      'Configuration:',
      `  Prompt file: ${defaultConfig.promptFile}`,
      `  Catalog file: ${defaultConfig.catalogFile}`,
      '  Target language: rust',
      '  Include unsafe: false',
      '  Coverage tags: 1',
      '',
    ]);
  });

  it('shows migration status with a table of steps', () => {
    display.showMigrationStatus({
      completed: 1,
      total: 2,
      currentStep: '2',
      startedAt: '2024-06-01T12:00:00.000Z',
      steps: [
        { id: '1', status: 'completed', completedAt: STAMP, notes: 'ok' },
        { id: '2', status: 'in_progress' },
      ],
    });

    const lines = logged();
    expect(lines.slice(0, 5)).toEqual([
      'Migration Progress: 1/2 steps',
      `  [${'█'.repeat(15)}${'░'.repeat(15)}]`,
      'Current step: 2',
      'Started: 2024-06-01 12:00:00 UTC',
      '',
    ]);
    const table = lines[5];
    expect(table).toContain('[x]');
    expect(table).toContain('Step 1');
    expect(table).toContain('2024-06-01 12:00:01 UTC');
    expect(table).toContain('ok');
    expect(table).toContain('[>]');
    expect(table).toContain('Step 2');
  });

  it('lists requirements with done markers', () => {
    display.showRequirementList([
      requirement('api/cli', true),
      requirement('db/schema', false),
    ]);

    expect(logged()).toEqual(['[x] api/cli', '[ ] db/schema']);
  });

  it('reports an empty requirement list', () => {
    display.showRequirementList([]);

    expect(logged()).toEqual(['No requirements found.']);
  });

  it('prints requirement content as is', () => {
    display.showRequirement(requirement('api/cli', false));

    expect(logged()).toEqual(['content of api/cli']);
  });

  it('shows scan results', () => {
    display.showScanResult({
      module: 'example.com/shop',
      goVersion: '1.22',
      entries: [
        {
          path: 'github.com/spf13/cobra',
          version: 'v1.8.0',
          targets: [
            { crateName: 'clap', url: 'https://github.com/clap-rs/clap' },
          ],
        },
        { path: 'github.com/acme/unknown', version: 'v0.1.0', targets: [] },
      ],
      mappedCount: 1,
    });

    expect(logged()).toEqual([
      'Module: example.com/shop',
      'Go version: 1.22',
      'Direct dependencies: 2',
      '',
      'github.com/spf13/cobra',
      '  -> clap (https://github.com/clap-rs/clap)',
      'github.com/acme/unknown',
      '  -> (no mapping found)',
      '',
      'Mapped 1/2 direct dependencies',
    ]);
  });

  it('shows coverage with missing categories', () => {
    display.showCoverage([
      {
        category: 'cli',
        pattern: '*/cli',
        hasRequirements: true,
        count: 2,
        doneCount: 1,
        paths: ['api/cli', 'worker/cli'],
      },
      {
        category: 'web',
        pattern: '*/api',
        hasRequirements: false,
        count: 0,
        doneCount: 0,
        paths: [],
      },
    ]);

    const lines = logged();
    expect(lines[0]).toContain('*/cli');
    expect(lines[0]).toContain('1/2');
    expect(lines.slice(1)).toEqual([
      'Missing: no requirements match */api (web)',
      '',
      '1/2 expected categories have requirements',
    ]);
  });

  it('reports projects without coverage expectations', () => {
    display.showCoverage([]);

    expect(logged()).toEqual(['No coverage expectations for this project.']);
  });

  it('shows implementation status', () => {
    display.showImplementation({ done: ['api/cli'], pending: ['db/schema'] });

    expect(logged()).toEqual([
      'Done (1):',
      '  [x] api/cli',
      'Pending (1):',
      '  [ ] db/schema',
      '',
      'Implemented 1/2 requirements',
    ]);
  });

  it('starts and stops a spinner', () => {
    const stop = display.startSpinner('Working...');

    expect(() => stop()).not.toThrow();
  });
});
