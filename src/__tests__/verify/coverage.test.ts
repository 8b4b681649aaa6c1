/**
 * Tests for requirement coverage checks.
 */

import type { Requirement } from '../../types/requirement.js';
import {
  checkCoverage,
  checkImplementation,
  expandWildcardPattern,
  requirementStatus,
  type RequirementSource,
} from '../../verify/coverage.js';

const STAMP = '2024-07-01T09:00:00.000Z';

function requirement(path: string, done: boolean = false): Requirement {
  const entry: Requirement = {
    path,
    content: `notes for ${path}`,
    step: '2',
    created_at: STAMP,
    updated_at: STAMP,
    done,
  };
  if (done) {
    entry.done_at = STAMP;
  }
  return entry;
}

function sourceOf(entries: Requirement[]): RequirementSource {
  return { listEntries: async () => entries };
}

const SOURCE = sourceOf([
  requirement('api/cli', true),
  requirement('api/cli/flags'),
  requirement('db/schema', true),
  requirement('worker/cli', true),
]);

describe('checkCoverage', () => {
  it('reports counts per expected pattern in tag order', async () => {
    const statuses = await checkCoverage(SOURCE, ['web', 'cli', 'sql', 'orm']);

    expect(statuses).toEqual([
      {
        category: 'web',
        pattern: '*/api',
        hasRequirements: false,
        count: 0,
        doneCount: 0,
        paths: [],
      },
      {
        category: 'cli',
        pattern: '*/cli',
        hasRequirements: true,
        count: 3,
        doneCount: 2,
        paths: ['api/cli', 'api/cli/flags', 'worker/cli'],
      },
      {
        category: 'sql',
        pattern: 'db',
        hasRequirements: true,
        count: 1,
        doneCount: 1,
        paths: ['db/schema'],
      },
    ]);
  });

  it('ignores tags without expectations', async () => {
    await expect(checkCoverage(SOURCE, ['logging'])).resolves.toEqual([]);
  });

  it('uses a custom coverage map', async () => {
    const statuses = await checkCoverage(SOURCE, ['jobs'], {
      jobs: ['worker'],
    });

    expect(statuses.map((status) => [status.pattern, status.count])).toEqual([
      ['worker', 1],
    ]);
  });
});

describe('checkImplementation', () => {
  it('splits requirements into done and pending', async () => {
    await expect(checkImplementation(SOURCE)).resolves.toEqual({
      done: ['api/cli', 'db/schema', 'worker/cli'],
      pending: ['api/cli/flags'],
    });
  });
});

describe('requirementStatus', () => {
  it('lists pending requirements under a pattern', async () => {
    await expect(requirementStatus(SOURCE, 'api')).resolves.toEqual({
      allDone: false,
      pending: ['api/cli/flags'],
    });
  });

  it('is satisfied when everything matching is done', async () => {
    await expect(requirementStatus(SOURCE, '*/schema')).resolves.toEqual({
      allDone: true,
      pending: [],
    });
  });

  it('is satisfied when nothing matches', async () => {
    await expect(requirementStatus(SOURCE, 'billing')).resolves.toEqual({
      allDone: true,
      pending: [],
    });
  });
});

describe('expandWildcardPattern', () => {
  it('returns a plain pattern unchanged', async () => {
    await expect(expandWildcardPattern(SOURCE, 'api/cli')).resolves.toEqual([
      'api/cli',
    ]);
  });

  it('expands wildcard segments to the stored prefixes', async () => {
    await expect(expandWildcardPattern(SOURCE, '*/cli')).resolves.toEqual([
      'api/cli',
      'worker/cli',
    ]);
    await expect(expandWildcardPattern(SOURCE, 'api/*')).resolves.toEqual([
      'api/cli',
    ]);
  });

  it('expands to nothing when no requirement matches', async () => {
    await expect(expandWildcardPattern(SOURCE, '*/api')).resolves.toEqual([]);
  });
});
