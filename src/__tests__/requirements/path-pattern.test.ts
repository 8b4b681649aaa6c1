import {
  isWildcardPattern,
  matchesFilter,
  matchPattern,
} from '../../requirements/path-pattern.js';

describe('path patterns', () => {
  it('detects wildcard segments only', () => {
    expect(isWildcardPattern('*/cli')).toBe(true);
    expect(isWildcardPattern('api/*')).toBe(true);
    expect(isWildcardPattern('api/c*')).toBe(false);
    expect(isWildcardPattern('api/cli')).toBe(false);
  });

  it('matches segment by segment with trailing segments allowed', () => {
    expect(matchPattern('*/cli', 'api/cli')).toBe(true);
    expect(matchPattern('*/cli', 'worker/cli/flags')).toBe(true);
    expect(matchPattern('db', 'db/models')).toBe(true);
    expect(matchPattern('*/cli', 'api/web')).toBe(false);
    expect(matchPattern('*/cli', 'cli')).toBe(false);
    expect(matchPattern('db', 'dbx/models')).toBe(false);
  });

  it('filters by plain prefix unless the filter has a wildcard', () => {
    expect(matchesFilter('', 'anything')).toBe(true);
    expect(matchesFilter('api', 'api/cli')).toBe(true);
    expect(matchesFilter('ap', 'api/cli')).toBe(true);
    expect(matchesFilter('api', 'db/schema')).toBe(false);
    expect(matchesFilter('*/schema', 'db/schema')).toBe(true);
    expect(matchesFilter('*/schema', 'db/models')).toBe(false);
  });
});
