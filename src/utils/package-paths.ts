import path from 'node:path';

/**
 * Root of the installed waymark package (the directory holding package.json).
 * Resolves the same from `src/utils/` under ts-jest and `dist/utils/` after build.
 */
export const PACKAGE_ROOT = path.resolve(__dirname, '..', '..');

/** Bundled migration prompt document. */
export const DEFAULT_PROMPT_FILE = path.join(
  PACKAGE_ROOT,
  'prompts',
  'migration.md'
);

/** Bundled library catalog. */
export const DEFAULT_CATALOG_FILE = path.join(
  PACKAGE_ROOT,
  'data',
  'catalog.json'
);
