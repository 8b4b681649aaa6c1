import { readFile } from 'node:fs/promises';
import { ZodError } from 'zod';
import { StateIOError } from '../errors.js';
import { CatalogFileSchema } from '../types/catalog.js';
import { DEFAULT_CATALOG_FILE } from '../utils/package-paths.js';
import { formatZodIssues } from '../utils/progress-state-manager.js';
import { LibraryCatalog } from './library-catalog.js';

/**
 * Load and index a catalog data file.
 *
 * @param catalogFile - Catalog JSON (defaults to the bundled data/catalog.json)
 * @throws {StateIOError} If the file cannot be read or does not match the schema
 */
export async function loadCatalog(
  catalogFile: string = DEFAULT_CATALOG_FILE
): Promise<LibraryCatalog> {
  let content: string;
  try {
    content = await readFile(catalogFile, 'utf8');
  } catch (error) {
    throw new StateIOError('reading catalog', catalogFile, error);
  }

  try {
    const data = CatalogFileSchema.parse(JSON.parse(content));
    return LibraryCatalog.fromData(data.libs, data.mappings);
  } catch (error: unknown) {
    const reason = error instanceof ZodError ? formatZodIssues(error) : error;
    throw new StateIOError('parsing catalog', catalogFile, reason);
  }
}
