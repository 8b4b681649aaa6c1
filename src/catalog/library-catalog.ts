import type { Library, Mapping, RequiredDep } from '../types/catalog.js';
import {
  buildCatalogIndex,
  lookupKey,
  type CatalogIndex,
} from './catalog-index.js';
import { normalizeUrl } from './url.js';

export interface CatalogStats {
  libraries: number;
  mappings: number;
  unsafe: number;
}

/**
 * Read-only view of library equivalents across languages.
 *
 * Built once from catalog data and handed to the commands that need it.
 * Every lookup returns a fresh array.
 */
export class LibraryCatalog {
  private readonly index: CatalogIndex;

  constructor(index: CatalogIndex) {
    this.index = index;
  }

  static fromData(
    libs: Readonly<Record<string, Library>>,
    mappings: readonly Mapping[]
  ): LibraryCatalog {
    return new LibraryCatalog(buildCatalogIndex(libs, mappings));
  }

  /**
   * Equivalents of a library in another language.
   *
   * @param sourceUrl - Library URL, any case, with or without scheme
   * @param targetLang - Language to find equivalents in, e.g. "rust"
   * @param includeUnsafe - Include libraries flagged as vulnerable
   */
  lookup(
    sourceUrl: string,
    targetLang: string,
    includeUnsafe = false
  ): string[] {
    const table = includeUnsafe ? this.index.forwardAll : this.index.forward;
    return [...(table.get(lookupKey(targetLang, sourceUrl)) ?? [])];
  }

  /**
   * Libraries in `sourceLang` that map to the given target library.
   */
  reverseLookup(
    targetUrl: string,
    sourceLang: string,
    includeUnsafe = false
  ): string[] {
    const table = includeUnsafe ? this.index.reverseAll : this.index.reverse;
    return [...(table.get(lookupKey(sourceLang, targetUrl)) ?? [])];
  }

  /**
   * Explicit crate name of a Rust library, or an empty string.
   */
  crateName(rustUrl: string): string {
    return this.index.crateNames.get(normalizeUrl(rustUrl)) ?? '';
  }

  tags(libraryUrl: string): string[] {
    return [...(this.index.tags.get(normalizeUrl(libraryUrl)) ?? [])];
  }

  /**
   * Extra crates a mapping needs, keyed the same way as {@link lookup}.
   */
  requiredDeps(sourceUrl: string, targetLang: string): RequiredDep[] {
    const key = lookupKey(targetLang, sourceUrl);
    return [...(this.index.requiredDeps.get(key) ?? [])];
  }

  stats(): CatalogStats {
    return {
      libraries: this.index.libraryCount,
      mappings: this.index.mappingCount,
      unsafe: this.index.unsafeCount,
    };
  }
}
