/**
 * Lookup indexes over the library catalog.
 */

import type { Library, Mapping, RequiredDep } from '../types/catalog.js';
import { normalizeUrl } from './url.js';

/** Target placeholder for a source library with no known equivalent. */
export const NO_EQUIVALENT = '<None>';

export interface CatalogIndex {
  /** `<target lang>:<source url>` → target URLs, both sides safe */
  forward: Map<string, string[]>;

  /** Same as `forward`, including flagged libraries */
  forwardAll: Map<string, string[]>;

  /** `<source lang>:<target url>` → source URLs, both sides safe */
  reverse: Map<string, string[]>;

  reverseAll: Map<string, string[]>;

  /** Normalized Rust library URL → explicit crate name */
  crateNames: Map<string, string>;

  /** Normalized library URL → tags */
  tags: Map<string, string[]>;

  /** `<target lang>:<source url>` → extra crates the mapping needs */
  requiredDeps: Map<string, RequiredDep[]>;

  libraryCount: number;
  mappingCount: number;
  unsafeCount: number;
}

/**
 * Key shared by the forward and required-dependency indexes.
 */
export function lookupKey(lang: string, url: string): string {
  return `${lang.toLowerCase()}:${normalizeUrl(url)}`;
}

function append<T>(index: Map<string, T[]>, key: string, values: T[]): void {
  const existing = index.get(key);
  if (existing === undefined) {
    index.set(key, [...values]);
  } else {
    existing.push(...values);
  }
}

function findLibrary(
  libs: Readonly<Record<string, Library>>,
  id: string
): Library | undefined {
  return Object.hasOwn(libs, id) ? libs[id] : undefined;
}

/**
 * Build forward and reverse indexes from catalog data.
 *
 * Mappings that name unknown library IDs are skipped, as are `<None>`
 * targets. A pair lands in the safe indexes only when neither library is
 * flagged unsafe.
 */
export function buildCatalogIndex(
  libs: Readonly<Record<string, Library>>,
  mappings: readonly Mapping[]
): CatalogIndex {
  const index: CatalogIndex = {
    forward: new Map(),
    forwardAll: new Map(),
    reverse: new Map(),
    reverseAll: new Map(),
    crateNames: new Map(),
    tags: new Map(),
    requiredDeps: new Map(),
    libraryCount: Object.keys(libs).length,
    mappingCount: mappings.length,
    unsafeCount: 0,
  };

  for (const lib of Object.values(libs)) {
    if (lib.unsafe !== undefined && lib.unsafe !== '') {
      index.unsafeCount++;
    }
    const url = normalizeUrl(lib.url);
    if (
      lib.lang === 'rust' &&
      lib.crate_name !== undefined &&
      lib.crate_name !== ''
    ) {
      index.crateNames.set(url, lib.crate_name);
    }
    if (lib.tags !== undefined && lib.tags.length > 0) {
      index.tags.set(url, [...lib.tags]);
    }
  }

  for (const mapping of mappings) {
    const source = findLibrary(libs, mapping.source);
    if (source === undefined) {
      continue;
    }
    const sourceUnsafe = source.unsafe !== undefined && source.unsafe !== '';

    for (const targetId of mapping.targets) {
      if (targetId === NO_EQUIVALENT) {
        continue;
      }
      const target = findLibrary(libs, targetId);
      if (target === undefined) {
        continue;
      }
      const targetUnsafe = target.unsafe !== undefined && target.unsafe !== '';
      const safe = !sourceUnsafe && !targetUnsafe;

      const forwardKey = lookupKey(target.lang, source.url);
      append(index.forwardAll, forwardKey, [target.url]);
      if (safe) {
        append(index.forward, forwardKey, [target.url]);
      }

      const reverseKey = lookupKey(source.lang, target.url);
      append(index.reverseAll, reverseKey, [source.url]);
      if (safe) {
        append(index.reverse, reverseKey, [source.url]);
      }

      if (mapping.requires !== undefined && mapping.requires.length > 0) {
        append(index.requiredDeps, forwardKey, mapping.requires);
      }
    }
  }

  return index;
}
