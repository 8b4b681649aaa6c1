/**
 * Cargo.toml generation from Go dependencies.
 */

import { normalizeUrl } from '../catalog/url.js';
import type { RequiredDep } from '../types/catalog.js';
import type { GoDependency } from './go-mod-parser.js';

/**
 * Source of explicit crate names for Rust library URLs.
 */
export interface CrateNameSource {
  crateName(rustUrl: string): string;
}

/**
 * The slice of the library catalog that dependency mapping uses.
 */
export interface DependencyLookup extends CrateNameSource {
  lookup(
    sourceUrl: string,
    targetLang: string,
    includeUnsafe?: boolean
  ): string[];
  requiredDeps(sourceUrl: string, targetLang: string): RequiredDep[];
}

export interface MappedDependency {
  dependency: GoDependency;
  /** Rust library URLs, parallel to `crateNames` */
  rustTargets: string[];
  crateNames: string[];
  requiredDeps: RequiredDep[];
}

export interface CargoMapping {
  mapped: MappedDependency[];
  unmapped: GoDependency[];
}

const TARGET_LANGUAGE = 'rust';
const GOLANG_X_PREFIX = 'golang.org/x/';
const GITHUB_PREFIX = 'github.com/';
const MAJOR_VERSION_SUFFIX = /\/v\d+$/;

/**
 * Map a Go module path to the GitHub URL the catalog knows it by.
 *
 * `golang.org/x/<pkg>/...` becomes `https://github.com/golang/<pkg>`; a
 * GitHub path loses its `/vN` major version suffix. Anything else is
 * prefixed with `https://` unchanged.
 */
export function modulePathToGitHubUrl(modulePath: string): string {
  if (modulePath.startsWith(GOLANG_X_PREFIX)) {
    const pkg = modulePath.slice(GOLANG_X_PREFIX.length).split('/')[0];
    return `https://github.com/golang/${pkg}`;
  }
  if (modulePath.startsWith(GITHUB_PREFIX)) {
    return `https://${modulePath.replace(MAJOR_VERSION_SUFFIX, '')}`;
  }
  return `https://${modulePath}`;
}

/**
 * Derive a crate name from a Rust library's GitHub URL.
 *
 * An explicit catalog name wins. Otherwise the repository name is used (or
 * the last segment of a `/tree/...` subpath), minus a `-rs` suffix, with
 * hyphens turned into underscores.
 *
 * @returns The crate name, or an empty string for non-GitHub URLs
 */
export function extractCrateName(
  githubUrl: string,
  known?: CrateNameSource
): string {
  const explicit = known?.crateName(githubUrl) ?? '';
  if (explicit !== '') {
    return explicit;
  }

  const parts = normalizeUrl(githubUrl).split('/');
  if (parts.length < 3 || parts[0] !== 'github.com') {
    return '';
  }

  let repoName = parts[2];
  if (parts.length >= 5 && parts[3] === 'tree') {
    repoName = parts[parts.length - 1];
  }

  return repoName.replace(/-rs$/, '').replaceAll('-', '_');
}

/**
 * Split Go dependencies into those with Rust equivalents and those without.
 *
 * Targets whose crate name cannot be derived are dropped; a dependency left
 * with no targets counts as unmapped.
 */
export function mapDependencies(
  dependencies: readonly GoDependency[],
  catalog: DependencyLookup,
  includeUnsafe: boolean = false
): CargoMapping {
  const result: CargoMapping = { mapped: [], unmapped: [] };

  for (const dependency of dependencies) {
    const sourceUrl = modulePathToGitHubUrl(dependency.path);
    const rustTargets: string[] = [];
    const crateNames: string[] = [];

    for (const rustUrl of catalog.lookup(
      sourceUrl,
      TARGET_LANGUAGE,
      includeUnsafe
    )) {
      const crateName = extractCrateName(rustUrl, catalog);
      if (crateName !== '') {
        rustTargets.push(rustUrl);
        crateNames.push(crateName);
      }
    }

    if (crateNames.length === 0) {
      result.unmapped.push(dependency);
      continue;
    }
    result.mapped.push({
      dependency,
      rustTargets,
      crateNames,
      requiredDeps: catalog.requiredDeps(sourceUrl, TARGET_LANGUAGE),
    });
  }

  return result;
}

function compareByFirstCrate(
  a: MappedDependency,
  b: MappedDependency
): number {
  const left = a.crateNames[0];
  const right = b.crateNames[0];
  if (left < right) return -1;
  if (left > right) return 1;
  return 0;
}

function renderRequiredDep(required: RequiredDep, requiredBy: string): string {
  const reason = required.reason ? ` (${required.reason})` : '';
  const comment = `  # required by ${requiredBy}${reason}`;
  if (required.features === undefined || required.features.length === 0) {
    return `${required.crate} = "*"${comment}`;
  }
  const features = required.features.map((name) => `"${name}"`).join(', ');
  return `${required.crate} = { version = "*", features = [${features}] }${comment}`;
}

/**
 * Render a Cargo.toml for the converted project.
 *
 * Mapped crates are sorted by their first crate name. Crates a mapping
 * requires follow, once each, unless already listed. Unmapped Go
 * dependencies are listed as comments at the end.
 */
export function renderCargoToml(
  moduleName: string,
  mapping: CargoMapping
): string {
  const lines = [
    '# Generated by waymark',
    `# Original Go module: ${moduleName}`,
    '',
    '[package]',
    'name = "converted_project"',
    'version = "0.1.0"',
    'edition = "2021"',
    '',
    '[dependencies]',
  ];

  const sorted = [...mapping.mapped].sort(compareByFirstCrate);
  const listed = new Set<string>();

  for (const mapped of sorted) {
    mapped.crateNames.forEach((crateName, i) => {
      if (listed.has(crateName)) {
        return;
      }
      listed.add(crateName);
      lines.push(
        `${crateName} = "*"  # from ${mapped.dependency.path} -> ${mapped.rustTargets[i]}`
      );
    });
  }

  for (const mapped of sorted) {
    for (const required of mapped.requiredDeps) {
      if (listed.has(required.crate)) {
        continue;
      }
      listed.add(required.crate);
      lines.push(renderRequiredDep(required, mapped.dependency.path));
    }
  }

  if (mapping.unmapped.length > 0) {
    lines.push('', '# No Rust equivalent found for these Go dependencies:');
    for (const dependency of mapping.unmapped) {
      lines.push(`# - ${dependency.path} ${dependency.version}`);
    }
  }

  return lines.join('\n') + '\n';
}
