/**
 * go.mod reader.
 *
 * Understands the directives a dependency scan needs: `module`, `go`, and
 * `require` in both single-line and block form. Everything else (replace,
 * exclude, toolchain) is ignored.
 */

import { readFile } from 'node:fs/promises';
import { ManifestParseError, StateIOError } from '../errors.js';

/** Upper bound on dependencies read from one go.mod. */
export const MAX_DEPENDENCIES = 10_000;

export interface GoDependency {
  /** Module path, e.g. github.com/spf13/cobra */
  path: string;
  version: string;
  /** Marked `// indirect` */
  indirect: boolean;
}

export interface GoModule {
  module: string;
  goVersion: string;
  dependencies: GoDependency[];
}

const MODULE_PATTERN = /^module\s+(\S+)/;
const GO_VERSION_PATTERN = /^go\s+(\S+)/;
const REQUIRE_SINGLE_PATTERN = /^require\s+(\S+)\s+(\S+)(.*)$/;
const REQUIRE_BLOCK_START_PATTERN = /^require\s*\(/;
const DEPENDENCY_LINE_PATTERN = /^(\S+)\s+(\S+)(.*)$/;
const INDIRECT_MARKER = '// indirect';

/**
 * Parse go.mod text.
 *
 * @throws {ManifestParseError} If a `require (` block is never closed or the
 *   file lists more than {@link MAX_DEPENDENCIES} dependencies
 */
export function parseGoMod(text: string): GoModule {
  const result: GoModule = { module: '', goVersion: '', dependencies: [] };
  let inBlock = false;

  const addDependency = (match: RegExpExecArray): void => {
    result.dependencies.push({
      path: match[1],
      version: match[2],
      indirect: match[3].includes(INDIRECT_MARKER),
    });
    if (result.dependencies.length > MAX_DEPENDENCIES) {
      throw new ManifestParseError(
        `too many dependencies (limit: ${MAX_DEPENDENCIES})`
      );
    }
  };

  for (const rawLine of text.split(/\r?\n/)) {
    const line = rawLine.trim();
    if (line === '' || line.startsWith('//')) {
      continue;
    }

    if (inBlock && line === ')') {
      inBlock = false;
      continue;
    }

    const moduleMatch = MODULE_PATTERN.exec(line);
    if (moduleMatch) {
      result.module = moduleMatch[1];
      continue;
    }

    const goMatch = GO_VERSION_PATTERN.exec(line);
    if (goMatch) {
      result.goVersion = goMatch[1];
      continue;
    }

    if (REQUIRE_BLOCK_START_PATTERN.test(line)) {
      inBlock = true;
      continue;
    }

    const singleMatch = REQUIRE_SINGLE_PATTERN.exec(line);
    if (singleMatch) {
      addDependency(singleMatch);
      continue;
    }

    if (inBlock) {
      const dependencyMatch = DEPENDENCY_LINE_PATTERN.exec(line);
      if (dependencyMatch) {
        addDependency(dependencyMatch);
      }
    }
  }

  if (inBlock) {
    throw new ManifestParseError('unclosed require block');
  }
  return result;
}

/**
 * Read and parse a go.mod file.
 *
 * @throws {StateIOError} If the file cannot be read
 * @throws {ManifestParseError} If the contents are malformed
 */
export async function parseGoModFile(filePath: string): Promise<GoModule> {
  let text: string;
  try {
    text = await readFile(filePath, 'utf8');
  } catch (error) {
    throw new StateIOError('reading go.mod', filePath, error);
  }
  return parseGoMod(text);
}

/**
 * Dependencies not marked `// indirect`, in file order.
 */
export function directDependencies(goModule: GoModule): GoDependency[] {
  return goModule.dependencies.filter((dependency) => !dependency.indirect);
}
