/**
 * Tests for the lookup, scan, analyze and convert commands against the
 * bundled catalog.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { analyzeCommand, analyzeCore } from '../../commands/analyze.js';
import { convertCommand, convertCore } from '../../commands/convert.js';
import { lookupCommand, lookupCore } from '../../commands/lookup.js';
import { scanCommand, scanCore } from '../../commands/scan.js';
import { EXIT_CODE } from '../../constants/exit-codes.js';
import {
  createMockConfigLoader,
  createMockDisplay,
  createTempDir,
  removeTempDir,
  SAMPLE_GO_MOD,
  writeGoMod,
} from '../test-helpers.js';

describe('catalog commands', () => {
  let tempDir: string;
  let goModPath: string;
  let display: ReturnType<typeof createMockDisplay>;
  let configLoader: ReturnType<typeof createMockConfigLoader>;

  beforeEach(() => {
    tempDir = createTempDir('commands');
    goModPath = writeGoMod(tempDir, SAMPLE_GO_MOD);
    display = createMockDisplay();
    configLoader = createMockConfigLoader();
  });

  afterEach(() => {
    removeTempDir(tempDir);
  });

  describe('lookup', () => {
    it('prints each equivalent', async () => {
      const results = await lookupCore(
        'https://github.com/spf13/cobra',
        undefined,
        {},
        display,
        configLoader
      );

      expect(results).toEqual(['https://github.com/clap-rs/clap']);
      expect(display.showMessage).toHaveBeenCalledWith(
        'https://github.com/clap-rs/clap'
      );
    });

    it('includes unsafe libraries with --unsafe', async () => {
      const results = await lookupCore(
        'https://github.com/dgrijalva/jwt-go',
        'rust',
        { unsafe: true },
        display,
        configLoader
      );

      expect(results).toEqual(['https://github.com/Keats/jsonwebtoken']);
    });

    it('shows the configuration in verbose mode', async () => {
      await lookupCore(
        'https://github.com/spf13/cobra',
        undefined,
        { verbose: true },
        display,
        configLoader
      );

      expect(display.showConfig).toHaveBeenCalledTimes(1);
    });

    it.each([
      ['', 'URL is required'],
      [
        'github.com/spf13/cobra',
        'invalid URL: must start with http:// or https://',
      ],
      [
        'https://github.com/acme/none',
        'no rust equivalent found for https://github.com/acme/none',
      ],
    ])('fails for %j', async (url, message) => {
      const exitCode = await lookupCommand(
        url,
        undefined,
        {},
        display,
        configLoader
      );

      expect(exitCode).toBe(EXIT_CODE.ERROR);
      expect(display.showError).toHaveBeenCalledWith(message);
    });

    it('hides unsafe libraries by default', async () => {
      const exitCode = await lookupCommand(
        'https://github.com/dgrijalva/jwt-go',
        'rust',
        {},
        display,
        configLoader
      );

      expect(exitCode).toBe(EXIT_CODE.ERROR);
    });
  });

  describe('scan', () => {
    it('maps each direct dependency', async () => {
      const result = await scanCore(goModPath, {}, display, configLoader);

      expect(result).toEqual({
        module: 'example.com/inventory',
        goVersion: '1.22',
        entries: [
          {
            path: 'github.com/spf13/cobra',
            version: 'v1.8.0',
            targets: [
              { crateName: 'clap', url: 'https://github.com/clap-rs/clap' },
            ],
          },
          {
            path: 'github.com/gin-gonic/gin',
            version: 'v1.9.1',
            targets: [
              { crateName: 'axum', url: 'https://github.com/tokio-rs/axum' },
              {
                crateName: 'actix_web',
                url: 'https://github.com/actix/actix-web',
              },
            ],
          },
          {
            path: 'github.com/stretchr/testify',
            version: 'v1.9.0',
            targets: [],
          },
          { path: 'github.com/acme/unknown', version: 'v0.1.0', targets: [] },
        ],
        mappedCount: 2,
      });
      expect(display.showScanResult).toHaveBeenCalledWith(result);
      expect(display.startSpinner).toHaveBeenCalledWith(
        'Scanning dependencies...'
      );
    });

    it('reports a missing go.mod', async () => {
      const missing = path.join(tempDir, 'nested', 'go.mod');

      const exitCode = await scanCommand(missing, {}, display, configLoader);

      expect(exitCode).toBe(EXIT_CODE.ERROR);
      expect(display.showError).toHaveBeenCalledWith(
        `failed to scan go.mod: go.mod not found: ${missing}\n` +
          'Please check that the path exists and try again.'
      );
    });
  });

  describe('analyze', () => {
    it('prints the sorted project tags', async () => {
      const tags = await analyzeCore(goModPath, {}, display, configLoader);

      expect(tags).toEqual(['cli', 'web']);
      expect(display.showMessage.mock.calls).toEqual([['cli'], ['web']]);
    });

    it('reports a malformed go.mod', async () => {
      fs.writeFileSync(goModPath, 'module m\nrequire (\n');

      const exitCode = await analyzeCommand(
        goModPath,
        {},
        display,
        configLoader
      );

      expect(exitCode).toBe(EXIT_CODE.ERROR);
      expect(display.showError).toHaveBeenCalledWith(
        'failed to analyze go.mod: unclosed require block'
      );
    });
  });

  describe('convert', () => {
    const EXPECTED_DEPENDENCIES = [
      'axum = "*"  # from github.com/gin-gonic/gin -> https://github.com/tokio-rs/axum',
      'actix_web = "*"  # from github.com/gin-gonic/gin -> https://github.com/actix/actix-web',
      'clap = "*"  # from github.com/spf13/cobra -> https://github.com/clap-rs/clap',
      'tokio = { version = "*", features = ["full"] }  # required by github.com/gin-gonic/gin (async runtime)',
      '',
      '# No Rust equivalent found for these Go dependencies:',
      '# - github.com/stretchr/testify v1.9.0',
      '# - github.com/acme/unknown v0.1.0',
    ];

    it('prints the Cargo.toml by default', async () => {
      await convertCore(goModPath, {}, display, configLoader, tempDir);

      const printed = String(display.showMessage.mock.calls[0][0]);
      expect(printed.split('\n').slice(0, 2)).toEqual([
        '# Generated by waymark',
        '# Original Go module: example.com/inventory',
      ]);
      expect(printed.split('\n').slice(9)).toEqual(EXPECTED_DEPENDENCIES);
    });

    it('writes the Cargo.toml to a file', async () => {
      const mapping = await convertCore(
        goModPath,
        { output: 'Cargo.toml' },
        display,
        configLoader,
        tempDir
      );

      const written = fs.readFileSync(path.join(tempDir, 'Cargo.toml'), 'utf8');
      expect(written.split('\n').slice(9)).toEqual([
        ...EXPECTED_DEPENDENCIES,
        '',
      ]);
      expect(mapping.mapped).toHaveLength(2);
      expect(display.showSuccess).toHaveBeenCalledWith(
        'Generated Cargo.toml with 4 dependencies (2 mapped, 2 unmapped)'
      );
    });

    it('refuses to write outside the working directory', async () => {
      const exitCode = await convertCommand(
        goModPath,
        { output: '../Cargo.toml' },
        display,
        configLoader
      );

      expect(exitCode).toBe(EXIT_CODE.ERROR);
      expect(display.showError).toHaveBeenCalledWith(
        'path traversal not allowed: ../Cargo.toml'
      );
    });
  });
});
