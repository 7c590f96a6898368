/**
 * Tests for src/config.ts
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs';
import * as path from 'node:path';
import { buildConfig, loadConfigFile, pathsFor } from '../../src/config.js';
import { makeTempDir } from '../helpers/docx-fixtures.js';

describe('buildConfig', () => {
  it('should use defaults when nothing is set', () => {
    const config = buildConfig({}, {}, {});

    expect(config).toEqual({
      baseDir: process.cwd(),
      host: '127.0.0.1',
      port: 8000,
      onCorruptStore: 'reset',
      pdfTimeoutMs: 120_000,
      maxUploadBytes: 5 * 1024 * 1024,
    });
  });

  it('should layer cli over env over yml', () => {
    const yml = { port: 9000, host: '0.0.0.0' };
    const env = { REPORT_ENGINE_PORT: '9100' };

    expect(buildConfig({}, yml, env).port).toBe(9100);
    expect(buildConfig({ port: 9200 }, yml, env).port).toBe(9200);
    expect(buildConfig({}, yml, env).host).toBe('0.0.0.0');
  });

  it('should ignore unparseable environment values', () => {
    const config = buildConfig({}, { port: 9000 }, { REPORT_ENGINE_PORT: 'eighty', REPORT_ENGINE_ON_CORRUPT_STORE: 'panic' });

    expect(config.port).toBe(9000);
    expect(config.onCorruptStore).toBe('reset');
  });

  it('should accept snake_case and camelCase yml keys', () => {
    expect(buildConfig({}, { on_corrupt_store: 'fail', pdf_timeout_ms: 30000 }, {})).toMatchObject({
      onCorruptStore: 'fail',
      pdfTimeoutMs: 30000,
    });
    expect(buildConfig({}, { maxUploadBytes: 1024, storePath: 'state/brands.json' }, {})).toMatchObject({
      maxUploadBytes: 1024,
      storePath: 'state/brands.json',
    });
  });

  it('should read every REPORT_ENGINE_ variable', () => {
    const config = buildConfig({}, {}, {
      REPORT_ENGINE_BASE_DIR: '/srv/reports',
      REPORT_ENGINE_STORE_PATH: '/var/lib/brands.json',
      REPORT_ENGINE_HOST: '0.0.0.0',
      REPORT_ENGINE_PORT: '8080',
      REPORT_ENGINE_ON_CORRUPT_STORE: 'fail',
      REPORT_ENGINE_PDF_TIMEOUT_MS: '60000',
      REPORT_ENGINE_MAX_UPLOAD_BYTES: '2048',
    });

    expect(config).toEqual({
      baseDir: '/srv/reports',
      storePath: '/var/lib/brands.json',
      host: '0.0.0.0',
      port: 8080,
      onCorruptStore: 'fail',
      pdfTimeoutMs: 60000,
      maxUploadBytes: 2048,
    });
  });

  it('should not let undefined cli values mask lower layers', () => {
    expect(buildConfig({ port: undefined }, { port: 9000 }, {}).port).toBe(9000);
  });
});

describe('pathsFor', () => {
  it('should lay out data, reports and brands under the base directory', () => {
    const paths = pathsFor(buildConfig({ baseDir: '/srv/reports' }, {}, {}));

    expect(paths).toEqual({
      baseDir: '/srv/reports',
      storePath: '/srv/reports/data/brands.json',
      templateDir: '/srv/reports/reports/templates',
      outputDir: '/srv/reports/reports/output',
      logoDir: '/srv/reports/brands',
    });
  });

  it('should resolve a relative store path against the base directory', () => {
    const paths = pathsFor(buildConfig({ baseDir: '/srv/reports', storePath: 'state/brands.json' }, {}, {}));
    expect(paths.storePath).toBe('/srv/reports/state/brands.json');
  });
});

describe('loadConfigFile', () => {
  let testDir: string;

  beforeEach(() => {
    testDir = makeTempDir('config-');
  });

  afterEach(() => {
    fs.rmSync(testDir, { recursive: true, force: true });
  });

  it('should return an empty object for a missing file', () => {
    expect(loadConfigFile(path.join(testDir, 'report-engine.yml'))).toEqual({});
  });

  it('should return an empty object for an empty file', () => {
    const file = path.join(testDir, 'report-engine.yml');
    fs.writeFileSync(file, '');
    expect(loadConfigFile(file)).toEqual({});
  });

  it('should parse a YAML mapping', () => {
    const file = path.join(testDir, 'report-engine.yml');
    fs.writeFileSync(file, 'port: 9001\non_corrupt_store: fail\n');

    expect(loadConfigFile(file)).toEqual({ port: 9001, on_corrupt_store: 'fail' });
  });

  it('should reject a YAML list', () => {
    const file = path.join(testDir, 'report-engine.yml');
    fs.writeFileSync(file, '- port\n- host\n');

    expect(() => loadConfigFile(file)).toThrow(`${file} must contain a YAML mapping`);
  });
});
