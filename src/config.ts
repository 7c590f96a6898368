/**
 * Engine Configuration - Single source of truth for runtime settings.
 *
 * Configuration is resolved from four layers with the following precedence
 * (highest wins):
 *
 *   1. CLI arguments (`cliArgs`)
 *   2. Environment variables (e.g. `REPORT_ENGINE_PORT`)
 *   3. Values loaded from `report-engine.yml`
 *   4. Built-in defaults
 *
 * @module config
 */

import * as fs from 'node:fs';
import * as yaml from 'yaml';
import type { CorruptStorePolicy } from './brand-store.js';
import { resolveReportPaths, type ReportPaths } from './report-paths.js';

/** Every field has a default so partial configs are safe. */
export interface EngineConfig {
  /** Root for `data/`, `reports/` and `brands/`. */
  baseDir: string;
  /** Overrides `<baseDir>/data/brands.json`; relative paths resolve against `baseDir`. */
  storePath?: string;

  host: string;
  port: number;

  /** What to do with an unreadable brand store at startup. */
  onCorruptStore: CorruptStorePolicy;
  /** Wall-clock limit for one PDF conversion (milliseconds). */
  pdfTimeoutMs: number;
  /** Largest accepted logo upload (bytes). */
  maxUploadBytes: number;
}

export const CONFIG_FILE_NAME = 'report-engine.yml';

// ---------------------------------------------------------------------------
// Defaults
// ---------------------------------------------------------------------------

function defaults(): EngineConfig {
  return {
    baseDir: process.cwd(),
    host: '127.0.0.1',
    port: 8000,
    onCorruptStore: 'reset',
    pdfTimeoutMs: 120_000,
    maxUploadBytes: 5 * 1024 * 1024,
  };
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/**
 * Parse a numeric value, returning `undefined` on failure.
 */
function parseNum(value: unknown): number | undefined {
  if (value === undefined || value === null || value === '') return undefined;
  const n = Number(value);
  return Number.isFinite(n) ? n : undefined;
}

function parsePolicy(value: unknown): CorruptStorePolicy | undefined {
  if (value === 'reset' || value === 'fail') return value;
  return undefined;
}

/**
 * Read `report-engine.yml`. A missing file is an empty config.
 *
 * @throws when the file exists but is not a YAML mapping
 */
export function loadConfigFile(configPath: string): Record<string, unknown> {
  if (!fs.existsSync(configPath)) {
    return {};
  }

  const parsed: unknown = yaml.parse(fs.readFileSync(configPath, 'utf-8'));
  if (parsed === null || parsed === undefined) {
    return {};
  }
  if (typeof parsed !== 'object' || Array.isArray(parsed)) {
    throw new Error(`${configPath} must contain a YAML mapping`);
  }
  return Object.fromEntries(Object.entries(parsed));
}

// ---------------------------------------------------------------------------
// Builder
// ---------------------------------------------------------------------------

/**
 * Merge configuration from all sources and return a fully-resolved config.
 *
 * Both camelCase and snake_case keys are accepted in the YAML file.
 *
 * @param env - Environment variable map (defaults to `process.env`).
 */
export function buildConfig(
  cliArgs: Partial<EngineConfig> = {},
  configYml: Record<string, unknown> = {},
  env: NodeJS.ProcessEnv = process.env,
): EngineConfig {
  // ---- Layer 3: report-engine.yml ---------------------------------------

  const fromYml: Partial<EngineConfig> = {};
  const yml = (camel: string, snake: string): unknown => configYml[snake] ?? configYml[camel];

  const ymlBaseDir = yml('baseDir', 'base_dir');
  if (typeof ymlBaseDir === 'string') fromYml.baseDir = ymlBaseDir;

  const ymlStorePath = yml('storePath', 'store_path');
  if (typeof ymlStorePath === 'string') fromYml.storePath = ymlStorePath;

  if (typeof configYml.host === 'string') fromYml.host = configYml.host;

  const ymlPort = parseNum(configYml.port);
  if (ymlPort !== undefined) fromYml.port = ymlPort;

  const ymlPolicy = parsePolicy(yml('onCorruptStore', 'on_corrupt_store'));
  if (ymlPolicy !== undefined) fromYml.onCorruptStore = ymlPolicy;

  const ymlTimeout = parseNum(yml('pdfTimeoutMs', 'pdf_timeout_ms'));
  if (ymlTimeout !== undefined) fromYml.pdfTimeoutMs = ymlTimeout;

  const ymlUpload = parseNum(yml('maxUploadBytes', 'max_upload_bytes'));
  if (ymlUpload !== undefined) fromYml.maxUploadBytes = ymlUpload;

  // ---- Layer 2: environment variables -----------------------------------

  const fromEnv: Partial<EngineConfig> = {};

  if (env.REPORT_ENGINE_BASE_DIR) fromEnv.baseDir = env.REPORT_ENGINE_BASE_DIR;
  if (env.REPORT_ENGINE_STORE_PATH) fromEnv.storePath = env.REPORT_ENGINE_STORE_PATH;
  if (env.REPORT_ENGINE_HOST) fromEnv.host = env.REPORT_ENGINE_HOST;

  const envPort = parseNum(env.REPORT_ENGINE_PORT);
  if (envPort !== undefined) fromEnv.port = envPort;

  const envPolicy = parsePolicy(env.REPORT_ENGINE_ON_CORRUPT_STORE);
  if (envPolicy !== undefined) fromEnv.onCorruptStore = envPolicy;

  const envTimeout = parseNum(env.REPORT_ENGINE_PDF_TIMEOUT_MS);
  if (envTimeout !== undefined) fromEnv.pdfTimeoutMs = envTimeout;

  const envUpload = parseNum(env.REPORT_ENGINE_MAX_UPLOAD_BYTES);
  if (envUpload !== undefined) fromEnv.maxUploadBytes = envUpload;

  // ---- Merge (cli > env > yml > defaults) -------------------------------

  return {
    ...defaults(),
    ...fromYml,
    ...fromEnv,
    ...stripUndefined(cliArgs),
  };
}

function stripUndefined(values: Partial<EngineConfig>): Partial<EngineConfig> {
  const out: Partial<EngineConfig> = {};
  if (values.baseDir !== undefined) out.baseDir = values.baseDir;
  if (values.storePath !== undefined) out.storePath = values.storePath;
  if (values.host !== undefined) out.host = values.host;
  if (values.port !== undefined) out.port = values.port;
  if (values.onCorruptStore !== undefined) out.onCorruptStore = values.onCorruptStore;
  if (values.pdfTimeoutMs !== undefined) out.pdfTimeoutMs = values.pdfTimeoutMs;
  if (values.maxUploadBytes !== undefined) out.maxUploadBytes = values.maxUploadBytes;
  return out;
}

/** Directory layout for a resolved config. */
export function pathsFor(config: EngineConfig): ReportPaths {
  return resolveReportPaths(config.baseDir, config.storePath);
}
