/**
 * Engine wiring - build the store, renderer and report service for one
 * process from a resolved {@link EngineConfig}.
 *
 * @module engine
 */

import * as fs from 'node:fs';
import { BrandStore } from './brand-store.js';
import { pathsFor, type EngineConfig } from './config.js';
import type { ReportPaths } from './report-paths.js';
import { ReportService, type PdfConvertFn } from './report-service.js';
import { TemplateRenderer } from './template-renderer.js';

export interface Engine {
  config: EngineConfig;
  paths: ReportPaths;
  store: BrandStore;
  renderer: TemplateRenderer;
  service: ReportService;
  /** Flush and close the brand store. */
  close(): Promise<void>;
}

export interface EngineOverrides {
  convert?: PdfConvertFn;
  now?: () => Date;
}

/**
 * Create the engine directories, open the brand store and wire the service.
 *
 * @throws {StoreLoadError} when the store is corrupt and `onCorruptStore` is `fail`
 */
export function openEngine(config: EngineConfig, overrides: EngineOverrides = {}): Engine {
  const paths = pathsFor(config);

  for (const dir of [paths.templateDir, paths.outputDir, paths.logoDir]) {
    fs.mkdirSync(dir, { recursive: true });
  }

  const store = new BrandStore(paths.storePath, {
    onCorruptStore: config.onCorruptStore,
    now: overrides.now,
  });
  store.open();

  const renderer = new TemplateRenderer({
    templateDir: paths.templateDir,
    outputDir: paths.outputDir,
  });

  const service = new ReportService({
    store,
    renderer,
    convert: overrides.convert,
    converterOptions: { timeoutMs: config.pdfTimeoutMs },
    now: overrides.now,
  });

  return {
    config,
    paths,
    store,
    renderer,
    service,
    close: () => store.close(),
  };
}
