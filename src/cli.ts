#!/usr/bin/env node
/**
 * CLI Entry Point for the Client Report Engine
 *
 *   report-engine [render] --template <name> --data <file.json> [--docx-out <name>] [--pdf]
 *   report-engine serve [--port <n>] [--host <addr>]
 *
 * `render` works offline against the template and output directories; it
 * does not touch the brand store.
 *
 * @module cli
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { fileURLToPath } from 'node:url';
import { parseArgs } from 'node:util';
import { buildConfig, CONFIG_FILE_NAME, loadConfigFile, pathsFor, type EngineConfig } from './config.js';
import { openEngine } from './engine.js';
import { startServer } from './http/server.js';
import { convertDocxToPdf } from './pdf-converter.js';
import { TemplateRenderer } from './template-renderer.js';
import { VERSION } from './version.js';

export type CliCommand = 'render' | 'serve';

export interface RenderArgs {
  template: string;
  data: string;
  docxOut?: string;
  pdf: boolean;
}

export type ParsedCli =
  | { command: 'help' }
  | { command: 'version' }
  | { command: 'render'; render: RenderArgs; config: Partial<EngineConfig> }
  | { command: 'serve'; config: Partial<EngineConfig> }
  | { command: 'error'; message: string };

const USAGE = `
Client Report Engine v${VERSION}

Usage:
  report-engine [render] [options]   Render a DOCX (and optionally PDF) from a template
  report-engine serve [options]      Start the HTTP API and operator UI

Render options:
  --template <name>       Template DOCX file name, e.g. sample_report.docx (required)
  --data <path>           JSON file with context data (required)
  --docx-out <name>       Output DOCX file name (default: <template>_rendered.docx)
  --pdf                   Also convert to PDF

Serve options:
  --port <n>              Port to listen on (default: 8000)
  --host <addr>           Interface to bind (default: 127.0.0.1)

Common options:
  --base-dir <path>       Root for data/, reports/ and brands/ (default: cwd)
  --help, -h              Show this help message
  --version, -v           Show version number

Environment Variables:
  REPORT_ENGINE_BASE_DIR           Default base directory
  REPORT_ENGINE_HOST               Default bind address
  REPORT_ENGINE_PORT               Default port
  REPORT_ENGINE_STORE_PATH         Brand store file (default: <base>/data/brands.json)
  REPORT_ENGINE_ON_CORRUPT_STORE   reset | fail (default: reset)
  REPORT_ENGINE_PDF_TIMEOUT_MS     PDF conversion timeout (default: 120000)
  REPORT_ENGINE_MAX_UPLOAD_BYTES   Logo upload limit (default: 5242880)

Examples:
  report-engine --template sample_report.docx --data data/sample_client.json
  report-engine render --template sample_report.docx --data ctx.json --docx-out acme.docx --pdf
  report-engine serve --port 8080
`;

function readFlags(args: string[]) {
  return parseArgs({
    args,
    options: {
      template: { type: 'string' },
      data: { type: 'string' },
      'docx-out': { type: 'string' },
      pdf: { type: 'boolean', default: false },
      port: { type: 'string' },
      host: { type: 'string' },
      'base-dir': { type: 'string' },
      help: { type: 'boolean', short: 'h' },
      version: { type: 'boolean', short: 'v' },
    },
    allowPositionals: false,
  }).values;
}

type CliFlags = ReturnType<typeof readFlags>;

/**
 * Parse command-line arguments. Never exits; the caller decides.
 *
 * @param argv - Arguments after the node executable and script name.
 */
export function parseCliArgs(argv: string[]): ParsedCli {
  const first = argv[0];
  const hasCommand = first !== undefined && !first.startsWith('-');
  const command = hasCommand ? first : 'render';

  if (command !== 'render' && command !== 'serve') {
    return { command: 'error', message: `unknown command '${command}'` };
  }

  let values: CliFlags;
  try {
    values = readFlags(hasCommand ? argv.slice(1) : argv);
  } catch (err) {
    return { command: 'error', message: err instanceof Error ? err.message : String(err) };
  }

  if (values.help) return { command: 'help' };
  if (values.version) return { command: 'version' };

  const config: Partial<EngineConfig> = {};
  if (values['base-dir']) config.baseDir = path.resolve(values['base-dir']);
  if (values.host) config.host = values.host;
  if (values.port !== undefined) {
    const port = Number(values.port);
    if (!Number.isInteger(port) || port < 0 || port > 65535) {
      return { command: 'error', message: `Invalid --port value: ${values.port}` };
    }
    config.port = port;
  }

  if (command === 'serve') {
    return { command: 'serve', config };
  }

  if (!values.template) {
    return { command: 'error', message: '--template is required' };
  }
  if (!values.data) {
    return { command: 'error', message: '--data is required' };
  }

  return {
    command: 'render',
    render: {
      template: values.template,
      data: values.data,
      docxOut: values['docx-out'],
      pdf: values.pdf ?? false,
    },
    config,
  };
}

/**
 * Read the `--data` file: a JSON object used verbatim as the template context.
 */
export function loadContextFile(dataPath: string): Record<string, unknown> {
  const absolute = path.resolve(dataPath);
  if (!fs.existsSync(absolute)) {
    throw new Error(`Data file not found: ${absolute}`);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(fs.readFileSync(absolute, 'utf-8'));
  } catch (err) {
    throw new Error(`Failed to parse data file as JSON: ${absolute} (${err instanceof Error ? err.message : String(err)})`);
  }

  if (parsed === null || typeof parsed !== 'object' || Array.isArray(parsed)) {
    throw new Error(`Data file must contain a JSON object: ${absolute}`);
  }
  return Object.fromEntries(Object.entries(parsed));
}

/**
 * Render (and optionally convert) one document.
 *
 * @returns The path to print: the PDF when `--pdf` was given, else the DOCX.
 */
export async function runRender(args: RenderArgs, config: EngineConfig): Promise<{ docxPath: string; pdfPath: string | null }> {
  const paths = pathsFor(config);
  const renderer = new TemplateRenderer({ templateDir: paths.templateDir, outputDir: paths.outputDir });

  const context = loadContextFile(args.data);
  const docxPath = await renderer.render(args.template, context, args.docxOut);
  const pdfPath = args.pdf ? await convertDocxToPdf(docxPath, null, { timeoutMs: config.pdfTimeoutMs }) : null;

  return { docxPath, pdfPath };
}

async function runServe(config: EngineConfig): Promise<void> {
  const engine = openEngine(config);
  const server = await startServer({
    store: engine.store,
    service: engine.service,
    logoDir: engine.paths.logoDir,
    maxUploadBytes: config.maxUploadBytes,
    host: config.host,
    port: config.port,
  });

  console.log(`[Server] Client Report Engine v${VERSION} listening on ${server.url}`);
  console.log(`[Server] Brand store: ${engine.paths.storePath} (${engine.store.size} clients)`);
  console.log(`[Server] Templates: ${engine.paths.templateDir}`);

  const shutdown = (signal: NodeJS.Signals): void => {
    console.log(`[Server] ${signal} received, shutting down`);
    server
      .close()
      .then(() => engine.close())
      .then(() => process.exit(0))
      .catch((err: unknown) => {
        console.error('[Server] Shutdown failed:', err);
        process.exit(1);
      });
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);
}

/**
 * Main entry point. Returns the process exit code for `render`; `serve`
 * keeps running until a signal arrives.
 */
export async function main(argv: string[] = process.argv.slice(2)): Promise<number> {
  const parsed = parseCliArgs(argv);

  switch (parsed.command) {
    case 'help':
      console.log(USAGE.trim());
      return 0;
    case 'version':
      console.log(`v${VERSION}`);
      return 0;
    case 'error':
      console.error(`Error: ${parsed.message}`);
      console.error('Run with --help for usage information');
      return 1;
    default:
      break;
  }

  const baseDir = parsed.config.baseDir ?? process.env.REPORT_ENGINE_BASE_DIR ?? process.cwd();
  const config = buildConfig(parsed.config, loadConfigFile(path.join(baseDir, CONFIG_FILE_NAME)));

  if (parsed.command === 'serve') {
    await runServe(config);
    return 0;
  }

  try {
    const { docxPath, pdfPath } = await runRender(parsed.render, config);
    if (pdfPath) {
      console.log(`PDF generated at: ${pdfPath}`);
    } else {
      console.log(`DOCX generated at: ${docxPath}`);
    }
    return 0;
  } catch (err) {
    console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
    return 1;
  }
}

// Run main if this is the entry point
const entry = process.argv[1];
if (entry !== undefined && path.resolve(entry) === fileURLToPath(import.meta.url)) {
  main().then(
    (code) => {
      if (code !== 0) process.exit(code);
    },
    (err: unknown) => {
      console.error('Fatal error:', err);
      process.exit(1);
    },
  );
}
