/**
 * PDF Converter - DOCX → PDF through an external conversion backend.
 *
 * Backend selection, first match wins:
 *   1. LibreOffice (`soffice`) on PATH, any platform.
 *   2. `docx2pdf` (drives Microsoft Word) on Windows and macOS only.
 *   3. Otherwise fail with "No PDF backend found".
 *
 * Each conversion is a single attempt with a wall-clock timeout and an
 * optional AbortSignal. Backend diagnostics (stderr) are surfaced verbatim
 * in the {@link PdfConversionError} message.
 *
 * @module pdf-converter
 */

import { execFile, execSync } from 'node:child_process';
import * as fs from 'node:fs';
import * as path from 'node:path';
import { promisify } from 'node:util';
import { PdfConversionError } from './errors.js';
import { pdfPathFor } from './report-paths.js';

const execFileAsync = promisify(execFile);

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface CommandResult {
  exitCode: number;
  stdout: string;
  stderr: string;
}

export interface RunOptions {
  timeoutMs: number;
  signal?: AbortSignal;
}

/** Runs a command to completion. Rejects only when it could not be run. */
export type CommandRunner = (command: string, args: string[], options: RunOptions) => Promise<CommandResult>;

/** Whether `command` resolves on PATH. */
export type CommandLocator = (command: string) => boolean;

export type PdfBackend = 'libreoffice' | 'docx2pdf';

export interface PdfConverterOptions {
  /** Default: 120000 */
  timeoutMs?: number;
  signal?: AbortSignal;
  /** Default: `process.platform` */
  platform?: NodeJS.Platform;
  which?: CommandLocator;
  run?: CommandRunner;
  /** Default: `soffice` */
  sofficeBin?: string;
  /** Default: `docx2pdf` */
  docx2pdfBin?: string;
}

/** Platforms where Word is scriptable through docx2pdf. */
const DOCX2PDF_PLATFORMS: ReadonlySet<NodeJS.Platform> = new Set(['win32', 'darwin']);

export const NO_BACKEND_MESSAGE = 'No PDF backend found. Install LibreOffice (soffice on PATH) or docx2pdf.';

// ---------------------------------------------------------------------------
// Process helpers
// ---------------------------------------------------------------------------

interface ExecFailure extends Error {
  code?: string | number;
  killed?: boolean;
  signal?: NodeJS.Signals | null;
  stdout?: string;
  stderr?: string;
}

function isExecFailure(error: unknown): error is ExecFailure {
  return error instanceof Error;
}

/**
 * Look `command` up on PATH with `which` (`where` on Windows).
 */
export function commandExists(command: string): boolean {
  const lookup = process.platform === 'win32' ? 'where' : 'which';
  try {
    execSync(`${lookup} ${JSON.stringify(command)}`, { stdio: 'ignore' });
    return true;
  } catch {
    return false;
  }
}

/**
 * Default {@link CommandRunner}: `execFile` without a shell.
 *
 * A non-zero exit resolves with its code; spawn failures, timeouts and
 * aborts reject with {@link PdfConversionError}.
 */
export async function runCommand(command: string, args: string[], options: RunOptions): Promise<CommandResult> {
  try {
    const { stdout, stderr } = await execFileAsync(command, args, {
      timeout: options.timeoutMs,
      signal: options.signal,
      maxBuffer: 10 * 1024 * 1024,
      encoding: 'utf8',
      windowsHide: true,
    });
    return { exitCode: 0, stdout, stderr };
  } catch (error: unknown) {
    if (!isExecFailure(error)) {
      throw new PdfConversionError(`${command} failed: ${String(error)}`);
    }

    if (error.name === 'AbortError') {
      throw new PdfConversionError(`${command} was aborted`, error);
    }

    if (error.killed || error.signal === 'SIGTERM') {
      throw new PdfConversionError(`${command} timed out after ${options.timeoutMs}ms`, error);
    }

    if (error.code === 'ENOENT') {
      throw new PdfConversionError(`${command} not found`, error);
    }

    if (typeof error.code === 'number') {
      return { exitCode: error.code, stdout: error.stdout ?? '', stderr: error.stderr ?? '' };
    }

    throw new PdfConversionError(`${command} failed: ${error.message}`, error);
  }
}

// ---------------------------------------------------------------------------
// Backend selection
// ---------------------------------------------------------------------------

/**
 * Which backend would handle a conversion on this host, or `null`.
 */
export function selectPdfBackend(options: PdfConverterOptions = {}): PdfBackend | null {
  const which = options.which ?? commandExists;
  const platform = options.platform ?? process.platform;

  if (which(options.sofficeBin ?? 'soffice')) {
    return 'libreoffice';
  }
  if (DOCX2PDF_PLATFORMS.has(platform)) {
    return 'docx2pdf';
  }
  return null;
}

// ---------------------------------------------------------------------------
// Backends
// ---------------------------------------------------------------------------

async function convertWithLibreOffice(
  docxPath: string,
  pdfPath: string,
  options: PdfConverterOptions,
  run: CommandRunner,
  timeoutMs: number,
): Promise<string> {
  const bin = options.sofficeBin ?? 'soffice';
  const outputDir = path.dirname(pdfPath);

  const result = await run(bin, ['--headless', '--convert-to', 'pdf', '--outdir', outputDir, docxPath], {
    timeoutMs,
    signal: options.signal,
  });

  if (result.exitCode !== 0) {
    throw new PdfConversionError(`LibreOffice failed: ${result.stderr.trim()}`);
  }
  if (result.stderr.trim().length > 0) {
    console.warn(`[PdfConverter] soffice stderr: ${result.stderr.trim()}`);
  }

  // soffice always names the file after the input stem
  const produced = path.join(outputDir, `${path.parse(docxPath).name}.pdf`);
  if (!fs.existsSync(produced)) {
    throw new PdfConversionError(`LibreOffice did not create output file: ${produced}`);
  }
  if (produced !== pdfPath) {
    fs.renameSync(produced, pdfPath);
  }
  return pdfPath;
}

async function convertWithDocx2Pdf(
  docxPath: string,
  pdfPath: string,
  options: PdfConverterOptions,
  run: CommandRunner,
  which: CommandLocator,
  timeoutMs: number,
): Promise<string> {
  const bin = options.docx2pdfBin ?? 'docx2pdf';
  if (!which(bin)) {
    throw new PdfConversionError('docx2pdf not installed');
  }

  const result = await run(bin, [docxPath, pdfPath], { timeoutMs, signal: options.signal });
  if (result.exitCode !== 0) {
    throw new PdfConversionError(`docx2pdf failed: ${result.stderr.trim()}`);
  }
  if (!fs.existsSync(pdfPath)) {
    throw new PdfConversionError('docx2pdf did not create output file');
  }
  return pdfPath;
}

// ---------------------------------------------------------------------------
// Entry point
// ---------------------------------------------------------------------------

/**
 * Convert a DOCX file to PDF.
 *
 * @param outputPath - Defaults to `docxPath` with a `.pdf` extension.
 * @returns Absolute path of the PDF.
 * @throws {PdfConversionError} no backend, non-zero exit, timeout, abort,
 *   or no output file after a clean exit
 */
export async function convertDocxToPdf(
  docxPath: string,
  outputPath?: string | null,
  options: PdfConverterOptions = {},
): Promise<string> {
  const source = path.resolve(docxPath);
  const target = path.resolve(outputPath ?? pdfPathFor(source));
  const which = options.which ?? commandExists;
  const run = options.run ?? runCommand;
  const timeoutMs = options.timeoutMs ?? 120_000;

  if (!fs.existsSync(source)) {
    throw new PdfConversionError(`Input document not found: ${source}`);
  }
  if (options.signal?.aborted) {
    throw new PdfConversionError('PDF conversion aborted before it started');
  }

  fs.mkdirSync(path.dirname(target), { recursive: true });

  const backend = selectPdfBackend({ ...options, which });
  switch (backend) {
    case 'libreoffice':
      return convertWithLibreOffice(source, target, options, run, timeoutMs);
    case 'docx2pdf':
      return convertWithDocx2Pdf(source, target, options, run, which, timeoutMs);
    default:
      throw new PdfConversionError(NO_BACKEND_MESSAGE);
  }
}
