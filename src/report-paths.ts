/**
 * Path Conventions - Centralized path management for engine state.
 *
 * Every file the engine reads or writes is located through the helpers in
 * this module so the server, the CLI and the tests agree on one layout.
 *
 * Standard directory structure:
 *   {baseDir}/
 *     data/
 *       brands.json
 *     reports/
 *       templates/
 *         sample_report.docx
 *       output/
 *         acme_report_20260301_101500.docx
 *         acme_report_20260301_101500.pdf
 *     brands/
 *       acme_logo.png
 *
 * @module report-paths
 */

import path from 'node:path';

export interface ReportPaths {
  baseDir: string;
  /** JSON document holding every BrandConfig. */
  storePath: string;
  templateDir: string;
  outputDir: string;
  /** Uploaded client logos. */
  logoDir: string;
}

/**
 * Resolve the directory layout under `baseDir`.
 *
 * @param storePath - Overrides the default `data/brands.json` location.
 */
export function resolveReportPaths(baseDir: string, storePath?: string): ReportPaths {
  const root = path.resolve(baseDir);
  return {
    baseDir: root,
    storePath: storePath ? path.resolve(root, storePath) : path.join(root, 'data', 'brands.json'),
    templateDir: path.join(root, 'reports', 'templates'),
    outputDir: path.join(root, 'reports', 'output'),
    logoDir: path.join(root, 'brands'),
  };
}

/**
 * True when `name` is a bare file name that cannot address anything
 * outside the directory it is joined to.
 */
export function isPlainFileName(name: string): boolean {
  if (!name || name === '.' || name === '..') return false;
  if (name.includes('/') || name.includes('\\') || name.includes('\0')) return false;
  return !name.split('.').every((part) => part === '');
}

/** `{logoDir}/{clientId}_logo{ext}`; `.png` when the upload had no extension. */
export function getLogoPath(logoDir: string, clientId: string, uploadedFileName: string | undefined): string {
  const ext = path.extname(uploadedFileName ?? '') || '.png';
  return path.join(logoDir, `${clientId}_logo${ext}`);
}

/** Same directory and stem as `docxPath`, with a `.pdf` extension. */
export function pdfPathFor(docxPath: string): string {
  const parsed = path.parse(docxPath);
  return path.join(parsed.dir, `${parsed.name}.pdf`);
}
