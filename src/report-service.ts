/**
 * Report Service - The generation flow, independent of HTTP.
 *
 *   brand lookup → context → DOCX render → optional PDF conversion
 *
 * The two output steps are not transactional: when conversion fails the
 * rendered DOCX stays on disk and the error propagates.
 *
 * @module report-service
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import type { ReportRequest, ReportResponse } from './brand-schema.js';
import type { BrandStore } from './brand-store.js';
import { ClientNotFoundError, ReportFileNotFoundError } from './errors.js';
import { convertDocxToPdf, type PdfConverterOptions } from './pdf-converter.js';
import { buildReportContext, defaultOutputFilename } from './report-context.js';
import { isPlainFileName } from './report-paths.js';
import type { TemplateRenderer } from './template-renderer.js';

export const DOCX_CONTENT_TYPE = 'application/vnd.openxmlformats-officedocument.wordprocessingml.document';
export const PDF_CONTENT_TYPE = 'application/pdf';

/** Same call shape as {@link convertDocxToPdf}; swapped out in tests. */
export type PdfConvertFn = (docxPath: string, outputPath?: string | null, options?: PdfConverterOptions) => Promise<string>;

export interface ReportServiceDeps {
  store: BrandStore;
  renderer: TemplateRenderer;
  convert?: PdfConvertFn;
  converterOptions?: PdfConverterOptions;
  now?: () => Date;
}

export interface DownloadTarget {
  path: string;
  filename: string;
  contentType: string;
}

export class ReportService {
  private readonly store: BrandStore;
  private readonly renderer: TemplateRenderer;
  private readonly convert: PdfConvertFn;
  private readonly converterOptions: PdfConverterOptions;
  private readonly now: () => Date;

  constructor(deps: ReportServiceDeps) {
    this.store = deps.store;
    this.renderer = deps.renderer;
    this.convert = deps.convert ?? convertDocxToPdf;
    this.converterOptions = deps.converterOptions ?? {};
    this.now = deps.now ?? (() => new Date());
  }

  /**
   * @throws {ClientNotFoundError} before anything is rendered
   * @throws {TemplateNotFoundError}
   * @throws {PdfConversionError}
   */
  async generate(request: ReportRequest, signal?: AbortSignal): Promise<ReportResponse> {
    const brand = this.store.get(request.client_id);
    if (!brand) {
      throw new ClientNotFoundError(request.client_id);
    }

    const startedAt = this.now();
    const context = buildReportContext(brand, request, startedAt);
    const outputName = request.output_filename || defaultOutputFilename(request.client_id, startedAt);

    const docxPath = await this.renderer.render(request.template_name, context, outputName);

    let pdfPath: string | null = null;
    if (request.generate_pdf) {
      pdfPath = await this.convert(docxPath, null, {
        ...this.converterOptions,
        signal: signal ?? this.converterOptions.signal,
      });
    }

    return {
      client_id: request.client_id,
      docx_path: docxPath,
      pdf_path: pdfPath,
      generated_at: this.now().toISOString(),
      template_used: request.template_name,
    };
  }

  listTemplates(): string[] {
    return this.renderer.listTemplates();
  }

  /**
   * Locate a generated file for download.
   *
   * A name that is not a bare file name is reported as not found.
   *
   * @throws {ReportFileNotFoundError}
   */
  resolveDownload(filename: string): DownloadTarget {
    if (!isPlainFileName(filename)) {
      throw new ReportFileNotFoundError(filename);
    }

    const filePath = path.join(this.renderer.outputDir, filename);
    if (!fs.existsSync(filePath) || !fs.statSync(filePath).isFile()) {
      throw new ReportFileNotFoundError(filename);
    }

    return {
      path: filePath,
      filename,
      contentType: filename.toLowerCase().endsWith('.pdf') ? PDF_CONTENT_TYPE : DOCX_CONTENT_TYPE,
    };
  }
}
