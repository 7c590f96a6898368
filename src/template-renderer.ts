/**
 * Template Renderer - Fill a DOCX template and write the result.
 *
 * Placeholder substitution is delegated entirely to docxtemplater; this
 * module only resolves file locations and hands it the context. Errors
 * raised by docxtemplater (bad tag syntax, unclosed loops) propagate as-is.
 *
 * Tag syntax is docxtemplater's: `{client_name}`, `{brand.primary_color}`,
 * `{#metrics}{name}: {value}{/metrics}`.
 *
 * @module template-renderer
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import PizZip from 'pizzip';
import Docxtemplater from 'docxtemplater';
import { InvalidFileNameError, TemplateNotFoundError } from './errors.js';
import { isPlainFileName } from './report-paths.js';
import type { ReportContext } from './report-context.js';

export interface TemplateRendererOptions {
  templateDir: string;
  outputDir: string;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object';
}

/**
 * Resolve `a.b.c` against the current loop scope. `.` is the scope itself,
 * which is how `{#highlights}{.}{/highlights}` prints plain strings.
 */
export function dottedPathParser(tag: string): { get(scope: unknown): unknown } {
  const trimmed = tag.trim();
  const segments = trimmed === '.' ? [] : trimmed.split('.');

  return {
    get(scope: unknown): unknown {
      let value: unknown = scope;
      for (const segment of segments) {
        if (!isRecord(value)) {
          return undefined;
        }
        value = value[segment];
      }
      return value;
    },
  };
}

/** `sample_report.docx` → `sample_report_rendered.docx` */
export function renderedNameFor(templateName: string): string {
  return templateName.replaceAll('.docx', '_rendered.docx');
}

export class TemplateRenderer {
  readonly templateDir: string;
  readonly outputDir: string;

  constructor(options: TemplateRendererOptions) {
    this.templateDir = options.templateDir;
    this.outputDir = options.outputDir;
  }

  /**
   * Render `templateName` with `context` into the output directory.
   *
   * @returns Absolute path of the written document.
   * @throws {TemplateNotFoundError} when the template file does not exist
   * @throws {InvalidFileNameError} when either name is not a bare file name
   */
  async render(templateName: string, context: ReportContext, outputName?: string | null): Promise<string> {
    if (!isPlainFileName(templateName)) {
      throw new InvalidFileNameError(templateName);
    }
    const targetName = outputName || renderedNameFor(templateName);
    if (!isPlainFileName(targetName)) {
      throw new InvalidFileNameError(targetName);
    }

    const templatePath = path.join(this.templateDir, templateName);
    if (!fs.existsSync(templatePath)) {
      throw new TemplateNotFoundError(templateName, templatePath);
    }

    await fs.promises.mkdir(this.outputDir, { recursive: true });
    const outputPath = path.resolve(this.outputDir, targetName);

    const content = await fs.promises.readFile(templatePath);
    const doc = new Docxtemplater(new PizZip(content), {
      paragraphLoop: true,
      linebreaks: true,
      parser: dottedPathParser,
      nullGetter: () => '',
    });
    doc.render(context);

    const rendered = doc.getZip().generate({ type: 'nodebuffer', compression: 'DEFLATE' });
    await fs.promises.writeFile(outputPath, rendered);
    return outputPath;
  }

  /** `.docx` file names in the template directory, sorted. */
  listTemplates(): string[] {
    if (!fs.existsSync(this.templateDir)) {
      return [];
    }
    return fs
      .readdirSync(this.templateDir, { withFileTypes: true })
      .filter((entry) => entry.isFile() && entry.name.endsWith('.docx') && !entry.name.startsWith('~$'))
      .map((entry) => entry.name)
      .sort();
  }
}
