/**
 * Tests for src/template-renderer.ts
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs';
import * as path from 'node:path';
import { parseBrandConfig, parseReportRequest } from '../../src/brand-schema.js';
import { InvalidFileNameError, TemplateNotFoundError } from '../../src/errors.js';
import { buildReportContext } from '../../src/report-context.js';
import { dottedPathParser, renderedNameFor, TemplateRenderer } from '../../src/template-renderer.js';
import { makeTempDir, readParagraphs, SAMPLE_TEMPLATE, writeDocx } from '../helpers/docx-fixtures.js';

describe('dottedPathParser', () => {
  it('should walk nested keys', () => {
    expect(dottedPathParser('brand.primary_color').get({ brand: { primary_color: '#123456' } })).toBe('#123456');
  });

  it('should return the scope for a dot', () => {
    expect(dottedPathParser('.').get('Launched blog')).toBe('Launched blog');
  });

  it('should return undefined through missing or scalar segments', () => {
    expect(dottedPathParser('contact.name').get({})).toBeUndefined();
    expect(dottedPathParser('brand.primary_color').get({ brand: 'plain' })).toBeUndefined();
  });
});

describe('renderedNameFor', () => {
  it('should insert _rendered before the extension', () => {
    expect(renderedNameFor('sample_report.docx')).toBe('sample_report_rendered.docx');
  });
});

describe('TemplateRenderer', () => {
  let testDir: string;
  let renderer: TemplateRenderer;

  beforeEach(() => {
    testDir = makeTempDir('template-renderer-');
    renderer = new TemplateRenderer({
      templateDir: path.join(testDir, 'templates'),
      outputDir: path.join(testDir, 'output'),
    });
  });

  afterEach(() => {
    fs.rmSync(testDir, { recursive: true, force: true });
  });

  it('should substitute fields, nested paths and loops', async () => {
    writeDocx(path.join(renderer.templateDir, 'sample_report.docx'), SAMPLE_TEMPLATE);
    const brand = parseBrandConfig({ client_id: 'acme', display_name: 'Acme Co', primary_color: '#0055AA' });
    const request = parseReportRequest({
      client_id: 'acme',
      report_period: 'Q1 2026',
      report_date: 'March 31, 2026',
      metrics: [
        { name: 'Sessions', value: 1200, change: '+5%', status: 'positive' },
        { name: 'Bounce rate', value: '41%', change: '-2%', status: 'negative' },
      ],
      highlights: ['Launched blog', 'New CRM'],
      contact: { name: 'Dana Reyes' },
    });

    const outputPath = await renderer.render('sample_report.docx', buildReportContext(brand, request), 'acme.docx');

    expect(outputPath).toBe(path.join(testDir, 'output', 'acme.docx'));
    expect(readParagraphs(outputPath)).toEqual([
      'Acme Co report for Q1 2026',
      'Date: March 31, 2026',
      'Color: #0055AA',
      'Metrics: Sessions=1200 (positive);Bounce rate=41% (negative);',
      'Highlights: [Launched blog][New CRM]',
      'Contact: Dana Reyes',
      'Note: end',
    ]);
  });

  it('should default the output name and create the output directory', async () => {
    writeDocx(path.join(renderer.templateDir, 'welcome.docx'), ['Hello {client_name}']);

    const outputPath = await renderer.render('welcome.docx', { client_name: 'Globex' });

    expect(path.basename(outputPath)).toBe('welcome_rendered.docx');
    expect(readParagraphs(outputPath)).toEqual(['Hello Globex']);
  });

  it('should throw TemplateNotFoundError for a missing template', async () => {
    const attempt = renderer.render('missing.docx', {});

    await expect(attempt).rejects.toBeInstanceOf(TemplateNotFoundError);
    await expect(attempt).rejects.toMatchObject({
      message: 'Template not found: missing.docx',
      templatePath: path.join(renderer.templateDir, 'missing.docx'),
    });
  });

  it('should reject template and output names that leave their directory', async () => {
    await expect(renderer.render('../secret.docx', {})).rejects.toBeInstanceOf(InvalidFileNameError);

    writeDocx(path.join(renderer.templateDir, 'welcome.docx'), ['Hello']);
    await expect(renderer.render('welcome.docx', {}, '../escape.docx')).rejects.toBeInstanceOf(InvalidFileNameError);
    expect(fs.existsSync(path.join(testDir, 'escape.docx'))).toBe(false);
  });

  it('should propagate template syntax errors', async () => {
    writeDocx(path.join(renderer.templateDir, 'broken.docx'), ['{#metrics}never closed']);

    await expect(renderer.render('broken.docx', { metrics: [] })).rejects.toThrow();
  });

  describe('listTemplates', () => {
    it('should list .docx files sorted, skipping lock files', () => {
      writeDocx(path.join(renderer.templateDir, 'weekly.docx'), ['x']);
      writeDocx(path.join(renderer.templateDir, 'annual.docx'), ['x']);
      writeDocx(path.join(renderer.templateDir, '~$annual.docx'), ['x']);
      fs.writeFileSync(path.join(renderer.templateDir, 'notes.txt'), 'not a template');

      expect(renderer.listTemplates()).toEqual(['annual.docx', 'weekly.docx']);
    });

    it('should return an empty list when the directory is missing', () => {
      expect(renderer.listTemplates()).toEqual([]);
    });
  });
});
