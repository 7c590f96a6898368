/**
 * DOCX fixtures - build minimal Word documents in memory and read their
 * paragraph text back, so renderer tests need no binary files on disk.
 */

import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import PizZip from 'pizzip';

const CONTENT_TYPES = `<?xml version="1.0" encoding="UTF-8" standalone="yes"?>
<Types xmlns="http://schemas.openxmlformats.org/package/2006/content-types">
<Default Extension="rels" ContentType="application/vnd.openxmlformats-package.relationships+xml"/>
<Default Extension="xml" ContentType="application/xml"/>
<Override PartName="/word/document.xml" ContentType="application/vnd.openxmlformats-officedocument.wordprocessingml.document.main+xml"/>
</Types>`;

const ROOT_RELS = `<?xml version="1.0" encoding="UTF-8" standalone="yes"?>
<Relationships xmlns="http://schemas.openxmlformats.org/package/2006/relationships">
<Relationship Id="rId1" Type="http://schemas.openxmlformats.org/officeDocument/2006/relationships/officeDocument" Target="word/document.xml"/>
</Relationships>`;

const DOCUMENT_RELS = `<?xml version="1.0" encoding="UTF-8" standalone="yes"?>
<Relationships xmlns="http://schemas.openxmlformats.org/package/2006/relationships"></Relationships>`;

/** One `<w:p>` with a single run per entry in `paragraphs`. */
export function buildDocx(paragraphs: string[]): Buffer {
  const body = paragraphs
    .map((text) => `<w:p><w:r><w:t xml:space="preserve">${text}</w:t></w:r></w:p>`)
    .join('');

  const documentXml =
    '<?xml version="1.0" encoding="UTF-8" standalone="yes"?>' +
    '<w:document xmlns:w="http://schemas.openxmlformats.org/wordprocessingml/2006/main">' +
    `<w:body>${body}</w:body></w:document>`;

  const zip = new PizZip();
  zip.file('[Content_Types].xml', CONTENT_TYPES);
  zip.file('_rels/.rels', ROOT_RELS);
  zip.file('word/_rels/document.xml.rels', DOCUMENT_RELS);
  zip.file('word/document.xml', documentXml);
  return zip.generate({ type: 'nodebuffer' });
}

export function writeDocx(filePath: string, paragraphs: string[]): string {
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  fs.writeFileSync(filePath, buildDocx(paragraphs));
  return filePath;
}

/** Text of every non-empty paragraph in a rendered document. */
export function readParagraphs(filePath: string): string[] {
  const zip = new PizZip(fs.readFileSync(filePath));
  const xml = zip.file('word/document.xml')?.asText() ?? '';

  return xml
    .split('</w:p>')
    .map((chunk) => [...chunk.matchAll(/<w:t(?:\s[^>]*)?>([^<]*)<\/w:t>/g)].map((m) => m[1] ?? '').join(''))
    .filter((text) => text.length > 0);
}

export function makeTempDir(prefix = 'report-engine-'): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

/** The template most tests render against. */
export const SAMPLE_TEMPLATE = [
  '{client_name} report for {report_period}',
  'Date: {report_date}',
  'Color: {brand.primary_color}',
  'Metrics: {#metrics}{name}={value} ({status});{/metrics}',
  'Highlights: {#highlights}[{.}]{/highlights}',
  'Contact: {contact.name}',
  'Note: {missing_value}end',
];
