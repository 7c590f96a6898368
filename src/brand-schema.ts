/**
 * Brand & Report Schemas - Zod validation for every record that crosses
 * the HTTP boundary or is read back from the brand store file.
 *
 * Optional fields are normalised to `null` on parse so persisted JSON and
 * API responses always carry the full key set.
 *
 * @module brand-schema
 */

import { z } from 'zod';
import { RequestValidationError } from './errors.js';

// ---------------------------------------------------------------------------
// Enumerations
// ---------------------------------------------------------------------------

export const MetricStatus = z.enum(['positive', 'negative', 'neutral']);
export type MetricStatus = z.infer<typeof MetricStatus>;

export const RecommendationPriority = z.enum(['High', 'Medium', 'Low']);
export type RecommendationPriority = z.infer<typeof RecommendationPriority>;

// ---------------------------------------------------------------------------
// Brand configuration
// ---------------------------------------------------------------------------

const optionalText = z.string().nullable().default(null);

function isHttpUrl(value: string): boolean {
  try {
    const { protocol } = new URL(value);
    return protocol === 'http:' || protocol === 'https:';
  } catch {
    return false;
  }
}

const httpUrl = z.string().refine(isHttpUrl, 'Invalid http(s) URL');

/** Truncates sub-millisecond digits; a value without a zone is read as UTC. */
function toUtcIso(value: string): string {
  const match = /^(.*?)(Z|[+-]\d{2}(?::?\d{2})?)?$/i.exec(value);
  const local = (match?.[1] ?? value).replace(/(\.\d{3})\d+$/, '$1');
  const offset = /^([+-]\d{2}):?(\d{2})?$/.exec(match?.[2] ?? '');
  const zone = offset ? `${offset[1]}:${offset[2] ?? '00'}` : 'Z';
  return new Date(`${local}${zone}`).toISOString();
}

/** Any ISO-8601 date-time, stored in `toISOString()` form. */
const timestamp = z.string().datetime({ offset: true, local: true }).transform(toUtcIso);

export const BrandConfigSchema = z.object({
  client_id: z.string().min(1),
  display_name: z.string().min(1),

  primary_color: optionalText,
  secondary_color: optionalText,
  font_family: optionalText,
  logo_path: optionalText,
  website_url: httpUrl.nullable().default(null),

  created_at: timestamp.nullable().default(null),
  updated_at: timestamp.nullable().default(null),
});

export type BrandConfig = z.infer<typeof BrandConfigSchema>;
export type BrandConfigInput = z.input<typeof BrandConfigSchema>;

// ---------------------------------------------------------------------------
// Report request
// ---------------------------------------------------------------------------

/** Metric values arrive as strings from the UI but as numbers from scripts. */
const displayValue = z.union([z.string(), z.number()]).transform(String);

export const MetricItemSchema = z.object({
  name: z.string(),
  value: displayValue,
  change: displayValue,
  status: MetricStatus.default('neutral'),
});
export type MetricItem = z.infer<typeof MetricItemSchema>;

export const RecommendationItemSchema = z.object({
  priority: RecommendationPriority.default('Medium'),
  title: z.string(),
  description: z.string(),
});
export type RecommendationItem = z.infer<typeof RecommendationItemSchema>;

export const ContactInfoSchema = z.object({
  name: z.string().min(1),
  title: optionalText,
  email: optionalText,
  phone: optionalText,
});
export type ContactInfo = z.infer<typeof ContactInfoSchema>;

export const ReportRequestSchema = z.object({
  client_id: z.string().min(1),
  template_name: z.string().min(1).default('sample_report.docx'),

  report_date: z.string().nullish(),
  report_period: z.string().nullish(),
  prepared_by: z.string().nullish(),
  executive_summary: z.string().nullish(),

  metrics: z.array(MetricItemSchema).default([]),
  highlights: z.array(z.string()).default([]),
  recommendations: z.array(RecommendationItemSchema).default([]),
  contact: ContactInfoSchema.nullish(),

  extra_context: z.record(z.unknown()).default({}),

  generate_pdf: z.boolean().default(false),
  output_filename: z.string().min(1).nullish(),
});

export type ReportRequest = z.infer<typeof ReportRequestSchema>;
export type ReportRequestInput = z.input<typeof ReportRequestSchema>;

export interface ReportResponse {
  client_id: string;
  docx_path: string;
  pdf_path: string | null;
  /** ISO 8601 */
  generated_at: string;
  template_used: string;
}

// ---------------------------------------------------------------------------
// Parsing
// ---------------------------------------------------------------------------

/** Flatten Zod issues into `path: message` strings. */
export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) =>
    issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message,
  );
}

function parseOrThrow<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, data: unknown): T {
  const result = schema.safeParse(data);
  if (!result.success) {
    throw new RequestValidationError(formatIssues(result.error));
  }
  return result.data;
}

export function parseBrandConfig(data: unknown): BrandConfig {
  return parseOrThrow(BrandConfigSchema, data);
}

export function parseReportRequest(data: unknown): ReportRequest {
  return parseOrThrow(ReportRequestSchema, data);
}

/**
 * Validate the on-disk store document: an object keyed by client id.
 *
 * Returns the issues instead of throwing so the store can apply its own
 * corrupt-file policy.
 */
export const StoreDocumentSchema = z.record(BrandConfigSchema);

export function validateStoreDocument(
  data: unknown,
): { success: true; data: Record<string, BrandConfig> } | { success: false; errors: string[] } {
  const result = StoreDocumentSchema.safeParse(data);
  if (result.success) {
    return { success: true, data: result.data };
  }
  return { success: false, errors: formatIssues(result.error) };
}
