/**
 * Report Context Builder - Merge a brand and a report request into the
 * key/value context handed to the template renderer.
 *
 * Precedence: computed fields first, then `extra_context` spread on top.
 * An `extra_context` key always wins, including `brand`; callers use this
 * to override defaults from the request.
 *
 * @module report-context
 */

import type {
  BrandConfig,
  ContactInfo,
  MetricItem,
  RecommendationItem,
  ReportRequest,
} from './brand-schema.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface BrandStyle {
  primary_color: string | null;
  secondary_color: string | null;
  font_family: string | null;
  logo_path: string | null;
}

/** The fields the builder computes before `extra_context` is applied. */
export interface ComputedContext {
  client_name: string;
  report_date: string;
  report_period: string;
  prepared_by: string;
  executive_summary: string;
  metrics: MetricItem[];
  highlights: string[];
  recommendations: RecommendationItem[];
  contact: ContactInfo | Record<string, never>;
  brand: BrandStyle;
}

/** Anything may be shadowed by `extra_context`, so the merged shape is open. */
export type ReportContext = Record<string, unknown>;

// ---------------------------------------------------------------------------
// Formatting
// ---------------------------------------------------------------------------

const reportDateFormat = new Intl.DateTimeFormat('en-US', {
  month: 'long',
  day: '2-digit',
  year: 'numeric',
});

/** e.g. `March 05, 2026` */
export function formatReportDate(date: Date): string {
  return reportDateFormat.format(date);
}

/**
 * Default output name for a generated report.
 *
 * Format: `{clientId}_report_YYYYMMDD_HHMMSS.docx` (local time).
 */
export function defaultOutputFilename(clientId: string, now: Date = new Date()): string {
  const pad = (n: number): string => String(n).padStart(2, '0');

  const stamp =
    `${now.getFullYear()}${pad(now.getMonth() + 1)}${pad(now.getDate())}` +
    `_${pad(now.getHours())}${pad(now.getMinutes())}${pad(now.getSeconds())}`;

  return `${clientId}_report_${stamp}.docx`;
}

// ---------------------------------------------------------------------------
// Builder
// ---------------------------------------------------------------------------

export function buildComputedContext(
  brand: BrandConfig,
  request: ReportRequest,
  now: Date = new Date(),
): ComputedContext {
  return {
    client_name: brand.display_name,
    report_date: request.report_date || formatReportDate(now),
    report_period: request.report_period ?? '',
    prepared_by: request.prepared_by ?? '',
    executive_summary: request.executive_summary ?? '',
    metrics: request.metrics.map((m) => ({ ...m })),
    highlights: [...request.highlights],
    recommendations: request.recommendations.map((r) => ({ ...r })),
    contact: request.contact ? { ...request.contact } : {},
    brand: {
      primary_color: brand.primary_color,
      secondary_color: brand.secondary_color,
      font_family: brand.font_family,
      logo_path: brand.logo_path,
    },
  };
}

/**
 * Build the template context for `request` rendered under `brand`.
 *
 * @param now - Clock for the default `report_date`.
 */
export function buildReportContext(
  brand: BrandConfig,
  request: ReportRequest,
  now: Date = new Date(),
): ReportContext {
  return {
    ...buildComputedContext(brand, request, now),
    ...request.extra_context,
  };
}
