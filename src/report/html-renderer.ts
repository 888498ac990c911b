/**
 * HTML report renderer
 *
 * Produces one self-contained document: stylesheets are inlined, each check
 * gets a heading, its description, an optional warning callout and a single
 * column findings table.
 *
 * @license MIT
 */

import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';
import type { Report } from '../types.js';
import { formatDisplayTimestamp, formatRowValues, trimTrailingNewlines } from './format.js';

export const REPORT_TITLE = 'DMS Compatibility Report';

const STYLESHEET_URL = new URL('../../assets/report.css', import.meta.url);

let cachedStylesheet: string | undefined;

/**
 * Stylesheet embedded in every HTML report
 */
export function loadReportStylesheet(): string {
  if (cachedStylesheet === undefined) {
    cachedStylesheet = readFileSync(fileURLToPath(STYLESHEET_URL), 'utf8');
  }
  return cachedStylesheet;
}

export interface HtmlRenderOptions {
  /** Clock for the "Generated on" line (default: current time) */
  now?: () => Date;
  /** Extra stylesheets inlined after the built-in one */
  extraStylesheets?: readonly string[];
}

const HTML_ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&#39;',
};

export function escapeHtml(text: string): string {
  return text.replace(/[&<>"']/g, char => HTML_ESCAPES[char] ?? char);
}

/**
 * Render a report as a complete HTML document
 */
export function renderHtmlReport(report: Report, options: HtmlRenderOptions = {}): string {
  const now = options.now ?? (() => new Date());
  const stylesheets = [loadReportStylesheet(), ...(options.extraStylesheets ?? [])];

  const html: string[] = [
    '<!DOCTYPE html>',
    '<html>',
    '<head>',
    '<meta charset="utf-8">',
    `<title>${REPORT_TITLE}</title>`,
  ];

  for (const css of stylesheets) {
    html.push('<style>', css.trimEnd(), '</style>');
  }

  html.push(
    '</head>',
    '<body>',
    `<h1>${REPORT_TITLE}</h1>`,
    `<p class="generated">Generated on: ${formatDisplayTimestamp(now())}</p>`
  );

  if (report.length === 0) {
    html.push('<p class="empty">No findings.</p>');
  }

  for (const result of report) {
    const warning = trimTrailingNewlines(result.warning);

    html.push(`<h2>${escapeHtml(result.name)}</h2>`);
    html.push(`<p>${escapeHtml(trimTrailingNewlines(result.description))}</p>`);
    if (warning) {
      html.push(`<p class="warning"><strong>Warning:</strong> ${escapeHtml(warning)}</p>`);
    }
    html.push('<table>');
    html.push('<tr><th>Findings</th></tr>');
    for (const row of result.rows) {
      html.push(`<tr><td>${escapeHtml(formatRowValues(row))}</td></tr>`);
    }
    html.push('</table>');
  }

  html.push('</body>', '</html>');

  return html.join('\n');
}
