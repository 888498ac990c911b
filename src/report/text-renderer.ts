/**
 * Plain-text report renderer
 *
 * @license MIT
 */

import type { Report } from '../types.js';
import { formatRowValues, trimTrailingNewlines } from './format.js';

/**
 * Render a report as plain text
 *
 * Each check becomes a block of name, description, warning and one
 * `  - (v1, v2)` line per row, followed by a blank line. An empty report
 * renders as an empty string.
 */
export function renderTextReport(report: Report): string {
  const lines: string[] = [];

  for (const result of report) {
    lines.push(`Check: ${result.name}`);
    lines.push(trimTrailingNewlines(result.description));
    lines.push(trimTrailingNewlines(result.warning));
    lines.push('Result:');
    for (const row of result.rows) {
      lines.push(`  - (${formatRowValues(row)})`);
    }
    lines.push('');
    lines.push('');
  }

  return lines.join('\n');
}
