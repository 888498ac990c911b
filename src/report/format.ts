/**
 * Cell value formatting shared by the renderers
 */

/**
 * Format one column value for display
 */
export function formatCellValue(value: unknown): string {
  if (value === null || value === undefined) {
    return 'NULL';
  }

  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? 'Invalid Date' : value.toISOString();
  }

  if (Buffer.isBuffer(value)) {
    return value.toString('hex');
  }

  if (typeof value === 'object') {
    return JSON.stringify(value);
  }

  return String(value);
}

export function formatRowValues(row: readonly unknown[]): string {
  return row.map(formatCellValue).join(', ');
}

/**
 * Drop the trailing newline YAML block scalars leave on descriptions and warnings
 */
export function trimTrailingNewlines(text: string): string {
  return text.replace(/\s+$/, '');
}

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/**
 * Local-time `YYYYMMDD_HHMMSS`, used in report file names
 */
export function formatRunTimestamp(date: Date): string {
  return `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}` +
    `_${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
}

/**
 * Local-time `YYYY-MM-DD HH:MM:SS`, used in report headers
 */
export function formatDisplayTimestamp(date: Date): string {
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}` +
    ` ${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
}
