/**
 * Report artifact naming and writing
 *
 * @license MIT
 */

import { mkdir, readdir, readFile, writeFile } from 'fs/promises';
import { join, resolve } from 'path';
import type { ConnectionTarget } from '../types/connector.js';
import type { OutputFormat } from '../types.js';
import { RenderError } from '../errors/index.js';
import { formatRunTimestamp } from './format.js';

export const REPORT_FILE_PREFIX = 'dms_comp';

const FILE_EXTENSIONS: Record<OutputFormat, string> = {
  text: 'txt',
  html: 'html',
};

/**
 * Reduce a host name to a file-name token
 *
 * Dotted numeric addresses become `ip_10_0_0_5`; anything else keeps only its
 * letters, accented ones included (`prod-db-01` becomes `proddb`).
 */
export function deriveHostToken(host: string): string {
  if (/^[0-9.]+$/.test(host)) {
    return `ip_${host.replace(/\./g, '_')}`;
  }
  return lettersOnly(host);
}

function lettersOnly(value: string): string {
  return value.replace(/[^\p{L}]/gu, '');
}

export function targetToken(target: ConnectionTarget): string {
  return target.kind === 'direct' ? deriveHostToken(target.host) : lettersOnly(target.alias);
}

/**
 * `dms_comp_<token>_<YYYYMMDD_HHMMSS>.<ext>`
 */
export function reportFileName(target: ConnectionTarget, runDate: Date, format: OutputFormat): string {
  return `${REPORT_FILE_PREFIX}_${targetToken(target)}_${formatRunTimestamp(runDate)}.${FILE_EXTENSIONS[format]}`;
}

/**
 * Write the rendered report and return its absolute path
 */
export async function writeReportArtifact(
  outputDir: string,
  fileName: string,
  content: string
): Promise<string> {
  const path = resolve(outputDir, fileName);

  try {
    await mkdir(resolve(outputDir), { recursive: true });
    await writeFile(path, content, 'utf8');
  } catch (error) {
    throw RenderError.notWritable(path, error);
  }

  return path;
}

/**
 * Read every `.css` file of a directory, in name order
 */
export async function loadStylesheetDirectory(dir: string): Promise<string[]> {
  try {
    const entries = await readdir(dir);
    const cssFiles = entries.filter(entry => entry.endsWith('.css')).sort();
    return await Promise.all(cssFiles.map(file => readFile(join(dir, file), 'utf8')));
  } catch (error) {
    throw new RenderError(`Cannot read stylesheets from ${dir}`, dir, { cause: error });
  }
}
