/**
 * Check document loader
 *
 * Reads a YAML document with `validations` and `owner_exclude_list` keys and
 * validates it into a CheckDocument.
 *
 * @license MIT
 */

import { readFile } from 'fs/promises';
import { resolve } from 'path';
import { fileURLToPath } from 'url';
import { parse as parseYaml, YAMLParseError } from 'yaml';
import { ConfigurationError } from '../errors/index.js';
import type { CheckDocument } from '../types.js';
import { validateCheckDocument } from '../validation/index.js';

/**
 * Check catalogue shipped with the package
 */
export const DEFAULT_CHECKS_PATH = fileURLToPath(new URL('../../config/checks.oracle.yaml', import.meta.url));

/**
 * Parse and validate a check document from YAML text
 *
 * @param source - File name used in error messages
 */
export function parseCheckDocument(text: string, source = 'check document'): CheckDocument {
  let parsed: unknown;

  try {
    parsed = parseYaml(text);
  } catch (error) {
    const reason = error instanceof YAMLParseError ? error.message : 'unreadable YAML';
    throw new ConfigurationError(`Malformed ${source}: ${reason}`, undefined, { cause: error });
  }

  if (parsed === null || typeof parsed !== 'object' || Array.isArray(parsed)) {
    throw ConfigurationError.invalidFormat(source, 'a mapping with "validations" and "owner_exclude_list"');
  }

  const document = validateCheckDocument(parsed);
  assertUniqueCheckNames(document);
  return document;
}

function assertUniqueCheckNames(document: CheckDocument): void {
  const seen = new Set<string>();
  for (const check of document.checks) {
    if (seen.has(check.name)) {
      throw ConfigurationError.duplicateCheck(check.name);
    }
    seen.add(check.name);
  }
}

/**
 * Load a check document from disk, resolving relative paths against the cwd
 */
export async function loadCheckDocument(path: string = DEFAULT_CHECKS_PATH): Promise<CheckDocument> {
  const fullPath = resolve(path);
  let text: string;

  try {
    text = await readFile(fullPath, 'utf8');
  } catch (error) {
    throw new ConfigurationError(`Check document not found or unreadable: ${fullPath}`, 'config', { cause: error });
  }

  return parseCheckDocument(text, fullPath);
}
