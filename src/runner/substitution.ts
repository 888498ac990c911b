/**
 * Exclusion-list substitution for check query templates
 *
 * @license MIT
 */

import type { ExclusionList } from '../types.js';

export const OWNER_EXCLUDE_PLACEHOLDER = '{owner_exclude_list}';

/**
 * Quote each owner and join them into an SQL list body: `'SYS', 'SYSTEM'`
 *
 * Values are not escaped. The exclusion list comes from the operator's check
 * document and is trusted; a name containing a quote will break the query.
 */
export function formatExclusionList(exclusions: ExclusionList): string {
  return exclusions.map(owner => `'${owner}'`).join(', ');
}

/**
 * Replace every placeholder occurrence in the template with the quoted list
 */
export function renderQuery(template: string, exclusions: ExclusionList): string {
  return template.split(OWNER_EXCLUDE_PLACEHOLDER).join(formatExclusionList(exclusions));
}
