/**
 * Metadata - Content Identifiers
 *
 * Content-addressed ids for agents, claims, pages and keywords: the same
 * payload always yields the same id, whatever its key order.
 */

import { createHash } from 'crypto';

export const CONTENT_ID_NAMESPACE = 'seo_signals_v1';

export type ContentIdKind = 'agent' | 'claim' | 'page' | 'keyword';

export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue | undefined };

const ID_HEX_LENGTH = 32;

/**
 * JSON with object keys sorted at every level. Undefined properties are
 * dropped, as JSON.stringify does.
 */
export function canonicalJson(value: JsonValue): string {
  if (value === null || typeof value !== 'object') {
    if (typeof value === 'number' && !Number.isFinite(value)) {
      throw new Error(`Cannot derive an id from non-finite number ${value}`);
    }
    return JSON.stringify(value);
  }

  if (Array.isArray(value)) {
    return `[${value.map(canonicalJson).join(',')}]`;
  }

  const parts: string[] = [];
  for (const key of Object.keys(value).sort()) {
    const entry = value[key];
    if (entry === undefined) continue;
    parts.push(`${JSON.stringify(key)}:${canonicalJson(entry)}`);
  }
  return `{${parts.join(',')}}`;
}

export function deriveContentId(
  kind: ContentIdKind,
  payload: JsonValue,
  namespace: string = CONTENT_ID_NAMESPACE
): string {
  const digest = createHash('sha256')
    .update(`${namespace}\n${kind}\n${canonicalJson(payload)}`, 'utf8')
    .digest('hex');
  return `${kind}_${digest.slice(0, ID_HEX_LENGTH)}`;
}
