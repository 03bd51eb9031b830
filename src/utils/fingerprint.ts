import { createHash } from 'node:crypto';

/**
 * Stable SHA-256 hex digest of `text` plus optional scoring inputs.
 * Text is NFC-normalised and trimmed; `extra` is serialised with sorted keys
 * and undefined members omitted, so equal inputs always share a digest.
 */
export function fingerprint(text: string, extra?: Record<string, unknown>): string {
  const hash = createHash('sha256').update(text.normalize('NFC').trim());
  const canonical = extra ? canonicalJson(extra) : '{}';
  if (canonical !== '{}') {
    hash.update('\u0000').update(canonical);
  }
  return hash.digest('hex');
}

export function canonicalJson(value: unknown): string {
  if (Array.isArray(value)) {
    return `[${value.map(canonicalJson).join(',')}]`;
  }
  if (value !== null && typeof value === 'object') {
    const members = Object.entries(value)
      .filter(([, v]) => v !== undefined)
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
      .map(([k, v]) => `${JSON.stringify(k)}:${canonicalJson(v)}`);
    return `{${members.join(',')}}`;
  }
  return JSON.stringify(value) ?? 'null';
}
