/**
 * Content digests for trace records: SHA-256 over a canonical JSON rendering
 * (object keys sorted) so equal values always hash equally.
 */

import { createHash } from 'crypto';

function canonicalize(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map(canonicalize);
  }
  if (value instanceof Date) {
    return value.toISOString();
  }
  if (typeof value === 'object' && value !== null) {
    const sorted: Record<string, unknown> = {};
    for (const key of Object.keys(value).sort()) {
      sorted[key] = canonicalize(Reflect.get(value, key));
    }
    return sorted;
  }
  return value;
}

export function digest(value: unknown): string {
  const text = typeof value === 'string' ? value : JSON.stringify(canonicalize(value)) ?? 'undefined';
  return createHash('sha256').update(text).digest('hex');
}
