import { createHash } from 'node:crypto';

function sortKeys(value: unknown): unknown {
  if (Array.isArray(value)) return value.map(sortKeys);
  if (value !== null && typeof value === 'object') {
    const sorted: Record<string, unknown> = {};
    for (const key of Object.keys(value).sort()) {
      sorted[key] = sortKeys(Reflect.get(value, key));
    }
    return sorted;
  }
  return value;
}

/** JSON with object keys sorted at every depth. */
export function stableStringify(value: unknown): string {
  return JSON.stringify(sortKeys(value));
}

export function messageIdFor(payload: string): string {
  return createHash('sha1').update(payload, 'utf8').digest('hex');
}
