// Key-order independent serialization, used to compare decision payloads

/**
 * JSON serialization with object keys sorted. Defined for JSON-serializable values:
 * like JSON.stringify, it writes `NaN`, `Infinity` and `undefined` array items as `null`
 * and leaves out `undefined` properties.
 */
export function stableStringify(obj: unknown): string {
  if (obj === undefined) return 'null';
  if (obj === null || typeof obj !== 'object') return JSON.stringify(obj);
  if (Array.isArray(obj)) return `[${obj.map(stableStringify).join(',')}]`;
  const entries = Object.entries(obj)
    .filter(([, v]) => v !== undefined)
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
  return `{${entries.map(([k, v]) => `${JSON.stringify(k)}:${stableStringify(v)}`).join(',')}}`;
}

/** Equality of two JSON-serializable payloads; values JSON cannot tell apart compare equal. */
export function payloadsEqual(a: unknown, b: unknown): boolean {
  return stableStringify(a) === stableStringify(b);
}
