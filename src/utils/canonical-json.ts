/**
 * Serialize a value with object keys sorted and undefined members dropped,
 * so that two structurally equal values always produce the same string.
 */
export function canonicalJson(value: unknown): string {
  return JSON.stringify(normalize(value));
}

function normalize(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map((item) => (item === undefined ? null : normalize(item)));
  }
  if (value !== null && typeof value === 'object') {
    const sorted: Record<string, unknown> = {};
    for (const key of Object.keys(value).sort()) {
      const member: unknown = Reflect.get(value, key);
      if (member !== undefined) {
        sorted[key] = normalize(member);
      }
    }
    return sorted;
  }
  return value;
}
