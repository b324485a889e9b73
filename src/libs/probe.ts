export type JsonObject = Record<string, unknown>;

export function isObject(v: unknown): v is JsonObject {
  return typeof v === 'object' && v !== null && !Array.isArray(v);
}

/** Walks nested objects; anything that is not an object on the way yields undefined. */
export function getPath(v: unknown, ...path: string[]): unknown {
  let cur = v;
  for (const key of path) {
    if (!isObject(cur)) return undefined;
    cur = cur[key];
  }
  return cur;
}

export function getObject(v: unknown, ...path: string[]): JsonObject | null {
  const found = getPath(v, ...path);
  return isObject(found) ? found : null;
}

/** Scalars as text. Blank strings, null, objects and arrays are treated as absent. */
export function asText(v: unknown): string | null {
  if (typeof v === 'string') return v.trim() === '' ? null : v;
  if (typeof v === 'number') return Number.isFinite(v) ? String(v) : null;
  if (typeof v === 'boolean') return String(v);
  return null;
}

export function firstText(...candidates: unknown[]): string | null {
  for (const c of candidates) {
    const text = asText(c);
    if (text !== null) return text;
  }
  return null;
}

export function firstElement(v: unknown): unknown {
  return Array.isArray(v) && v.length > 0 ? v[0] : undefined;
}

/** Epoch seconds or a parseable date string, as an ISO timestamp. */
export function asIsoTimestamp(v: unknown): string | null {
  let d: Date | null = null;
  if (typeof v === 'number' && Number.isFinite(v)) d = new Date(v * 1000);
  else if (typeof v === 'string' && v.trim() !== '') d = new Date(v);
  return d && Number.isFinite(d.getTime()) ? d.toISOString() : null;
}
