/**
 * Narrowing helpers for vendor JSON. Vendor payloads are untrusted: every
 * field read goes through one of these instead of a cast.
 */

export type JsonRecord = Record<string, unknown>;

export function isRecord(value: unknown): value is JsonRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function getRecord(obj: JsonRecord | undefined, key: string): JsonRecord | undefined {
  const value = obj?.[key];
  return isRecord(value) ? value : undefined;
}

export function getString(obj: JsonRecord | undefined, key: string): string | undefined {
  const value = obj?.[key];
  return typeof value === 'string' ? value : undefined;
}

export function getNumber(obj: JsonRecord | undefined, key: string): number | undefined {
  const value = obj?.[key];
  return typeof value === 'number' && Number.isFinite(value) ? value : undefined;
}

export function getArray(obj: JsonRecord | undefined, key: string): unknown[] | undefined {
  const value = obj?.[key];
  return Array.isArray(value) ? value : undefined;
}

export function getRecords(obj: JsonRecord | undefined, key: string): JsonRecord[] {
  return (getArray(obj, key) ?? []).filter(isRecord);
}

/**
 * Parse JSON text without throwing.
 */
export function tryParseJson(text: string): { ok: true; value: unknown } | { ok: false } {
  try {
    return { ok: true, value: JSON.parse(text) };
  } catch {
    return { ok: false };
  }
}
