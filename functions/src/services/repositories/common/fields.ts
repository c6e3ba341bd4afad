/**
 * Readers for untyped Firestore document data. Timestamps are written as
 * `Date` values and come back as Firestore `Timestamp`s; both read as ISO
 * strings.
 */

type DocumentData = FirebaseFirestore.DocumentData;

export function readString(data: DocumentData, key: string): string | null {
  const value: unknown = data[key];
  return typeof value === 'string' ? value : null;
}

export function readNumber(data: DocumentData, key: string): number | null {
  const value: unknown = data[key];
  return typeof value === 'number' && Number.isFinite(value) ? value : null;
}

export function readBoolean(data: DocumentData, key: string): boolean | null {
  const value: unknown = data[key];
  return typeof value === 'boolean' ? value : null;
}

export function readStringArray(data: DocumentData, key: string): string[] {
  const value: unknown = data[key];
  if (!Array.isArray(value)) {
    return [];
  }
  return value.filter((item): item is string => typeof item === 'string');
}

export function toIsoString(value: unknown): string | null {
  if (typeof value === 'string') {
    return value;
  }
  if (value instanceof Date) {
    return value.toISOString();
  }
  if (value && typeof value === 'object' && 'toDate' in value && typeof value.toDate === 'function') {
    const date: unknown = value.toDate();
    return date instanceof Date ? date.toISOString() : null;
  }
  return null;
}

export function readTimestamp(data: DocumentData, key: string): string | null {
  return toIsoString(data[key]);
}

/** Drops keys whose value is `undefined`; Firestore rejects them. */
export function compact(value: Record<string, unknown>): DocumentData {
  return Object.fromEntries(Object.entries(value).filter(([, item]) => item !== undefined));
}
