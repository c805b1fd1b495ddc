export type JsonRecord = Record<string, unknown>;

export const isRecord = (value: unknown): value is JsonRecord =>
  !!value && typeof value === 'object' && !Array.isArray(value);

export const asRecord = (value: unknown): JsonRecord => (isRecord(value) ? value : {});

export const asRecordList = (value: unknown): JsonRecord[] =>
  toList(value).filter((entry): entry is JsonRecord => isRecord(entry));

/** Providers that serialize XML to JSON return a bare object for one item and an array for many. */
export const toList = (value: unknown): unknown[] => {
  if (value === undefined || value === null) return [];
  return Array.isArray(value) ? value : [value];
};

export const asString = (value: unknown): string => {
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  return '';
};

export const asNumber = (value: unknown, fallback = 0): number => {
  if (typeof value === 'number' && Number.isFinite(value)) return value;
  if (typeof value === 'string' && value.trim()) {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : fallback;
  }
  return fallback;
};

/** Reads `#text` from XML-derived JSON nodes, or the value itself when it is a scalar. */
export const textOf = (value: unknown): string => {
  if (isRecord(value)) return asString(value['#text']);
  return asString(value);
};
