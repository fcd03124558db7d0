export type LooseRecord = Record<string, unknown>;

export const isRecord = (value: unknown): value is LooseRecord =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

/** First value among the given keys that is neither undefined nor null. */
export function pickAlias(record: LooseRecord, keys: readonly string[]): unknown {
  for (const key of keys) {
    const value = record[key];
    if (value !== undefined && value !== null) {
      return value;
    }
  }
  return undefined;
}

/** Finite number from a number or numeric string ("0,8" and "80%" included). */
export function toNumber(value: unknown): number | null {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null;
  }
  if (typeof value !== 'string') {
    return null;
  }

  const cleaned = value.trim().replace(',', '.').replace(/%$/, '');
  if (!/^[-+]?\d+(\.\d+)?$/.test(cleaned)) {
    return null;
  }
  return parseFloat(cleaned);
}

/** Non-negative integer or null. */
export function toCount(value: unknown): number | null {
  const num = toNumber(value);
  return num === null || num < 0 ? null : Math.round(num);
}

export function toText(value: unknown, fallback = ''): string {
  if (value === undefined || value === null) {
    return fallback;
  }
  if (Array.isArray(value)) {
    return value.map((item) => toText(item)).filter(Boolean).join(', ');
  }
  if (isRecord(value)) {
    return JSON.stringify(value);
  }
  return String(value).trim();
}

/** A list of non-empty strings; a single string becomes a one-item list. */
export function toStringList(value: unknown): string[] {
  if (typeof value === 'string') {
    return value.trim() ? [value.trim()] : [];
  }
  if (!Array.isArray(value)) {
    return [];
  }
  return value
    .filter((item) => typeof item === 'string' || typeof item === 'number')
    .map((item) => String(item).trim())
    .filter(Boolean);
}

const TRUE_WORDS = new Set(['true', 'yes', 'да', '1']);
const FALSE_WORDS = new Set(['false', 'no', 'нет', '0']);

export function toBoolean(value: unknown): boolean | null {
  if (typeof value === 'boolean') {
    return value;
  }
  if (typeof value === 'number') {
    return value !== 0;
  }
  if (typeof value === 'string') {
    const word = value.trim().toLowerCase();
    if (TRUE_WORDS.has(word)) return true;
    if (FALSE_WORDS.has(word)) return false;
  }
  return null;
}

export const truncate = (value: string, max: number): string =>
  value.length > max ? `${value.slice(0, max)}…` : value;
