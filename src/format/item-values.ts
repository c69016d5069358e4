const INTEGER_RE = /^[+-]?\d+$/;
const FLOAT_RE = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;
const HEX_RE = /^[0-9a-fA-F]+$/;
const ITEM_TIME_RE = /^(\d{4})-(\d{2})-(\d{2})T(\d{2}):(\d{2}):(\d{2})(?:\.(\d{1,9}))?Z$/;

export const INT8_RANGE = { min: -128, max: 127 } as const;
export const INT32_RANGE = { min: -2147483648, max: 2147483647 } as const;

export function parseInteger(text: string, range: { min: number; max: number } = INT32_RANGE): number | null {
  const trimmed = text.trim();
  if (!INTEGER_RE.test(trimmed)) return null;

  const value = Number(trimmed);
  if (value < range.min || value > range.max) return null;
  return value;
}

export function parseFloatStrict(text: string): number | null {
  const trimmed = text.trim();
  if (!FLOAT_RE.test(trimmed)) return null;
  return Number(trimmed);
}

/** Integer flag: `1` is true, any other integer false, non-integers rejected. */
export function parseFlag(text: string): boolean | null {
  const value = parseInteger(text, INT8_RANGE);
  return value === null ? null : value === 1;
}

/** Exact-width hex field; anything but hex digits is rejected. */
export function parseHex(text: string): number | null {
  if (!HEX_RE.test(text)) return null;
  return Number.parseInt(text, 16);
}

/**
 * Parse `YYYY-MM-DDTHH:MM:SS[.fraction]Z` as a UTC instant. Fractions beyond
 * milliseconds are truncated. Calendar-invalid dates are rejected.
 */
export function parseItemTime(text: string): Date | null {
  const match = ITEM_TIME_RE.exec(text);
  if (!match) return null;

  const [, year, month, day, hour, minute, second, fraction] = match;
  const ms = fraction ? Number(fraction.padEnd(3, "0").slice(0, 3)) : 0;
  const time = Date.UTC(Number(year), Number(month) - 1, Number(day), Number(hour), Number(minute), Number(second), ms);
  const date = new Date(time);

  if (
    date.getUTCFullYear() !== Number(year) ||
    date.getUTCMonth() !== Number(month) - 1 ||
    date.getUTCDate() !== Number(day) ||
    date.getUTCHours() !== Number(hour) ||
    date.getUTCMinutes() !== Number(minute) ||
    date.getUTCSeconds() !== Number(second)
  ) {
    return null;
  }
  return date;
}

export function formatItemTime(date: Date): string {
  return date.toISOString();
}
