import type { CellValue } from '../types/schema';

const NUMERIC_REGEX = /^[-+]?(\d+(\.\d*)?|\.\d+)([eE][-+]?\d+)?$/;
const GROUPED_REGEX = /^[-+]?\d{1,3}(,\d{3})+(\.\d+)?$/;
const CURRENCY_PREFIX = /^([-+]?)[$€£₹]\s?/;
const LEADING_ZERO = /^[-+]?0\d/; // codes such as zip or account numbers stay text
const INTEGER_REGEX = /^[-+]?\d+$/;
const MAX_SIGNIFICANT_DIGITS = 15;

const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;
const ISO_DATETIME = /^\d{4}-\d{2}-\d{2}[T ]\d{2}:\d{2}(:\d{2}(\.\d+)?)?(Z|[+-]\d{2}:?\d{2})?$/;
const SLASH_DATE = /^(\d{1,2})[/.-](\d{1,2})[/.-](\d{4})$/;
const NAMED_MONTH = /^(?:(\d{1,2})\s+([a-z]{3,9})\.?,?\s+(\d{4})|([a-z]{3,9})\.?\s+(\d{1,2}),?\s+(\d{4}))$/i;

const MONTHS = ['jan', 'feb', 'mar', 'apr', 'may', 'jun', 'jul', 'aug', 'sep', 'oct', 'nov', 'dec'];

const pad = (n: number, width = 2) => String(n).padStart(width, '0');

export const isScalar = (value: unknown): value is string | number | boolean =>
  typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean';

export const isMissingToken = (text: string, tokens: ReadonlySet<string>) => tokens.has(text.toLowerCase());

/** Collapses line breaks and trims a text cell. */
export const tidyText = (text: string) => text.replace(/\r?\n|\r/g, ' ').trim();

const significantDigits = (body: string) =>
  body
    .replace(/[eE].*$/, '')
    .replace(/\D/g, '')
    .replace(/^0+/, '').length;

/**
 * Parses numeric-looking text: plain numbers, thousands separators,
 * a leading currency symbol and a trailing percent sign. Values a double cannot
 * hold exactly are rejected.
 */
export const parseNumeric = (text: string): number | null => {
  let body = text.trim();
  if (!body) return null;
  body = body.replace(CURRENCY_PREFIX, '$1');
  if (body.endsWith('%')) body = body.slice(0, -1).trim();
  if (GROUPED_REGEX.test(body)) body = body.replace(/,/g, '');
  if (!NUMERIC_REGEX.test(body) || LEADING_ZERO.test(body)) return null;
  const value = Number(body);
  if (!Number.isFinite(value)) return null;
  // long identifiers would collapse onto the same double
  if (INTEGER_REGEX.test(body)) return Number.isSafeInteger(value) ? value : null;
  return significantDigits(body) <= MAX_SIGNIFICANT_DIGITS ? value : null;
};

export const parseBoolean = (text: string): boolean | null => {
  const lower = text.trim().toLowerCase();
  if (lower === 'true') return true;
  if (lower === 'false') return false;
  return null;
};

const validDay = (year: number, month: number, day: number) => {
  if (month < 1 || month > 12 || day < 1) return false;
  return day <= new Date(Date.UTC(year, month, 0)).getUTCDate();
};

const formatDay = (year: number, month: number, day: number) => `${pad(year, 4)}-${pad(month)}-${pad(day)}`;

/**
 * Returns the ISO form of a date-like string, or null when it is not a date.
 * Day-only values become YYYY-MM-DD, values with a time part a full ISO timestamp.
 */
export const parseDate = (text: string): string | null => {
  const value = text.trim();
  if (!value) return null;

  const iso = ISO_DATE.exec(value);
  if (iso) {
    const [year, month, day] = [Number(iso[1]), Number(iso[2]), Number(iso[3])];
    return validDay(year, month, day) ? formatDay(year, month, day) : null;
  }

  const datetime = ISO_DATETIME.exec(value);
  if (datetime) {
    // no offset means UTC, whatever zone the process runs in
    const zoned = datetime[3] ? value : `${value}Z`;
    const ms = Date.parse(zoned.replace(' ', 'T'));
    return Number.isNaN(ms) ? null : new Date(ms).toISOString();
  }

  const slash = SLASH_DATE.exec(value);
  if (slash) {
    const first = Number(slash[1]);
    const second = Number(slash[2]);
    const year = Number(slash[3]);
    // month first unless the first part cannot be a month
    const [month, day] = first > 12 ? [second, first] : [first, second];
    return validDay(year, month, day) ? formatDay(year, month, day) : null;
  }

  const named = NAMED_MONTH.exec(value);
  if (named) {
    const dayText = named[1] ?? named[5];
    const monthText = named[2] ?? named[4];
    const yearText = named[3] ?? named[6];
    const month = MONTHS.indexOf(monthText.slice(0, 3).toLowerCase()) + 1;
    const day = Number(dayText);
    const year = Number(yearText);
    return month > 0 && validDay(year, month, day) ? formatDay(year, month, day) : null;
  }

  return null;
};

/** Stable identity of a cell for distinct counts and row equality. */
export const cellKey = (value: CellValue) => (value === null ? '\u0000' : `${typeof value}:${String(value)}`);

export const rowKey = (row: CellValue[]) => JSON.stringify(row);

export const round = (value: number, digits = 4) => Number(value.toFixed(digits));

export const ratio = (numerator: number, denominator: number) => (denominator > 0 ? numerator / denominator : 0);

/** Lookup object without a prototype, so names such as `__proto__` stay ordinary keys. */
export const emptyRecord = <T>(): Record<string, T> => Object.create(null);
