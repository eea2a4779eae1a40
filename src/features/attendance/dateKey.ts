const pad = (value: number) => String(value).padStart(2, '0');

const DATE_KEY_REGEX = /^(\d{4})-(\d{2})-(\d{2})$/;

const DAY_MS = 24 * 60 * 60 * 1000;

/**
 * Calendar date of `date` as `YYYY-MM-DD`, in `timeZone` when given and in the
 * process's local zone otherwise.
 */
export const toDateKey = (date: Date, timeZone?: string | null): string => {
  if (!timeZone) {
    return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
  }

  const parts = new Intl.DateTimeFormat('en-US', {
    timeZone,
    year: 'numeric',
    month: '2-digit',
    day: '2-digit',
  }).formatToParts(date);
  const part = (type: Intl.DateTimeFormatPartTypes) =>
    parts.find((item) => item.type === type)?.value ?? '';
  return `${part('year')}-${part('month')}-${part('day')}`;
};

export const isDateKey = (value: string): boolean => {
  const match = DATE_KEY_REGEX.exec(value);
  if (!match) {
    return false;
  }
  const [year, month, day] = match.slice(1).map((segment) => Number.parseInt(segment, 10));
  const utc = new Date(Date.UTC(year, month - 1, day));
  return utc.getUTCFullYear() === year && utc.getUTCMonth() === month - 1 && utc.getUTCDate() === day;
};

const keyToUtcMillis = (key: string): number => {
  if (!isDateKey(key)) {
    throw new Error(`Invalid date key: ${key}`);
  }
  const [year, month, day] = key.split('-').map((segment) => Number.parseInt(segment, 10));
  return Date.UTC(year, month - 1, day);
};

const utcMillisToKey = (millis: number): string => {
  const date = new Date(millis);
  return `${date.getUTCFullYear()}-${pad(date.getUTCMonth() + 1)}-${pad(date.getUTCDate())}`;
};

export const addDays = (key: string, days: number): string =>
  utcMillisToKey(keyToUtcMillis(key) + days * DAY_MS);

/** Every date key from `fromKey` to `toKey` inclusive, newest first. */
export const dateKeysInRange = (fromKey: string, toKey: string): string[] => {
  const start = keyToUtcMillis(fromKey);
  const end = keyToUtcMillis(toKey);
  const keys: string[] = [];
  for (let millis = end; millis >= start; millis -= DAY_MS) {
    keys.push(utcMillisToKey(millis));
  }
  return keys;
};

export interface DateRange {
  fromKey: string;
  toKey: string;
}

/** Monday to Sunday of the week containing `key`. */
export const weekRangeOf = (key: string): DateRange => {
  const weekday = new Date(keyToUtcMillis(key)).getUTCDay();
  const sinceMonday = (weekday + 6) % 7;
  const fromKey = addDays(key, -sinceMonday);
  return { fromKey, toKey: addDays(fromKey, 6) };
};
