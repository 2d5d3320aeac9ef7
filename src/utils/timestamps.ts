// 9999-01-01T00:00:00Z: sorts after any real timestamp
export const DISTANT_FUTURE = Date.UTC(9999, 0, 1);

const RFC3339_PATTERN =
  /^(\d{4})-(\d{2})-(\d{2})T(\d{2}):(\d{2}):(\d{2})(\.\d+)?(?:Z|([+-])(\d{2}):(\d{2}))$/;

const DAYS_IN_MONTH = [31, 28, 31, 30, 31, 30, 31, 31, 30, 31, 30, 31];

function isLeapYear(year: number): boolean {
  return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
}

// month is 1-based
function daysInMonth(year: number, month: number): number {
  return month === 2 && isLeapYear(year) ? 29 : DAYS_IN_MONTH[month - 1];
}

/**
 * Parse an RFC3339 timestamp into epoch milliseconds.
 * Precision is milliseconds: fractional digits past the third are dropped,
 * so timestamps differing only below a millisecond compare equal.
 * @returns null when the value is missing, not RFC3339, or names a date or
 *   time that does not exist
 */
export function parseRfc3339(value: string | undefined): number | null {
  if (value === undefined) return null;
  const match = RFC3339_PATTERN.exec(value.trim());
  if (!match) return null;

  const [, yearStr, monthStr, dayStr, hourStr, minuteStr, secondStr, fraction, sign, offHourStr, offMinuteStr] =
    match;
  const year = Number(yearStr);
  const month = Number(monthStr);
  const day = Number(dayStr);
  const hour = Number(hourStr);
  const minute = Number(minuteStr);
  const second = Number(secondStr);

  if (month < 1 || month > 12) return null;
  if (day < 1 || day > daysInMonth(year, month)) return null;
  if (hour > 23 || minute > 59 || second > 59) return null;

  let offsetMinutes = 0;
  if (sign !== undefined) {
    const offHour = Number(offHourStr);
    const offMinute = Number(offMinuteStr);
    if (offHour > 23 || offMinute > 59) return null;
    offsetMinutes = (offHour * 60 + offMinute) * (sign === '-' ? -1 : 1);
  }

  const millis = fraction ? Number(fraction.slice(1, 4).padEnd(3, '0')) : 0;
  // setUTCFullYear keeps years 0-99 literal; Date.UTC would map them to 19xx
  const date = new Date(0);
  date.setUTCFullYear(year, month - 1, day);
  date.setUTCHours(hour, minute, second, millis);
  return date.getTime() - offsetMinutes * 60000;
}

/**
 * First candidate that parses, or {@link DISTANT_FUTURE} if none do
 */
export function pickTimestamp(...values: (string | undefined)[]): number {
  for (const value of values) {
    const ms = parseRfc3339(value);
    if (ms !== null) return ms;
  }
  return DISTANT_FUTURE;
}
