const DATE_ONLY = /^(\d{4})-(\d{2})-(\d{2})$/;
const DATE_TIME = /^(\d{4})-(\d{2})-(\d{2})[T ](\d{2}):(\d{2})(?::(\d{2})(?:\.(\d{1,3})\d*)?)?(Z|[+-]\d{2}:?\d{2})?$/;
const DOTTED = /^(\d{2})\.(\d{2})\.(\d{4})$/;

const MS_PER_DAY = 24 * 60 * 60 * 1000;

function utc(year: number, month: number, day: number, hour = 0, minute = 0, second = 0, ms = 0): number | null {
  const time = Date.UTC(year, month - 1, day, hour, minute, second, ms);
  const check = new Date(time);

  // Reject rollovers such as 2024-02-31 or 10:75
  if (
    check.getUTCFullYear() !== year ||
    check.getUTCMonth() !== month - 1 ||
    check.getUTCDate() !== day ||
    check.getUTCHours() !== hour ||
    check.getUTCMinutes() !== minute ||
    check.getUTCSeconds() !== second
  ) {
    return null;
  }
  return time;
}

function offsetMinutes(zone: string): number {
  if (zone === 'Z') {
    return 0;
  }
  const sign = zone.startsWith('-') ? -1 : 1;
  const digits = zone.slice(1).replace(':', '');
  return sign * (parseInt(digits.slice(0, 2), 10) * 60 + parseInt(digits.slice(2), 10));
}

/**
 * Parse a date-like string to epoch milliseconds (UTC).
 *
 * Accepts `YYYY-MM-DD`, `YYYY-MM-DDTHH:mm[:ss[.sss]][Z|±hh:mm]` and
 * `DD.MM.YYYY`. Times without a zone are read as UTC.
 *
 * @returns epoch milliseconds, or null when the value is not a date
 */
export function parseDateLike(value: string): number | null {
  const text = value.trim();

  const dateOnly = DATE_ONLY.exec(text);
  if (dateOnly) {
    return utc(Number(dateOnly[1]), Number(dateOnly[2]), Number(dateOnly[3]));
  }

  const dotted = DOTTED.exec(text);
  if (dotted) {
    return utc(Number(dotted[3]), Number(dotted[2]), Number(dotted[1]));
  }

  const dateTime = DATE_TIME.exec(text);
  if (dateTime) {
    const [, year, month, day, hour, minute, second, fraction, zone] = dateTime;
    const ms = fraction ? Number(fraction.padEnd(3, '0')) : 0;
    const time = utc(
      Number(year),
      Number(month),
      Number(day),
      Number(hour),
      Number(minute),
      second ? Number(second) : 0,
      ms
    );
    if (time === null) {
      return null;
    }
    return zone ? time - offsetMinutes(zone) * 60_000 : time;
  }

  return null;
}

/**
 * Truncate epoch milliseconds to the start of its UTC day.
 */
export function startOfUtcDay(epochMs: number): number {
  return Math.floor(epochMs / MS_PER_DAY) * MS_PER_DAY;
}
