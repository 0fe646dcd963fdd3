import type { EventTime } from "./types.js";

const TIMESTAMP_PATTERN =
  /^(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{2}):(\d{2})(?::(\d{2})(?:[.,](\d+))?)?)?\s*(Z|[+-]\d{2}(?::?\d{2})?)?$/i;

function daysInMonth(year: number, month: number): number {
  return new Date(Date.UTC(year, month, 0)).getUTCDate();
}

function parseOffsetMinutes(offset: string | undefined): number | null {
  if (!offset || offset.toUpperCase() === "Z") return 0;
  const sign = offset.startsWith("-") ? -1 : 1;
  const digits = offset.slice(1).replace(":", "");
  const hours = Number(digits.slice(0, 2));
  const minutes = digits.length > 2 ? Number(digits.slice(2)) : 0;
  if (hours > 23 || minutes > 59) return null;
  return sign * (hours * 60 + minutes);
}

/**
 * Parse an ISO-8601-style timestamp into wall-clock fields.
 *
 * Hour, date and weekday are taken in the offset the timestamp states; nothing
 * is converted to another zone. Returns null for anything that is not a real
 * calendar date and time.
 */
export function parseTimestamp(raw: string): EventTime | null {
  const match = TIMESTAMP_PATTERN.exec(raw.trim());
  if (!match) return null;

  const [, ys, mos, ds, hs, mis, ss, fraction, offset] = match;
  if (ys === undefined || mos === undefined || ds === undefined) return null;

  const year = Number(ys);
  const month = Number(mos);
  const day = Number(ds);
  const hour = hs === undefined ? 0 : Number(hs);
  const minute = mis === undefined ? 0 : Number(mis);
  const second = ss === undefined ? 0 : Number(ss);
  const millis = fraction === undefined ? 0 : Number(fraction.slice(0, 3).padEnd(3, "0"));

  if (year < 1000) return null;
  if (month < 1 || month > 12) return null;
  if (day < 1 || day > daysInMonth(year, month)) return null;
  if (hour > 23 || minute > 59 || second > 59) return null;

  const offsetMinutes = parseOffsetMinutes(offset);
  if (offsetMinutes === null) return null;

  const wallClock = Date.UTC(year, month - 1, day, hour, minute, second, millis);

  return {
    instant: wallClock - offsetMinutes * 60_000,
    date: `${ys}-${mos}-${ds}`,
    month: `${ys}-${mos}`,
    year,
    hour,
    dayOfMonth: day,
    weekday: new Date(Date.UTC(year, month - 1, day)).getUTCDay(),
  };
}
