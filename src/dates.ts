export const MS_PER_DAY = 24 * 60 * 60 * 1000;

// 2024-01-02T03:04:05[.123456][Z|+01:00|+0100] with either "T" or a space separator
const ISO_PATTERN =
  /^(\d{4})-(\d{2})-(\d{2})[T ](\d{2}):(\d{2})(?::(\d{2})(?:\.(\d+))?)?\s*(Z|[+-]\d{2}:?\d{2})?$/i;

/**
 * Parses the ISO-8601 variants hosting APIs return into a Date.
 * Accepts a "Z" suffix, "+HH:MM"/"+HHMM" offsets, fractional seconds of any
 * precision and a space instead of "T". Timestamps without an offset are
 * read as UTC. Returns null for anything else, including impossible dates.
 */
export function parseInstant(value: string | Date | null | undefined): Date | null {
  if (value == null) return null;
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? null : value;
  }

  const match = ISO_PATTERN.exec(value.trim());
  if (!match) return null;

  const [, year, month, day, hour, minute, second = "0", fraction = "", zone = "Z"] = match;
  const millis = Number(fraction.padEnd(3, "0").slice(0, 3));
  const utc = Date.UTC(
    Number(year),
    Number(month) - 1,
    Number(day),
    Number(hour),
    Number(minute),
    Number(second),
    millis,
  );

  const check = new Date(utc);
  if (
    check.getUTCFullYear() !== Number(year) ||
    check.getUTCMonth() !== Number(month) - 1 ||
    check.getUTCDate() !== Number(day) ||
    Number(hour) > 23 ||
    Number(minute) > 59 ||
    Number(second) > 59
  ) {
    return null;
  }

  return new Date(utc - zoneOffsetMs(zone));
}

function zoneOffsetMs(zone: string): number {
  if (zone.toUpperCase() === "Z") return 0;
  const sign = zone.startsWith("-") ? -1 : 1;
  const digits = zone.slice(1).replace(":", "");
  const hours = Number(digits.slice(0, 2));
  const minutes = Number(digits.slice(2, 4));
  return sign * (hours * 60 + minutes) * 60 * 1000;
}

export function daysBefore(now: Date, days: number): Date {
  return new Date(now.getTime() - days * MS_PER_DAY);
}

export function latest(...dates: Array<Date | null>): Date | null {
  let result: Date | null = null;
  for (const d of dates) {
    if (d && (result === null || d > result)) result = d;
  }
  return result;
}

/** "2024-01-02 03:04:05" in UTC, used in emails and logs. */
export function formatDisplay(date: Date): string {
  return date.toISOString().slice(0, 19).replace("T", " ");
}

/** "20240102_030405" in UTC, used in archive file names. */
export function formatFileStamp(date: Date): string {
  const iso = date.toISOString();
  return `${iso.slice(0, 4)}${iso.slice(5, 7)}${iso.slice(8, 10)}_${iso.slice(11, 13)}${iso.slice(14, 16)}${iso.slice(17, 19)}`;
}
