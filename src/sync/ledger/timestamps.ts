/**
 * Timestamp handling for change detection.
 *
 * Sources disagree on format: Jira sends `2024-01-01T10:00:00.000+0000`,
 * Confluence `2024-01-01T10:00:00.000Z`, and a source may also send naive
 * `2024-01-01 10:00:00` values, which the tracker stores verbatim. `Date.parse`
 * would silently read naive values as local time, so parsing keeps the
 * wall-clock fields and the offset apart.
 */

export interface ParsedTimestamp {
  /** Wall-clock fields as milliseconds, read as if they were UTC. */
  wallClockMs: number;
  /** Sub-millisecond digits (0-999), kept so microsecond values compare exactly. */
  micros: number;
  /** Minutes east of UTC, or null for a naive timestamp. */
  offsetMinutes: number | null;
}

const ISO_PATTERN =
  /^(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{2}):(\d{2})(?::(\d{2})(?:[.,](\d{1,9}))?)?)?\s*(Z|[+-]\d{2}(?::?\d{2})?)?$/i;

export function parseTimestamp(value: string): ParsedTimestamp | null {
  const match = ISO_PATTERN.exec(value.trim());
  if (!match) return null;

  const [, y, mo, d, h = "0", mi = "0", s = "0", fraction = "", offset] = match;
  const year = Number(y);
  const month = Number(mo);
  const day = Number(d);
  const hour = Number(h);
  const minute = Number(mi);
  const second = Number(s);

  if (month < 1 || month > 12 || hour > 23 || minute > 59 || second > 59) return null;

  const digits = fraction.padEnd(6, "0");
  const millis = Number(digits.slice(0, 3));
  const micros = Number(digits.slice(3, 6));

  const wallClockMs = Date.UTC(year, month - 1, day, hour, minute, second, millis);
  // Date.UTC rolls Feb 30 over into March; reject instead.
  if (new Date(wallClockMs).getUTCDate() !== day) return null;

  const offsetMinutes = offset === undefined ? null : parseOffset(offset);
  if (offsetMinutes === undefined) return null;

  return { wallClockMs, micros, offsetMinutes };
}

function parseOffset(raw: string): number | null | undefined {
  if (raw.toUpperCase() === "Z") return 0;
  const sign = raw.startsWith("-") ? -1 : 1;
  const body = raw.slice(1).replace(":", "");
  const hours = Number(body.slice(0, 2));
  const minutes = body.length > 2 ? Number(body.slice(2, 4)) : 0;
  if (hours > 23 || minutes > 59) return undefined;
  return sign * (hours * 60 + minutes);
}

export function isOffsetAware(ts: ParsedTimestamp): boolean {
  return ts.offsetMinutes !== null;
}

/**
 * Compare two timestamps. When exactly one side carries an offset, the offset
 * is dropped and both are compared as naive wall-clock times; otherwise naive
 * values compare by wall clock and aware values by instant.
 */
export function compareTimestamps(a: ParsedTimestamp, b: ParsedTimestamp): number {
  const bothAware = a.offsetMinutes !== null && b.offsetMinutes !== null;
  const left = bothAware ? instantMs(a) : a.wallClockMs;
  const right = bothAware ? instantMs(b) : b.wallClockMs;
  if (left !== right) return left < right ? -1 : 1;
  if (a.micros !== b.micros) return a.micros < b.micros ? -1 : 1;
  return 0;
}

function instantMs(ts: ParsedTimestamp): number {
  return ts.wallClockMs - (ts.offsetMinutes ?? 0) * 60_000;
}

/** Convert to a Date; naive values are read in the process's local time zone. */
export function toDate(ts: ParsedTimestamp): Date {
  if (ts.offsetMinutes !== null) return new Date(instantMs(ts));
  const utc = new Date(ts.wallClockMs);
  return new Date(
    utc.getUTCFullYear(),
    utc.getUTCMonth(),
    utc.getUTCDate(),
    utc.getUTCHours(),
    utc.getUTCMinutes(),
    utc.getUTCSeconds(),
    utc.getUTCMilliseconds(),
  );
}
