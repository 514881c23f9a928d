import { InvalidTimestampError } from "./errors.js";

const RFC3339_PATTERN =
  /^(\d{4})-(\d{2})-(\d{2})T(\d{2}):(\d{2}):(\d{2})(\.\d+)?(Z|([+-])(\d{2}):(\d{2}))$/i;

/**
 * Parses an RFC 3339 timestamp into a Date.
 *
 * Stricter than `Date.parse`: the date and time parts must be present, the
 * offset is mandatory, and out-of-range fields (e.g. February 30th) are
 * rejected instead of rolling over.
 *
 * @throws InvalidTimestampError when the value is not RFC 3339
 *
 * @example
 * ```typescript
 * parseTimestamp("2017-09-01T10:00:00+02:00").toISOString();
 * // "2017-09-01T08:00:00.000Z"
 * ```
 */
export function parseTimestamp(value: string): Date {
  const match = RFC3339_PATTERN.exec(value);
  if (!match) throw new InvalidTimestampError(value);

  const [, y, mo, d, h, mi, s, fraction, zone, sign, oh, om] = match;
  const year = Number(y);
  const month = Number(mo);
  const day = Number(d);
  const hours = Number(h);
  const minutes = Number(mi);
  const seconds = Number(s);

  if (month < 1 || month > 12 || hours > 23 || minutes > 59 || seconds > 59) {
    throw new InvalidTimestampError(value);
  }

  // Truncated to milliseconds, the precision of Date.
  const millis = fraction ? Number(fraction.slice(1, 4).padEnd(3, "0")) : 0;

  const date = new Date(0);
  date.setUTCFullYear(year, month - 1, day);
  date.setUTCHours(hours, minutes, seconds, millis);

  // Date silently rolls invalid days into the next month
  if (date.getUTCMonth() !== month - 1 || date.getUTCDate() !== day) {
    throw new InvalidTimestampError(value);
  }

  if (zone && zone.toUpperCase() !== "Z") {
    const offsetHours = Number(oh);
    const offsetMinutes = Number(om);
    if (offsetHours > 23 || offsetMinutes > 59) throw new InvalidTimestampError(value);
    const offsetMs = (offsetHours * 60 + offsetMinutes) * 60_000;
    date.setTime(date.getTime() + (sign === "-" ? offsetMs : -offsetMs));
  }

  return date;
}

/**
 * Returns true if the value parses as an RFC 3339 timestamp.
 */
export function isRfc3339(value: string): boolean {
  try {
    parseTimestamp(value);
    return true;
  } catch {
    return false;
  }
}

/**
 * Formats a Date as a canonical UTC timestamp.
 *
 * Milliseconds are written only when non-zero, so whole-second instants
 * render as `YYYY-MM-DDTHH:MM:SSZ`.
 */
export function formatTimestamp(date: Date): string {
  return date.toISOString().replace(".000Z", "Z");
}

/**
 * Canonicalizes an RFC 3339 timestamp to UTC.
 *
 * The same instant written with different offsets always yields the same
 * string, which makes the result safe to compare for equality.
 *
 * @throws InvalidTimestampError when the value is not RFC 3339
 *
 * @example
 * ```typescript
 * normalizeTimestamp("2017-09-01T10:00:00+02:00"); // "2017-09-01T08:00:00Z"
 * normalizeTimestamp("2017-09-01T08:00:00Z");      // "2017-09-01T08:00:00Z"
 * ```
 */
export function normalizeTimestamp(value: string): string {
  return formatTimestamp(parseTimestamp(value));
}

/**
 * The current instant, normalized. Used as the end of soft-deleted layers.
 */
export function currentTimestamp(now: Date = new Date()): string {
  return formatTimestamp(now);
}

/**
 * Compares two timestamps by the instant they denote.
 *
 * Empty strings stand for "unset" and only match each other. Values that are
 * not RFC 3339 fall back to plain string comparison.
 */
export function sameInstant(a: string, b: string): boolean {
  if (a === b) return true;
  if (a === "" || b === "") return false;
  if (!isRfc3339(a) || !isRfc3339(b)) return false;
  return parseTimestamp(a).getTime() === parseTimestamp(b).getTime();
}

/**
 * Decides whether a layer's `start` difference is noise.
 *
 * The service moves a start that lies in the past forward to the moment the
 * layer was written, so a remote start later than a desired start that has
 * already passed is not a real change.
 *
 * @param remote - The start the service reports
 * @param desired - The start in the declared configuration
 * @param now - Reference instant
 */
export function suppressLayerStartDiff(remote: string, desired: string, now: Date): boolean {
  if (sameInstant(remote, desired)) return true;
  if (!isRfc3339(remote) || !isRfc3339(desired)) return false;

  const desiredAt = parseTimestamp(desired).getTime();
  const remoteAt = parseTimestamp(remote).getTime();
  return desiredAt < now.getTime() && remoteAt > desiredAt;
}

/**
 * Returns true if a layer with the given end no longer applies at `now`.
 * An empty end means the layer is open-ended.
 *
 * @throws InvalidTimestampError when a non-empty end is not RFC 3339
 */
export function hasEnded(end: string | null | undefined, now: Date): boolean {
  if (!end) return false;
  return parseTimestamp(end).getTime() <= now.getTime();
}

/**
 * Returns true if the runtime's time zone database knows the IANA zone name.
 *
 * @example
 * ```typescript
 * isValidTimeZone("Europe/Berlin"); // true
 * isValidTimeZone("Mars/Olympus");  // false
 * ```
 */
export function isValidTimeZone(zone: string): boolean {
  if (zone === "") return false;
  try {
    new Intl.DateTimeFormat("en-US", { timeZone: zone });
    return true;
  } catch {
    return false;
  }
}

/**
 * Renders a coverage percentage with two decimals, e.g. `"87.50"`.
 */
export function renderRoundedPercentage(value: number): string {
  return value.toFixed(2);
}
