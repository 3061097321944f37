// This module builds the JSON payloads shared by tools, prompts, legacy methods, and REST routes.

import type { TimeSnapshot } from './clock.js';
import { snapshotFromEpochSeconds } from './clock.js';
import { STANDARD_FORMATS, formatTime } from './strftime.js';
import { AppError } from '../utils/errors.js';
import { assertTimeZone, listTimezones, toZonedDateTime } from './timezones.js';

export interface UnixTimePayload {
  seconds: number;
  nanos: number;
  // Decimal string: the value exceeds the exact integer range of a JSON number.
  nanos_since_epoch: string;
}

export interface TimeResponse {
  unix: UnixTimePayload;
  iso8601: string;
  rfc3339: string;
  rfc2822: string;
  ctime: string;
  nanos_since_epoch: string;
  seconds: number;
  microseconds: number;
  milliseconds: number;
  year: number;
  month: number;
  day: number;
  hour: number;
  minute: number;
  second: number;
  nanosecond: number;
  timezone: string;
  offset: number;
  weekday: string;
  week_of_year: number;
  day_of_year: number;
  custom_formats: Record<string, string>;
}

export function buildUnixTime(snapshot: TimeSnapshot): UnixTimePayload {
  return {
    seconds: snapshot.seconds,
    nanos: snapshot.nanos,
    nanos_since_epoch: snapshot.nanosSinceEpoch.toString()
  };
}

export function buildNanos(snapshot: TimeSnapshot): { nanoseconds: string; seconds: number; subsec_nanos: number } {
  return {
    nanoseconds: snapshot.nanosSinceEpoch.toString(),
    seconds: snapshot.seconds,
    subsec_nanos: snapshot.nanos
  };
}

// This function derives every field from one snapshot so a response never mixes two instants.
export function buildTimeResponse(snapshot: TimeSnapshot, zone = 'UTC'): TimeResponse {
  const timezone = assertTimeZone(zone);
  const dt = toZonedDateTime(snapshot, timezone);
  const offsetSeconds = dt.offset * 60;
  // Zero offsets render as Z in the nanosecond ISO form.
  const iso8601Format = offsetSeconds === 0 ? '%Y-%m-%dT%H:%M:%S%.9fZ' : '%Y-%m-%dT%H:%M:%S%.9f%:z';

  return {
    unix: buildUnixTime(snapshot),
    iso8601: formatTime(snapshot, iso8601Format, timezone),
    rfc3339: formatTime(snapshot, STANDARD_FORMATS.rfc3339, timezone),
    rfc2822: formatTime(snapshot, STANDARD_FORMATS.rfc2822, timezone),
    ctime: formatTime(snapshot, STANDARD_FORMATS.ctime, timezone),
    nanos_since_epoch: snapshot.nanosSinceEpoch.toString(),
    seconds: snapshot.seconds,
    microseconds: snapshot.seconds * 1_000_000 + Math.floor(snapshot.nanos / 1_000),
    milliseconds: snapshot.seconds * 1_000 + Math.floor(snapshot.nanos / 1_000_000),
    year: dt.year,
    month: dt.month,
    day: dt.day,
    hour: dt.hour,
    minute: dt.minute,
    second: dt.second,
    nanosecond: snapshot.nanos,
    timezone,
    offset: offsetSeconds,
    weekday: dt.toFormat('cccc'),
    week_of_year: Number(formatTime(snapshot, '%U', timezone)),
    day_of_year: dt.ordinal,
    custom_formats: {
      unix_date: formatTime(snapshot, STANDARD_FORMATS.unixDate, timezone),
      syslog: formatTime(snapshot, STANDARD_FORMATS.syslog, timezone),
      apache_log: formatTime(snapshot, STANDARD_FORMATS.apacheLog, timezone),
      unix_timestamp: String(snapshot.seconds)
    }
  };
}

export function buildFormattedTime(
  snapshot: TimeSnapshot,
  format: string,
  zone = 'UTC'
): { formatted: string; format: string; timezone: string; unix_seconds: number; unix_nanos: number } {
  return {
    formatted: formatTime(snapshot, format, zone),
    format,
    timezone: zone,
    unix_seconds: snapshot.seconds,
    unix_nanos: snapshot.nanos
  };
}

export function buildTimezoneList(): { timezones: string[]; count: number } {
  const timezones = listTimezones();
  return { timezones, count: timezones.length };
}

export interface ConvertedTime {
  original: { timestamp: number; timezone: string; formatted: string };
  converted: { timestamp: number; timezone: string; formatted: string; offset: number };
}

// This function re-expresses one Unix timestamp in a target zone; the source zone is informational.
export function convertTimestamp(timestamp: number, toTimezone: string, fromTimezone = 'UTC'): ConvertedTime {
  assertTimeZone(fromTimezone);
  assertTimeZone(toTimezone);
  if (!Number.isSafeInteger(timestamp)) {
    throw new AppError(400, 'validation_error', 'Invalid timestamp', { timestamp });
  }
  const snapshot = snapshotFromEpochSeconds(timestamp);
  const target = toZonedDateTime(snapshot, toTimezone);
  // Luxon represents at most 8.64e15 ms either side of the epoch.
  if (!target.isValid) {
    throw new AppError(400, 'validation_error', 'Invalid timestamp', { timestamp });
  }

  return {
    original: {
      timestamp,
      timezone: fromTimezone,
      formatted: formatTime(snapshot, '%Y-%m-%dT%H:%M:%S%:z', 'UTC')
    },
    converted: {
      timestamp,
      timezone: toTimezone,
      formatted: formatTime(snapshot, '%Y-%m-%dT%H:%M:%S%:z', toTimezone),
      offset: target.offset * 60
    }
  };
}
