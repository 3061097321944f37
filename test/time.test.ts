// This test suite verifies strftime rendering, zoned responses and timestamp conversion.

import { describe, expect, it } from 'vitest';
import { snapshotFromEpochNanos, snapshotFromEpochSeconds } from '../src/time/clock.js';
import { buildFormattedTime, buildNanos, buildTimeResponse, buildUnixTime, convertTimestamp } from '../src/time/responses.js';
import { formatTime } from '../src/time/strftime.js';
import { isValidTimeZone, listTimezones } from '../src/time/timezones.js';
import { AppError } from '../src/utils/errors.js';
import { FIXED_SNAPSHOT } from './helpers.js';

describe('time snapshots', () => {
  it('splits epoch nanoseconds into seconds and a non-negative remainder', () => {
    expect(FIXED_SNAPSHOT.seconds).toBe(1_700_000_000);
    expect(FIXED_SNAPSHOT.nanos).toBe(123_456_789);

    const beforeEpoch = snapshotFromEpochNanos(-1n);
    expect(beforeEpoch.seconds).toBe(-1);
    expect(beforeEpoch.nanos).toBe(999_999_999);
  });
});

describe('formatTime', () => {
  it('renders date and time directives', () => {
    expect(formatTime(FIXED_SNAPSHOT, '%Y-%m-%d %H:%M:%S')).toBe('2023-11-14 22:13:20');
    expect(formatTime(FIXED_SNAPSHOT, '%j %U %a %A %b %B')).toBe('318 46 Tue Tuesday Nov November');
    expect(formatTime(FIXED_SNAPSHOT, '%I:%M %p')).toBe('10:13 PM');
    expect(formatTime(FIXED_SNAPSHOT, '%D|%T|%F|%%')).toBe('11/14/23|22:13:20|2023-11-14|%');
    expect(formatTime(FIXED_SNAPSHOT, '%s')).toBe('1700000000');
  });

  it('renders fractional seconds at fixed and automatic precision', () => {
    expect(formatTime(FIXED_SNAPSHOT, '%.3f|%.6f|%f|%.f')).toBe('.123|.123456|123456789|.123456789');
    expect(formatTime(snapshotFromEpochSeconds(1_700_000_000), 'x%.fx')).toBe('xx');
  });

  it('honours padding modifiers', () => {
    const early = snapshotFromEpochSeconds(1_704_171_845); // 2024-01-02 05:04:05 UTC
    expect(formatTime(early, '%-d/%-m %_H %e')).toBe('2/1  5  2');
  });

  it('renders zone names and offsets in the target zone', () => {
    expect(formatTime(FIXED_SNAPSHOT, '%Z %z %:z')).toBe('UTC +0000 +00:00');
    expect(formatTime(FIXED_SNAPSHOT, '%H %Z %z', 'America/New_York')).toBe('17 EST -0500');
  });

  it('rejects unknown and truncated specifiers', () => {
    expect(() => formatTime(FIXED_SNAPSHOT, '%Q')).toThrowError('Unsupported format specifier: %Q');
    expect(() => formatTime(FIXED_SNAPSHOT, 'abc%')).toThrowError('Invalid format specifier at position 3.');

    let caught: unknown = null;
    try {
      formatTime(FIXED_SNAPSHOT, '%Q');
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(AppError);
    if (caught instanceof AppError) {
      expect(caught.code).toBe('format_error');
      expect(caught.statusCode).toBe(400);
    }
  });
});

describe('time responses', () => {
  it('derives every UTC field from one snapshot', () => {
    const response = buildTimeResponse(FIXED_SNAPSHOT);

    expect(response.iso8601).toBe('2023-11-14T22:13:20.123456789Z');
    expect(response.rfc3339).toBe('2023-11-14T22:13:20.123456789+00:00');
    expect(response.rfc2822).toBe('Tue, 14 Nov 2023 22:13:20 +0000');
    expect(response.ctime).toBe('Tue Nov 14 22:13:20 2023');
    expect(response.nanos_since_epoch).toBe('1700000000123456789');
    expect(response.milliseconds).toBe(1_700_000_000_123);
    expect(response.microseconds).toBe(1_700_000_000_123_456);
    expect(response).toMatchObject({
      year: 2023,
      month: 11,
      day: 14,
      hour: 22,
      minute: 13,
      second: 20,
      nanosecond: 123_456_789,
      timezone: 'UTC',
      offset: 0,
      weekday: 'Tuesday',
      week_of_year: 46,
      day_of_year: 318
    });
    expect(response.custom_formats).toEqual({
      unix_date: 'Tue Nov 14 22:13:20 UTC 2023',
      syslog: 'Nov 14 22:13:20',
      apache_log: '14/Nov/2023:22:13:20 +0000',
      unix_timestamp: '1700000000'
    });
  });

  it('computes components in the requested zone', () => {
    const response = buildTimeResponse(FIXED_SNAPSHOT, 'America/New_York');

    expect(response.iso8601).toBe('2023-11-14T17:13:20.123456789-05:00');
    expect(response.hour).toBe(17);
    expect(response.offset).toBe(-18_000);
    expect(response.timezone).toBe('America/New_York');
    expect(response.custom_formats.unix_date).toBe('Tue Nov 14 17:13:20 EST 2023');
  });

  it('rejects unknown zones', () => {
    expect(() => buildTimeResponse(FIXED_SNAPSHOT, 'Mars/Olympus')).toThrowError('Invalid timezone: Mars/Olympus');
  });

  it('builds the unix, nanos and formatted payloads', () => {
    expect(buildUnixTime(FIXED_SNAPSHOT)).toEqual({
      seconds: 1_700_000_000,
      nanos: 123_456_789,
      nanos_since_epoch: '1700000000123456789'
    });
    expect(buildNanos(FIXED_SNAPSHOT)).toEqual({
      nanoseconds: '1700000000123456789',
      seconds: 1_700_000_000,
      subsec_nanos: 123_456_789
    });
    expect(buildFormattedTime(FIXED_SNAPSHOT, '%H:%M')).toEqual({
      formatted: '22:13',
      format: '%H:%M',
      timezone: 'UTC',
      unix_seconds: 1_700_000_000,
      unix_nanos: 123_456_789
    });
  });

  it('converts a timestamp into another zone', () => {
    expect(convertTimestamp(1_700_000_000, 'America/New_York')).toEqual({
      original: { timestamp: 1_700_000_000, timezone: 'UTC', formatted: '2023-11-14T22:13:20+00:00' },
      converted: {
        timestamp: 1_700_000_000,
        timezone: 'America/New_York',
        formatted: '2023-11-14T17:13:20-05:00',
        offset: -18_000
      }
    });
    expect(convertTimestamp(1_700_000_000, 'Asia/Tokyo', 'Europe/Berlin').converted.formatted).toBe('2023-11-15T07:13:20+09:00');
    expect(() => convertTimestamp(1_700_000_000, 'Nowhere/Land')).toThrowError('Invalid timezone: Nowhere/Land');
  });

  it('rejects timestamps outside the representable range', () => {
    expect(convertTimestamp(8_640_000_000_000, 'UTC').converted.offset).toBe(0);
    expect(() => convertTimestamp(8_640_000_000_001, 'UTC')).toThrowError('Invalid timestamp');
    expect(() => convertTimestamp(-100_000_000_000_000, 'Asia/Tokyo')).toThrowError('Invalid timestamp');
    expect(() => convertTimestamp(1e20, 'UTC')).toThrowError('Invalid timestamp');
  });
});

describe('timezones', () => {
  it('lists a sorted catalog that includes UTC', () => {
    const zones = listTimezones();

    expect(zones).toContain('UTC');
    expect(zones).toContain('America/New_York');
    expect([...zones].sort((left, right) => left.localeCompare(right))).toEqual(zones);
    expect(isValidTimeZone('Europe/London')).toBe(true);
    expect(isValidTimeZone('Europe/Atlantis')).toBe(false);
  });
});
