// This module wraps IANA zone lookup so handlers share one validation and listing policy.

import { DateTime, IANAZone } from 'luxon';
import { AppError } from '../utils/errors.js';
import type { TimeSnapshot } from './clock.js';

export function isValidTimeZone(value: string): boolean {
  return value === 'UTC' || IANAZone.isValidZone(value);
}

// This helper throws a validation error for unknown zones so callers can map it per protocol family.
export function assertTimeZone(value: string): string {
  if (!isValidTimeZone(value)) {
    throw new AppError(400, 'invalid_timezone', `Invalid timezone: ${value}`, { timezone: value });
  }
  return value;
}

// This helper lists the runtime's IANA zones in a stable order, always including UTC.
export function listTimezones(): string[] {
  const zones = new Set(Intl.supportedValuesOf('timeZone'));
  zones.add('UTC');
  return [...zones].sort((left, right) => left.localeCompare(right));
}

// This helper materializes one snapshot as a zoned luxon DateTime with English names.
export function toZonedDateTime(snapshot: TimeSnapshot, zone: string): DateTime {
  const millis = snapshot.seconds * 1000 + Math.floor(snapshot.nanos / 1_000_000);
  return DateTime.fromMillis(millis, { zone: assertTimeZone(zone), locale: 'en-US' });
}
