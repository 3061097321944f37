// This module interprets strftime-style format strings against a time snapshot using luxon.

import type { DateTime } from 'luxon';
import { AppError } from '../utils/errors.js';
import type { TimeSnapshot } from './clock.js';
import { toZonedDateTime } from './timezones.js';

type PadModifier = '-' | '_' | '0' | undefined;

interface FormatInput {
  dt: DateTime;
  snapshot: TimeSnapshot;
  pad: PadModifier;
}

type Directive = (input: FormatInput) => string;

// This helper pads numeric fields, honouring the -, _ and 0 padding modifiers.
function pad(value: number, width: number, fill: '0' | ' ', modifier: PadModifier): string {
  const digits = String(Math.abs(value));
  const sign = value < 0 ? '-' : '';
  if (modifier === '-') {
    return `${sign}${digits}`;
  }
  const filler = modifier === '_' ? ' ' : modifier === '0' ? '0' : fill;
  return `${sign}${digits.padStart(width, filler)}`;
}

const numeric =
  (read: (dt: DateTime) => number, width: number, fill: '0' | ' ' = '0'): Directive =>
  ({ dt, pad: modifier }) =>
    pad(read(dt), width, fill, modifier);

function hour12(dt: DateTime): number {
  return dt.hour % 12 === 0 ? 12 : dt.hour % 12;
}

// Sunday-based week number (%U); luxon weekday runs 1 (Monday) to 7 (Sunday).
function sundayWeek(dt: DateTime): number {
  return Math.floor((dt.ordinal - 1 + 7 - (dt.weekday % 7)) / 7);
}

function mondayWeek(dt: DateTime): number {
  return Math.floor((dt.ordinal - 1 + 7 - (dt.weekday - 1)) / 7);
}

function offset(dt: DateTime, separator: string): string {
  const minutes = dt.offset;
  const sign = minutes < 0 ? '-' : '+';
  const absolute = Math.abs(minutes);
  return `${sign}${String(Math.floor(absolute / 60)).padStart(2, '0')}${separator}${String(absolute % 60).padStart(2, '0')}`;
}

// Fraction with the fewest of 0, 3, 6 or 9 digits that represents the nanoseconds exactly.
function autoFraction(nanos: number): string {
  if (nanos === 0) {
    return '';
  }
  if (nanos % 1_000_000 === 0) {
    return `.${String(nanos / 1_000_000).padStart(3, '0')}`;
  }
  if (nanos % 1_000 === 0) {
    return `.${String(nanos / 1_000).padStart(6, '0')}`;
  }
  return `.${String(nanos).padStart(9, '0')}`;
}

function fixedFraction(nanos: number, digits: 3 | 6 | 9): string {
  return String(nanos).padStart(9, '0').slice(0, digits);
}

const DIRECTIVES: Readonly<Record<string, Directive>> = Object.freeze({
  Y: numeric((dt) => dt.year, 4),
  C: numeric((dt) => Math.floor(dt.year / 100), 2),
  y: numeric((dt) => dt.year % 100, 2),
  G: numeric((dt) => dt.weekYear, 4),
  g: numeric((dt) => dt.weekYear % 100, 2),
  m: numeric((dt) => dt.month, 2),
  b: ({ dt }) => dt.toFormat('LLL'),
  h: ({ dt }) => dt.toFormat('LLL'),
  B: ({ dt }) => dt.toFormat('LLLL'),
  d: numeric((dt) => dt.day, 2),
  e: numeric((dt) => dt.day, 2, ' '),
  a: ({ dt }) => dt.toFormat('ccc'),
  A: ({ dt }) => dt.toFormat('cccc'),
  w: numeric((dt) => dt.weekday % 7, 1),
  u: numeric((dt) => dt.weekday, 1),
  U: numeric(sundayWeek, 2),
  W: numeric(mondayWeek, 2),
  V: numeric((dt) => dt.weekNumber, 2),
  j: numeric((dt) => dt.ordinal, 3),
  H: numeric((dt) => dt.hour, 2),
  k: numeric((dt) => dt.hour, 2, ' '),
  I: numeric(hour12, 2),
  l: numeric(hour12, 2, ' '),
  P: ({ dt }) => (dt.hour < 12 ? 'am' : 'pm'),
  p: ({ dt }) => (dt.hour < 12 ? 'AM' : 'PM'),
  M: numeric((dt) => dt.minute, 2),
  S: numeric((dt) => dt.second, 2),
  f: ({ snapshot }) => String(snapshot.nanos).padStart(9, '0'),
  '.f': ({ snapshot }) => autoFraction(snapshot.nanos),
  '.3f': ({ snapshot }) => `.${fixedFraction(snapshot.nanos, 3)}`,
  '.6f': ({ snapshot }) => `.${fixedFraction(snapshot.nanos, 6)}`,
  '.9f': ({ snapshot }) => `.${fixedFraction(snapshot.nanos, 9)}`,
  '3f': ({ snapshot }) => fixedFraction(snapshot.nanos, 3),
  '6f': ({ snapshot }) => fixedFraction(snapshot.nanos, 6),
  '9f': ({ snapshot }) => fixedFraction(snapshot.nanos, 9),
  Z: ({ dt }) => (dt.zoneName === 'UTC' ? 'UTC' : dt.offsetNameShort ?? offset(dt, ':')),
  z: ({ dt }) => offset(dt, ''),
  ':z': ({ dt }) => offset(dt, ':'),
  s: ({ snapshot }) => String(snapshot.seconds),
  t: () => '\t',
  n: () => '\n',
  '%': () => '%'
});

// Composite directives expand to other directives before evaluation.
const COMPOSITES: Readonly<Record<string, string>> = Object.freeze({
  D: '%m/%d/%y',
  x: '%m/%d/%y',
  F: '%Y-%m-%d',
  v: '%e-%b-%Y',
  R: '%H:%M',
  T: '%H:%M:%S',
  X: '%H:%M:%S',
  r: '%I:%M:%S %p',
  c: '%a %b %e %H:%M:%S %Y'
});

const DIRECTIVE_PATTERN = /^([-_0])?(\.[369]?f|[369]f|:z|[A-Za-z%])/;

function render(dt: DateTime, snapshot: TimeSnapshot, pattern: string): string {
  let output = '';
  let index = 0;

  while (index < pattern.length) {
    const percent = pattern.indexOf('%', index);
    if (percent === -1) {
      output += pattern.slice(index);
      break;
    }

    output += pattern.slice(index, percent);
    const match = DIRECTIVE_PATTERN.exec(pattern.slice(percent + 1));
    if (!match) {
      throw new AppError(400, 'format_error', `Invalid format specifier at position ${percent}.`, { format: pattern });
    }

    const [token, modifier, name] = match;
    const composite = COMPOSITES[name];
    const directive = DIRECTIVES[name];

    if (composite !== undefined) {
      output += render(dt, snapshot, composite);
    } else if (directive !== undefined) {
      output += directive({ dt, snapshot, pad: modifier === '-' || modifier === '_' || modifier === '0' ? modifier : undefined });
    } else {
      throw new AppError(400, 'format_error', `Unsupported format specifier: %${name}`, { format: pattern });
    }

    index = percent + 1 + token.length;
  }

  return output;
}

// This function formats one snapshot in the given zone; unknown specifiers raise a format_error.
export function formatTime(snapshot: TimeSnapshot, pattern: string, zone = 'UTC'): string {
  return render(toZonedDateTime(snapshot, zone), snapshot, pattern);
}

export const STANDARD_FORMATS = Object.freeze({
  rfc3339: '%Y-%m-%dT%H:%M:%S%.f%:z',
  rfc2822: '%a, %-d %b %Y %H:%M:%S %z',
  ctime: '%c',
  unixDate: '%a %b %e %H:%M:%S %Z %Y',
  syslog: '%b %d %H:%M:%S',
  apacheLog: '%d/%b/%Y:%H:%M:%S %z',
  unixTimestamp: '%s'
});
