// This test suite verifies the argument contracts and published JSON Schemas of the time tools.

import { describe, expect, it } from 'vitest';
import {
  convertTimeArgumentsSchema,
  emptyArgumentsSchema,
  formatArgumentsSchema,
  timezoneArgumentsSchema,
  toolEntries,
  toolInputSchema,
  toolSchemas
} from '../src/mcp/tool-schemas.js';

describe('tool schema safety', () => {
  it('bounds format strings', () => {
    expect(() => formatArgumentsSchema.parse({ format: '' })).toThrow();
    expect(() => formatArgumentsSchema.parse({ format: '%Y'.repeat(300) })).toThrow();
    expect(formatArgumentsSchema.parse({ format: '%H:%M' })).toEqual({ format: '%H:%M' });
  });

  it('trims timezone names and rejects blanks', () => {
    expect(timezoneArgumentsSchema.parse({ timezone: '  Europe/Berlin ' })).toEqual({ timezone: 'Europe/Berlin' });
    expect(() => timezoneArgumentsSchema.parse({ timezone: '   ' })).toThrow();
  });

  it('requires an integer timestamp and a target zone for conversion', () => {
    expect(() => convertTimeArgumentsSchema.parse({ timestamp: 1.5, to_timezone: 'UTC' })).toThrow();
    expect(() => convertTimeArgumentsSchema.parse({ timestamp: 1 })).toThrow();
    expect(convertTimeArgumentsSchema.parse({ timestamp: 1, to_timezone: 'UTC' })).toEqual({ timestamp: 1, to_timezone: 'UTC' });
  });

  it('accepts empty argument objects for argument-free tools', () => {
    expect(emptyArgumentsSchema.parse({})).toEqual({});
  });

  it('lists every tool that has a schema exactly once', () => {
    const names = toolEntries.map((entry) => entry.name);

    expect(new Set(names).size).toBe(names.length);
    expect([...names].sort()).toEqual(Object.keys(toolSchemas).sort());
  });

  it('publishes inline object schemas', () => {
    const schema = toolInputSchema('get_time_formatted');

    expect(schema.$schema).toBeUndefined();
    expect(schema.type).toBe('object');
    expect(schema.required).toEqual(['format']);
    expect(schema.additionalProperties).toBe(false);
  });
});
