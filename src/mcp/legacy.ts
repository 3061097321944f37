// This module serves the flat time/* methods kept for clients that predate tools/call.
// Their failures are protocol errors, like prompts.

import { z } from 'zod';
import {
  buildFormattedTime,
  buildNanos,
  buildTimeResponse,
  buildTimezoneList,
  buildUnixTime,
  convertTimestamp
} from '../time/responses.js';
import { assertTimeZone } from '../time/timezones.js';
import { AppError } from '../utils/errors.js';
import { assertNever, type LegacyMethod } from './methods.js';
import type { ServiceContext } from './registry.js';
import { convertTimeArgumentsSchema, formatArgumentsSchema, timezoneArgumentsSchema } from './tool-schemas.js';

function parseParams<Schema extends z.ZodTypeAny>(method: LegacyMethod, schema: Schema, params: unknown): z.infer<Schema> {
  const parsed = schema.safeParse(params ?? {});
  if (!parsed.success) {
    throw new AppError(400, 'validation_error', `Invalid params for ${method}.`, parsed.error.flatten());
  }
  return parsed.data;
}

export async function executeLegacyMethod(method: LegacyMethod, params: unknown, context: ServiceContext): Promise<object> {
  switch (method) {
    case 'time/get':
      return buildTimeResponse(context.time.snapshotTime());
    case 'time/get_with_format': {
      const { format } = parseParams(method, formatArgumentsSchema, params);
      return buildFormattedTime(context.time.snapshotTime(), format);
    }
    case 'time/get_with_timezone': {
      const { timezone } = parseParams(method, timezoneArgumentsSchema, params);
      return buildTimeResponse(context.time.snapshotTime(), assertTimeZone(timezone));
    }
    case 'time/get_unix':
      return buildUnixTime(context.time.snapshotTime());
    case 'time/get_nanos':
      return buildNanos(context.time.snapshotTime());
    case 'time/list_timezones':
      return buildTimezoneList();
    case 'time/convert': {
      const args = parseParams(method, convertTimeArgumentsSchema, params);
      return convertTimestamp(args.timestamp, args.to_timezone, args.from_timezone);
    }
    default:
      return assertNever(method);
  }
}
