// This module parses process environment variables into one validated runtime configuration.

import { z } from 'zod';
import { AppError } from '../utils/errors.js';

// This helper accepts the yes/no/true/false/1/0 spellings used by deployment scripts.
const flagSchema = (fallback: boolean) =>
  z
    .string()
    .trim()
    .toLowerCase()
    .optional()
    .transform((value, ctx) => {
      if (value === undefined || value === '') {
        return fallback;
      }
      if (['yes', 'true', '1', 'on'].includes(value)) {
        return true;
      }
      if (['no', 'false', '0', 'off'].includes(value)) {
        return false;
      }
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Expected a boolean flag, got "${value}".` });
      return z.NEVER;
    });

const intSchema = (fallback: number, min: number, max: number) =>
  z
    .string()
    .trim()
    .optional()
    .transform((value) => (value === undefined || value === '' ? fallback : Number(value)))
    .pipe(z.number().int().min(min).max(max));

const optionalIntSchema = (min: number, max: number) =>
  z
    .string()
    .trim()
    .optional()
    .transform((value) => (value === undefined || value === '' ? undefined : Number(value)))
    .pipe(z.number().int().min(min).max(max).optional());

const listSchema = z
  .string()
  .optional()
  .transform((value) =>
    (value ?? '')
      .split(',')
      .map((entry) => entry.trim())
      .filter((entry) => entry.length > 0)
  );

const envSchema = z.object({
  HOST: z.string().trim().min(1).default('0.0.0.0'),
  PORT: z.string().trim().optional(),
  HEALTH_PORT: z.string().trim().optional(),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  ENABLE_HTTP_API: flagSchema(true),
  ENABLE_HEALTH_SERVER: z.string().optional(),
  CONTAINER_APP_NAME: z.string().optional(),
  KUBERNETES_SERVICE_HOST: z.string().optional(),
  HTTP_API_ONLY: z.string().optional(),
  NTP_SERVERS: listSchema,
  ENABLE_PPS: flagSchema(false),
  ENABLE_GPS: flagSchema(false),
  PPS_GPIO: optionalIntSchema(0, 1024),
  PPS_DEVICE: z.string().trim().min(1).default('/dev/pps0'),
  GPS_DEVICE: z.string().trim().min(1).default('/dev/ttyAMA0'),
  GPS_BAUD: intSchema(9600, 300, 921_600),
  LOCAL_STRATUM: optionalIntSchema(0, 16),
  NTP_SHM_ENABLED: flagSchema(true),
  NTP_SHM_PATH: z.string().trim().min(1).default('/dev/shm/ntpd0'),
  NTP_SHM_MAX_ATTEMPTS: intSchema(3, 1, 20),
  NTP_SHM_MAX_AGE_MS: intSchema(60_000, 1_000, 3_600_000),
  NTPQ_PATH: z.string().trim().min(1).default('ntpq'),
  SYNC_QUERY_TIMEOUT_MS: intSchema(2_000, 50, 30_000),
  HTTP_REQUEST_TIMEOUT_MS: intSchema(5_000, 100, 120_000)
});

export interface HardwareSourceConfig {
  pps: { enabled: boolean; device: string; gpioPin?: number };
  gps: { enabled: boolean; device: string; baudRate: number };
}

export interface AppConfig {
  host: string;
  port: number;
  logLevel: string;
  enableHttp: boolean;
  enableStdio: boolean;
  containerMode: boolean;
  ntpServers: string[];
  localStratum?: number;
  hardware: HardwareSourceConfig;
  shm: {
    enabled: boolean;
    path: string;
    maxAttempts: number;
    maxSampleAgeMs: number;
  };
  ntpqPath: string;
  syncQueryTimeoutMs: number;
  httpRequestTimeoutMs: number;
}

const DEFAULT_NTP_SERVERS = ['time.cloudflare.com', 'time.google.com'];

// This helper resolves the listening port, accepting HEALTH_PORT as a legacy alias.
function resolvePort(port: string | undefined, healthPort: string | undefined): number {
  const raw = port ?? healthPort;
  if (raw === undefined || raw === '') {
    return 8080;
  }

  const parsed = Number(raw);
  if (!Number.isInteger(parsed) || parsed < 0 || parsed > 65_535) {
    throw new AppError(500, 'config_invalid', 'PORT must be an integer between 0 and 65535.', { port: raw });
  }

  return parsed;
}

// This function validates one environment map and derives feature toggles for both transports.
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    throw new AppError(500, 'config_invalid', 'Environment configuration is invalid.', result.error.flatten().fieldErrors);
  }

  const parsed = result.data;
  const containerMode =
    parsed.CONTAINER_APP_NAME !== undefined ||
    parsed.KUBERNETES_SERVICE_HOST !== undefined ||
    parsed.HTTP_API_ONLY !== undefined;

  // ENABLE_HEALTH_SERVER is the older name of ENABLE_HTTP_API and only applies when the new one is unset.
  const enableHttp =
    env.ENABLE_HTTP_API === undefined && parsed.ENABLE_HEALTH_SERVER !== undefined
      ? !['no', 'false', '0', 'off'].includes(parsed.ENABLE_HEALTH_SERVER.trim().toLowerCase())
      : parsed.ENABLE_HTTP_API;

  return {
    host: parsed.HOST,
    port: resolvePort(parsed.PORT, parsed.HEALTH_PORT),
    logLevel: parsed.LOG_LEVEL,
    enableHttp: enableHttp || containerMode,
    enableStdio: !containerMode,
    containerMode,
    ntpServers: parsed.NTP_SERVERS.length > 0 ? parsed.NTP_SERVERS : DEFAULT_NTP_SERVERS,
    localStratum: parsed.LOCAL_STRATUM,
    hardware: {
      pps: { enabled: parsed.ENABLE_PPS, device: parsed.PPS_DEVICE, gpioPin: parsed.PPS_GPIO },
      gps: { enabled: parsed.ENABLE_GPS, device: parsed.GPS_DEVICE, baudRate: parsed.GPS_BAUD }
    },
    shm: {
      enabled: parsed.NTP_SHM_ENABLED,
      path: parsed.NTP_SHM_PATH,
      maxAttempts: parsed.NTP_SHM_MAX_ATTEMPTS,
      maxSampleAgeMs: parsed.NTP_SHM_MAX_AGE_MS
    },
    ntpqPath: parsed.NTPQ_PATH,
    syncQueryTimeoutMs: parsed.SYNC_QUERY_TIMEOUT_MS,
    httpRequestTimeoutMs: parsed.HTTP_REQUEST_TIMEOUT_MS
  };
}
