#!/usr/bin/env node
// This is the process entrypoint: it loads configuration, starts the enabled transports and
// handles graceful shutdown. HTTP and STDIO fail independently of each other.

import type { FastifyInstance } from 'fastify';
import { ApiKeyValidator } from './config/api-keys.js';
import { loadConfig, type AppConfig } from './config/env.js';
import { createDefaultRegistry } from './mcp/registry.js';
import { ServiceMetrics } from './observability/metrics.js';
import { createServer } from './server.js';
import { createSyncStatusMonitor } from './sync/monitor.js';
import { createTimeService } from './time/clock.js';
import { runStdioTransport } from './transport/stdio.js';
import { normalizeError } from './utils/errors.js';
import { createLogger, errorForLog, sanitizeForLog } from './utils/logger.js';
import { MCP_SERVER_NAME, MCP_SERVER_VERSION } from './version.js';

function readConfig(): AppConfig {
  try {
    return loadConfig();
  } catch (error) {
    const appError = normalizeError(error);
    createLogger('info').fatal(
      { event: 'config_invalid', message: appError.message, details: sanitizeForLog(appError.details) },
      'config_invalid'
    );
    process.exit(1);
  }
}

async function main(): Promise<void> {
  const config = readConfig();
  const logger = createLogger(config.logLevel);
  const time = createTimeService();
  const sync = createSyncStatusMonitor(config, logger);
  const registry = createDefaultRegistry();
  const metrics = new ServiceMetrics();
  const apiKeys = ApiKeyValidator.fromEnv();
  let app: FastifyInstance | null = null;
  let shuttingDown = false;

  logger.info(
    {
      event: 'service_starting',
      name: MCP_SERVER_NAME,
      version: MCP_SERVER_VERSION,
      http: config.enableHttp,
      stdio: config.enableStdio,
      containerMode: config.containerMode,
      apiKeys: apiKeys.size,
      shmPath: config.shm.enabled ? config.shm.path : null
    },
    'service_starting'
  );

  // This helper performs graceful shutdown so in-flight HTTP replies complete before exit.
  const shutdown = async (reason: string, exitCode: number): Promise<void> => {
    if (shuttingDown) {
      return;
    }
    shuttingDown = true;
    logger.info({ event: 'shutdown_started', reason }, 'shutdown_started');

    try {
      await app?.close();
    } catch (error) {
      logger.error({ event: 'shutdown_close_failed', error: errorForLog(error) }, 'shutdown_close_failed');
      exitCode = 1;
    }

    logger.info({ event: 'shutdown_completed', reason }, 'shutdown_completed');
    process.exit(exitCode);
  };

  process.on('SIGTERM', () => {
    void shutdown('SIGTERM', 0);
  });

  process.on('SIGINT', () => {
    void shutdown('SIGINT', 0);
  });

  if (config.enableHttp) {
    try {
      app = await createServer({ config, logger, registry, time, sync, metrics, apiKeys });
      await app.listen({ host: config.host, port: config.port });
      logger.info({ event: 'server_started', host: config.host, port: config.port }, 'server_started');
    } catch (error) {
      logger.error({ event: 'server_start_failed', error: errorForLog(error) }, 'server_start_failed');
      await app?.close();
      app = null;
      if (!config.enableStdio) {
        await shutdown('http_start_failed', 1);
        return;
      }
    }
  }

  if (!config.enableStdio) {
    return;
  }

  const exit = await runStdioTransport({
    input: process.stdin,
    output: process.stdout,
    context: { registry, time, sync, metrics, transport: 'stdio', logger: logger.child({ component: 'stdio' }) },
    logger
  });

  if (exit.reason === 'eof') {
    await shutdown('stdin_eof', 0);
    return;
  }

  logger.error({ event: 'stdio_channel_closed', handled: exit.handled, error: errorForLog(exit.error) }, 'stdio_channel_closed');
  if (!app) {
    await shutdown('stdio_io_error', 1);
  }
}

main().catch((error: unknown) => {
  createLogger('info').fatal({ event: 'service_failed', error: errorForLog(error) }, 'service_failed');
  process.exit(1);
});
