// This module runs the line-delimited JSON-RPC channel over standard input and output.
// Lines are handled strictly one after another, so responses leave in request order.

import { createInterface } from 'node:readline';
import type { Readable, Writable } from 'node:stream';
import type { FastifyBaseLogger } from 'fastify';
import { dispatchRaw, type DispatchContext } from '../mcp/dispatcher.js';
import { errorForLog } from '../utils/logger.js';

export interface StdioTransportOptions {
  input: Readable;
  output: Writable;
  context: DispatchContext;
  logger: FastifyBaseLogger;
}

export type StdioExit = { reason: 'eof'; handled: number } | { reason: 'io_error'; handled: number; error: Error };

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

function writeLine(output: Writable, line: string): Promise<void> {
  return new Promise((resolve, reject) => {
    output.write(`${line}\n`, (error) => {
      if (error) {
        reject(error);
        return;
      }
      resolve();
    });
  });
}

// This function resolves when input ends or either stream fails; a failure closes only this channel.
// The output error listener stays attached so a late EPIPE cannot crash the process.
export async function runStdioTransport(options: StdioTransportOptions): Promise<StdioExit> {
  const { input, output, context, logger } = options;
  const state: { ioError: Error | null; handled: number } = { ioError: null, handled: 0 };
  const reader = createInterface({ input, crlfDelay: Infinity, terminal: false });

  const onStreamError = (error: Error): void => {
    if (!state.ioError) {
      state.ioError = error;
      logger.error({ event: 'stdio_stream_error', error: errorForLog(error) }, 'stdio_stream_error');
    }
    reader.close();
  };
  input.on('error', onStreamError);
  output.on('error', onStreamError);
  reader.on('error', onStreamError);

  logger.info({ event: 'stdio_transport_started' }, 'stdio_transport_started');

  try {
    for await (const rawLine of reader) {
      if (state.ioError) {
        break;
      }

      const line = rawLine.trim();
      if (line.length === 0) {
        continue;
      }

      const reply = await dispatchRaw(line, context);
      state.handled += 1;
      if (reply !== null) {
        await writeLine(output, reply);
      }
    }
  } catch (error) {
    onStreamError(toError(error));
  } finally {
    input.off('error', onStreamError);
    reader.close();
  }

  if (state.ioError) {
    return { reason: 'io_error', handled: state.handled, error: state.ioError };
  }

  logger.info({ event: 'stdio_transport_eof', handled: state.handled }, 'stdio_transport_eof');
  return { reason: 'eof', handled: state.handled };
}
