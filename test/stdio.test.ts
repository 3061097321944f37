// This test suite verifies line framing, response ordering and channel shutdown of the STDIO transport.

import { PassThrough, Writable } from 'node:stream';
import { describe, expect, it } from 'vitest';
import type { SyncStatus } from '../src/sync/types.js';
import { runStdioTransport } from '../src/transport/stdio.js';
import { createSilentLogger } from '../src/utils/logger.js';
import { SYNCED_STATUS, ScriptedSync, createTestContext } from './helpers.js';

function collector(): { stream: Writable; lines: () => unknown[] } {
  let text = '';
  const stream = new Writable({
    write(chunk: Buffer, _encoding, callback) {
      text += chunk.toString('utf8');
      callback();
    }
  });
  return {
    stream,
    lines: () =>
      text
        .split('\n')
        .filter((line) => line.length > 0)
        .map((line): unknown => JSON.parse(line))
  };
}

describe('runStdioTransport', () => {
  it('answers each line in order and ends on EOF', async () => {
    const input = new PassThrough();
    const output = collector();
    const running = runStdioTransport({ input, output: output.stream, context: createTestContext(), logger: createSilentLogger() });

    input.end(
      [
        '{"jsonrpc":"2.0","id":1,"method":"ping"}',
        '',
        '   ',
        '{"jsonrpc":"2.0","method":"notifications/initialized"}',
        '{not json'
      ].join('\n') + '\n'
    );

    expect(await running).toEqual({ reason: 'eof', handled: 3 });
    expect(output.lines()).toEqual([
      { jsonrpc: '2.0', id: 1, result: {} },
      expect.objectContaining({ id: null, error: expect.objectContaining({ code: -32700, message: 'Parse error' }) })
    ]);
  });

  it('keeps request order when an earlier request is slower', async () => {
    const sync = new ScriptedSync(
      () =>
        new Promise<SyncStatus>((resolve) => {
          setTimeout(() => resolve(SYNCED_STATUS), 30);
        })
    );
    const input = new PassThrough();
    const output = collector();
    const running = runStdioTransport({
      input,
      output: output.stream,
      context: createTestContext({ sync }),
      logger: createSilentLogger()
    });

    input.write('{"jsonrpc":"2.0","id":"slow","method":"tools/call","params":{"name":"get_ntp_status"}}\n');
    input.write('{"jsonrpc":"2.0","id":"fast","method":"ping"}\r\n');
    input.end();

    expect(await running).toEqual({ reason: 'eof', handled: 2 });
    expect(output.lines()).toMatchObject([{ id: 'slow', result: { isError: false } }, { id: 'fast', result: {} }]);
    expect(sync.statusCalls).toBe(1);
  });

  it('closes the channel when the output fails', async () => {
    const input = new PassThrough();
    const output = new Writable({
      write(_chunk, _encoding, callback) {
        callback(new Error('EPIPE'));
      }
    });
    const running = runStdioTransport({ input, output, context: createTestContext(), logger: createSilentLogger() });

    input.write('{"jsonrpc":"2.0","id":1,"method":"ping"}\n{"jsonrpc":"2.0","id":2,"method":"ping"}\n');

    const exit = await running;
    expect(exit.reason).toBe('io_error');
    expect(exit.handled).toBe(1);
    if (exit.reason === 'io_error') {
      expect(exit.error.message).toBe('EPIPE');
    }
  });
});
