/**
 * Listener lifecycle tests against an in-process stand-in for node:http.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { NO_DATA_REPORT, ReportService } from '@screen-digest/core';
import { createReportApp } from '../app.js';
import { startServer } from '../serve.js';

interface StubServer {
  emit(event: string, ...args: unknown[]): boolean;
  listenerCount(event: string): number;
  closed: boolean;
}

const created = vi.hoisted(() => {
  const servers: StubServer[] = [];
  return { servers };
});

vi.mock('node:http', async () => {
  const { EventEmitter } = await import('node:events');

  class FakeServer extends EventEmitter {
    private port = 0;
    closed = false;

    listen(port: number, _host: string, callback: () => void): this {
      this.port = port;
      if (port === 1) {
        queueMicrotask(() => this.emit('error', new Error('address in use')));
      } else {
        queueMicrotask(callback);
      }
      return this;
    }

    address(): { address: string; family: string; port: number } {
      return { address: '127.0.0.1', family: 'IPv4', port: this.port === 0 ? 43210 : this.port };
    }

    close(callback: (err?: Error) => void): this {
      this.closed = true;
      callback();
      return this;
    }
  }

  return {
    createServer: vi.fn(() => {
      const server = new FakeServer();
      created.servers.push(server);
      return server;
    }),
  };
});

function app() {
  return createReportApp({ service: new ReportService({ currentReport: () => NO_DATA_REPORT }, { subject: 'robin' }) });
}

describe('startServer()', () => {
  beforeEach(() => {
    created.servers.length = 0;
    vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('resolves with the bound address', async () => {
    const running = await startServer(app(), { host: '127.0.0.1', port: 5000 });

    expect(running.url).toBe('http://127.0.0.1:5000');
    expect(running.port).toBe(5000);
  });

  it('reports the assigned port when asked for port 0', async () => {
    const running = await startServer(app(), { host: '127.0.0.1', port: 0 });

    expect(running.port).toBe(43210);
    expect(running.url).toBe('http://127.0.0.1:43210');
  });

  it('rejects when the address cannot be bound', async () => {
    await expect(startServer(app(), { host: '127.0.0.1', port: 1 })).rejects.toMatchObject({
      code: 'ERROR_SERVER_LISTEN_FAILED',
      recoverability: 'non-recoverable',
      message: 'Cannot listen on 127.0.0.1:1: address in use',
    });
  });

  it('logs errors raised after listening instead of crashing', async () => {
    const logged = vi.spyOn(console, 'error').mockImplementation(() => {});
    await startServer(app(), { host: '127.0.0.1', port: 5000 });
    const [server] = created.servers;
    const err = new Error('connection reset');

    expect(server.listenerCount('error')).toBe(1);
    expect(() => server.emit('error', err)).not.toThrow();
    expect(logged).toHaveBeenCalledWith('[Server] Error:', err);
  });

  it('closes the underlying server', async () => {
    const running = await startServer(app(), { host: '127.0.0.1', port: 5000 });

    await running.close();

    expect(created.servers[0].closed).toBe(true);
  });
});
