/**
 * Node listener for the Hono app.
 */

import { createServer } from 'node:http';
import type { AddressInfo } from 'node:net';
import { getRequestListener } from '@hono/node-server';
import type { Hono } from 'hono';
import { createError, type ListenConfig } from '@screen-digest/core';

export interface RunningServer {
  url: string;
  port: number;
  close(): Promise<void>;
}

/**
 * Bind the app and resolve once it is listening.
 * Rejects with ERROR_SERVER_LISTEN_FAILED when the address cannot be bound;
 * errors after that are logged.
 */
export function startServer(app: Hono, listen: ListenConfig): Promise<RunningServer> {
  const server = createServer(getRequestListener(app.fetch));

  return new Promise((resolve, reject) => {
    const onError = (err: Error): void => {
      reject(createError('ERROR_SERVER_LISTEN_FAILED', `Cannot listen on ${listen.host}:${listen.port}: ${err.message}`, {
        recoverability: 'non-recoverable',
        cause: err,
        userAction: 'Choose another port with --port or SCREEN_DIGEST_PORT.',
      }));
    };

    server.once('error', onError);
    server.listen(listen.port, listen.host, () => {
      server.off('error', onError);
      server.on('error', (err) => {
        console.error('[Server] Error:', err);
      });

      const address = server.address();
      const port = isAddressInfo(address) ? address.port : listen.port;
      const url = `http://${listen.host}:${port}`;
      console.log(`[Server] Listening on ${url}`);

      resolve({
        url,
        port,
        close: () => new Promise<void>((done, fail) => {
          server.close((err) => (err ? fail(err) : done()));
        }),
      });
    });
  });
}

function isAddressInfo(address: string | AddressInfo | null): address is AddressInfo {
  return typeof address === 'object' && address !== null;
}
