import type { Server } from 'http';
import { createApp } from '@api/app';
import type { Registry } from '@core/registry';
import type { ApiResponse } from '@shared/types';

export interface TestServer {
  baseUrl: string;
  close: () => Promise<void>;
}

/** Serves the app on an ephemeral loopback port for the duration of a test. */
export async function startServer(registry: Registry): Promise<TestServer> {
  const app = createApp(registry);
  const server = await new Promise<Server>((resolve) => {
    const listening = app.listen(0, '127.0.0.1', () => resolve(listening));
  });
  const address = server.address();
  if (address === null || typeof address === 'string') {
    throw new Error('server is not listening on a TCP port');
  }
  return {
    baseUrl: `http://127.0.0.1:${address.port}`,
    close: () =>
      new Promise<void>((resolve, reject) => {
        server.close((err) => (err ? reject(err) : resolve()));
      }),
  };
}

export interface JsonResult<T> {
  status: number;
  body: ApiResponse<T>;
}

export async function requestJson<T = unknown>(
  baseUrl: string,
  method: string,
  path: string,
  body?: unknown,
): Promise<JsonResult<T>> {
  const res = await fetch(`${baseUrl}${path}`, {
    method,
    headers: body === undefined ? undefined : { 'content-type': 'application/json' },
    body: body === undefined ? undefined : JSON.stringify(body),
  });
  return { status: res.status, body: (await res.json()) as ApiResponse<T> };
}
