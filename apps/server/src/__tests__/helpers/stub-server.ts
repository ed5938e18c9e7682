import type { Express } from 'express';
import http from 'http';
import net from 'net';
import type { BackendEndpoint } from '../../types/backend.js';

export interface StubServer {
  endpoint: BackendEndpoint;
  close(): Promise<void>;
}

/** 在 127.0.0.1 的随机端口上启动一个 express 应用，充当 opencode serve */
export async function startStubServer(app: Express): Promise<StubServer> {
  const server: http.Server = await new Promise(resolve => {
    const listening = app.listen(0, '127.0.0.1', () => resolve(listening));
  });
  const addr = server.address();
  if (!addr || typeof addr === 'string') {
    throw new Error('stub server has no port');
  }
  return {
    endpoint: { baseUrl: `http://127.0.0.1:${addr.port}`, host: '127.0.0.1', port: addr.port },
    close: () => new Promise(resolve => {
      server.closeAllConnections();
      server.close(() => resolve());
    }),
  };
}

/** 取一个刚释放、当前无人监听的端口 */
export async function findClosedPort(): Promise<number> {
  const server = net.createServer();
  await new Promise<void>(resolve => server.listen(0, '127.0.0.1', () => resolve()));
  const addr = server.address();
  await new Promise<void>(resolve => server.close(() => resolve()));
  if (!addr || typeof addr === 'string') {
    throw new Error('no port allocated');
  }
  return addr.port;
}
