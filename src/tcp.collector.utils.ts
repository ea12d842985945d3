/**
 * Licensed to the Apache Software Foundation (ASF) under one
 * or more contributor license agreements.  See the NOTICE file
 * distributed with this work for additional information
 * regarding copyright ownership.  The ASF licenses this file
 * to you under the Apache License, Version 2.0 (the
 * "License"); you may not use this file except in compliance
 * with the License.  You may obtain a copy of the License at
 *
 *   http://www.apache.org/licenses/LICENSE-2.0
 *
 * Unless required by applicable law or agreed to in writing,
 * software distributed under the License is distributed on an
 * "AS IS" BASIS, WITHOUT WARRANTIES OR CONDITIONS OF ANY
 * KIND, either express or implied.  See the License for the
 * specific language governing permissions and limitations
 * under the License.
 */


import { createServer, type Server, type Socket } from 'node:net';
import { once } from 'node:events';
import type { Logger, LoggerFactory } from './socket/socket.debug.js';

/** in process line collector standing in for the real endpoint */
export type TestCollector = {
  server: Server,
  port: number,
  connections: Socket[],
  received: () => string,
  dropConnections: () => Promise<void>,
  close: () => Promise<void>
};

export const startCollector = async (port = 0): Promise<TestCollector> => {
  const connections: Socket[] = [];
  let data = '';

  const server = createServer((sock) => {
    connections.push(sock);
    sock.on('data', (chunk: Buffer) => { data += chunk.toString('utf8'); });
    sock.on('error', () => undefined);
  });
  server.listen(port, '127.0.0.1');
  await once(server, 'listening');
  const addr = server.address();
  if (!addr || 'string' === typeof addr)
    throw new Error('collector has no tcp address');

  const dropConnections = async () => {
    const live = connections.splice(0).filter(c => !c.destroyed);
    await Promise.all(live.map(c => {
      const closed = once(c, 'close');
      c.destroy();
      return closed;
    }));
  };

  return {
    server,
    port: addr.port,
    connections,
    received: () => data,
    dropConnections,
    close: async () => {
      await dropConnections();
      await new Promise<void>(resolve => server.close(() => resolve()));
    }
  };
};

/** a port nothing listens on */
export const closedPort = async () => {
  const c = await startCollector();
  await c.close();
  return c.port;
};

export const sleep = (interval: number) =>
  new Promise(resolve => setTimeout(resolve, interval));

export const waitUntil = async (cond: () => boolean, timeout = 2000, step = 10) => {
  const until = Date.now() + timeout;
  while (!cond()) {
    if (Date.now() > until)
      throw new Error(`condition not met within ${timeout} ms`);
    await sleep(step);
  }
};

export type RecordedLine = { level: keyof Logger, message: string };

/** logger factory keeping every line in memory */
export const recordingLoggerFactory = (): LoggerFactory & { lines: RecordedLine[] } => {
  const lines: RecordedLine[] = [];
  const factory = () => ({
    info: (message: string) => { lines.push({ level: 'info', message }); },
    warn: (message: string) => { lines.push({ level: 'warn', message }); }
  });
  return Object.assign(factory, { lines });
};
