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


import { once } from 'node:events';
import type { Socket } from 'node:net';
import { debug } from './socket.debug.js';

/**
 * Non blocking mutual exclusion: `tryAcquire` either takes the slot or
 * returns false right away, callers never wait for the holder.
 */
export class SingleFlightGate {
  private busy: boolean;

  constructor() {
    this.busy = false;
  }

  get locked() {
    return this.busy;
  }

  tryAcquire(): boolean {
    if (this.busy)
      return false;
    this.busy = true;
    return true;
  }

  release() {
    this.busy = false;
  }
};

export type TimedConnect = { timedOut: boolean };

const isAbortError = (err: unknown) =>
  err instanceof Error && err.name === 'AbortError';

/**
 * Connects `socket` to `host:port`, resolves `{ timedOut: true }` when
 * `timeout` elapses first and rejects with the socket error otherwise.
 */
export const connectSocket = async (
  socket: Socket,
  host: string,
  port: number,
  timeout: number
): Promise<TimedConnect> => {
  const ac = new AbortController();
  const timer = setTimeout(() => ac.abort(), timeout);
  const connected = once(socket, 'connect', { signal: ac.signal });
  try {
    socket.connect({ host, port });
    await connected;
    debug('socket connected', { host, port });
    return { timedOut: false };
  } catch (err) {
    if (isAbortError(err))
      return { timedOut: true };
    throw err;
  } finally {
    clearTimeout(timer);
  }
};

export const socketWrite = (socket: Socket, chunk: Buffer): Promise<void> =>
  new Promise((resolve, reject) => {
    socket.write(chunk, (err) => err ? reject(err) : resolve());
  });

export const socketEnd = (socket: Socket): Promise<void> =>
  new Promise((resolve, reject) => {
    socket.end((err?: Error | null) => err ? reject(err) : resolve());
  });
