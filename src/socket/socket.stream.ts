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


import type { Socket } from 'node:net';
import { SocketClosedError, SocketGoneError } from '../error.utils.js';
import { socketEnd, socketWrite } from './socket.utils.js';
import { debug } from './socket.debug.js';


/**
 * Buffered output side of a connected socket.
 *
 * `write`, `flush` and `close` run one at a time in call order, so bytes
 * of concurrent writers are never interleaved on the wire.
 */
export class BufferedSocketStream {
  readonly socket: Socket;
  readonly bufferSize: number;
  private pending: Buffer;
  private tail: Promise<void>;
  private closed: boolean;

  constructor(socket: Socket, bufferSize: number) {
    this.socket = socket;
    this.bufferSize = bufferSize;
    this.pending = Buffer.alloc(0);
    this.tail = Promise.resolve();
    this.closed = false;
  }

  /** bytes waiting for the next flush */
  get buffered() {
    return this.pending.length;
  }

  get isClosed() {
    return this.closed;
  }

  write(bytes: Buffer): Promise<void> {
    return this._enqueue(async () => {
      this._assertWritable();

      if (bytes.length >= this.bufferSize) {
        await this._flushPending();
        await socketWrite(this.socket, bytes);
        return;
      }

      if (this.pending.length + bytes.length > this.bufferSize)
        await this._flushPending();

      this.pending = Buffer.concat([this.pending, bytes]);
    });
  }

  flush(): Promise<void> {
    return this._enqueue(async () => {
      this._assertWritable();
      await this._flushPending();
    });
  }

  close(): Promise<void> {
    return this._enqueue(async () => {
      if (this.closed)
        return;
      this.closed = true;
      if (this.socket.destroyed) {
        this.pending = Buffer.alloc(0);
        throw new SocketGoneError('socket destroyed before close');
      }
      await this._flushPending();
      await socketEnd(this.socket);
    });
  }

  _enqueue<T>(job: () => Promise<T>): Promise<T> {
    const run = this.tail.then(job);
    this.tail = run.then(() => undefined, () => undefined);
    return run;
  }

  _assertWritable() {
    if (this.closed)
      throw new SocketClosedError('stream is closed');
    if (this.socket.destroyed || !this.socket.writable)
      throw new SocketGoneError();
  }

  async _flushPending() {
    if (this.pending.length === 0)
      return;
    // dropped on failure, delivery is at most once
    const chunk = this.pending;
    this.pending = Buffer.alloc(0);
    debug('==> flush', chunk.length);
    await socketWrite(this.socket, chunk);
  }
};
