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


import { EventEmitter } from 'node:events';
import type { Socket } from 'node:net';
import type { Counter } from '../metrics/metrics.registry.js';
import type {
  ConnectOutcome, ReconnectingSocketConfig, ResolvedConfig
} from './socket.type.js';
import { BufferedSocketStream } from './socket.stream.js';
import { SingleFlightGate, connectSocket } from './socket.utils.js';
import { prefixedName, resolveConfig } from '../config.utils.js';
import { LOG_NAMESPACE, debug, type Logger } from './socket.debug.js';
import {
  ConnectError, ConnectTimeoutError, SocketClosedError, SocketGoneError, WriteError
} from '../error.utils.js';


type ConnectionState = Readonly<{
  socket: Socket,
  stream: BufferedSocketStream
}>;

type SocketCounters = {
  writeSuccesses: Counter,
  writeErrors: Counter,
  flushSuccesses: Counter,
  flushErrors: Counter,
  resetSuccesses: Counter,
  resetErrors: Counter
};

const createCounters = ({ metricsRegistry, entityPrefix }: ResolvedConfig): SocketCounters => {
  const name = prefixedName(entityPrefix);
  return {
    writeSuccesses: metricsRegistry.deltaCounter(name('write.success')),
    writeErrors: metricsRegistry.deltaCounter(name('write.errors')),
    flushSuccesses: metricsRegistry.deltaCounter(name('flush.success')),
    flushErrors: metricsRegistry.deltaCounter(name('flush.errors')),
    resetSuccesses: metricsRegistry.deltaCounter(name('reset.success')),
    resetErrors: metricsRegistry.deltaCounter(name('reset.errors'))
  };
};


/**
 * Long lived, one way TCP client for a line oriented collector.
 *
 * Every write goes to the current connection; when it fails the connection
 * is reset once and the write retried. Flush failures schedule a reset in
 * the background and are never surfaced. Only one connect runs at a time,
 * concurrent reset requests are dropped rather than queued.
 *
 * Emits `connect` after each successful (re)connect and `disconnected` when
 * the live socket closes.
 */
export class ReconnectingSocket extends EventEmitter {
  readonly config: ResolvedConfig;
  private state?: ConnectionState;
  private gate: SingleFlightGate;
  private counters: SocketCounters;
  private logger: Logger;
  private closed: boolean;

  constructor(config: ReconnectingSocketConfig) {
    super();
    this.config = resolveConfig(config);
    this.gate = new SingleFlightGate();
    this.counters = createCounters(this.config);
    this.logger = this.config.loggerFactory(LOG_NAMESPACE);
    this.closed = false;
  }

  get endpoint() {
    const { host, port } = this.config;
    return { host, port };
  }

  get connected() {
    const s = this.state?.socket;
    return !!s && !s.destroyed && s.writable;
  }

  get isClosed() {
    return this.closed;
  }

  async _connect(isReset: boolean): Promise<ConnectOutcome> {
    if (this.closed || !this.gate.tryAcquire()) {
      debug('connect skipped', { isReset, closed: this.closed });
      return 'skipped';
    }

    try {
      // a live state is never replaced without closing it first
      if (isReset || this.state)
        await this._teardown();

      const { host, port, connectTimeout } = this.config;
      const socket = this._createSocket();

      try {
        const { timedOut } = await connectSocket(socket, host, port, connectTimeout);
        if (timedOut) {
          this.logger.warn('Unable to connect to %s:%d (timed out after %d ms)',
            host, port, connectTimeout);
          socket.destroy();
          return 'timeout';
        }
      } catch (err) {
        if (isReset)
          this.counters.resetErrors.inc();
        this.logger.warn('Unable to connect to %s:%d %o', host, port, err);
        socket.destroy();
        throw new ConnectError(this.endpoint, err);
      }

      if (this.closed) {
        debug('closed while connecting, dropping new socket');
        socket.destroy();
        return 'skipped';
      }

      this.state = Object.freeze({
        socket,
        stream: new BufferedSocketStream(socket, this.config.bufferSize)
      });
      if (isReset)
        this.counters.resetSuccesses.inc();
      this.logger.info('Successfully connected to %s:%d', host, port);
      this.emit('connect');
      return 'connected';
    } finally {
      this.gate.release();
    }
  }

  /**
   * Sends `message` as utf8, record delimiters are up to the caller.
   * Throws `WriteError` when the retry after a reset failed as well.
   */
  async write(message: string): Promise<void> {
    if (this.closed)
      throw new SocketClosedError();

    const bytes = Buffer.from(message, 'utf8');
    try {
      await this._writeBytes(bytes);
      this.counters.writeSuccesses.inc();
    } catch (err) {
      try {
        this.logger.warn('Attempting to reset socket connection. %o', err);
        await this._connect(true);
        await this._writeBytes(bytes);
        this.counters.writeSuccesses.inc();
      } catch (err2) {
        this.counters.writeErrors.inc();
        throw new WriteError(this.endpoint, err2);
      }
    }
  }

  /** Best effort, a failed flush resets the connection in background. */
  async flush(): Promise<void> {
    if (this.closed)
      return;

    try {
      await this._current().stream.flush();
      this.counters.flushSuccesses.inc();
    } catch (err) {
      this.counters.flushErrors.inc();
      this.logger.warn('Attempting to reset socket connection. %o', err);
      this._connect(true).catch((resetErr: unknown) => {
        this.logger.warn('Background reset failed %o', resetErr);
      });
    }
  }

  async close(): Promise<void> {
    this.closed = true;
    await this._teardown();
  }

  _current(): ConnectionState {
    if (!this.state)
      throw new SocketGoneError('no connection established');
    return this.state;
  }

  _writeBytes(bytes: Buffer) {
    return this._current().stream.write(bytes);
  }

  async _teardown() {
    const state = this.state;
    if (!state)
      return;
    try {
      await state.stream.close();
    } catch (err) {
      this.logger.info('Could not flush and close socket. %o', err);
    }
    state.socket.destroy();
  }

  _createSocket(): Socket {
    const socket = this.config.socketFactory();
    socket.setTimeout(this.config.readTimeout);
    socket.on('timeout', () => debug('socket idle for', this.config.readTimeout, 'ms'));
    socket.on('error', (err) => debug('socket/error event', err));
    // one way client, incoming bytes are discarded
    socket.on('data', (data: Buffer) => debug('<== discarded', data.length));
    socket.once('close', (hadError: boolean) => {
      debug('socket/close event', { hadError });
      if (this.state?.socket === socket)
        this.emit('disconnected', hadError);
    });
    return socket;
  }
};


/**
 * Creates the socket and waits for the first connection.
 * Rejects with `ConnectError` or `ConnectTimeoutError` when it cannot be made.
 */
export const createReconnectingSocket = async (
  config: ReconnectingSocketConfig
): Promise<ReconnectingSocket> => {
  const s = new ReconnectingSocket(config);
  const outcome = await s._connect(false);
  if (outcome !== 'connected') {
    await s.close();
    throw new ConnectTimeoutError(s.endpoint, s.config.connectTimeout);
  }
  return s;
};
