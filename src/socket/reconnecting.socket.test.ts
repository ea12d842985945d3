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


import { afterEach, describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { once } from 'node:events';
import { Socket } from 'node:net';
import { InMemoryMetricsRegistry } from '../metrics/metrics.registry.js';
import { createReconnectingSocket, type ReconnectingSocket } from './reconnecting.socket.js';
import {
  ConfigError, ConnectError, ConnectTimeoutError, SocketClosedError, WriteError
} from '../error.utils.js';
import {
  closedPort, recordingLoggerFactory, startCollector, waitUntil, type TestCollector
} from '../tcp.collector.utils.js';

class StallingSocket extends Socket {
  override connect(): this {
    return this;
  }
};

const counters = (over: Record<string, number> = {}) => ({
  'test.flush.errors': 0,
  'test.flush.success': 0,
  'test.reset.errors': 0,
  'test.reset.success': 0,
  'test.write.errors': 0,
  'test.write.success': 0,
  ...over
});

describe('ReconnectingSocket', () => {
  let collector: TestCollector | undefined;
  let client: ReconnectingSocket | undefined;
  let registry: InMemoryMetricsRegistry;

  const open = async () => {
    const col = await startCollector();
    collector = col;
    registry = new InMemoryMetricsRegistry();
    const c = await createReconnectingSocket({
      host: '127.0.0.1',
      port: col.port,
      metricsRegistry: registry,
      entityPrefix: 'test',
      loggerFactory: recordingLoggerFactory()
    });
    client = c;
    return { collector: col, client: c };
  };

  /** peer drops the connection, resolves once the client noticed */
  const severed = async (c: ReconnectingSocket, col: TestCollector) => {
    await waitUntil(() => col.connections.length > 0);
    const disconnected = once(c, 'disconnected');
    await col.dropConnections();
    await disconnected;
  };

  afterEach(async () => {
    await client?.close();
    await collector?.close();
    client = undefined;
    collector = undefined;
  });

  it('writes and flushes on a live connection', async () => {
    const { collector, client } = await open();
    assert.equal(client.connected, true);

    await client.write('m1\n');
    assert.deepEqual(registry.snapshot(), counters({ 'test.write.success': 1 }));

    await client.flush();
    assert.deepEqual(registry.snapshot(), counters({
      'test.write.success': 1, 'test.flush.success': 1
    }));
    await waitUntil(() => collector.received() === 'm1\n');
  });

  it('resets once and retries a write after the peer dropped', async () => {
    const { collector, client } = await open();
    await severed(client, collector);
    assert.equal(client.connected, false);

    await client.write('x\n');
    await client.flush();

    assert.deepEqual(registry.snapshot(), counters({
      'test.write.success': 1, 'test.reset.success': 1, 'test.flush.success': 1
    }));
    assert.equal(client.connected, true);
    await waitUntil(() => collector.received() === 'x\n');
  });

  it('surfaces a write error when the reset fails too', async () => {
    const { collector, client } = await open();
    await waitUntil(() => collector.connections.length > 0);
    const disconnected = once(client, 'disconnected');
    await collector.close();
    await disconnected;

    await assert.rejects(
      client.write('x\n'),
      (err: unknown) => {
        assert.ok(err instanceof WriteError);
        assert.ok(err.cause instanceof ConnectError);
        return true;
      }
    );
    assert.deepEqual(registry.snapshot(), counters({
      'test.write.errors': 1, 'test.reset.errors': 1
    }));
  });

  it('lets only one of many concurrent writers reconnect', async () => {
    const { collector, client } = await open();
    await severed(client, collector);

    const results = await Promise.allSettled(
      ['a', 'b', 'c', 'd', 'e'].map(m => client.write(`${m}\n`))
    );

    assert.equal(results.filter(r => r.status === 'fulfilled').length, 1);
    assert.equal(results.filter(r => r.status === 'rejected').length, 4);
    assert.deepEqual(registry.snapshot(), counters({
      'test.write.success': 1, 'test.write.errors': 4, 'test.reset.success': 1
    }));
  });

  it('never throws on flush and repairs in background', async () => {
    const { collector, client } = await open();
    await severed(client, collector);

    const reconnected = once(client, 'connect');
    await client.flush();
    assert.deepEqual(registry.snapshot(), counters({ 'test.flush.errors': 1 }));

    await reconnected;
    assert.deepEqual(registry.snapshot(), counters({
      'test.flush.errors': 1, 'test.reset.success': 1
    }));
    assert.equal(client.connected, true);
  });

  it('collapses concurrent flush failures into a single reset', async () => {
    const { collector, client } = await open();
    await severed(client, collector);

    let connects = 0;
    client.on('connect', () => { connects += 1; });
    const reconnected = once(client, 'connect');
    await Promise.all([client.flush(), client.flush(), client.flush()]);
    await reconnected;

    assert.equal(connects, 1);
    assert.deepEqual(registry.snapshot(), counters({
      'test.flush.errors': 3, 'test.reset.success': 1
    }));
  });

  it('can be closed twice and is terminal', async () => {
    const { client } = await open();
    await client.close();
    await client.close();

    assert.equal(client.isClosed, true);
    assert.equal(client.connected, false);
    await assert.rejects(client.write('late\n'), SocketClosedError);
    await client.flush();
    assert.deepEqual(registry.snapshot(), counters());
  });

  it('logs the successful connect', async () => {
    const loggerFactory = recordingLoggerFactory();
    const col = await startCollector();
    collector = col;
    client = await createReconnectingSocket({
      host: '127.0.0.1',
      port: col.port,
      metricsRegistry: new InMemoryMetricsRegistry(),
      loggerFactory
    });
    assert.deepEqual(loggerFactory.lines, [
      { level: 'info', message: 'Successfully connected to %s:%d' }
    ]);
  });

  it('names counters without prefix when none is given', async () => {
    const col = await startCollector();
    collector = col;
    const reg = new InMemoryMetricsRegistry();
    client = await createReconnectingSocket({
      host: '127.0.0.1',
      port: col.port,
      metricsRegistry: reg,
      entityPrefix: '  ',
      loggerFactory: recordingLoggerFactory()
    });
    assert.deepEqual(Object.keys(reg.snapshot()), [
      'flush.errors', 'flush.success',
      'reset.errors', 'reset.success',
      'write.errors', 'write.success'
    ]);
  });

  it('closes the previous connection when connecting over a live one', async () => {
    const { collector, client } = await open();
    await client._connect(false);
    await waitUntil(() => collector.connections.length === 2);
    await waitUntil(() => collector.connections[0].destroyed);

    await client.close();
    await waitUntil(() => collector.connections.every(c => c.destroyed));
    assert.deepEqual(registry.snapshot(), counters());
  });

  it('keeps the stale connection when a reset times out', async () => {
    const col = await startCollector();
    collector = col;
    registry = new InMemoryMetricsRegistry();
    let created = 0;
    const c = await createReconnectingSocket({
      host: '127.0.0.1',
      port: col.port,
      connectTimeout: 50,
      metricsRegistry: registry,
      entityPrefix: 'test',
      loggerFactory: recordingLoggerFactory(),
      socketFactory: () => (created++ === 0 ? new Socket() : new StallingSocket())
    });
    client = c;
    await severed(c, col);

    await assert.rejects(c.write('x\n'), WriteError);
    assert.equal(created, 2);
    assert.equal(c.connected, false);
    assert.deepEqual(registry.snapshot(), counters({ 'test.write.errors': 1 }));
  });

});

describe('createReconnectingSocket', () => {

  it('fails when the endpoint refuses connections', async () => {
    const port = await closedPort();
    const registry = new InMemoryMetricsRegistry();
    await assert.rejects(
      createReconnectingSocket({
        host: '127.0.0.1', port, metricsRegistry: registry,
        loggerFactory: recordingLoggerFactory()
      }),
      ConnectError
    );
    // initial connect is not a reset
    assert.equal(registry.snapshot()['reset.errors'], 0);
  });

  it('fails when the connect times out', async () => {
    await assert.rejects(
      createReconnectingSocket({
        host: '127.0.0.1',
        port: 2878,
        connectTimeout: 50,
        metricsRegistry: new InMemoryMetricsRegistry(),
        loggerFactory: recordingLoggerFactory(),
        socketFactory: () => new StallingSocket()
      }),
      ConnectTimeoutError
    );
  });

  it('rejects invalid config', async () => {
    const metricsRegistry = new InMemoryMetricsRegistry();
    await assert.rejects(
      createReconnectingSocket({ host: '', port: 2878, metricsRegistry }),
      ConfigError
    );
    await assert.rejects(
      createReconnectingSocket({ host: '127.0.0.1', port: 70000, metricsRegistry }),
      ConfigError
    );
    await assert.rejects(
      createReconnectingSocket({
        host: '127.0.0.1', port: 2878, bufferSize: 0, metricsRegistry
      }),
      ConfigError
    );
  });

});
