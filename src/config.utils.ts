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


import { Socket } from 'node:net';
import { ConfigError } from './error.utils.js';
import { debugLoggerFactory } from './socket/socket.debug.js';
import {
  DefaultSocketOptions,
  type ReconnectingSocketConfig,
  type ResolvedConfig
} from './socket/socket.type.js';

export const DEFAULT_HOST = '127.0.0.1';
export const DEFAULT_PORT = 2878;

const assertPositive = (name: string, v: number) => {
  if (!Number.isFinite(v) || v <= 0)
    throw new ConfigError(`invalid ${name}: ${v} (must be > 0)`);
};

export const resolveConfig = (config: ReconnectingSocketConfig): ResolvedConfig => {
  const { host, port } = config;

  if ('string' !== typeof host || host.trim().length === 0)
    throw new ConfigError('invalid host: empty');

  if (!Number.isInteger(port) || port < 1 || port > 65535)
    throw new ConfigError(`invalid port: ${port} (use 1-65535)`);

  const resolved: ResolvedConfig = {
    host,
    port,
    metricsRegistry: config.metricsRegistry,
    entityPrefix: config.entityPrefix ?? '',
    loggerFactory: config.loggerFactory ?? debugLoggerFactory,
    socketFactory: config.socketFactory ?? (() => new Socket()),
    connectTimeout: config.connectTimeout ?? DefaultSocketOptions.connectTimeout,
    readTimeout: config.readTimeout ?? DefaultSocketOptions.readTimeout,
    bufferSize: config.bufferSize ?? DefaultSocketOptions.bufferSize
  };

  assertPositive('connectTimeout', resolved.connectTimeout);
  assertPositive('readTimeout', resolved.readTimeout);
  assertPositive('bufferSize', resolved.bufferSize);

  return resolved;
};

/** `write.success` → `prefix.write.success`, blank prefix leaves the name as is */
export const prefixedName = (entityPrefix: string) => {
  const p = entityPrefix.trim().length === 0 ? '' : `${entityPrefix}.`;
  return (name: string) => `${p}${name}`;
};

/** reads `TELEMETRY_TCP_ADDRESS=host:port`, falling back on the given defaults */
export const getCollectorAddress = (
  host = DEFAULT_HOST,
  port = DEFAULT_PORT,
  env: NodeJS.ProcessEnv = process.env
): [string, number] => {
  const addr = env.TELEMETRY_TCP_ADDRESS;
  if (!addr)
    return [host, port];

  const idx = addr.lastIndexOf(':');
  if (idx === -1)
    return [addr, port];

  const p = parseInt(addr.slice(idx + 1), 10);
  const valid = Number.isInteger(p) && p >= 1 && p <= 65535;
  return [addr.slice(0, idx) || host, valid ? p : port];
};
