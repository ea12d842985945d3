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
import type { MetricsRegistry } from '../metrics/metrics.registry.js';
import type { LoggerFactory } from './socket.debug.js';

export type SocketOptions = {
  /** ms allowed for a connect attempt before it is abandoned */
  connectTimeout: number,
  /** idle timeout configured on every socket */
  readTimeout: number,
  /** bytes held by the output stream before they hit the wire */
  bufferSize: number
};

export const DefaultSocketOptions: SocketOptions = {
  connectTimeout: 2000,
  readTimeout: 2000,
  bufferSize: 8192
};

export type SocketFactory = () => Socket;

export type ReconnectingSocketConfig = {
  host: string,
  port: number,
  metricsRegistry: MetricsRegistry,
  entityPrefix?: string,
  loggerFactory?: LoggerFactory,
  socketFactory?: SocketFactory
} & Partial<SocketOptions>;

export type ConnectOutcome = 'connected' | 'timeout' | 'skipped';

export type ResolvedConfig = {
  host: string,
  port: number,
  metricsRegistry: MetricsRegistry,
  entityPrefix: string,
  loggerFactory: LoggerFactory,
  socketFactory: SocketFactory
} & SocketOptions;
