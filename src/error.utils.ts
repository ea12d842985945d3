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


export type Endpoint = { host: string, port: number };

const address = ({ host, port }: Endpoint) => `${host}:${port}`;

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
    Object.setPrototypeOf(this, ConfigError.prototype);
  }
}

/** connect raised an error (refused, unreachable, dns failure...) */
export class ConnectError extends Error {
  constructor(endpoint: Endpoint, cause?: unknown) {
    super(`unable to connect to ${address(endpoint)}`, { cause });
    this.name = "ConnectError";
    Object.setPrototypeOf(this, ConnectError.prototype);
  }
}

/** initial connect did not complete within the connect timeout */
export class ConnectTimeoutError extends Error {
  constructor(endpoint: Endpoint, timeout: number) {
    super(`connect to ${address(endpoint)} timed out after ${timeout} ms`);
    this.name = "ConnectTimeoutError";
    Object.setPrototypeOf(this, ConnectTimeoutError.prototype);
  }
}

/** write failed twice (before and after a reset), message was not sent */
export class WriteError extends Error {
  constructor(endpoint: Endpoint, cause?: unknown) {
    super(`failed to write to ${address(endpoint)}`, { cause });
    this.name = "WriteError";
    Object.setPrototypeOf(this, WriteError.prototype);
  }
}

export class SocketGoneError extends Error {
  constructor(message = 'socket is not writable') {
    super(message);
    this.name = "SocketGoneError";
    Object.setPrototypeOf(this, SocketGoneError.prototype);
  }
}

export class SocketClosedError extends Error {
  constructor(message = 'socket is closed') {
    super(message);
    this.name = "SocketClosedError";
    Object.setPrototypeOf(this, SocketClosedError.prototype);
  }
}
