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


import Debug from 'debug';

export type LogFn = (formatter: string, ...args: unknown[]) => void;

export type Logger = {
  info: LogFn,
  warn: LogFn
};

export type LoggerFactory = (namespace: string) => Logger;

export const LOG_NAMESPACE = 'telemetry:socket';

/** info goes to `<namespace>`, warnings to `<namespace>:warn` */
export const debugLoggerFactory: LoggerFactory = (namespace) => ({
  info: Debug(namespace),
  warn: Debug(`${namespace}:warn`)
});

export const debug = Debug(`${LOG_NAMESPACE}:trace`);
