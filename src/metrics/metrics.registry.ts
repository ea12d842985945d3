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


export type Counter = {
  inc: (n?: number) => void
};

/**
 * Factory for the counters a socket reports to.
 * Anything exposing `deltaCounter(name)` can be plugged in.
 */
export type MetricsRegistry = {
  deltaCounter: (name: string) => Counter
};

export class DeltaCounter implements Counter {
  readonly name: string;
  private value: number;

  constructor(name: string) {
    this.name = name;
    this.value = 0;
  }

  inc(n = 1) {
    if (!Number.isFinite(n) || n < 0)
      throw new Error(`invalid increment for ${this.name}: ${n}`);
    this.value += n;
  }

  get count() {
    return this.value;
  }

  /** returns the delta accumulated since the previous call */
  getAndClear() {
    const v = this.value;
    this.value = 0;
    return v;
  }
};

export class InMemoryMetricsRegistry implements MetricsRegistry {
  private counters: Map<string, DeltaCounter>;

  constructor() {
    this.counters = new Map();
  }

  deltaCounter(name: string): DeltaCounter {
    const existing = this.counters.get(name);
    if (existing)
      return existing;
    const c = new DeltaCounter(name);
    this.counters.set(name, c);
    return c;
  }

  snapshot(): Record<string, number> {
    return Object.fromEntries(
      this.sorted().map(c => [c.name, c.count])
    );
  }

  drain(): Record<string, number> {
    return Object.fromEntries(
      this.sorted().map(c => [c.name, c.getAndClear()])
    );
  }

  private sorted() {
    return [...this.counters.values()]
      .sort((a, b) => a.name.localeCompare(b.name));
  }
};
