/**
 * Tests for the dedupe gates.
 */

import { describe, expect, it } from 'vitest';

import { QueueError } from '../errors/queue-error.js';
import { createFakeBroker } from '../test-utils/fake-broker.js';
import {
  createBrokerDedupeGate,
  createMemoryDedupeGate,
  type DedupeGate,
} from './gate.js';

interface Harness {
  gate: DedupeGate;
  advance(ms: number): void;
}

function memoryHarness(): Harness {
  let now = 1_000_000;
  return {
    gate: createMemoryDedupeGate({ now: () => now }),
    advance(ms) {
      now += ms;
    },
  };
}

function brokerHarness(): Harness {
  const broker = createFakeBroker();
  return {
    gate: createBrokerDedupeGate(broker),
    advance(ms) {
      broker.advance(ms);
    },
  };
}

describe.each([
  ['memory', memoryHarness],
  ['broker', brokerHarness],
])('%s dedupe gate', (_name, harness) => {
  it('should let exactly one caller set a key', async () => {
    const { gate } = harness();
    expect(await gate.trySetKey('reading:abc', 300)).toBe(true);
    expect(await gate.trySetKey('reading:abc', 300)).toBe(false);
    expect(await gate.exists('reading:abc')).toBe(true);
  });

  it('should let exactly one of many concurrent callers win', async () => {
    const { gate } = harness();
    const results = await Promise.all(
      Array.from({ length: 10 }, () => gate.trySetKey('reading:race', 60)),
    );
    expect(results.filter(Boolean)).toHaveLength(1);
  });

  it('should release the key after its TTL', async () => {
    const { gate, advance } = harness();
    await gate.trySetKey('reading:ttl', 2);
    advance(1999);
    expect(await gate.exists('reading:ttl')).toBe(true);
    advance(1);
    expect(await gate.exists('reading:ttl')).toBe(false);
    expect(await gate.trySetKey('reading:ttl', 2)).toBe(true);
  });

  it('should report the remaining TTL', async () => {
    const { gate, advance } = harness();
    expect(await gate.getTtl('reading:missing')).toBeNull();
    await gate.trySetKey('reading:t', 300);
    advance(100_500);
    expect(await gate.getTtl('reading:t')).toBe(200);
  });

  it('should delete keys and tolerate missing ones', async () => {
    const { gate } = harness();
    await gate.trySetKey('reading:del', 300);
    await gate.deleteKey('reading:del');
    await gate.deleteKey('reading:del');
    expect(await gate.exists('reading:del')).toBe(false);
    expect(await gate.trySetKey('reading:del', 300)).toBe(true);
  });

  it.each([
    ['', 300],
    ['   ', 300],
    ['k', 0],
    ['k', -5],
    ['k', 1.5],
  ])('should reject key %j with ttl %d before any backend call', async (key, ttl) => {
    const { gate } = harness();
    const err = await gate.trySetKey(key, ttl).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(QueueError);
    expect(err).toMatchObject({ kind: 'invalid_payload' });
  });
});

describe('createMemoryDedupeGate', () => {
  it('should sweep expired keys so distinct keys do not accumulate', async () => {
    let now = 0;
    const gate = createMemoryDedupeGate({ now: () => now });

    for (let i = 0; i < 50; i += 1) {
      await gate.trySetKey(`daily:${String(i)}`, 60);
    }
    expect(gate.size()).toBe(50);

    now = 61_000;
    await gate.trySetKey('daily:next', 60);

    expect(gate.size()).toBe(1);
    expect(await gate.exists('daily:0')).toBe(false);
  });
});

describe('createBrokerDedupeGate', () => {
  it('should send a single SET NX EX with the key prefix', async () => {
    const broker = createFakeBroker();
    const gate = createBrokerDedupeGate(broker, { keyPrefix: 'dedupe:' });

    await gate.trySetKey('reading:abc', 300);

    expect(broker.calls).toEqual([
      {
        command: 'SET',
        args: ['dedupe:reading:abc', '1', 'NX', 'EX', '300'],
        blocking: false,
      },
    ]);
  });

  it('should not call the broker for invalid input', async () => {
    const broker = createFakeBroker();
    const gate = createBrokerDedupeGate(broker);
    await expect(gate.exists('')).rejects.toBeInstanceOf(QueueError);
    expect(broker.calls).toEqual([]);
  });

  it('should classify broker failures', async () => {
    const broker = createFakeBroker();
    const gate = createBrokerDedupeGate(broker);
    broker.failNext('SET', Object.assign(new Error('read ECONNRESET'), { code: 'ECONNRESET' }));

    await expect(gate.trySetKey('reading:abc', 300)).rejects.toMatchObject({
      kind: 'connection_failed',
    });
  });
});
