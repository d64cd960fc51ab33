/**
 * In-process stand-in for a stream broker: the subset of stream, key and expiry commands the queue and dedupe gate send, with a settable clock and failure injection.
 */

import { BrokerReplyError } from '../errors/transport.js';
import type {
  CommandArg,
  CommandExecutor,
  ExecuteOptions,
} from '../queue/stream/commands.js';

interface Entry {
  seq: number;
  id: string;
  fields: string[];
}

interface PendingEntry {
  consumer: string;
  deliveredAt: number;
  deliveries: number;
}

interface Group {
  lastDelivered: number;
  pending: Map<string, PendingEntry>;
}

interface Stream {
  entries: Entry[];
  groups: Map<string, Group>;
}

interface KeyValue {
  value: string;
  expiresAt: number | null;
}

/** A command the fake received. */
export interface RecordedCall {
  command: string;
  args: string[];
  blocking: boolean;
}

export interface FakeBroker extends CommandExecutor {
  readonly calls: RecordedCall[];
  /** Current fake time in ms. */
  now: number;
  /** Advance the clock. */
  advance(ms: number): void;
  /** Make the next `times` calls of a command reject with `error`. */
  failNext(command: string, error: unknown, times?: number): void;
  /** Entries of a stream as field records, oldest first. */
  entries(key: string): Array<{ id: string; fields: Record<string, string> }>;
  /** Write a raw entry, bypassing the queue's encoder. */
  addRaw(key: string, fields: Record<string, string>): string;
  /** Whether close() has been called. */
  readonly closed: boolean;
}

function seqOf(id: string): number {
  return Number.parseInt(id.split('-')[0] ?? '0', 10);
}

function toRecord(flat: string[]): Record<string, string> {
  const out: Record<string, string> = {};
  for (let i = 0; i + 1 < flat.length; i += 2) {
    out[flat[i] ?? ''] = flat[i + 1] ?? '';
  }
  return out;
}

/** Create an empty fake broker with its clock at `start` ms. */
export function createFakeBroker(start = 1_000_000): FakeBroker {
  const streams = new Map<string, Stream>();
  const keys = new Map<string, KeyValue>();
  const failures = new Map<string, { error: unknown; times: number }>();
  const calls: RecordedCall[] = [];
  let nextSeq = 1;
  let closed = false;

  const broker = {
    calls,
    now: start,
    get closed() {
      return closed;
    },
    advance(ms: number) {
      broker.now += ms;
    },
    failNext(command: string, error: unknown, times = 1) {
      failures.set(command, { error, times });
    },
    entries(key: string) {
      return (streams.get(key)?.entries ?? []).map((e) => ({
        id: e.id,
        fields: toRecord(e.fields),
      }));
    },
    addRaw(key: string, fields: Record<string, string>) {
      return append(key, Object.entries(fields).flat(), true);
    },
    async execute(
      command: string,
      rawArgs: CommandArg[],
      options?: ExecuteOptions,
    ) {
      const args = rawArgs.map(String);
      calls.push({ command, args, blocking: options?.blocking ?? false });

      const failure = failures.get(command);
      if (failure) {
        failure.times -= 1;
        if (failure.times <= 0) failures.delete(command);
        throw failure.error;
      }
      return run(command, args);
    },
    async close() {
      closed = true;
    },
  };

  function stream(key: string, create: boolean): Stream | undefined {
    let s = streams.get(key);
    if (!s && create) {
      s = { entries: [], groups: new Map() };
      streams.set(key, s);
    }
    return s;
  }

  function group(key: string, name: string): Group {
    const g = streams.get(key)?.groups.get(name);
    if (!g) {
      throw new BrokerReplyError(
        `NOGROUP No such key '${key}' or consumer group '${name}'`,
      );
    }
    return g;
  }

  function append(key: string, fields: string[], create: boolean): string {
    const s = stream(key, create);
    if (!s) throw new BrokerReplyError('ERR no such key');
    const seq = nextSeq++;
    const id = `${String(seq)}-0`;
    s.entries.push({ seq, id, fields });
    return id;
  }

  function live(key: string): KeyValue | undefined {
    const kv = keys.get(key);
    if (kv && kv.expiresAt !== null && kv.expiresAt <= broker.now) {
      keys.delete(key);
      return undefined;
    }
    return kv;
  }

  function run(command: string, args: string[]): unknown {
    switch (command) {
      case 'XGROUP': {
        const [, key = '', name = ''] = args;
        const s = stream(key, args.includes('MKSTREAM'));
        if (!s) {
          throw new BrokerReplyError(
            'ERR The XGROUP subcommand requires the key to exist',
          );
        }
        if (s.groups.has(name)) {
          throw new BrokerReplyError(
            'BUSYGROUP Consumer Group name already exists',
          );
        }
        s.groups.set(name, { lastDelivered: 0, pending: new Map() });
        return 'OK';
      }

      case 'XADD': {
        const [key = '', , ...fields] = args;
        return append(key, fields, true);
      }

      case 'XREADGROUP': {
        const name = args[1] ?? '';
        const consumer = args[2] ?? '';
        const count = Number(args[4]);
        const key = args[args.length - 2] ?? '';
        const g = group(key, name);
        const s = stream(key, false);
        const fresh = (s?.entries ?? [])
          .filter((e) => e.seq > g.lastDelivered)
          .slice(0, count);
        if (fresh.length === 0) return null;
        for (const e of fresh) {
          g.lastDelivered = e.seq;
          g.pending.set(e.id, {
            consumer,
            deliveredAt: broker.now,
            deliveries: 1,
          });
        }
        return [[key, fresh.map((e) => [e.id, [...e.fields]])]];
      }

      case 'XAUTOCLAIM': {
        const [key = '', name = '', consumer = '', minIdle = '0'] = args;
        const count = Number(args[6] ?? 100);
        const g = group(key, name);
        const s = stream(key, false);
        const claimed: Array<[string, string[]]> = [];
        const deleted: string[] = [];
        const ids = [...g.pending.keys()].sort((a, b) => seqOf(a) - seqOf(b));
        for (const id of ids) {
          if (claimed.length >= count) break;
          const p = g.pending.get(id);
          if (!p || broker.now - p.deliveredAt < Number(minIdle)) continue;
          const entry = s?.entries.find((e) => e.id === id);
          if (!entry) {
            g.pending.delete(id);
            deleted.push(id);
            continue;
          }
          p.consumer = consumer;
          p.deliveredAt = broker.now;
          p.deliveries += 1;
          claimed.push([id, [...entry.fields]]);
        }
        return ['0-0', claimed, deleted];
      }

      case 'XPENDING': {
        const [key = '', name = ''] = args;
        const g = group(key, name);
        const rows = [...g.pending.entries()].sort(
          ([a], [b]) => seqOf(a) - seqOf(b),
        );
        if (args.length === 2) {
          if (rows.length === 0) return [0, null, null, null];
          const perConsumer = new Map<string, number>();
          for (const [, p] of rows) {
            perConsumer.set(p.consumer, (perConsumer.get(p.consumer) ?? 0) + 1);
          }
          return [
            rows.length,
            rows[0]?.[0],
            rows[rows.length - 1]?.[0],
            [...perConsumer.entries()].map(([c, n]) => [c, String(n)]),
          ];
        }
        const lo = seqOf(args[2] ?? '0');
        const hi = seqOf(args[3] ?? '0');
        return rows
          .filter(([id]) => seqOf(id) >= lo && seqOf(id) <= hi)
          .slice(0, Number(args[4]))
          .map(([id, p]) => [
            id,
            p.consumer,
            broker.now - p.deliveredAt,
            p.deliveries,
          ]);
      }

      case 'XACK': {
        const [key = '', name = '', ...ids] = args;
        const g = group(key, name);
        return ids.filter((id) => g.pending.delete(id)).length;
      }

      case 'XDEL': {
        const [key = '', ...ids] = args;
        const s = stream(key, false);
        if (!s) return 0;
        const before = s.entries.length;
        s.entries = s.entries.filter((e) => !ids.includes(e.id));
        return before - s.entries.length;
      }

      case 'XLEN':
        return stream(args[0] ?? '', false)?.entries.length ?? 0;

      case 'SET': {
        const [key = '', value = ''] = args;
        const nx = args.includes('NX');
        const exIndex = args.indexOf('EX');
        if (nx && live(key)) return null;
        keys.set(key, {
          value,
          expiresAt:
            exIndex >= 0 ? broker.now + Number(args[exIndex + 1]) * 1000 : null,
        });
        return 'OK';
      }

      case 'EXISTS':
        return args.filter((key) => live(key) !== undefined).length;

      case 'DEL':
        return args.filter((key) => live(key) !== undefined && keys.delete(key))
          .length;

      case 'TTL': {
        const kv = live(args[0] ?? '');
        if (!kv) return -2;
        if (kv.expiresAt === null) return -1;
        return Math.ceil((kv.expiresAt - broker.now) / 1000);
      }

      default:
        throw new BrokerReplyError(`ERR unknown command '${command}'`);
    }
  }

  return broker;
}
