// Message Bus - Keyed message stores with change notification

import { EventEmitter } from 'node:events';
import { RawFragment, type MessageSegment } from '@cyclewire/protocol';
import { MessageStore, type StoreEntry } from './message-store.js';
import type { Cursor } from './cursor.js';
import type { BusMessage, ConnectionCommand } from './types.js';
import type { Logger } from './logger.js';

export interface MessageBusOptions {
  fragmentSize: number;
  maxFragments: number;
  logger?: Logger;
}

export interface PublishOptions {
  source?: string;
  exclude?: readonly string[];
}

export interface BusReadResult {
  segments: MessageSegment<BusMessage>[];
  cursor: Map<string, number>;
  count: number;
}

export class MessageBus {
  private stores = new Map<string, MessageStore>();
  private events = new EventEmitter();
  private options: MessageBusOptions;

  constructor(options: MessageBusOptions) {
    this.options = options;
    // One listener per waiting poll or open stream
    this.events.setMaxListeners(0);
  }

  /** Serialize `value` once and append it under `key`. */
  publish(key: string, value: unknown, options: PublishOptions = {}): BusMessage {
    return this.append(key, {
      isCommand: false,
      value: RawFragment.serialize(value),
      source: options.source,
      excludedConnections: options.exclude,
    });
  }

  command(key: string, command: ConnectionCommand): BusMessage {
    return this.append(key, {
      isCommand: true,
      value: RawFragment.serialize(command),
      command,
    });
  }

  lastId(key: string): number {
    return this.stores.get(key)?.lastId ?? -1;
  }

  cursorFor(keys: readonly string[]): Map<string, number> {
    return new Map(keys.map((key) => [key, this.lastId(key)]));
  }

  /**
   * Read at most `limit` messages across `keys`, in key order. Keys missing
   * from `cursor` start at their current end.
   */
  read(keys: readonly string[], cursor: Cursor, limit: number): BusReadResult {
    const next = new Map<string, number>();
    const segments: MessageSegment<BusMessage>[] = [];
    let count = 0;

    for (const key of keys) {
      const position = cursor.get(key) ?? this.lastId(key);
      const store = this.stores.get(key);
      if (!store) {
        // Nothing stored: a position from an earlier store is stale
        next.set(key, Math.min(position, -1));
        continue;
      }
      if (count >= limit) {
        next.set(key, position);
        continue;
      }

      const result = store.read(position, limit - count);
      segments.push(...result.segments);
      count += result.count;
      next.set(key, result.lastId);
    }

    return { segments, cursor: next, count };
  }

  get keyCount(): number {
    return this.stores.size;
  }

  hasKey(key: string): boolean {
    return this.stores.has(key);
  }

  /** Discard everything stored under `key`. */
  drop(key: string): void {
    if (this.stores.delete(key)) {
      this.options.logger?.debug(`[bus] Dropped ${key}`);
    }
  }

  /** Discard every store whose key is not in `live`. */
  retain(live: ReadonlySet<string>): void {
    for (const key of this.stores.keys()) {
      if (!live.has(key)) this.drop(key);
    }
  }

  /** Call `listener` for every message appended under any of `keys`. Returns an unsubscribe function. */
  subscribe(keys: readonly string[], listener: (message: BusMessage) => void): () => void {
    for (const key of keys) this.events.on(key, listener);
    return () => {
      for (const key of keys) this.events.off(key, listener);
    };
  }

  /** Resolves true when a message arrives on any of `keys`, false on timeout or abort. */
  waitForMessage(keys: readonly string[], timeoutMs: number, signal?: AbortSignal): Promise<boolean> {
    return new Promise((resolve) => {
      if (signal?.aborted) {
        resolve(false);
        return;
      }

      let unsubscribe = (): void => {};
      const finish = (arrived: boolean) => {
        clearTimeout(timer);
        unsubscribe();
        signal?.removeEventListener('abort', onAbort);
        resolve(arrived);
      };
      const onAbort = () => finish(false);
      const timer = setTimeout(() => finish(false), timeoutMs);

      unsubscribe = this.subscribe(keys, () => finish(true));
      signal?.addEventListener('abort', onAbort, { once: true });
    });
  }

  private append(key: string, entry: StoreEntry): BusMessage {
    let store = this.stores.get(key);
    if (!store) {
      store = new MessageStore(key, this.options.fragmentSize, this.options.maxFragments);
      this.stores.set(key, store);
    }

    const message = store.add(entry);
    this.options.logger?.debug(`[bus] ${message.isCommand ? 'Command' : 'Message'} ${message.id} on ${key}`);
    this.events.emit(key, message);
    return message;
  }
}
