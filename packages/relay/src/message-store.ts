// Message Store - Append-only, fragmented message buffer for a single key
//
// Messages live in fixed-size fragment arrays. Reads hand out segment views
// straight into those arrays; fragments are only ever appended to, so a view
// stays valid after later writes and after its fragment is evicted.

import { segmentOf, type MessageSegment } from '@cyclewire/protocol';
import type { BusMessage } from './types.js';

export interface StoreReadResult {
  segments: MessageSegment<BusMessage>[];
  /** Id of the last message returned, or the resumed position when nothing was read. */
  lastId: number;
  count: number;
}

export type StoreEntry = Omit<BusMessage, 'key' | 'id'>;

export class MessageStore {
  readonly key: string;
  private fragmentSize: number;
  private maxFragments: number;
  private fragments: BusMessage[][] = [];
  private evictedFragments = 0;
  private nextId = 0;

  constructor(key: string, fragmentSize: number, maxFragments: number) {
    if (fragmentSize < 1 || maxFragments < 1) {
      throw new RangeError('Message store needs at least one fragment of at least one message');
    }
    this.key = key;
    this.fragmentSize = fragmentSize;
    this.maxFragments = maxFragments;
  }

  /** Id of the newest message, -1 when empty. */
  get lastId(): number {
    return this.nextId - 1;
  }

  /** Id of the oldest message still retained. */
  get firstId(): number {
    return this.evictedFragments * this.fragmentSize;
  }

  add(entry: StoreEntry): BusMessage {
    const message: BusMessage = { ...entry, key: this.key, id: this.nextId++ };

    let tail = this.fragments[this.fragments.length - 1];
    if (!tail || tail.length === this.fragmentSize) {
      tail = [];
      this.fragments.push(tail);
      if (this.fragments.length > this.maxFragments) {
        this.fragments.shift();
        this.evictedFragments++;
      }
    }
    tail.push(message);

    return message;
  }

  /**
   * Read up to `limit` messages newer than `afterId`. A position older than
   * the retained window resumes at the oldest retained message; one past
   * `lastId` came from an earlier store and resumes there too.
   */
  read(afterId: number, limit: number): StoreReadResult {
    const segments: MessageSegment<BusMessage>[] = [];
    const position = afterId > this.lastId ? this.firstId - 1 : afterId;
    let from = Math.max(position + 1, this.firstId);
    let count = 0;

    while (from <= this.lastId && count < limit) {
      const fragment = this.fragments[Math.floor(from / this.fragmentSize) - this.evictedFragments];
      const offset = from % this.fragmentSize;
      const take = Math.min(fragment.length - offset, limit - count);

      segments.push(segmentOf(fragment, offset, take));
      count += take;
      from += take;
    }

    return { segments, lastId: count > 0 ? from - 1 : position, count };
  }
}
