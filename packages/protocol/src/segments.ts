// Segments - Bounded views over message buffers and lazy iteration across them

import type { RawFragment } from './raw-fragment.js';

export interface Message {
  /** Control messages are consumed by the server and never reach the client. */
  readonly isCommand: boolean;
  readonly value: RawFragment;
}

/** A read-only window of `count` items starting at `offset` in a buffer owned elsewhere. */
export interface MessageSegment<TMessage extends Message = Message> {
  readonly array: readonly TMessage[];
  readonly offset: number;
  readonly count: number;
}

export function segmentOf<TMessage extends Message>(
  array: readonly TMessage[],
  offset = 0,
  count = array.length - offset,
): MessageSegment<TMessage> {
  if (!Number.isInteger(offset) || offset < 0 || offset > array.length) {
    throw new RangeError(`Segment offset ${offset} is outside buffer of length ${array.length}`);
  }
  if (!Number.isInteger(count) || count < 0 || offset + count > array.length) {
    throw new RangeError(`Segment count ${count} at offset ${offset} exceeds buffer of length ${array.length}`);
  }
  return { array, offset, count };
}

/**
 * Yield every message across `segments`, in order, for which `skip` is false.
 *
 * Walks segment index then position within the segment; nothing is copied
 * into an intermediate collection. Single-use.
 */
export function* enumerateMessages<TMessage extends Message>(
  segments: readonly MessageSegment<TMessage>[],
  skip: (message: TMessage) => boolean,
): Generator<TMessage, void, undefined> {
  for (let s = 0; s < segments.length; s++) {
    const { array, offset, count } = segments[s];
    const end = offset + count;
    for (let i = offset; i < end; i++) {
      const message = array[i];
      if (!skip(message)) {
        yield message;
      }
    }
  }
}
