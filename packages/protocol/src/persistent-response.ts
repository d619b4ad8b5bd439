// Persistent Response - State of one response cycle on a persistent connection

import type { Message, MessageSegment } from './segments.js';

export type ExcludeFilter<TMessage extends Message = Message> = (message: TMessage) => boolean;

export interface PersistentResponseInit<TMessage extends Message = Message> {
  messageId?: string | null;
  messages?: readonly MessageSegment<TMessage>[];
  totalCount?: number;
  disconnect?: boolean;
  aborted?: boolean;
  timedOut?: boolean;
  resetGroups?: boolean;
  addedGroups?: Iterable<string> | null;
  removedGroups?: Iterable<string> | null;
  longPollDelay?: number;
  exclude?: ExcludeFilter<TMessage>;
}

const excludeNothing = (): boolean => false;

/**
 * A response to a connection, built fresh for each cycle and handed to the
 * encoder once. Fields are taken as given; nothing here is validated.
 */
export class PersistentResponse<TMessage extends Message = Message> {
  /** The id of the last message the connection has received. */
  readonly messageId: string | null;
  /** Messages to deliver, in delivery order. */
  readonly messages: readonly MessageSegment<TMessage>[];
  /** Count metadata; not derived from `messages`. */
  readonly totalCount: number;
  readonly disconnect: boolean;
  /** Local-only: the connection was forcibly closed. Never sent to the client. */
  readonly aborted: boolean;
  readonly timedOut: boolean;
  /** When set, `addedGroups` replaces the client's group set instead of extending it. */
  readonly resetGroups: boolean;
  /** `null` means "no change", which is not the same as an empty list. */
  readonly addedGroups: readonly string[] | null;
  readonly removedGroups: readonly string[] | null;
  /** How long a long-polling client should wait (ms) before reconnecting. */
  readonly longPollDelay: number | undefined;
  /** Decides whether a message should be withheld from this client. */
  readonly excludeFilter: ExcludeFilter<TMessage>;

  constructor(init: PersistentResponseInit<TMessage> = {}) {
    this.messageId = init.messageId ?? null;
    this.messages = init.messages ?? [];
    this.totalCount = init.totalCount ?? 0;
    this.disconnect = init.disconnect ?? false;
    this.aborted = init.aborted ?? false;
    this.timedOut = init.timedOut ?? false;
    this.resetGroups = init.resetGroups ?? false;
    this.addedGroups = init.addedGroups == null ? null : Array.from(init.addedGroups);
    this.removedGroups = init.removedGroups == null ? null : Array.from(init.removedGroups);
    this.longPollDelay = init.longPollDelay;
    this.excludeFilter = init.exclude ?? excludeNothing;
  }
}
