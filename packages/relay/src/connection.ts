// Connection - Per-connection state and response cycle assembly

import { PersistentResponse, enumerateMessages } from '@cyclewire/protocol';
import { parseCursor, serializeCursor } from './cursor.js';
import type { MessageBus } from './message-bus.js';
import { BROADCAST_KEY, connectionKey, groupKey, type BusMessage } from './types.js';
import type { Logger } from './logger.js';

export interface ConnectionOptions {
  maxMessagesPerResponse: number;
  longPollDelayMs: number;
  logger?: Logger;
}

export class Connection {
  readonly id: string;
  lastSeen = Date.now();

  private bus: MessageBus;
  private options: ConnectionOptions;
  private groups = new Set<string>();
  private addedSince = new Set<string>();
  private removedSince = new Set<string>();
  private activeRequests = 0;
  private origin: number;
  private started = false;
  private disconnected = false;
  private aborted = false;
  private timedOut = false;

  constructor(id: string, bus: MessageBus, options: ConnectionOptions) {
    this.id = id;
    this.bus = bus;
    this.options = options;
    // Direct messages published from here on belong to this connection
    this.origin = bus.lastId(connectionKey(id));
  }

  /** Bus keys this connection reads from. */
  get keys(): string[] {
    return [BROADCAST_KEY, connectionKey(this.id), ...Array.from(this.groups, groupKey)];
  }

  get groupNames(): string[] {
    return [...this.groups];
  }

  get active(): boolean {
    return this.activeRequests > 0;
  }

  /** True once a cycle has carried a disconnect, abort or timeout. */
  get closed(): boolean {
    return this.disconnected || this.aborted || this.timedOut;
  }

  get isTimedOut(): boolean {
    return this.timedOut;
  }

  beginRequest(): void {
    this.activeRequests++;
    this.lastSeen = Date.now();
  }

  endRequest(): void {
    this.activeRequests = Math.max(0, this.activeRequests - 1);
    this.lastSeen = Date.now();
  }

  markTimedOut(): void {
    this.timedOut = true;
  }

  /** Whether a receive with `cursorText` would return without waiting. */
  hasPendingMessages(cursorText: string | null): boolean {
    if (cursorText === null || this.closed) return true;

    const cursor = parseCursor(cursorText);
    return this.keys.some((key) => {
      const lastId = this.bus.lastId(key);
      // Behind means new messages; ahead means a stale cursor to resync
      return (cursor.get(key) ?? lastId) !== lastId;
    });
  }

  /**
   * Build the response for one cycle. A `null` cursor starts the connection:
   * the client gets the full group set and a cursor positioned at the end of
   * the shared keys. On the first start, anything addressed to this
   * connection since it was created is kept for the next cycle.
   */
  receive(cursorText: string | null): PersistentResponse<BusMessage> {
    this.lastSeen = Date.now();

    if (cursorText === null) {
      const cursor = this.bus.cursorFor(this.keys);
      if (!this.started) cursor.set(connectionKey(this.id), this.origin);
      this.started = true;
      this.addedSince.clear();
      this.removedSince.clear();

      return this.createResponse({
        messageId: serializeCursor(cursor),
        resetGroups: true,
        addedGroups: this.groupNames,
      });
    }

    const result = this.bus.read(this.keys, parseCursor(cursorText), this.options.maxMessagesPerResponse);

    for (const message of enumerateMessages(result.segments, (m) => !m.isCommand)) {
      this.applyCommand(message);
    }

    // Re-key the cursor after commands so new groups start from their current end
    const next = new Map<string, number>();
    for (const key of this.keys) {
      next.set(key, result.cursor.get(key) ?? this.bus.lastId(key));
    }

    const response = this.createResponse({
      messageId: serializeCursor(next),
      messages: result.segments,
      totalCount: result.count,
      addedGroups: this.addedSince.size > 0 ? [...this.addedSince] : null,
      removedGroups: this.removedSince.size > 0 ? [...this.removedSince] : null,
    });

    this.addedSince.clear();
    this.removedSince.clear();

    return response;
  }

  private createResponse(init: {
    messageId: string;
    messages?: PersistentResponse<BusMessage>['messages'];
    totalCount?: number;
    resetGroups?: boolean;
    addedGroups: string[] | null;
    removedGroups?: string[] | null;
  }): PersistentResponse<BusMessage> {
    return new PersistentResponse<BusMessage>({
      ...init,
      disconnect: this.disconnected,
      aborted: this.aborted,
      timedOut: this.timedOut,
      longPollDelay: this.options.longPollDelayMs > 0 ? this.options.longPollDelayMs : undefined,
      exclude: (message) => message.source === this.id || (message.excludedConnections?.includes(this.id) ?? false),
    });
  }

  private applyCommand(message: BusMessage): void {
    const command = message.command;
    if (!command) return;

    switch (command.type) {
      case 'addToGroup':
        if (this.groups.has(command.group)) break;
        this.groups.add(command.group);
        if (!this.removedSince.delete(command.group)) this.addedSince.add(command.group);
        break;
      case 'removeFromGroup':
        if (!this.groups.delete(command.group)) break;
        if (!this.addedSince.delete(command.group)) this.removedSince.add(command.group);
        break;
      case 'disconnect':
        this.disconnected = true;
        break;
      case 'abort':
        this.aborted = true;
        break;
    }

    this.options.logger?.debug(`[connection] ${this.id} applied ${command.type}`);
  }
}
