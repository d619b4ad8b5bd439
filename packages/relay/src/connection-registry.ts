// Connection Registry - Tracks live connections and times out idle ones

import { Connection } from './connection.js';
import type { MessageBus } from './message-bus.js';
import type { RelayConfig } from './config.js';
import type { Logger } from './logger.js';
import { connectionKey } from './types.js';

const CONNECTION_ID_PATTERN = /^[A-Za-z0-9_.:-]{1,128}$/;

export function isValidConnectionId(id: string): boolean {
  return CONNECTION_ID_PATTERN.test(id);
}

export class ConnectionRegistry {
  private connections = new Map<string, Connection>();
  private sweepTimer: NodeJS.Timeout | null = null;
  private bus: MessageBus;
  private transport: RelayConfig['transport'];
  private logger?: Logger;

  constructor(bus: MessageBus, transport: RelayConfig['transport'], logger?: Logger) {
    this.bus = bus;
    this.transport = transport;
    this.logger = logger;
  }

  get size(): number {
    return this.connections.size;
  }

  get(id: string): Connection | undefined {
    return this.connections.get(id);
  }

  acquire(id: string): Connection {
    if (!isValidConnectionId(id)) {
      throw new RangeError(`Invalid connection id "${id}"`);
    }

    let connection = this.connections.get(id);
    if (!connection) {
      connection = new Connection(id, this.bus, {
        maxMessagesPerResponse: this.transport.maxMessagesPerResponse,
        longPollDelayMs: this.transport.longPollDelayMs,
        logger: this.logger,
      });
      this.connections.set(id, connection);
      this.logger?.info(`[registry] Connection ${id} created`);
    }
    return connection;
  }

  /** Forget a connection once a response carrying its end state has been written. */
  release(connection: Connection): void {
    if (!connection.closed || this.connections.get(connection.id) !== connection) return;
    this.connections.delete(connection.id);
    this.bus.drop(connectionKey(connection.id));
    this.logger?.info(`[registry] Connection ${connection.id} closed${connection.isTimedOut ? ' (timed out)' : ''}`);
  }

  /**
   * Mark connections idle past the disconnect timeout as timed out, drop
   * those that stayed away for another full timeout after that, and discard
   * bus keys no remaining connection reads.
   */
  sweep(now: number = Date.now()): void {
    const timeout = this.transport.disconnectTimeoutMs;

    for (const [id, connection] of this.connections) {
      if (connection.active) continue;
      const idle = now - connection.lastSeen;

      if (connection.isTimedOut) {
        if (idle > timeout * 2) {
          this.connections.delete(id);
          this.bus.drop(connectionKey(id));
          this.logger?.info(`[registry] Connection ${id} dropped after timeout`);
        }
      } else if (idle > timeout) {
        connection.markTimedOut();
        this.logger?.info(`[registry] Connection ${id} timed out after ${idle}ms idle`);
      }
    }

    const live = new Set<string>();
    for (const connection of this.connections.values()) {
      for (const key of connection.keys) live.add(key);
    }
    this.bus.retain(live);
  }

  startSweeping(): void {
    if (this.sweepTimer) return;
    this.sweepTimer = setInterval(() => this.sweep(), Math.max(1, Math.floor(this.transport.disconnectTimeoutMs / 2)));
    this.sweepTimer.unref();
  }

  stopSweeping(): void {
    if (this.sweepTimer) {
      clearInterval(this.sweepTimer);
      this.sweepTimer = null;
    }
  }
}
