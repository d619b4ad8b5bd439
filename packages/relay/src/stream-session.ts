// Stream Session - Pushes one encoded response per wake-up over a WebSocket

import { WebSocket } from 'ws';
import { StringSink, writePersistentResponse } from '@cyclewire/protocol';
import type { Connection } from './connection.js';
import type { MessageBus } from './message-bus.js';
import type { ConnectionRegistry } from './connection-registry.js';
import type { Logger } from './logger.js';

export interface StreamSessionOptions {
  ws: WebSocket;
  connection: Connection;
  cursor: string | null;
  bus: MessageBus;
  registry: ConnectionRegistry;
  onClose: (session: StreamSession) => void;
  logger?: Logger;
}

export class StreamSession {
  private options: StreamSessionOptions;
  private cursor: string | null;
  private unsubscribe: (() => void) | null = null;
  private scheduled = false;
  private disposed = false;

  constructor(options: StreamSessionOptions) {
    this.options = options;
    this.cursor = options.cursor;
  }

  get connectionId(): string {
    return this.options.connection.id;
  }

  start(): void {
    const { ws, connection, logger } = this.options;
    connection.beginRequest();

    ws.on('close', (code, reason) => {
      logger?.info(`[stream] ${connection.id} disconnected: ${code} ${reason.toString()}`);
      this.dispose();
    });

    ws.on('error', (err) => {
      logger?.error(`[stream] ${connection.id} socket error: ${err.message}`);
    });

    this.flush();
  }

  close(code = 1001, reason = 'Server shutting down'): void {
    this.dispose();
    this.options.ws.close(code, reason);
  }

  private schedule(): void {
    if (this.scheduled || this.disposed) return;
    this.scheduled = true;
    // Coalesce bursts of messages into one frame
    setImmediate(() => {
      this.scheduled = false;
      this.flush();
    });
  }

  private flush(): void {
    const { ws, connection, registry, logger } = this.options;
    if (this.disposed || ws.readyState !== WebSocket.OPEN) return;

    let frame: string;
    let closed: boolean;
    try {
      const response = connection.receive(this.cursor);
      const sink = new StringSink();
      writePersistentResponse(response, sink);
      frame = sink.toString();
      closed = connection.closed;
      this.cursor = response.messageId;
    } catch (err) {
      const errMsg = err instanceof Error ? err.message : String(err);
      logger?.warn(`[stream] ${connection.id} cannot build response: ${errMsg}`);
      this.close(1008, 'Invalid cursor');
      return;
    }

    ws.send(frame);

    if (closed) {
      registry.release(connection);
      this.close(1000, 'Connection closed');
      return;
    }

    // Group changes alter the key set, so subscribe again after every frame
    this.unsubscribe?.();
    this.unsubscribe = this.options.bus.subscribe(connection.keys, () => this.schedule());
  }

  private dispose(): void {
    if (this.disposed) return;
    this.disposed = true;
    this.unsubscribe?.();
    this.unsubscribe = null;
    this.options.connection.endRequest();
    this.options.onClose(this);
  }
}
