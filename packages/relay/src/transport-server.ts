// Transport Server - HTTP long-polling and WebSocket streaming of response cycles

import { createServer, type Server, type IncomingMessage, type ServerResponse } from 'node:http';
import { WebSocketServer } from 'ws';
import { StringSink, writePersistentResponse, type PersistentResponse } from '@cyclewire/protocol';
import { InvalidCursorError } from './cursor.js';
import { StreamSession } from './stream-session.js';
import { isValidConnectionId, type ConnectionRegistry } from './connection-registry.js';
import type { MessageBus } from './message-bus.js';
import type { RelayConfig } from './config.js';
import type { Logger } from './logger.js';
import { BROADCAST_KEY, connectionKey, groupKey, type BusMessage } from './types.js';

const MAX_BODY_BYTES = 1024 * 1024;

export class RequestError extends Error {
  readonly status: number;

  constructor(status: number, message: string) {
    super(message);
    this.name = 'RequestError';
    this.status = status;
  }
}

export interface TransportServerOptions {
  config: RelayConfig;
  bus: MessageBus;
  registry: ConnectionRegistry;
  logger?: Logger;
}

export class TransportServer {
  private server: Server | null = null;
  private wss: WebSocketServer | null = null;
  private sessions = new Set<StreamSession>();
  private waits = new Set<AbortController>();
  private options: TransportServerOptions;

  constructor(options: TransportServerOptions) {
    this.options = options;
  }

  /** The bound port; differs from the configured one when that was 0. */
  get port(): number {
    const address = this.server?.address();
    if (!address || typeof address === 'string') {
      throw new Error('Transport server is not listening');
    }
    return address.port;
  }

  start(): Promise<void> {
    const { config, logger } = this.options;

    return new Promise((resolve, reject) => {
      const server = createServer((req, res) => this.handleRequest(req, res));
      const wss = new WebSocketServer({ noServer: true });

      server.on('upgrade', (req, socket, head) => {
        const url = new URL(req.url ?? '/', 'http://localhost');

        if (url.pathname !== '/stream') {
          socket.destroy();
          return;
        }

        if (!this.authorized(req)) {
          logger?.warn('[transport] Stream upgrade rejected: invalid auth');
          socket.write('HTTP/1.1 401 Unauthorized\r\n\r\n');
          socket.destroy();
          return;
        }

        const connectionId = url.searchParams.get('connectionId') ?? '';
        if (!isValidConnectionId(connectionId)) {
          socket.write('HTTP/1.1 400 Bad Request\r\n\r\n');
          socket.destroy();
          return;
        }

        wss.handleUpgrade(req, socket, head, (ws) => {
          const session = new StreamSession({
            ws,
            connection: this.options.registry.acquire(connectionId),
            cursor: url.searchParams.get('cursor'),
            bus: this.options.bus,
            registry: this.options.registry,
            onClose: (closed) => this.sessions.delete(closed),
            logger,
          });
          this.sessions.add(session);
          logger?.info(`[transport] Stream opened for ${connectionId}`);
          session.start();
        });
      });

      server.on('error', reject);
      server.listen(config.server.port, config.server.host, () => {
        this.server = server;
        this.wss = wss;
        logger?.info(`[transport] Listening on ${config.server.host}:${this.port} (HTTP + WS)`);
        resolve();
      });
    });
  }

  stop(): Promise<void> {
    for (const controller of this.waits) controller.abort();
    this.waits.clear();

    for (const session of this.sessions) session.close();
    this.sessions.clear();

    if (this.wss) {
      this.wss.close();
      this.wss = null;
    }

    return new Promise((resolve) => {
      if (!this.server) {
        resolve();
        return;
      }
      this.server.closeAllConnections();
      this.server.close(() => {
        this.server = null;
        this.options.logger?.info('[transport] Server stopped');
        resolve();
      });
    });
  }

  private handleRequest(req: IncomingMessage, res: ServerResponse): void {
    void this.route(req, res).catch((err: unknown) => this.fail(res, err));
  }

  private async route(req: IncomingMessage, res: ServerResponse): Promise<void> {
    const url = new URL(req.url ?? '/', 'http://localhost');

    if (!this.authorized(req)) {
      throw new RequestError(401, 'Unauthorized');
    }

    switch (`${req.method} ${url.pathname}`) {
      case 'GET /health':
        this.sendJson(res, 200, {
          status: 'ok',
          connections: this.options.registry.size,
          streams: this.sessions.size,
        });
        return;
      case 'GET /poll':
        await this.handlePoll(url, res);
        return;
      case 'POST /send':
        this.handleSend(await readJsonBody(req), res);
        return;
      case 'POST /groups':
        this.handleGroups(await readJsonBody(req), res);
        return;
      case 'POST /disconnect':
        this.handleDisconnect(await readJsonBody(req), res);
        return;
      default:
        throw new RequestError(404, 'Not found');
    }
  }

  private async handlePoll(url: URL, res: ServerResponse): Promise<void> {
    const { bus, registry, config } = this.options;
    const connection = registry.acquire(requireConnectionId(url.searchParams.get('connectionId')));
    const cursor = url.searchParams.get('cursor');

    connection.beginRequest();
    try {
      if (!connection.hasPendingMessages(cursor)) {
        const controller = new AbortController();
        const onClose = () => controller.abort();
        this.waits.add(controller);
        res.on('close', onClose);
        try {
          await bus.waitForMessage(connection.keys, config.transport.longPollTimeoutMs, controller.signal);
        } finally {
          this.waits.delete(controller);
          res.off('close', onClose);
        }
      }

      if (res.destroyed) {
        this.options.logger?.debug(`[transport] Poll for ${connection.id} abandoned by client`);
        return;
      }

      this.sendEnvelope(res, connection.receive(cursor));
      registry.release(connection);
    } finally {
      connection.endRequest();
    }
  }

  private handleSend(body: Record<string, unknown>, res: ServerResponse): void {
    if (body.data === undefined) {
      throw new RequestError(400, 'Missing required field: data');
    }

    let key = BROADCAST_KEY;
    if (body.connectionId !== undefined) {
      key = connectionKey(this.requireKnownConnection(body.connectionId));
    } else if (body.group !== undefined) {
      key = groupKey(requireString(body.group, 'group'));
    }

    const exclude = body.exclude === undefined ? undefined : requireStringArray(body.exclude, 'exclude');
    const source = body.source === undefined ? undefined : requireString(body.source, 'source');
    const message = this.options.bus.publish(key, body.data, { source, exclude });

    this.sendJson(res, 200, { ok: true, key, id: message.id });
  }

  private handleGroups(body: Record<string, unknown>, res: ServerResponse): void {
    const connectionId = requireConnectionId(body.connectionId);
    const group = requireString(body.group, 'group');
    if (body.action !== 'add' && body.action !== 'remove') {
      throw new RequestError(400, 'action must be "add" or "remove"');
    }

    const key = connectionKey(this.requireKnownConnection(connectionId));
    if (body.action === 'add') {
      this.options.bus.command(key, { type: 'addToGroup', group });
    } else {
      this.options.bus.command(key, { type: 'removeFromGroup', group });
    }

    this.sendJson(res, 200, { ok: true });
  }

  private handleDisconnect(body: Record<string, unknown>, res: ServerResponse): void {
    const connectionId = this.requireKnownConnection(body.connectionId);
    this.options.bus.command(connectionKey(connectionId), { type: body.abort === true ? 'abort' : 'disconnect' });
    this.sendJson(res, 200, { ok: true });
  }

  /** Only connections the registry tracks get a store; unknown ids are refused. */
  private requireKnownConnection(value: unknown): string {
    const connectionId = requireConnectionId(value);
    if (!this.options.registry.get(connectionId)) {
      throw new RequestError(404, `Unknown connection "${connectionId}"`);
    }
    return connectionId;
  }

  private authorized(req: IncomingMessage): boolean {
    const token = this.options.config.server.authToken;
    if (!token) return true;
    return req.headers['authorization'] === `Bearer ${token}`;
  }

  private sendEnvelope(res: ServerResponse, response: PersistentResponse<BusMessage>): void {
    const sink = new StringSink();
    writePersistentResponse(response, sink);
    res.writeHead(200, { 'Content-Type': 'application/json' });
    res.end(sink.toString());
  }

  private sendJson(res: ServerResponse, status: number, body: unknown): void {
    res.writeHead(status, { 'Content-Type': 'application/json' });
    res.end(JSON.stringify(body));
  }

  private fail(res: ServerResponse, err: unknown): void {
    let status = 500;
    let message = 'Internal server error';

    if (err instanceof RequestError) {
      status = err.status;
      message = err.message;
    } else if (err instanceof InvalidCursorError || err instanceof RangeError) {
      status = 400;
      message = err.message;
    } else {
      this.options.logger?.error(`[transport] Request failed: ${err instanceof Error ? err.stack ?? err.message : String(err)}`);
    }

    if (res.headersSent || res.destroyed) return;
    this.sendJson(res, status, { error: message });
  }
}

async function readJsonBody(req: IncomingMessage): Promise<Record<string, unknown>> {
  const chunks: Buffer[] = [];
  let size = 0;
  for await (const chunk of req) {
    const buffer = Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk));
    size += buffer.length;
    if (size > MAX_BODY_BYTES) {
      throw new RequestError(413, 'Request body too large');
    }
    chunks.push(buffer);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(Buffer.concat(chunks).toString('utf-8'));
  } catch {
    throw new RequestError(400, 'Invalid JSON');
  }

  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new RequestError(400, 'Request body must be a JSON object');
  }
  return Object.fromEntries(Object.entries(parsed));
}

function requireString(value: unknown, field: string): string {
  if (typeof value !== 'string' || value === '') {
    throw new RequestError(400, `${field} must be a non-empty string`);
  }
  return value;
}

function requireStringArray(value: unknown, field: string): string[] {
  if (!Array.isArray(value) || !value.every((item): item is string => typeof item === 'string')) {
    throw new RequestError(400, `${field} must be an array of strings`);
  }
  return value;
}

function requireConnectionId(value: unknown): string {
  const id = requireString(value, 'connectionId');
  if (!isValidConnectionId(id)) {
    throw new RequestError(400, `Invalid connection id "${id}"`);
  }
  return id;
}
