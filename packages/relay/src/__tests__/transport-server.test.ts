import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { WebSocket } from 'ws';
import { DEFAULTS, type RelayConfig } from '../config.js';
import { silentLogger } from '../logger.js';
import { Relay } from '../relay.js';

function testConfig(authToken?: string): RelayConfig {
  return {
    server: { port: 0, host: '127.0.0.1', authToken },
    transport: { ...DEFAULTS.transport, longPollTimeoutMs: 200 },
    store: { fragmentSize: 8, maxFragments: 8 },
  };
}

function cursorOf(text: string): string {
  const body: unknown = JSON.parse(text);
  if (typeof body === 'object' && body !== null && 'C' in body && typeof body.C === 'string') {
    return body.C;
  }
  throw new Error(`No cursor in ${text}`);
}

/** Buffers frames so none are lost between awaits. */
function frameReader(ws: WebSocket): () => Promise<string> {
  const frames: string[] = [];
  const waiters: ((frame: string) => void)[] = [];

  ws.on('message', (data) => {
    const frame = data.toString();
    const waiter = waiters.shift();
    if (waiter) waiter(frame);
    else frames.push(frame);
  });

  return () => new Promise((resolve) => {
    const frame = frames.shift();
    if (frame !== undefined) resolve(frame);
    else waiters.push(resolve);
  });
}

describe('TransportServer', () => {
  let relay: Relay;
  let base: string;

  beforeEach(async () => {
    relay = new Relay(testConfig(), silentLogger);
    await relay.start();
    base = `http://127.0.0.1:${relay.server.port}`;
  });

  afterEach(async () => {
    await relay.stop();
  });

  async function poll(connectionId: string, cursor?: string) {
    const params = new URLSearchParams({ connectionId });
    if (cursor !== undefined) params.set('cursor', cursor);
    const res = await fetch(`${base}/poll?${params}`);
    return { status: res.status, text: await res.text() };
  }

  async function post(path: string, body: unknown) {
    const res = await fetch(`${base}${path}`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: typeof body === 'string' ? body : JSON.stringify(body),
    });
    return { status: res.status, body: await res.json() };
  }

  it('should report health', async () => {
    const res = await fetch(`${base}/health`);
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ status: 'ok', connections: 0, streams: 0 });
  });

  it('should start a connection with a group reset', async () => {
    const first = await poll('a');
    expect(first.status).toBe(200);
    expect(first.text).toBe('{"C":"broadcast=-1&c%3Aa=-1","R":[],"M":[]}');
  });

  it('should return queued direct messages immediately', async () => {
    const start = cursorOf((await poll('a')).text);

    expect(await post('/send', { connectionId: 'a', data: { text: 'hi' } })).toEqual({
      status: 200,
      body: { ok: true, key: 'c:a', id: 0 },
    });

    expect((await poll('a', start)).text).toBe('{"C":"broadcast=-1&c%3Aa=0","M":[{"text":"hi"}]}');
  });

  it('should hold a poll open until a message arrives', async () => {
    const start = cursorOf((await poll('a')).text);

    const pending = poll('a', start);
    await post('/send', { data: { n: 1 } });

    expect((await pending).text).toBe('{"C":"broadcast=0&c%3Aa=-1","M":[{"n":1}]}');
  });

  it('should answer an empty cycle when the poll times out', async () => {
    const start = cursorOf((await poll('a')).text);
    expect((await poll('a', start)).text).toBe('{"C":"broadcast=-1&c%3Aa=-1","M":[]}');
  });

  it('should deliver group changes and group messages', async () => {
    const start = cursorOf((await poll('a')).text);

    expect(await post('/groups', { connectionId: 'a', group: 'room', action: 'add' })).toEqual({ status: 200, body: { ok: true } });
    const joined = await poll('a', start);
    expect(joined.text).toBe('{"C":"broadcast=-1&c%3Aa=0&g%3Aroom=-1","G":["room"],"M":[]}');

    await post('/send', { group: 'room', data: 'x' });
    expect((await poll('a', cursorOf(joined.text))).text).toBe('{"C":"broadcast=-1&c%3Aa=0&g%3Aroom=0","M":["x"]}');
  });

  it('should withhold messages that exclude the connection', async () => {
    const start = cursorOf((await poll('a')).text);
    await post('/send', { data: 1, exclude: ['a'] });
    expect((await poll('a', start)).text).toBe('{"C":"broadcast=0&c%3Aa=-1","M":[]}');
  });

  it('should not echo a message to the connection that sent it', async () => {
    const start = cursorOf((await poll('a')).text);
    await post('/send', { data: 'mine', source: 'a' });
    expect((await poll('a', start)).text).toBe('{"C":"broadcast=0&c%3Aa=-1","M":[]}');
  });

  it('should refuse commands and messages for unknown connections', async () => {
    const unknown = { status: 404, body: { error: 'Unknown connection "ghost"' } };

    expect(await post('/send', { connectionId: 'ghost', data: 1 })).toEqual(unknown);
    expect(await post('/groups', { connectionId: 'ghost', group: 'room', action: 'add' })).toEqual(unknown);
    expect(await post('/disconnect', { connectionId: 'ghost' })).toEqual(unknown);
    expect(relay.bus.keyCount).toBe(0);
  });

  it('should send a disconnect and forget the connection', async () => {
    const start = cursorOf((await poll('a')).text);
    await post('/disconnect', { connectionId: 'a' });

    expect((await poll('a', start)).text).toBe('{"C":"broadcast=-1&c%3Aa=0","D":1,"M":[]}');
    expect(relay.registry.size).toBe(0);
    expect(relay.bus.hasKey('c:a')).toBe(false);
  });

  it('should reject malformed cursors', async () => {
    const res = await poll('a', 'broadcast=zz');
    expect(res.status).toBe(400);
    expect(JSON.parse(res.text)).toEqual({ error: 'Invalid position "zz" for key "broadcast"' });
  });

  it('should require a connection id', async () => {
    const res = await fetch(`${base}/poll`);
    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ error: 'connectionId must be a non-empty string' });
  });

  it('should validate request bodies', async () => {
    expect(await post('/send', '{nope')).toEqual({ status: 400, body: { error: 'Invalid JSON' } });
    expect(await post('/send', {})).toEqual({ status: 400, body: { error: 'Missing required field: data' } });
    expect(await post('/send', { data: 1, exclude: 'a' })).toEqual({
      status: 400,
      body: { error: 'exclude must be an array of strings' },
    });
    expect(await post('/groups', { connectionId: 'a', group: 'room', action: 'join' })).toEqual({
      status: 400,
      body: { error: 'action must be "add" or "remove"' },
    });
  });

  it('should return 404 for unknown routes', async () => {
    const res = await fetch(`${base}/nowhere`);
    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({ error: 'Not found' });
  });

  it('should push cycles over a stream', async () => {
    const ws = new WebSocket(`ws://127.0.0.1:${relay.server.port}/stream?connectionId=s1`);
    const nextFrame = frameReader(ws);

    expect(await nextFrame()).toBe('{"C":"broadcast=-1&c%3As1=-1","R":[],"M":[]}');

    await post('/send', { data: { n: 1 } });
    expect(await nextFrame()).toBe('{"C":"broadcast=0&c%3As1=-1","M":[{"n":1}]}');

    const closed = new Promise<number>((resolve) => ws.once('close', (code) => resolve(code)));
    await post('/disconnect', { connectionId: 's1' });

    expect(await nextFrame()).toBe('{"C":"broadcast=0&c%3As1=0","D":1,"M":[]}');
    expect(await closed).toBe(1000);
  });
});

describe('TransportServer with auth', () => {
  let relay: Relay;
  let base: string;

  beforeEach(async () => {
    relay = new Relay(testConfig('test-secret'), silentLogger);
    await relay.start();
    base = `http://127.0.0.1:${relay.server.port}`;
  });

  afterEach(async () => {
    await relay.stop();
  });

  it('should reject requests without the bearer token', async () => {
    const res = await fetch(`${base}/health`);
    expect(res.status).toBe(401);
    expect(await res.json()).toEqual({ error: 'Unauthorized' });
  });

  it('should accept requests with the bearer token', async () => {
    const res = await fetch(`${base}/health`, { headers: { Authorization: 'Bearer test-secret' } });
    expect(res.status).toBe(200);
  });

  it('should reject stream upgrades without the bearer token', async () => {
    const ws = new WebSocket(`ws://127.0.0.1:${relay.server.port}/stream?connectionId=s1`);
    const status = await new Promise<number | undefined>((resolve) => {
      ws.on('unexpected-response', (_req, res) => resolve(res.statusCode));
      ws.on('error', () => resolve(undefined));
    });
    expect(status).toBe(401);
  });
});
