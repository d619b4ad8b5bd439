import { describe, it, expect, beforeEach } from 'vitest';
import { encodePersistentResponse } from '@cyclewire/protocol';
import { ConnectionRegistry, isValidConnectionId } from '../connection-registry.js';
import { MessageBus } from '../message-bus.js';

const transport = {
  longPollTimeoutMs: 1_000,
  longPollDelayMs: 0,
  disconnectTimeoutMs: 100,
  maxMessagesPerResponse: 10,
};

describe('ConnectionRegistry', () => {
  let bus: MessageBus;
  let registry: ConnectionRegistry;

  beforeEach(() => {
    bus = new MessageBus({ fragmentSize: 4, maxFragments: 4 });
    registry = new ConnectionRegistry(bus, transport);
  });

  it('should create a connection once per id', () => {
    const first = registry.acquire('a');
    expect(registry.acquire('a')).toBe(first);
    expect(registry.size).toBe(1);
  });

  it('should validate connection ids', () => {
    expect(isValidConnectionId('client-1.tab_2')).toBe(true);
    expect(isValidConnectionId('')).toBe(false);
    expect(isValidConnectionId('has space')).toBe(false);
    expect(() => registry.acquire('bad/id')).toThrow(RangeError);
  });

  it('should time out idle connections and forget them after the timed-out cycle', () => {
    const connection = registry.acquire('a');
    const start = connection.receive(null).messageId;
    connection.lastSeen = 1_000;

    registry.sweep(1_150);
    expect(connection.isTimedOut).toBe(true);
    expect(encodePersistentResponse(connection.receive(start))).toBe('{"C":"broadcast=-1&c%3Aa=-1","T":1,"M":[]}');

    registry.release(connection);
    expect(registry.get('a')).toBeUndefined();
  });

  it('should leave connections with requests in flight alone', () => {
    const connection = registry.acquire('a');
    connection.beginRequest();
    connection.lastSeen = 1_000;

    registry.sweep(5_000);
    expect(connection.isTimedOut).toBe(false);
  });

  it('should drop timed-out connections that never come back', () => {
    const connection = registry.acquire('a');
    connection.lastSeen = 1_000;

    registry.sweep(1_150);
    expect(registry.size).toBe(1);

    registry.sweep(1_250);
    expect(registry.size).toBe(0);
  });

  it('should discard the connection store once the connection is forgotten', () => {
    const connection = registry.acquire('a');
    const start = connection.receive(null).messageId;
    bus.command('c:a', { type: 'disconnect' });
    expect(bus.keyCount).toBe(1);

    connection.receive(start);
    registry.release(connection);

    expect(bus.hasKey('c:a')).toBe(false);
    expect(bus.keyCount).toBe(0);
  });

  it('should discard stores no connection reads on each sweep', () => {
    registry.acquire('a');
    bus.publish('broadcast', 1);
    bus.publish('c:a', 2);
    bus.publish('g:orphan', 3);
    bus.publish('c:ghost', 4);

    registry.sweep(Date.now());

    expect(bus.hasKey('g:orphan')).toBe(false);
    expect(bus.hasKey('c:ghost')).toBe(false);
    expect(bus.hasKey('broadcast')).toBe(true);
    expect(bus.hasKey('c:a')).toBe(true);
  });

  it('should discard the store of a connection dropped after timeout', () => {
    const connection = registry.acquire('a');
    bus.publish('c:a', 1);
    connection.lastSeen = 1_000;

    registry.sweep(1_150);
    registry.sweep(1_250);

    expect(registry.size).toBe(0);
    expect(bus.keyCount).toBe(0);
  });

  it('should keep open connections on release', () => {
    const connection = registry.acquire('a');
    registry.release(connection);
    expect(registry.get('a')).toBe(connection);
  });
});
