// Relay Config - Types and loader

import { readFileSync } from 'node:fs';

export interface RelayConfig {
  server: {
    port: number;
    host: string;
    authToken?: string;
  };
  transport: {
    longPollTimeoutMs: number;
    longPollDelayMs: number;
    disconnectTimeoutMs: number;
    maxMessagesPerResponse: number;
  };
  store: {
    fragmentSize: number;
    maxFragments: number;
  };
}

export const DEFAULTS: RelayConfig = {
  server: {
    port: 8080,
    host: '0.0.0.0',
  },
  transport: {
    longPollTimeoutMs: 110_000,
    longPollDelayMs: 0,
    disconnectTimeoutMs: 30_000,
    maxMessagesPerResponse: 1_000,
  },
  store: {
    fragmentSize: 128,
    maxFragments: 64,
  },
};

type Env = Record<string, string | undefined>;

export function loadConfig(configPath?: string, env: Env = process.env): RelayConfig {
  const path = configPath ?? env.RELAY_CONFIG ?? 'relay.config.json';

  let fileConfig: Record<string, unknown> = {};
  try {
    const raw = readFileSync(path, 'utf-8');
    fileConfig = asRecord(JSON.parse(raw));
  } catch (err) {
    // Config file is optional unless one was named explicitly
    if (configPath || env.RELAY_CONFIG) {
      throw new Error(`Failed to read config file ${path}: ${err}`);
    }
  }

  const server = asRecord(fileConfig.server);
  const transport = asRecord(fileConfig.transport);
  const store = asRecord(fileConfig.store);

  const config: RelayConfig = {
    server: {
      port: readInt('RELAY_PORT', env.RELAY_PORT ?? server.port, DEFAULTS.server.port, 0),
      host: env.RELAY_HOST ?? readString(server.host) ?? DEFAULTS.server.host,
      authToken: env.RELAY_AUTH_TOKEN ?? readString(server.authToken),
    },
    transport: {
      longPollTimeoutMs: readInt('LONG_POLL_TIMEOUT_MS', env.LONG_POLL_TIMEOUT_MS ?? transport.longPollTimeoutMs, DEFAULTS.transport.longPollTimeoutMs, 1),
      longPollDelayMs: readInt('LONG_POLL_DELAY_MS', env.LONG_POLL_DELAY_MS ?? transport.longPollDelayMs, DEFAULTS.transport.longPollDelayMs, 0),
      disconnectTimeoutMs: readInt('DISCONNECT_TIMEOUT_MS', env.DISCONNECT_TIMEOUT_MS ?? transport.disconnectTimeoutMs, DEFAULTS.transport.disconnectTimeoutMs, 1),
      maxMessagesPerResponse: readInt('MAX_MESSAGES_PER_RESPONSE', env.MAX_MESSAGES_PER_RESPONSE ?? transport.maxMessagesPerResponse, DEFAULTS.transport.maxMessagesPerResponse, 1),
    },
    store: {
      fragmentSize: readInt('STORE_FRAGMENT_SIZE', env.STORE_FRAGMENT_SIZE ?? store.fragmentSize, DEFAULTS.store.fragmentSize, 1),
      maxFragments: readInt('STORE_MAX_FRAGMENTS', env.STORE_MAX_FRAGMENTS ?? store.maxFragments, DEFAULTS.store.maxFragments, 1),
    },
  };

  if (config.server.port > 65_535) {
    throw new Error(`RELAY_PORT must be a valid TCP port (got ${config.server.port})`);
  }

  return config;
}

function asRecord(value: unknown): Record<string, unknown> {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) return {};
  return Object.fromEntries(Object.entries(value));
}

function readString(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined;
}

function readInt(name: string, value: unknown, fallback: number, min: number): number {
  if (value === undefined || value === '') return fallback;
  const n = typeof value === 'number' ? value : Number(value);
  if (!Number.isInteger(n) || n < min) {
    throw new Error(`${name} must be an integer >= ${min} (got ${String(value)})`);
  }
  return n;
}
