// Relay Types - Bus messages and connection commands

import type { Message } from '@cyclewire/protocol';

export type ConnectionCommand =
  | { type: 'addToGroup'; group: string }
  | { type: 'removeFromGroup'; group: string }
  | { type: 'disconnect' }
  | { type: 'abort' };

export interface BusMessage extends Message {
  key: string;
  id: number;
  /** Sending connection; it never receives its own message back. */
  source?: string;
  /** Connections that must not receive this message. */
  excludedConnections?: readonly string[];
  command?: ConnectionCommand;
}

export const BROADCAST_KEY = 'broadcast';

export function connectionKey(connectionId: string): string {
  return `c:${connectionId}`;
}

export function groupKey(group: string): string {
  return `g:${group}`;
}
