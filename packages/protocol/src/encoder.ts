// Response Encoder - Writes a PersistentResponse as compact JSON
//
// Only the fields a client needs are written, under single-letter keys.
// Message payloads are embedded as already-serialized fragments so they
// are never encoded twice.

import { JsonTextWriter, StringSink, type TextSink } from './json-writer.js';
import { enumerateMessages, type Message } from './segments.js';
import type { PersistentResponse } from './persistent-response.js';

export const RESPONSE_KEYS = {
  cursor: 'C',
  disconnect: 'D',
  timedOut: 'T',
  resetGroups: 'R',
  addedGroups: 'G',
  removedGroups: 'g',
  longPollDelay: 'L',
  messages: 'M',
} as const;

/**
 * Write `response` to `sink` synchronously. Sink errors propagate as thrown;
 * the sink is then partially written and must be discarded.
 */
export function writePersistentResponse<TMessage extends Message>(
  response: PersistentResponse<TMessage>,
  sink: TextSink,
): void {
  const writer = new JsonTextWriter(sink);
  writer.writeStartObject();

  writer.writePropertyName(RESPONSE_KEYS.cursor);
  writer.writeValue(response.messageId);

  if (response.disconnect) {
    writer.writePropertyName(RESPONSE_KEYS.disconnect);
    writer.writeValue(1);
  }

  if (response.timedOut) {
    writer.writePropertyName(RESPONSE_KEYS.timedOut);
    writer.writeValue(1);
  }

  if (response.addedGroups !== null) {
    // R replaces the client's group set; G is merged into it
    if (response.resetGroups) {
      writer.writePropertyName(RESPONSE_KEYS.resetGroups);
    } else {
      writer.writePropertyName(RESPONSE_KEYS.addedGroups);
    }
    writeStringArray(writer, response.addedGroups);
  }

  if (response.removedGroups !== null) {
    writer.writePropertyName(RESPONSE_KEYS.removedGroups);
    writeStringArray(writer, response.removedGroups);
  }

  if (response.longPollDelay !== undefined) {
    writer.writePropertyName(RESPONSE_KEYS.longPollDelay);
    writer.writeValue(response.longPollDelay);
  }

  writer.writePropertyName(RESPONSE_KEYS.messages);
  writer.writeStartArray();

  const exclude = response.excludeFilter;
  for (const message of enumerateMessages(response.messages, (m) => m.isCommand || exclude(m))) {
    writer.writeRawValue(message.value);
  }

  writer.writeEndArray();
  writer.writeEndObject();
}

export function encodePersistentResponse<TMessage extends Message>(response: PersistentResponse<TMessage>): string {
  const sink = new StringSink();
  writePersistentResponse(response, sink);
  return sink.toString();
}

function writeStringArray(writer: JsonTextWriter, items: readonly string[]): void {
  writer.writeStartArray();
  for (const item of items) {
    writer.writeValue(item);
  }
  writer.writeEndArray();
}
