// @cyclewire/protocol - Wire encoding for persistent connection response cycles

export { RawFragment } from './raw-fragment.js';
export { segmentOf, enumerateMessages } from './segments.js';
export type { Message, MessageSegment } from './segments.js';
export { PersistentResponse } from './persistent-response.js';
export type { PersistentResponseInit, ExcludeFilter } from './persistent-response.js';
export { JsonTextWriter, StringSink } from './json-writer.js';
export type { TextSink, JsonPrimitive } from './json-writer.js';
export { writePersistentResponse, encodePersistentResponse, RESPONSE_KEYS } from './encoder.js';
