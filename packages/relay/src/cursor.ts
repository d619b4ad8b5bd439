// Cursor - Per-key read positions, serialized as an opaque string for clients

export type Cursor = ReadonlyMap<string, number>;

export class InvalidCursorError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidCursorError';
  }
}

export function serializeCursor(cursor: Cursor): string {
  const params = new URLSearchParams();
  for (const [key, id] of cursor) {
    params.append(key, String(id));
  }
  return params.toString();
}

export function parseCursor(text: string): Cursor {
  const cursor = new Map<string, number>();
  for (const [key, value] of new URLSearchParams(text)) {
    const id = Number(value);
    if (value === '' || !Number.isSafeInteger(id) || id < -1) {
      throw new InvalidCursorError(`Invalid position "${value}" for key "${key}"`);
    }
    cursor.set(key, id);
  }
  return cursor;
}
