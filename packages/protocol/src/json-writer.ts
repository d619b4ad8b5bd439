// JSON Writer - Forward-only JSON text writer over a synchronous sink

import type { RawFragment } from './raw-fragment.js';

export interface TextSink {
  /** Throws on failure; the sink is then unusable. */
  write(chunk: string): void;
}

export class StringSink implements TextSink {
  private chunks: string[] = [];

  write(chunk: string): void {
    this.chunks.push(chunk);
  }

  toString(): string {
    return this.chunks.join('');
  }
}

export type JsonPrimitive = string | number | boolean | null;

interface Scope {
  kind: 'object' | 'array';
  count: number;
}

export class JsonTextWriter {
  private sink: TextSink;
  private scopes: Scope[] = [];
  private awaitingValue = false;
  private rootWritten = false;

  constructor(sink: TextSink) {
    this.sink = sink;
  }

  writeStartObject(): void {
    this.beforeValue();
    this.sink.write('{');
    this.scopes.push({ kind: 'object', count: 0 });
  }

  writeEndObject(): void {
    this.endScope('object');
    this.sink.write('}');
  }

  writeStartArray(): void {
    this.beforeValue();
    this.sink.write('[');
    this.scopes.push({ kind: 'array', count: 0 });
  }

  writeEndArray(): void {
    this.endScope('array');
    this.sink.write(']');
  }

  writePropertyName(name: string): void {
    const scope = this.currentScope();
    if (scope?.kind !== 'object' || this.awaitingValue) {
      throw new Error(`Cannot write property name "${name}" here`);
    }
    this.sink.write(`${scope.count > 0 ? ',' : ''}${JSON.stringify(name)}:`);
    scope.count++;
    this.awaitingValue = true;
  }

  writeValue(value: JsonPrimitive): void {
    if (typeof value === 'number' && !Number.isFinite(value)) {
      throw new RangeError(`Cannot write non-finite number ${value}`);
    }
    this.beforeValue();
    this.sink.write(JSON.stringify(value));
  }

  /** Write already-encoded JSON without escaping it. */
  writeRawValue(fragment: RawFragment): void {
    this.beforeValue();
    this.sink.write(fragment.json);
  }

  private currentScope(): Scope | undefined {
    return this.scopes[this.scopes.length - 1];
  }

  private beforeValue(): void {
    if (this.awaitingValue) {
      this.awaitingValue = false;
      return;
    }

    const scope = this.currentScope();
    if (!scope) {
      if (this.rootWritten) throw new Error('JSON document already has a root value');
      this.rootWritten = true;
      return;
    }
    if (scope.kind === 'object') {
      throw new Error('Expected a property name before an object value');
    }
    if (scope.count > 0) this.sink.write(',');
    scope.count++;
  }

  private endScope(kind: Scope['kind']): void {
    const scope = this.currentScope();
    if (scope?.kind !== kind || this.awaitingValue) {
      throw new Error(`Cannot end ${kind} here`);
    }
    this.scopes.pop();
  }
}
