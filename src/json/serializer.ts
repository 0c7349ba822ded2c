/**
 * JSON Writer
 *
 * Token-level output to a CharSink. The writer places commas, colons and
 * (when pretty printing) newlines itself, so codecs only say what comes
 * next. Output is compact unless `pretty` is set.
 */

import { EncodeError } from '../utils/errors.js';
import type { JsonCodec } from './codecs/codec.js';
import { FileSink, StringSink, closeResource } from './sources.js';
import type { CharSink, EncodeOptions } from './types.js';

interface Frame {
  kind: 'object' | 'array';
  count: number;
}

function resolveIndent(options: EncodeOptions): string | undefined {
  if (!options.pretty) {
    return undefined;
  }
  const indent = options.indent ?? 2;
  return typeof indent === 'number' ? ' '.repeat(indent) : indent;
}

export class JsonWriter {
  private readonly frames: Frame[] = [];
  private readonly indent: string | undefined;
  private afterKey = false;
  private isWritingKey = false;
  private wroteRoot = false;

  constructor(
    private readonly sink: CharSink,
    options: EncodeOptions = {}
  ) {
    this.indent = resolveIndent(options);
  }

  beginObject(): void {
    this.beforeValue();
    this.sink.write('{');
    this.frames.push({ kind: 'object', count: 0 });
  }

  endObject(): void {
    this.close('object', '}');
  }

  beginArray(): void {
    this.beforeValue();
    this.sink.write('[');
    this.frames.push({ kind: 'array', count: 0 });
  }

  endArray(): void {
    this.close('array', ']');
  }

  /**
   * Write an object key; the next value written belongs to it
   */
  key(name: string): void {
    const frame = this.top();
    if (frame === undefined || frame.kind !== 'object' || this.afterKey) {
      throw new EncodeError(`key "${name}" written outside an object`);
    }
    this.isWritingKey = true;
    this.beforeValue();
    this.isWritingKey = false;
    this.sink.write(JSON.stringify(name));
    this.sink.write(this.indent === undefined ? ':' : ': ');
    this.afterKey = true;
  }

  string(value: string): void {
    if (typeof value !== 'string') {
      throw new EncodeError(`expected a string but got ${typeof value}`);
    }
    this.raw(JSON.stringify(value));
  }

  number(value: number): void {
    if (typeof value !== 'number' || !Number.isFinite(value)) {
      throw new EncodeError(`cannot encode ${String(value)} as a JSON number`);
    }
    this.raw(String(value));
  }

  bigint(value: bigint): void {
    if (typeof value !== 'bigint') {
      throw new EncodeError(`expected a bigint but got ${typeof value}`);
    }
    this.raw(value.toString());
  }

  boolean(value: boolean): void {
    if (typeof value !== 'boolean') {
      throw new EncodeError(`expected a boolean but got ${typeof value}`);
    }
    this.raw(value ? 'true' : 'false');
  }

  null(): void {
    this.raw('null');
  }

  /**
   * Verify that every container was closed
   */
  finish(): void {
    if (this.frames.length > 0 || this.afterKey) {
      throw new EncodeError('unterminated JSON value');
    }
  }

  private raw(text: string): void {
    this.beforeValue();
    this.sink.write(text);
  }

  private top(): Frame | undefined {
    return this.frames[this.frames.length - 1];
  }

  private newline(level: number): void {
    if (this.indent !== undefined) {
      this.sink.write('\n' + this.indent.repeat(level));
    }
  }

  private beforeValue(): void {
    if (this.afterKey) {
      this.afterKey = false;
      return;
    }
    const frame = this.top();
    if (frame === undefined) {
      if (this.wroteRoot) {
        throw new EncodeError('only one top-level value can be written');
      }
      this.wroteRoot = true;
      return;
    }
    if (frame.kind === 'object' && !this.isWritingKey) {
      throw new EncodeError('object member written without a key');
    }
    if (frame.count > 0) {
      this.sink.write(',');
    }
    this.newline(this.frames.length);
    frame.count++;
  }

  private close(kind: Frame['kind'], text: string): void {
    const frame = this.frames.pop();
    if (frame === undefined || frame.kind !== kind || this.afterKey) {
      throw new EncodeError(`unbalanced ${text}`);
    }
    if (frame.count > 0) {
      this.newline(this.frames.length);
    }
    this.sink.write(text);
  }
}

/**
 * Write the JSON for `value` to a sink. The sink stays open.
 */
export function encode<T>(
  sink: CharSink,
  codec: JsonCodec<T>,
  value: T,
  options?: EncodeOptions
): void {
  const writer = new JsonWriter(sink, options);
  codec.encode(writer, value);
  writer.finish();
}

/**
 * Encode to a string
 *
 * @example
 * ```ts
 * const point = record({ x: number, y: number });
 * toJson(point, { x: 1, y: 2 }); // '{"x":1,"y":2}'
 * ```
 */
export function toJson<T>(codec: JsonCodec<T>, value: T, options?: EncodeOptions): string {
  const sink = new StringSink();
  encode(sink, codec, value, options);
  return sink.toString();
}

/**
 * Encode to a file, closing it on every exit path
 */
export function writeJsonFile<T>(
  path: string,
  codec: JsonCodec<T>,
  value: T,
  options?: EncodeOptions
): void {
  const sink = new FileSink(path);
  let pending = true;
  try {
    encode(sink, codec, value, options);
    pending = false;
  } finally {
    closeResource(sink, path, pending);
  }
}
