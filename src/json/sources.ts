/**
 * Character Sources and Sinks
 *
 * String-backed and file-backed implementations of CharSource/CharSink.
 * File access is synchronous and chunked; only one chunk is held in memory.
 */

import { closeSync, openSync, readSync, writeSync } from 'node:fs';
import { StringDecoder } from 'node:string_decoder';
import { describeJsonError } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';
import type { CharSink, CharSource } from './types.js';

const log = createLogger('Source');

const DEFAULT_CHUNK_SIZE = 65536; // 64KB

/**
 * Close a source or sink on the way out of an operation. When another error
 * is already propagating (`pending`), a failure to close is logged so the
 * original error reaches the caller; otherwise it is thrown.
 */
export function closeResource(resource: CharSource | CharSink, label: string, pending: boolean): void {
  try {
    resource.close();
  } catch (error) {
    if (!pending) {
      throw error;
    }
    log.warn(`failed to close ${label}: ${describeJsonError(error)}`);
  }
}

export class StringSource implements CharSource {
  private index = 0;
  private isClosed = false;

  constructor(
    private readonly text: string,
    readonly label: string = '<string>'
  ) {}

  read(): string | undefined {
    if (this.isClosed || this.index >= this.text.length) {
      return undefined;
    }
    return this.text[this.index++];
  }

  close(): void {
    this.isClosed = true;
  }

  get closed(): boolean {
    return this.isClosed;
  }
}

/**
 * UTF-8 file reader
 *
 * @example
 * ```ts
 * const source = new FileSource('./data/items.json');
 * try {
 *   // ...
 * } finally {
 *   source.close();
 * }
 * ```
 */
export class FileSource implements CharSource {
  readonly label: string;
  private fd: number | undefined;
  private readonly buffer: Buffer;
  private readonly decoder = new StringDecoder('utf8');
  private chunk = '';
  private index = 0;

  constructor(path: string, chunkSize: number = DEFAULT_CHUNK_SIZE) {
    this.label = path;
    this.fd = openSync(path, 'r');
    this.buffer = Buffer.alloc(chunkSize);
  }

  read(): string | undefined {
    while (this.index >= this.chunk.length) {
      if (!this.fill()) {
        return undefined;
      }
    }
    return this.chunk[this.index++];
  }

  close(): void {
    if (this.fd !== undefined) {
      const fd = this.fd;
      this.fd = undefined;
      closeSync(fd);
    }
  }

  get closed(): boolean {
    return this.fd === undefined;
  }

  /**
   * Load the next chunk. Returns false at end of file.
   */
  private fill(): boolean {
    if (this.fd === undefined) {
      return false;
    }
    const bytesRead = readSync(this.fd, this.buffer, 0, this.buffer.length, null);
    if (bytesRead === 0) {
      this.chunk = this.decoder.end();
      this.index = 0;
      if (this.chunk === '') {
        this.close();
        return false;
      }
      return true;
    }
    this.chunk = this.decoder.write(this.buffer.subarray(0, bytesRead));
    this.index = 0;
    return true;
  }
}

export class StringSink implements CharSink {
  private readonly parts: string[] = [];

  write(text: string): void {
    this.parts.push(text);
  }

  close(): void {}

  toString(): string {
    return this.parts.join('');
  }
}

/**
 * Buffered UTF-8 file writer. Truncates the file on open.
 */
export class FileSink implements CharSink {
  private fd: number | undefined;
  private pending = '';

  constructor(
    readonly path: string,
    private readonly highWaterMark: number = DEFAULT_CHUNK_SIZE
  ) {
    this.fd = openSync(path, 'w');
  }

  write(text: string): void {
    if (this.fd === undefined) {
      throw new Error(`FileSink for ${this.path} is closed`);
    }
    this.pending += text;
    if (this.pending.length >= this.highWaterMark) {
      this.flush();
    }
  }

  flush(): void {
    if (this.fd !== undefined && this.pending !== '') {
      writeSync(this.fd, this.pending);
      this.pending = '';
    }
  }

  close(): void {
    if (this.fd === undefined) {
      return;
    }
    try {
      this.flush();
    } finally {
      const fd = this.fd;
      this.fd = undefined;
      closeSync(fd);
    }
  }

  get closed(): boolean {
    return this.fd === undefined;
  }
}
