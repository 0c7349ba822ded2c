/**
 * Streaming Item Iterator
 *
 * Decodes the elements of a top-level JSON array one pull at a time. Only
 * the element being decoded is held in memory, so arrays larger than the
 * heap can be processed from a file.
 */

import { createLogger } from '../utils/logger.js';
import type { JsonCodec } from './codecs/codec.js';
import { JsonParser } from './parser.js';
import { FileSource, closeResource } from './sources.js';
import { TokenKind, type CharSource, type DecodeOptions } from './types.js';

const log = createLogger('Stream');

/**
 * Lazily decode each element of a JSON array
 *
 * A factory is called on the first pull, so nothing is opened until the
 * iteration starts. The source is closed when the array ends, when the
 * consumer stops early, or when decoding fails. Iteration stops at the
 * closing `]` and reads nothing after it.
 *
 * @example
 * ```ts
 * for (const event of streamItems(() => new FileSource('events.json'), Event)) {
 *   if (event.kind === 'Stop') break;
 * }
 * ```
 */
export function streamItems<T>(
  open: CharSource | (() => CharSource),
  codec: JsonCodec<T>,
  options?: DecodeOptions
): IterableIterator<T> {
  const items = readItems(open, codec, options);
  let started = false;

  const iterator: IterableIterator<T> = {
    next() {
      started = true;
      return items.next();
    },
    return() {
      // A generator that never ran has no finally to close a source it was handed.
      if (!started && typeof open !== 'function') {
        started = true;
        closeResource(open, open.label, false);
        log.debug(`closed ${open.label} before the first item`);
      }
      return items.return(undefined);
    },
    [Symbol.iterator]() {
      return iterator;
    },
  };
  return iterator;
}

function* readItems<T>(
  open: CharSource | (() => CharSource),
  codec: JsonCodec<T>,
  options?: DecodeOptions
): Generator<T, void, undefined> {
  const source = typeof open === 'function' ? open() : open;
  log.debug(`opened ${source.label}`);

  let pending = true;
  let count = 0;
  try {
    const parser = new JsonParser(source, options);
    parser.expect(TokenKind.ArrayOpen);
    parser.enter();
    while (parser.peekKind() !== TokenKind.ArrayClose) {
      const item = codec.decode(parser);
      parser.separator(TokenKind.ArrayClose);
      count++;
      yield item;
    }
    parser.leave();
    pending = false;
  } finally {
    closeResource(source, source.label, pending);
    log.debug(`closed ${source.label} after ${count} items`);
  }
}

export function streamFileItems<T>(
  path: string,
  codec: JsonCodec<T>,
  options?: DecodeOptions
): IterableIterator<T> {
  return streamItems(() => new FileSource(path), codec, options);
}
