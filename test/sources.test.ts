/**
 * Sources, Sinks and File Operations Tests
 */

import { mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import {
  EncodeError,
  FileSink,
  FileSource,
  StringSink,
  StringSource,
  array,
  decode,
  integer,
  optional,
  readJsonFile,
  record,
  string,
  writeJsonFile,
} from '../src/index.js';
import { closeResource } from '../src/json/sources.js';

const Note = record({ title: string, body: optional(string), tags: array(string) }, 'Note');

function drain(source: { read(): string | undefined }): string {
  let text = '';
  for (let char = source.read(); char !== undefined; char = source.read()) {
    text += char;
  }
  return text;
}

describe('StringSource', () => {
  it('should yield characters until exhausted', () => {
    const source = new StringSource('ab');

    expect(source.read()).toBe('a');
    expect(source.read()).toBe('b');
    expect(source.read()).toBeUndefined();
    expect(source.label).toBe('<string>');
  });

  it('should stop reading once closed', () => {
    const source = new StringSource('ab', 'inline');
    source.close();

    expect(source.read()).toBeUndefined();
    expect(source.closed).toBe(true);
    expect(source.label).toBe('inline');
  });
});

describe('StringSink', () => {
  it('should collect written text', () => {
    const sink = new StringSink();
    sink.write('{');
    sink.write('}');

    expect(sink.toString()).toBe('{}');
  });
});

describe('file sources and sinks', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'typed-json-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('should decode multi-byte characters split across chunks', () => {
    const path = join(dir, 'text.json');
    writeFileSync(path, '"héllo wörld 😀"');

    const source = new FileSource(path, 3);

    expect(decode(source, string)).toBe('héllo wörld 😀');
    expect(source.closed).toBe(true);
  });

  it('should read every character of a file', () => {
    const path = join(dir, 'plain.txt');
    writeFileSync(path, 'ä\nb');

    const source = new FileSource(path, 2);

    expect(drain(source)).toBe('ä\nb');
    source.close();
    expect(source.closed).toBe(true);
  });

  it('should round trip a value through a file', () => {
    const path = join(dir, 'notes.json');
    const notes = [
      { title: 'first', body: 'text', tags: ['a'] },
      { title: 'second', body: undefined, tags: [] },
    ];

    writeJsonFile(path, array(Note), notes, { pretty: true });

    expect(readFileSync(path, 'utf8')).toBe(
      JSON.stringify(
        [
          { title: 'first', body: 'text', tags: ['a'] },
          { title: 'second', body: null, tags: [] },
        ],
        null,
        2
      )
    );
    expect(readJsonFile(path, array(Note))).toEqual(notes);
  });

  it('should flush buffered output when the sink is closed', () => {
    const path = join(dir, 'buffered.json');
    const sink = new FileSink(path, 1024);

    sink.write('[1,');
    sink.write('2]');
    expect(readFileSync(path, 'utf8')).toBe('');

    sink.close();
    expect(readFileSync(path, 'utf8')).toBe('[1,2]');
    expect(sink.closed).toBe(true);
    expect(() => sink.write('x')).toThrow(`FileSink for ${path} is closed`);
  });

  it('should close the file when encoding fails', () => {
    const path = join(dir, 'failed.json');

    expect(() => writeJsonFile(path, integer, 1.5)).toThrow(EncodeError);
    expect(readFileSync(path, 'utf8')).toBe('');
  });

  it('should require end of input in a file', () => {
    const path = join(dir, 'two.json');
    writeFileSync(path, '1\n2');

    expect(() => readJsonFile(path, integer)).toThrow(`${path}:2:1: expected end of input but got number 2`);
  });
});

describe('closeResource', () => {
  const failing = {
    write(): void {},
    close(): void {
      throw new Error('disk gone');
    },
  };

  it('should throw a close failure when nothing else is propagating', () => {
    expect(() => closeResource(failing, 'fake', false)).toThrow('disk gone');
  });

  it('should not mask an error that is already propagating', () => {
    expect(() => closeResource(failing, 'fake', true)).not.toThrow();
  });
});
