import { PassThrough } from 'node:stream';
import { afterEach, describe, expect, it } from 'vitest';

import { ReadlineLineReader, readlineHistory } from '../line-reader.js';

const tick = () => new Promise<void>((resolve) => setImmediate(resolve));

describe('readlineHistory', () => {
  it('puts the newest entry first and keeps repeats', () => {
    expect(readlineHistory(['ls', 'pwd', 'pwd', 'cd /tmp'])).toEqual(['cd /tmp', 'pwd', 'pwd', 'ls']);
  });

  it('leaves the stored order untouched', () => {
    const entries = ['a', 'b'];
    readlineHistory(entries);
    expect(entries).toEqual(['a', 'b']);
  });
});

describe('ReadlineLineReader', () => {
  let input: PassThrough;
  let output: PassThrough;
  let reader: ReadlineLineReader;

  function open(history: string[] = []): ReadlineLineReader {
    input = new PassThrough();
    output = new PassThrough();
    reader = new ReadlineLineReader({
      input,
      output,
      history,
      historySize: 100,
      complete: async (line) => [[], line]
    });
    return reader;
  }

  afterEach(() => {
    reader.close();
  });

  it('keeps piped lines that arrive before they are read', async () => {
    open();
    input.write('one\ntwo\nthree\n');
    await tick();

    expect(await reader.read('> ')).toBe('one');
    expect(await reader.read('> ')).toBe('two');
    expect(await reader.read('> ')).toBe('three');
  });

  it('writes the prompt while waiting for a line', async () => {
    open();
    const chunks: string[] = [];
    output.on('data', (chunk: Buffer) => chunks.push(chunk.toString('utf8')));

    const pending = reader.read('termlet:/tmp$ ');
    input.write('pwd\n');
    expect(await pending).toBe('pwd');
    await tick();
    expect(chunks.join('')).toContain('termlet:/tmp$ ');
  });

  it('delivers a final unterminated line, then null', async () => {
    open();
    input.end('last');

    expect(await reader.read('> ')).toBe('last');
    expect(await reader.read('> ')).toBeNull();
    expect(await reader.read('> ')).toBeNull();
  });

  it('returns null once closed', async () => {
    open();
    const pending = reader.read('> ');
    reader.close();
    expect(await pending).toBeNull();
  });

  it('resumes reading after a suspended task', async () => {
    open();
    const result = await reader.suspend(async () => {
      input.write('typed during the task\n');
      await tick();
      return 42;
    });

    expect(result).toBe(42);
    expect(await reader.read('> ')).toBe('typed during the task');
    expect(input.isPaused()).toBe(false);
  });

  it('resumes reading when the suspended task fails', async () => {
    open();
    await expect(
      reader.suspend(async () => {
        throw new Error('child failed');
      })
    ).rejects.toThrow('child failed');

    input.write('next\n');
    expect(await reader.read('> ')).toBe('next');
  });
});
