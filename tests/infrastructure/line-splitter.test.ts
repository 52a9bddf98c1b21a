import { describe, it, expect } from 'vitest';
import { LineSplitter } from '../../src/infrastructure/index.js';

const text = (lines: Buffer[]) => lines.map((line) => line.toString());

describe('LineSplitter', () => {
  it('splits on newlines and strips carriage returns', () => {
    const splitter = new LineSplitter();

    expect(text(splitter.push(Buffer.from('a\nb\r\nc')))).toEqual(['a', 'b']);
    expect(splitter.pending).toBe(1);
    expect(text(splitter.flush())).toEqual(['c']);
    expect(splitter.pending).toBe(0);
  });

  it('joins a line split across chunks', () => {
    const splitter = new LineSplitter();

    expect(splitter.push(Buffer.from('hel'))).toEqual([]);
    expect(text(splitter.push(Buffer.from('lo\n')))).toEqual(['hello']);
  });

  it('skips blank lines', () => {
    const splitter = new LineSplitter();
    expect(text(splitter.push(Buffer.from('\n\r\nx\n')))).toEqual(['x']);
  });

  it('cuts an oversized line into pieces', () => {
    const splitter = new LineSplitter(4);

    expect(text(splitter.push(Buffer.from('abcdefghij')))).toEqual(['abcd', 'efgh']);
    expect(splitter.pending).toBe(2);
  });

  it('returns nothing on flush when no partial line is held', () => {
    const splitter = new LineSplitter();
    splitter.push(Buffer.from('done\n'));

    expect(splitter.flush()).toEqual([]);
  });
});
