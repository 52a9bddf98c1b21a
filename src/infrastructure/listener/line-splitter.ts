const NEWLINE = 0x0a;
const CARRIAGE_RETURN = 0x0d;

export const DEFAULT_MAX_LINE_BYTES = 1024 * 1024;

/**
 * Splits a TCP byte stream into newline-delimited lines.
 *
 * Bytes are buffered across chunks until a `\n` arrives. A trailing `\r`
 * is stripped and blank lines are skipped. A partial line that grows
 * past `maxLineBytes` is emitted as-is rather than buffered forever.
 */
export class LineSplitter {
  private buffer: Buffer = Buffer.alloc(0);
  private readonly maxLineBytes: number;

  constructor(maxLineBytes: number = DEFAULT_MAX_LINE_BYTES) {
    this.maxLineBytes = maxLineBytes;
  }

  /** Appends a chunk and returns every line it completed. */
  push(chunk: Buffer): Buffer[] {
    this.buffer = this.buffer.length === 0 ? chunk : Buffer.concat([this.buffer, chunk]);
    const lines: Buffer[] = [];

    let start = 0;
    let newline = this.buffer.indexOf(NEWLINE, start);
    while (newline !== -1) {
      this.emit(lines, this.buffer.subarray(start, newline));
      start = newline + 1;
      newline = this.buffer.indexOf(NEWLINE, start);
    }
    this.buffer = this.buffer.subarray(start);

    while (this.buffer.length > this.maxLineBytes) {
      this.emit(lines, this.buffer.subarray(0, this.maxLineBytes));
      this.buffer = this.buffer.subarray(this.maxLineBytes);
    }

    return lines;
  }

  /** Returns the unterminated remainder (if any) at end of stream. */
  flush(): Buffer[] {
    const lines: Buffer[] = [];
    this.emit(lines, this.buffer);
    this.buffer = Buffer.alloc(0);
    return lines;
  }

  /** Bytes currently held waiting for a newline. */
  get pending(): number {
    return this.buffer.length;
  }

  private emit(lines: Buffer[], line: Buffer): void {
    const end = line.length > 0 && line[line.length - 1] === CARRIAGE_RETURN ? line.length - 1 : line.length;
    if (end === 0) return;
    // Copy out so the line does not pin the whole receive buffer
    lines.push(Buffer.from(line.subarray(0, end)));
  }
}
