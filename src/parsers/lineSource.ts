import * as fs from 'fs';

const CHUNK_SIZE = 64 * 1024;
const NEWLINE = 0x0a;
const CARRIAGE_RETURN = 0x0d;

/**
 * Synchronous, rewindable line reader over one open file descriptor.
 *
 * Positions are byte offsets of the next unread line, so a caller can
 * remember one with tell() and come back to it with seek().
 */
export class LineSource {
  private fd: number | null;
  private chunk: Buffer = Buffer.alloc(0);
  private chunkStart = 0;
  private position = 0;
  private reachedEnd = false;

  /**
   * Opens the file for reading; throws whatever fs.openSync throws
   */
  constructor(readonly filePath: string) {
    this.fd = fs.openSync(filePath, 'r');
  }

  get closed(): boolean {
    return this.fd === null;
  }

  /**
   * True once a read has run into the end of the file
   */
  get ended(): boolean {
    return this.reachedEnd;
  }

  /**
   * Read the next line without its terminator (\n or \r\n).
   * Returns null when there is nothing left.
   */
  readLine(): string | null {
    const parts: Buffer[] = [];

    for (;;) {
      let offset = this.position - this.chunkStart;
      if (offset < 0 || offset >= this.chunk.length) {
        if (this.fill(this.position) === 0) {
          this.reachedEnd = true;
          return parts.length > 0 ? decode(parts) : null;
        }
        offset = 0;
      }

      const newline = this.chunk.indexOf(NEWLINE, offset);
      if (newline === -1) {
        parts.push(this.chunk.subarray(offset));
        this.position = this.chunkStart + this.chunk.length;
        continue;
      }

      parts.push(this.chunk.subarray(offset, newline));
      this.position = this.chunkStart + newline + 1;
      return decode(parts);
    }
  }

  tell(): number {
    return this.position;
  }

  /**
   * Move to a byte offset previously returned by tell(); clears the end flag
   */
  seek(position: number, ended = false): void {
    this.position = position;
    this.reachedEnd = ended;
  }

  rewind(): void {
    this.seek(0);
  }

  close(): void {
    if (this.fd !== null) {
      fs.closeSync(this.fd);
      this.fd = null;
      this.chunk = Buffer.alloc(0);
    }
  }

  private fill(position: number): number {
    if (this.fd === null) {
      throw new Error(`Line source for ${this.filePath} is closed`);
    }
    const buffer = Buffer.alloc(CHUNK_SIZE);
    const bytesRead = fs.readSync(this.fd, buffer, 0, CHUNK_SIZE, position);
    this.chunk = buffer.subarray(0, bytesRead);
    this.chunkStart = position;
    return bytesRead;
  }
}

function decode(parts: Buffer[]): string {
  let line = parts.length === 1 ? parts[0] : Buffer.concat(parts);
  if (line.length > 0 && line[line.length - 1] === CARRIAGE_RETURN) {
    line = line.subarray(0, line.length - 1);
  }
  return line.toString('utf-8');
}
