import type { DocumentObject } from '../types/document';
import { isEndOfData } from '../types/document';
import type { KeyPath } from '../types/path';
import type { ArrayStrategy, DocumentCallback, PlayControl, ReplayOptions } from '../types/replay';
import { isDataLine, splitCsvLine } from './csvLine';
import { buildDocument } from './documentBuilder';
import { ReplayClosedError, ReplayError, ReplayHeaderError, ReplayOpenError } from './errors';
import { compileHeaders } from './keyPath';
import { LineSource } from './lineSource';

/**
 * Read forward to the next line that is neither comment nor blank
 */
function nextDataLine(source: LineSource): string | null {
  let line: string | null;
  while ((line = source.readLine()) !== null) {
    if (isDataLine(line)) {
      return line;
    }
  }
  return null;
}

/**
 * Replays a CSV file as a sequence of nested documents, one per data row.
 *
 * The header line is compiled once into key paths; each data row is then
 * typed and assembled into a fresh document. Lines whose first non-space
 * character is '#' and blank lines are skipped everywhere.
 *
 * All operations are synchronous and move a single cursor, so one instance
 * must not be shared between concurrent consumers.
 *
 * @example
 * ```ts
 * const replay = new Replay('telemetry.csv');
 * replay.play(doc => console.log(doc.speed));
 *
 * replay.setLoop(true);
 * replay.reset();
 * replay.play(doc => send(doc), 3); // three passes over the data
 * replay.close();
 * ```
 */
export class Replay implements Iterable<DocumentObject> {
  private readonly source: LineSource;
  private readonly compiledHeaders: readonly KeyPath[];
  private readonly arrayStrategy: ArrayStrategy;
  private loopEnabled: boolean;

  /**
   * @throws ReplayOpenError when the file cannot be read
   * @throws ReplayHeaderError when the file has no header line
   */
  constructor(readonly filePath: string, options: ReplayOptions = {}) {
    let source: LineSource;
    try {
      source = new LineSource(filePath);
    } catch (err) {
      throw new ReplayOpenError(filePath, err);
    }

    let headers: KeyPath[];
    try {
      const headerLine = nextDataLine(source);
      if (headerLine === null) {
        throw new ReplayHeaderError(filePath);
      }
      headers = compileHeaders(headerLine);
    } catch (err) {
      source.close();
      // Opening a directory succeeds on some platforms and only fails on read
      throw err instanceof ReplayError ? err : new ReplayOpenError(filePath, err);
    }

    this.source = source;
    this.compiledHeaders = headers;
    this.arrayStrategy = options.arrayStrategy ?? 'grouped';
    this.loopEnabled = options.loop ?? false;
  }

  /** Compiled header paths, in column order */
  get headers(): readonly KeyPath[] {
    return this.compiledHeaders;
  }

  get closed(): boolean {
    return this.source.closed;
  }

  /**
   * Read the next data row as a document.
   *
   * At end of file returns the empty document, unless loop mode is on, in
   * which case the cursor rewinds and the first row is returned instead.
   */
  advance(): DocumentObject {
    this.assertOpen();

    const line = nextDataLine(this.source);
    if (line !== null) {
      return this.build(line);
    }

    if (this.loopEnabled) {
      this.reset();
      // A single retry: a file without data rows ends here instead of recursing
      const first = nextDataLine(this.source);
      if (first !== null) {
        return this.build(first);
      }
    }

    return {};
  }

  /**
   * Always true in loop mode; otherwise true until a read hits end of file
   */
  hasNext(): boolean {
    if (this.source.closed) {
      return false;
    }
    if (this.loopEnabled) {
      return true;
    }
    return !this.source.ended;
  }

  /**
   * Rewind to the first data row. Headers are not compiled again.
   */
  reset(): void {
    this.assertOpen();
    this.source.rewind();
    nextDataLine(this.source);
  }

  setLoop(enabled: boolean): void {
    this.loopEnabled = enabled;
  }

  isLoopEnabled(): boolean {
    return this.loopEnabled;
  }

  /**
   * Count the data rows in one pass over the file.
   * The cursor is put back where it was.
   */
  countDataRows(): number {
    this.assertOpen();

    const position = this.source.tell();
    const ended = this.source.ended;

    this.reset();
    let count = 0;
    while (nextDataLine(this.source) !== null) {
      count++;
    }

    this.source.seek(position, ended);
    return count;
  }

  /**
   * Feed documents to `callback` until the data runs out.
   *
   * With loop mode on and `maxCycles` > 0, the file is replayed from its
   * first row for exactly `maxCycles` passes. With loop mode on and
   * `maxCycles` 0 this never returns unless the callback calls
   * `control.stop()`.
   *
   * @returns the number of documents delivered
   */
  play(callback: DocumentCallback, maxCycles = 0): number {
    if (!Number.isInteger(maxCycles) || maxCycles < 0) {
      throw new RangeError(`maxCycles must be a non-negative integer, got ${maxCycles}`);
    }

    let stopped = false;
    let delivered = 0;
    const control: PlayControl = {
      stop: () => {
        stopped = true;
      },
      get delivered() {
        return delivered;
      },
    };

    let budget = Infinity;
    if (this.loopEnabled && maxCycles > 0) {
      const rowsPerCycle = this.countDataRows();
      if (rowsPerCycle === 0) {
        return 0;
      }
      budget = rowsPerCycle * maxCycles;
      this.reset();
    }

    while (!stopped && delivered < budget && this.hasNext()) {
      const document = this.advance();
      if (isEndOfData(document)) {
        break;
      }
      delivered++;
      callback(document, control);
    }

    return delivered;
  }

  /**
   * Iterate the remaining documents (endless in loop mode)
   */
  *[Symbol.iterator](): Iterator<DocumentObject> {
    while (this.hasNext()) {
      const document = this.advance();
      if (isEndOfData(document)) {
        return;
      }
      yield document;
    }
  }

  /**
   * Release the file descriptor. Safe to call more than once.
   */
  close(): void {
    this.source.close();
  }

  private build(line: string): DocumentObject {
    return buildDocument(this.compiledHeaders, splitCsvLine(line), this.arrayStrategy);
  }

  private assertOpen(): void {
    if (this.source.closed) {
      throw new ReplayClosedError(this.filePath);
    }
  }
}

/**
 * Open a replay, hand it to `fn` and close it on every exit path
 */
export function withReplay<T>(filePath: string, fn: (replay: Replay) => T, options: ReplayOptions = {}): T {
  const replay = new Replay(filePath, options);
  try {
    return fn(replay);
  } finally {
    replay.close();
  }
}
