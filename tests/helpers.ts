import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import type { DocumentSink, StoredDocument } from '../src/types/job';

export interface FixtureDir {
  dir: string;
  write: (name: string, content: string) => string;
  cleanup: () => void;
}

/**
 * Temporary directory for CSV fixtures, removed by cleanup()
 */
export function createFixtureDir(prefix = 'csv-replay-'): FixtureDir {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), prefix));
  return {
    dir,
    write: (name, content) => {
      const filePath = path.join(dir, name);
      fs.writeFileSync(filePath, content, 'utf-8');
      return filePath;
    },
    cleanup: () => {
      fs.rmSync(dir, { recursive: true, force: true });
    },
  };
}

export const TELEMETRY_HEADER =
  'timestamp,speed,acceleration.x,acceleration.y,acceleration.z,driver.name,driver.age,' +
  'position.latitude,position.longitude,signal[0],signal[1],signal[2]';

/** Four data rows with comments and a blank line mixed in */
export const TELEMETRY_CSV = [
  '# Vehicle telemetry sample',
  TELEMETRY_HEADER,
  '1609459200,45.5,2.5,1.3,-0.8,John Doe,35,37.7749,-122.4194,101,102,103',
  '  # pit stop',
  '1609459201,46.2,2.1,1.1,-0.5,John Doe,35,37.775,-122.4195,104,105,106',
  '',
  '1609459202,47.8,1.9,0.9,-0.3,"Doe, Jane",29,37.7751,-122.4196,107,108,109',
  '1609459203,44.1,-1.2,0.4,0.2,Jane Doe,29,37.7752,-122.4197,110,111,112',
  '',
].join('\n');

export const TIMESTAMPS = [1609459200, 1609459201, 1609459202, 1609459203];

export interface WrittenBatch {
  jobId: string;
  sourceName: string;
  documents: StoredDocument[];
  metadata?: Record<string, string>;
}

export interface FakeSinkOptions {
  failWrites?: boolean;
  /** ensureReady waits on this, which holds the job in the queued state */
  readyGate?: Promise<void>;
}

/**
 * In-memory stand-in for the Postgres sink
 */
export class FakeSink implements DocumentSink {
  readonly batches: WrittenBatch[] = [];
  ready = 0;

  constructor(private readonly options: FakeSinkOptions = {}) {}

  async ensureReady(): Promise<void> {
    this.ready++;
    await this.options.readyGate;
  }

  async write(
    jobId: string,
    sourceName: string,
    documents: StoredDocument[],
    metadata?: Record<string, string>
  ): Promise<number> {
    if (this.options.failWrites) {
      throw new Error('connection refused');
    }
    this.batches.push({ jobId, sourceName, documents, metadata });
    return documents.length;
  }
}
