/**
 * Types for replay jobs run by the HTTP service.
 */

import type { DocumentObject } from './document';
import type { ArrayStrategy } from './replay';

export type JobStatus = 'queued' | 'processing' | 'completed' | 'failed';

export interface ReplayJobOptions {
  loop: boolean;
  /** Passes over the data when looping; must be > 0 when loop is on */
  maxCycles: number;
  arrayStrategy: ArrayStrategy;
  /** Documents kept in the job result */
  sampleSize: number;
}

export interface UploadedFile {
  filePath: string;
  originalName: string;
}

export interface ReplayJobResult {
  done: true;
  count: number;
  rowsPerCycle: number;
  cycles: number;
  headers: string[];
  sample: DocumentObject[];
  /** Set when documents were written to the database */
  jobId?: string;
  metadata?: Record<string, string>;
}

export interface ReplayJobState {
  id: string;
  status: JobStatus;
  queuePosition: number;
  progress: number;
  current: number;
  total: number;
  rowsPerCycle: number;
  sourceName: string;
  options: ReplayJobOptions;
  metadata?: Record<string, string>;
  createdAt: string;
  updatedAt?: string;
  completedAt?: string;
  failedAt?: string;
  error?: string;
  result?: ReplayJobResult;
}

/**
 * A document as persisted, with its position in the replay
 */
export interface StoredDocument {
  rowIndex: number;
  data: DocumentObject;
}

/**
 * Where replayed documents go. Postgres in production, an array in tests.
 */
export interface DocumentSink {
  ensureReady(): Promise<void>;
  write(
    jobId: string,
    sourceName: string,
    documents: StoredDocument[],
    metadata?: Record<string, string>
  ): Promise<number>;
}

export interface QueueHealth {
  length: number;
  running: number;
  idle: boolean;
}
