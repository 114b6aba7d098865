import * as fs from 'fs';
import { setImmediate as yieldToEventLoop } from 'timers/promises';
import { queue as asyncQueue, QueueObject } from 'async';
import { Replay } from '../parsers/replay';
import { formatKeyPath } from '../parsers/keyPath';
import type { DocumentObject } from '../types/document';
import type {
  DocumentSink,
  QueueHealth,
  ReplayJobOptions,
  ReplayJobResult,
  ReplayJobState,
  StoredDocument,
  UploadedFile,
} from '../types/job';

export interface ReplayJobServiceConfig {
  batchSize: number;
  batchFlushIntervalMs: number;
  jobResultTtlMs: number;
}

interface QueuedJob {
  jobId: string;
  upload: UploadedFile;
  options: ReplayJobOptions;
  metadata?: Record<string, string>;
}

// Give the event loop a turn every this many documents
const YIELD_EVERY = 1000;

function createJobId(): string {
  return `job-${Date.now()}-${Math.round(Math.random() * 1e9)}`;
}

function removeUpload(filePath: string): void {
  if (!fs.existsSync(filePath)) {
    return;
  }
  try {
    fs.unlinkSync(filePath);
    console.log(`[Cleanup] Deleted temporary file: ${filePath}`);
  } catch (err) {
    console.error('[Cleanup] Error deleting temp file:', err);
  }
}

/**
 * Runs uploaded files through Replay one at a time and keeps job state
 * for the status and result endpoints.
 */
export class ReplayJobService {
  private readonly jobs = new Map<string, ReplayJobState>();
  private readonly queue: QueueObject<QueuedJob>;

  constructor(
    private readonly config: ReplayJobServiceConfig,
    private readonly sink: DocumentSink | null = null
  ) {
    // concurrency = 1 (one file at a time)
    this.queue = asyncQueue<QueuedJob>(async job => {
      console.log(`[Queue] Starting ${job.jobId} (queue length: ${this.queue.length()})`);
      await this.process(job);
      console.log(`[Queue] Finished ${job.jobId} (queue length: ${this.queue.length()})`);
    }, 1);
  }

  /**
   * Validate an upload and queue it.
   * The file is opened once up front so a missing header fails the request
   * instead of the job. On failure the upload is removed.
   */
  submit(upload: UploadedFile, options: ReplayJobOptions, metadata?: Record<string, string>): ReplayJobState {
    let rowsPerCycle: number;
    try {
      const replay = new Replay(upload.filePath, { arrayStrategy: options.arrayStrategy });
      try {
        rowsPerCycle = replay.countDataRows();
      } finally {
        replay.close();
      }
    } catch (err) {
      removeUpload(upload.filePath);
      throw err;
    }

    const jobId = createJobId();
    const cycles = options.loop ? options.maxCycles : 1;
    const state: ReplayJobState = {
      id: jobId,
      status: 'queued',
      queuePosition: this.queue.length() + (this.queue.running() > 0 ? 1 : 0),
      progress: 0,
      current: 0,
      total: rowsPerCycle * cycles,
      rowsPerCycle,
      sourceName: upload.originalName,
      options,
      metadata: metadata && Object.keys(metadata).length > 0 ? metadata : undefined,
      createdAt: new Date().toISOString(),
    };
    this.jobs.set(jobId, state);

    setTimeout(() => {
      this.jobs.delete(jobId);
      console.log(`[Queue] Expired job result: ${jobId}`);
    }, this.config.jobResultTtlMs).unref();

    this.queue.push({ jobId, upload, options, metadata: state.metadata }, err => {
      if (err) {
        console.error(`[Queue] Job ${jobId} failed with error:`, err);
      }
    });
    console.log(`[Queue] Queued ${jobId} for ${upload.originalName} (${rowsPerCycle} rows per cycle)`);

    return state;
  }

  /**
   * Drop an upload that will not be queued
   */
  discard(upload: UploadedFile): void {
    removeUpload(upload.filePath);
  }

  get(jobId: string): ReplayJobState | undefined {
    return this.jobs.get(jobId);
  }

  health(): QueueHealth {
    return {
      length: this.queue.length(),
      running: this.queue.running(),
      idle: this.queue.idle(),
    };
  }

  /**
   * Resolves once every queued job has finished
   */
  async drain(): Promise<void> {
    if (this.queue.idle()) {
      return;
    }
    await this.queue.drain();
  }

  private update(jobId: string, updates: Partial<ReplayJobState>): void {
    const current = this.jobs.get(jobId);
    if (current) {
      this.jobs.set(jobId, { ...current, ...updates, updatedAt: new Date().toISOString() });
    }
  }

  private async flush(job: QueuedJob, batch: StoredDocument[]): Promise<void> {
    if (!this.sink || batch.length === 0) {
      return;
    }
    try {
      await this.sink.write(job.jobId, job.upload.originalName, batch, job.metadata);
    } catch (err) {
      // Parsing goes on without the failed batch
      console.error(`[Replay] Database write failed for ${job.jobId}:`, err);
    }
  }

  private async process(job: QueuedJob): Promise<void> {
    const { jobId, upload, options } = job;
    console.log(`[Replay] Processing ${upload.filePath} as ${jobId}`);

    try {
      if (this.sink) {
        try {
          await this.sink.ensureReady();
        } catch (err) {
          console.warn('[Replay] Database not ready, continuing without it:', err);
        }
      }

      const replay = new Replay(upload.filePath, { arrayStrategy: options.arrayStrategy, loop: options.loop });
      let result: ReplayJobResult;
      try {
        result = await this.replayAll(job, replay);
      } finally {
        replay.close();
      }

      this.update(jobId, {
        status: 'completed',
        progress: 100,
        current: result.count,
        result,
        completedAt: new Date().toISOString(),
      });
      console.log(`[Replay] ${jobId} produced ${result.count.toLocaleString()} documents`);
    } catch (err) {
      const message = err instanceof Error ? err.message : 'Unknown error';
      console.error(`[Replay] ${jobId} failed: ${message}`);
      this.update(jobId, { status: 'failed', error: message, failedAt: new Date().toISOString() });
    } finally {
      removeUpload(upload.filePath);
    }
  }

  private async replayAll(job: QueuedJob, replay: Replay): Promise<ReplayJobResult> {
    const { jobId, options } = job;
    const rowsPerCycle = replay.countDataRows();
    const cycles = options.loop ? options.maxCycles : 1;
    const total = rowsPerCycle * cycles;

    this.update(jobId, { status: 'processing', total, rowsPerCycle });

    const sample: DocumentObject[] = [];
    let batch: StoredDocument[] = [];
    let lastFlush = Date.now();
    let lastProgress = -1;
    let count = 0;

    for (const document of replay) {
      if (count >= total) {
        break;
      }

      if (sample.length < options.sampleSize) {
        sample.push(document);
      }

      if (this.sink) {
        batch.push({ rowIndex: count, data: document });
        const stale = Date.now() - lastFlush >= this.config.batchFlushIntervalMs;
        if (batch.length >= this.config.batchSize || stale) {
          await this.flush(job, batch);
          batch = [];
          lastFlush = Date.now();
        }
      }

      count++;

      const progress = total > 0 ? Math.min(100, Math.floor((count / total) * 100)) : 0;
      if (progress !== lastProgress) {
        this.update(jobId, { progress, current: count });
        lastProgress = progress;
      }

      if (count % YIELD_EVERY === 0) {
        await yieldToEventLoop();
      }
    }

    await this.flush(job, batch);

    return {
      done: true,
      count,
      rowsPerCycle,
      cycles,
      headers: replay.headers.map(formatKeyPath),
      sample,
      jobId: this.sink ? jobId : undefined,
      metadata: job.metadata,
    };
  }
}
