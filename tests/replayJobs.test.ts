import * as fs from 'fs';
import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { ReplayJobService } from '../src/services/replayJobs';
import { ReplayHeaderError } from '../src/parsers/errors';
import type { ReplayJobOptions } from '../src/types/job';
import { createFixtureDir, FakeSink, TELEMETRY_CSV, TIMESTAMPS, type FixtureDir } from './helpers';

const serviceConfig = {
  batchSize: 2,
  batchFlushIntervalMs: 60_000,
  jobResultTtlMs: 60_000,
};

const defaultOptions: ReplayJobOptions = {
  loop: false,
  maxCycles: 0,
  arrayStrategy: 'grouped',
  sampleSize: 2,
};

describe('ReplayJobService', () => {
  let fixtures: FixtureDir;

  beforeEach(() => {
    fixtures = createFixtureDir('replay-jobs-');
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
    fixtures.cleanup();
  });

  function upload(content = TELEMETRY_CSV) {
    return { filePath: fixtures.write('upload.csv', content), originalName: 'telemetry.csv' };
  }

  it('should queue a job with its row counts', async () => {
    const jobs = new ReplayJobService(serviceConfig);

    const state = jobs.submit(upload(), defaultOptions, { name: 'Test User' });

    expect(state.status).toBe('queued');
    expect(state.rowsPerCycle).toBe(4);
    expect(state.total).toBe(4);
    expect(state.sourceName).toBe('telemetry.csv');
    expect(state.metadata).toEqual({ name: 'Test User' });
    expect(jobs.get(state.id)).toBe(state);

    await jobs.drain();
    expect(jobs.get(state.id)?.status).toBe('completed');
  });

  it('should expire job state after the result TTL', async () => {
    vi.useFakeTimers({ toFake: ['setTimeout', 'clearTimeout'] });
    try {
      const jobs = new ReplayJobService({ ...serviceConfig, jobResultTtlMs: 1000 });

      const { id } = jobs.submit(upload(), defaultOptions);
      await jobs.drain();

      vi.advanceTimersByTime(999);
      expect(jobs.get(id)?.status).toBe('completed');

      vi.advanceTimersByTime(1);
      expect(jobs.get(id)).toBeUndefined();
    } finally {
      vi.useRealTimers();
    }
  });

  it('should keep oversized header indices as keys', async () => {
    const jobs = new ReplayJobService(serviceConfig);

    const state = jobs.submit(upload('a[4294967296],b.20000000\n1,2\n'), defaultOptions);
    await jobs.drain();

    expect(jobs.get(state.id)?.result?.sample).toEqual([{ a: { '4294967296': 1 }, b: { '20000000': 2 } }]);
    expect(jobs.get(state.id)?.result?.headers).toEqual(['/a/4294967296', '/b/20000000']);
  });

  it('should write documents to the sink in batches', async () => {
    const sink = new FakeSink();
    const jobs = new ReplayJobService(serviceConfig, sink);
    const file = upload();

    const { id } = jobs.submit(file, defaultOptions, { email: 'test@example.com' });
    await jobs.drain();

    expect(sink.ready).toBe(1);
    expect(sink.batches.map(batch => batch.documents.length)).toEqual([2, 2]);
    expect(sink.batches.flatMap(batch => batch.documents.map(doc => doc.rowIndex))).toEqual([0, 1, 2, 3]);
    expect(sink.batches[0]).toMatchObject({
      jobId: id,
      sourceName: 'telemetry.csv',
      metadata: { email: 'test@example.com' },
    });
    expect(sink.batches[1].documents[1].data.timestamp).toBe(TIMESTAMPS[3]);

    const job = jobs.get(id);
    expect(job?.status).toBe('completed');
    expect(job?.progress).toBe(100);
    expect(job?.result?.count).toBe(4);
    expect(job?.result?.jobId).toBe(id);
    expect(job?.result?.sample.map(doc => doc.timestamp)).toEqual(TIMESTAMPS.slice(0, 2));
    expect(job?.result?.headers).toContain('/signal/0');
    expect(fs.existsSync(file.filePath)).toBe(false);
  });

  it('should replay maxCycles passes in loop mode', async () => {
    const jobs = new ReplayJobService(serviceConfig);

    const state = jobs.submit(upload(), { ...defaultOptions, loop: true, maxCycles: 2, sampleSize: 10 });
    expect(state.total).toBe(8);
    await jobs.drain();

    const result = jobs.get(state.id)?.result;
    expect(result?.count).toBe(8);
    expect(result?.cycles).toBe(2);
    expect(result?.sample.map(doc => doc.timestamp)).toEqual([...TIMESTAMPS, ...TIMESTAMPS]);
    expect(result?.jobId).toBeUndefined();
  });

  it('should use the requested array strategy', async () => {
    const jobs = new ReplayJobService(serviceConfig);

    const state = jobs.submit(upload('a.0,a\n5,6\n'), { ...defaultOptions, arrayStrategy: 'pointer' });
    await jobs.drain();

    expect(jobs.get(state.id)?.result?.sample).toEqual([{ a: 6 }]);
  });

  it('should reject a file without a header and remove it', () => {
    const jobs = new ReplayJobService(serviceConfig);
    const file = upload('# only a comment\n\n');

    expect(() => jobs.submit(file, defaultOptions)).toThrow(ReplayHeaderError);
    expect(fs.existsSync(file.filePath)).toBe(false);
    expect(jobs.health()).toEqual({ length: 0, running: 0, idle: true });
  });

  it('should complete the job when sink writes fail', async () => {
    const sink = new FakeSink({ failWrites: true });
    const jobs = new ReplayJobService(serviceConfig, sink);

    const state = jobs.submit(upload(), defaultOptions);
    await jobs.drain();

    const job = jobs.get(state.id);
    expect(job?.status).toBe('completed');
    expect(job?.result?.count).toBe(4);
    expect(sink.batches).toEqual([]);
  });

  it('should remove a discarded upload', () => {
    const jobs = new ReplayJobService(serviceConfig);
    const file = upload();

    jobs.discard(file);

    expect(fs.existsSync(file.filePath)).toBe(false);
  });
});
