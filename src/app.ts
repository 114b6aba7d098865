import express, { Request, Response, NextFunction } from 'express';
import type { ServiceConfig } from './config/env';
import type { ReplayJobOptions } from './types/job';
import { createUploadMiddleware, getUploadedFile } from './middleware/upload';
import { errorHandler, httpErrors } from './middleware/errorHandler';
import type { ReplayJobService } from './services/replayJobs';
import { extractMetadata, parseJobOptions } from './services/jobOptions';

/**
 * Build the express app around a job service
 */
export function createApp(config: ServiceConfig, jobs: ReplayJobService): express.Express {
  const app = express();
  const uploadMiddleware = createUploadMiddleware(config.storageDir);

  app.use(express.json());

  app.get('/health', (req: Request, res: Response): void => {
    res.json({
      status: 'ok',
      queue: jobs.health(),
    });
  });

  /**
   * API: Upload a CSV file and replay it (returns job ID for polling)
   */
  app.post('/api/replay', uploadMiddleware, (req: Request, res: Response, next: NextFunction): void => {
    try {
      const upload = getUploadedFile(req);
      console.log(`[API] File uploaded: ${upload.filePath} (${upload.originalName})`);

      let options: ReplayJobOptions;
      try {
        options = parseJobOptions(req.body, {
          loop: false,
          maxCycles: 0,
          arrayStrategy: config.defaultArrayStrategy,
          sampleSize: config.sampleSize,
        });
      } catch (err) {
        jobs.discard(upload);
        throw err;
      }

      const job = jobs.submit(upload, options, extractMetadata(req.body));

      res.json({
        success: true,
        jobId: job.id,
        status: job.status,
        queuePosition: job.queuePosition,
        rowsPerCycle: job.rowsPerCycle,
        totalDocuments: job.total,
        metadata: job.metadata,
        statusUrl: `/api/status/${job.id}`,
        resultUrl: `/api/result/${job.id}`,
      });
    } catch (err) {
      next(err);
    }
  });

  /**
   * API: Check job status
   */
  app.get('/api/status/:jobId', (req: Request, res: Response, next: NextFunction): void => {
    const job = jobs.get(req.params.jobId);
    if (!job) {
      next(httpErrors.notFound('Job not found or expired'));
      return;
    }

    const { result, ...status } = job;
    res.json({ success: true, job: status });
  });

  /**
   * API: Get job result (only if completed)
   */
  app.get('/api/result/:jobId', (req: Request, res: Response, next: NextFunction): void => {
    const job = jobs.get(req.params.jobId);
    if (!job) {
      next(httpErrors.notFound('Job not found or expired'));
      return;
    }

    if (job.status !== 'completed') {
      res.status(400).json({
        success: false,
        error: `Job is ${job.status}, not completed`,
        status: job.status,
        progress: job.progress,
      });
      return;
    }

    res.json({ success: true, result: job.result });
  });

  app.use(errorHandler);

  return app;
}
