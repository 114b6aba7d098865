import { loadConfig } from './config/env';
import { createApp } from './app';
import { cleanupOldUploads } from './middleware/upload';
import { ReplayJobService } from './services/replayJobs';
import { PostgresDocumentSink, closeDb } from './db/postgres';

const config = loadConfig();

const sink = config.useDatabase ? new PostgresDocumentSink(config.database) : null;
const jobs = new ReplayJobService(
  {
    batchSize: config.batchSize,
    batchFlushIntervalMs: config.batchFlushIntervalMs,
    jobResultTtlMs: config.jobResultTtlMs,
  },
  sink
);

// Clean up orphaned files on startup
cleanupOldUploads(config.storageDir, config.storageMaxAgeMs);

const app = createApp(config, jobs);

async function shutdown(exitCode: number): Promise<void> {
  if (config.useDatabase) {
    try {
      await closeDb();
    } catch (poolErr) {
      console.error('[Shutdown] Pool close failed:', poolErr);
    }
  }
  process.exit(exitCode);
}

// Handle uncaught exceptions
process.on('uncaughtException', (err: Error) => {
  console.error('UNCAUGHT EXCEPTION! Shutting down...');
  console.error(err.name, err.message);
  console.error(err.stack);

  console.log('[Emergency] Attempting to clean up storage directory...');
  cleanupOldUploads(config.storageDir, 0);

  void shutdown(1);
});

// Handle unhandled promise rejections
process.on('unhandledRejection', (reason: unknown) => {
  console.error('UNHANDLED REJECTION! Shutting down...');
  console.error(reason);
  void shutdown(1);
});

// Graceful shutdown
process.on('SIGTERM', () => {
  console.log('SIGTERM received, closing database pool...');
  void shutdown(0);
});

process.on('SIGINT', () => {
  console.log('SIGINT received, closing database pool...');
  void shutdown(0);
});

app.listen(config.port, () => {
  console.log(`CSV replay server running on port ${config.port}`);
  if (config.useDatabase) {
    console.log('Database mode: ENABLED (table: replay_documents)');
  } else {
    console.log('Database mode: DISABLED (local testing mode)');
  }
  console.log(`Default array strategy: ${config.defaultArrayStrategy}`);
});
