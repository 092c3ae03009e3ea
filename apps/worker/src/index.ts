// Initialize environment FIRST (before any other imports that might read process.env)
import { initEnv, loadSettings } from '@caselens/config';

const { envFilePath, loaded, keysLoaded } = initEnv();

console.log(`📁 .env file: ${envFilePath}`);
console.log(`✅ .env loaded: ${loaded ? 'yes' : 'no'}`);
if (keysLoaded.length > 0) {
  console.log(`📋 Keys loaded from .env: ${keysLoaded.length} (${keysLoaded.slice(0, 10).join(', ')}${keysLoaded.length > 10 ? '...' : ''})`);
}

import { Worker } from 'bullmq';
import pino from 'pino';
import { QUEUE_NAME, errorMessage } from '@caselens/core';
import { checkDbConnection } from '@caselens/db';
import { closeContainer, createContainer } from './container.js';
import type { WorkerContainer } from './container.js';
import { processJob } from './jobs.js';
import type { JobResponse } from './jobs.js';
import { createRedisConnection, extractRedisHost, redactRedisUrl } from './redis.js';

const logger = pino({
  level: process.env.LOG_LEVEL || 'info',
  transport: {
    target: 'pino-pretty',
    options: {
      colorize: true,
      translateTime: 'HH:MM:ss Z',
      ignore: 'pid,hostname',
    },
  },
});

let worker: Worker<unknown, JobResponse> | null = null;
let container: WorkerContainer | null = null;

/**
 * Safely extract error message without exposing secrets
 */
function safeErrorMessage(err: unknown): string {
  let msg = errorMessage(err);
  msg = msg.replace(/token[=:]\s*[\w-]+/gi, 'token=***');
  msg = msg.replace(/password[=:]\s*[^\s]+/gi, 'password=***');
  msg = msg.replace(/api[_-]?key[=:]\s*[\w-]+/gi, 'api_key=***');
  if (msg.length > 500) {
    msg = msg.substring(0, 500) + '...';
  }
  return msg;
}

async function startWorker(): Promise<void> {
  const settings = loadSettings();
  const redisUrlRedacted = redactRedisUrl(settings.redis.url);

  logger.info('🚀 Worker starting...');
  logger.info(`   Node version: ${process.version}`);
  logger.info(`   Process PID: ${process.pid}`);
  logger.info(`   Environment: ${settings.app.environment}`);
  logger.info(`   Queue name: ${QUEUE_NAME}`);
  logger.info(`   Redis URL: ${redisUrlRedacted}`);
  logger.info(`   Database: ${settings.database.path}`);

  container = createContainer(settings);
  checkDbConnection(container.db);

  const active = container;
  worker = new Worker<unknown, JobResponse>(
    QUEUE_NAME,
    async (job) => {
      const startTime = Date.now();
      logger.info({ event: 'worker.job.start', jobId: job.id, jobName: job.name }, `Processing ${job.name}`);

      const response = await processJob(active, job.name, job.data);

      logger.info(
        {
          event: response.status === 'success' ? 'worker.job.success' : 'worker.job.error',
          jobId: job.id,
          jobName: job.name,
          status: response.status,
          durationMs: Date.now() - startTime,
        },
        `${job.name} finished with status ${response.status}`
      );
      return response;
    },
    {
      connection: createRedisConnection(settings.redis.url),
      concurrency: settings.worker.concurrency,
    }
  );

  worker.on('completed', (job) => {
    logger.info(
      {
        event: 'worker.job.completed',
        jobId: job.id,
        duration: job.finishedOn && job.processedOn ? job.finishedOn - job.processedOn : undefined,
      },
      'Job completed'
    );
  });

  worker.on('failed', (job, err) => {
    logger.error(
      {
        event: 'worker.job.failed',
        jobId: job?.id,
        jobName: job?.name,
        error: safeErrorMessage(err),
        attemptsMade: job?.attemptsMade,
      },
      'Job failed'
    );
  });

  worker.on('stalled', (jobId) => {
    logger.warn({ event: 'worker.job.stalled', jobId }, '⚠️ Job stalled (taking too long)');
  });

  logger.info(
    {
      event: 'worker.started',
      queueName: QUEUE_NAME,
      redisUrl: redisUrlRedacted,
      redisHost: extractRedisHost(settings.redis.url),
      concurrency: settings.worker.concurrency,
    },
    'Worker started successfully'
  );
  logger.info(`✅ Listening for jobs on queue: ${QUEUE_NAME}`);
}

// Graceful shutdown
const shutdown = async () => {
  logger.info('Shutting down worker gracefully...');
  try {
    if (worker) {
      await worker.close();
    }
    if (container) {
      closeContainer(container);
    }
    process.exit(0);
  } catch (err) {
    logger.error(err, 'Error during shutdown');
    process.exit(1);
  }
};

process.on('SIGTERM', () => void shutdown());
process.on('SIGINT', () => void shutdown());

startWorker().catch((err: unknown) => {
  console.error('Fatal error starting worker:', safeErrorMessage(err));
  process.exit(1);
});
