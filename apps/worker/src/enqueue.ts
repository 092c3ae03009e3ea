/**
 * CLI script to add a pipeline job to the queue
 *
 * Usage: npm run enqueue -- ingest --type urn --value 01AB2345678 [--experiment exp-1] [--correlation run-1]
 *        npm run enqueue -- analyze-section --section 12 [--tasks theme1-emotional,theme2-risk]
 *        npm run enqueue -- workflow --type urn_list --value 01AB2345678,02CD3456789 [--tasks ...]
 */

import { initEnv, loadSettings } from '@caselens/config';

// Load env (centralized)
initEnv();

import { Queue } from 'bullmq';
import { QUEUE_NAME, buildJobId, errorMessage } from '@caselens/core';
import { USAGE, buildJob } from './enqueue-args.js';
import { createRedisConnection, redactRedisUrl } from './redis.js';

async function main() {
  const job = buildJob(process.argv.slice(2));
  if (!job) {
    console.error(USAGE);
    process.exit(2);
  }

  const settings = loadSettings();
  const connection = createRedisConnection(settings.redis.url);
  const queue = new Queue(QUEUE_NAME, { connection });
  const jobId = buildJobId(job);

  try {
    await queue.add(job.name, job.data, { jobId, removeOnComplete: 1000, removeOnFail: 1000 });
    console.log(`📬 Enqueued ${job.name} on ${QUEUE_NAME} (${redactRedisUrl(settings.redis.url)})`);
    console.log(`   Job ID: ${jobId}`);
    console.log(JSON.stringify({ event: 'queue.job.enqueued', queueName: QUEUE_NAME, jobName: job.name, jobId }));
  } finally {
    await queue.close();
    connection.disconnect();
  }
}

main().catch((error: unknown) => {
  console.error(`❌ Failed to enqueue job: ${errorMessage(error)}`);
  process.exit(1);
});
