import { Queue } from 'bullmq';
import { Redis } from 'ioredis';
import { loadConfig } from '../src/config.js';
import { logger } from '../src/logger.js';
import {
  DOWNLOAD_QUEUE_NAME,
  STATUS_POLL_QUEUE_NAME,
  SUBMISSION_QUEUE_NAME,
} from '../src/jobs/retry-policy.js';

/**
 * Drain or clear the pipeline queues.
 *
 * Usage:
 *   npm run drain-queue                   # Drain waiting and delayed jobs (leave active; default)
 *   npm run drain-queue -- --obliterate   # Remove ALL jobs (waiting, active, completed, failed)
 */
async function main() {
  const obliterate = process.argv.includes('--obliterate');
  const cfg = loadConfig();
  const connection = new Redis(cfg.redisUrl, { maxRetriesPerRequest: null });

  for (const name of [SUBMISSION_QUEUE_NAME, STATUS_POLL_QUEUE_NAME, DOWNLOAD_QUEUE_NAME]) {
    const queue = new Queue(name, { connection });
    if (obliterate) {
      await queue.obliterate({ force: true });
      logger.info({ queue: name }, 'Queue obliterated (all jobs removed)');
    } else {
      await queue.drain(true);
      logger.info({ queue: name }, 'Queue drained (waiting and delayed jobs removed)');
    }
    await queue.close();
  }

  await connection.quit();
}

main().catch((err) => {
  logger.error({ err }, 'Failed to drain queues');
  process.exit(1);
});
