import { Queue, UnrecoverableError, Worker, type Job, type JobsOptions } from 'bullmq';
import { Redis } from 'ioredis';
import type { z } from 'zod';
import { logger } from './logger.js';
import { loadConfig } from './config.js';
import {
  downloadJobId,
  statusPollJobId,
  submissionJobId,
  type DownloadModelJobData,
  type JobContext,
  type JobScheduler,
  type PipelineProcessor,
  type PollStatusJobData,
  type SubmitGenerationJobData,
} from './jobs/generation-jobs.js';
import { createRetryPolicies, type RetryPolicy } from './jobs/retry-policy.js';
import { settleOutcome } from './jobs/outcome.js';

const cfg = loadConfig();

export const retryPolicies = createRetryPolicies(cfg);

const createRedisConnection = () =>
  new Redis(cfg.redisUrl, {
    maxRetriesPerRequest: null,
  });

const jobOptionsFor = (policy: RetryPolicy): JobsOptions => ({
  attempts: policy.maxAttempts,
  // Delays come from the worker's backoffStrategy, i.e. the policy
  backoff: { type: 'custom' },
  removeOnComplete: {
    age: 24 * 3600, // Keep completed jobs for a day
    count: 1000,
  },
  removeOnFail: false,
});

const createQueue = <T>(policy: RetryPolicy) =>
  new Queue<T>(policy.queueName, {
    connection: createRedisConnection(),
    defaultJobOptions: jobOptionsFor(policy),
  });

export const submissionQueue = createQueue<SubmitGenerationJobData>(retryPolicies.submission);
export const statusPollQueue = createQueue<PollStatusJobData>(retryPolicies.statusPoll);
export const downloadQueue = createQueue<DownloadModelJobData>(retryPolicies.download);

export const bullmqScheduler: JobScheduler = {
  async enqueueSubmission(data) {
    const job = await submissionQueue.add('submit', data, { jobId: submissionJobId(data.productId) });
    logger.info({ jobId: job.id, productId: data.productId }, 'Queued generation submission job');
    return job.id;
  },
  async enqueueStatusPoll(data) {
    const job = await statusPollQueue.add('poll', data, { jobId: statusPollJobId(data.taskId) });
    logger.info({ jobId: job.id, taskId: data.taskId }, 'Queued status poll job');
    return job.id;
  },
  async enqueueDownload(data) {
    // Same id per task, so a redelivered success does not download twice
    const job = await downloadQueue.add('download', data, { jobId: downloadJobId(data.taskId) });
    logger.info({ jobId: job.id, taskId: data.taskId }, 'Queued model download job');
    return job.id;
  },
};

export const createPipelineWorker = <T, R>(
  policy: RetryPolicy,
  schema: z.ZodType<T>,
  processor: PipelineProcessor<T, R>,
) => {
  const worker = new Worker<T, R | undefined>(
    policy.queueName,
    async (job: Job<T, R | undefined>, token?: string) => {
      const parsed = schema.safeParse(job.data);
      if (!parsed.success) {
        throw new UnrecoverableError(`Invalid ${policy.queueName} job payload: ${parsed.error.message}`);
      }

      const ctx: JobContext = {
        jobId: job.id,
        attempt: job.attemptsMade + 1,
        maxAttempts: job.opts.attempts ?? policy.maxAttempts,
        signal: AbortSignal.timeout(policy.executionTimeoutMs),
      };

      const outcome = await processor(parsed.data, ctx);
      return settleOutcome(job, token, outcome);
    },
    {
      connection: createRedisConnection(),
      concurrency: cfg.concurrency,
      settings: {
        backoffStrategy: (attemptsMade: number) => policy.backoffDelayMs(attemptsMade),
      },
    },
  );

  worker.on('completed', (job) => {
    logger.info({ queue: policy.queueName, jobId: job.id }, 'Pipeline job completed');
  });

  worker.on('failed', (job, err) => {
    logger.error({ queue: policy.queueName, jobId: job?.id, attemptsMade: job?.attemptsMade, err }, 'Pipeline job failed');
  });

  return { worker };
};
