import type { PipelineConfig } from '../config.js';

export const SUBMISSION_QUEUE_NAME = 'model-generation-submit';
export const STATUS_POLL_QUEUE_NAME = 'model-generation-poll';
export const DOWNLOAD_QUEUE_NAME = 'model-generation-download';

export interface RetryPolicy {
  queueName: string;
  maxAttempts: number;
  executionTimeoutMs: number;
  /** Delay before re-running an execution that failed on the given 1-based attempt. */
  backoffDelayMs: (attempt: number) => number;
}

export interface RetryPolicies {
  submission: RetryPolicy;
  statusPoll: RetryPolicy;
  download: RetryPolicy;
}

export const createRetryPolicies = (
  config: Pick<PipelineConfig, 'pollIntervalMs' | 'maxPollAttempts' | 'statusTimeoutMs' | 'downloadTimeoutMs'>,
): RetryPolicies => ({
  submission: {
    queueName: SUBMISSION_QUEUE_NAME,
    maxAttempts: 3,
    executionTimeoutMs: 2 * 60 * 1000,
    // 1min, 4min, 9min
    backoffDelayMs: (attempt) => attempt * attempt * 60 * 1000,
  },
  statusPoll: {
    queueName: STATUS_POLL_QUEUE_NAME,
    maxAttempts: config.maxPollAttempts,
    executionTimeoutMs: config.statusTimeoutMs,
    backoffDelayMs: () => config.pollIntervalMs,
  },
  download: {
    queueName: DOWNLOAD_QUEUE_NAME,
    maxAttempts: 3,
    // Model and preview are fetched one after the other, plus a minute for disk and Firestore
    executionTimeoutMs: 2 * config.downloadTimeoutMs + 60 * 1000,
    // 20s, 40s, 80s
    backoffDelayMs: (attempt) => Math.round(2 ** attempt * 10) * 1000,
  },
});
