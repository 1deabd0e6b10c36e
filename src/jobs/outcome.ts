import { DelayedError, UnrecoverableError, type Job } from 'bullmq';
import type { JobOutcome } from './generation-jobs.js';

/**
 * Translate a processor outcome into BullMQ terms. A deferred job is moved back
 * to the delayed set, which BullMQ does not count as a failed attempt.
 */
export const settleOutcome = async <T>(
  job: Pick<Job, 'moveToDelayed'>,
  token: string | undefined,
  outcome: JobOutcome<T>,
): Promise<T | undefined> => {
  switch (outcome.kind) {
    case 'completed':
      return outcome.result;
    case 'deferred':
      await job.moveToDelayed(Date.now() + outcome.delayMs, token);
      throw new DelayedError(outcome.reason);
    case 'failed':
      throw new UnrecoverableError(outcome.reason);
  }
};
