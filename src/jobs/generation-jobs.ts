import { z } from 'zod';

/** Product ids become directory names, so only path-safe characters are accepted. */
export const productIdSchema = z
  .string()
  .min(1)
  .regex(/^[A-Za-z0-9_-]+$/, 'Product id may only contain letters, digits, "-" and "_"');

export const submitGenerationJobSchema = z.object({
  productId: productIdSchema,
});

export type SubmitGenerationJobData = z.infer<typeof submitGenerationJobSchema>;

export const pollStatusJobSchema = z.object({
  productId: productIdSchema,
  taskId: z.string().min(1),
});

export type PollStatusJobData = z.infer<typeof pollStatusJobSchema>;

export const downloadModelJobSchema = z.object({
  productId: productIdSchema,
  taskId: z.string().min(1),
  modelUrl: z.string().url(),
  previewImageUrl: z.string().url(),
});

export type DownloadModelJobData = z.infer<typeof downloadModelJobSchema>;

/**
 * Execution-scoped information handed to a job processor by the queue.
 */
export interface JobContext {
  jobId?: string;
  /** 1-based; grows only when an execution fails, never on a deferred retry. */
  attempt: number;
  maxAttempts: number;
  /** Aborts when the execution exceeds its policy's timeout. */
  signal: AbortSignal;
}

/**
 * What a processor asks the queue to do once it returns. `deferred` re-runs the
 * same job later without counting a failed attempt; `failed` ends the job
 * with no retry. Unexpected errors are thrown instead, and count.
 */
export type JobOutcome<T = unknown> =
  | { kind: 'completed'; result?: T }
  | { kind: 'deferred'; delayMs: number; reason: string }
  | { kind: 'failed'; reason: string };

export type PipelineProcessor<T, R> = (data: T, ctx: JobContext) => Promise<JobOutcome<R>>;

export interface JobScheduler {
  enqueueSubmission(data: SubmitGenerationJobData): Promise<string | undefined>;
  enqueueStatusPoll(data: PollStatusJobData): Promise<string | undefined>;
  enqueueDownload(data: DownloadModelJobData): Promise<string | undefined>;
}

// Custom BullMQ job ids may not contain ':'
export const submissionJobId = (productId: string) => `submit-${productId}-${Date.now()}`;
export const statusPollJobId = (taskId: string) => `poll-${taskId}`;
export const downloadJobId = (taskId: string) => `download-${taskId}`;
