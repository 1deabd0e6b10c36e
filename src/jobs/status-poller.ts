import { logger } from '../logger.js';
import { classifyReportedStatus, isFailureStatus } from '../services/generation-status.js';
import type { GenerationTask, TaskStatusReport } from '../types/generation.js';
import type { JobContext, JobOutcome, PollStatusJobData } from './generation-jobs.js';
import type { PipelineDeps } from './pipeline-deps.js';

export const POLL_TIMEOUT_MESSAGE = 'Task timed out after maximum polling attempts';
export const MISSING_RESULT_MESSAGE = 'Generation succeeded without model or preview URL';

export type PollResult = { taskId: string; status: 'success' };

/**
 * Drives one generation task to a terminal status.
 *
 * "Still working" answers from the service reschedule the poll without using an
 * attempt. Any error is an ordinary job failure, retried by the queue until the
 * attempt ceiling, where the task is declared timed out.
 */
export class StatusPoller {
  constructor(private readonly deps: PipelineDeps) {}

  async run(data: PollStatusJobData, ctx: JobContext): Promise<JobOutcome<PollResult>> {
    try {
      return await this.poll(data, ctx);
    } catch (err) {
      if (ctx.attempt < ctx.maxAttempts) throw err;
      logger.error({ err, ...data, attempt: ctx.attempt }, 'Status polling failed on its last attempt');
      return this.handleExhausted(data.productId, data.taskId, err);
    }
  }

  private async poll({ productId, taskId }: PollStatusJobData, ctx: JobContext): Promise<JobOutcome<PollResult>> {
    const { gateway, store } = this.deps;

    logger.info({ productId, taskId, attempt: ctx.attempt }, 'Polling generation task status');

    let report = await gateway.getTaskStatus(taskId, ctx.signal);

    logger.info({ taskId, status: report.status, progress: report.progress }, 'Task status received');

    if (report.status === 'success' && (!report.modelUrl || !report.previewImageUrl)) {
      logger.error({ taskId, response: report.raw }, 'Success reported without result URLs');
      report = { ...report, status: 'failed', error: MISSING_RESULT_MESSAGE };
    }

    const { task, transitioned } = await store.recordStatusReport(productId, taskId, report);

    if (!transitioned) {
      return this.handleAlreadyTerminal(task);
    }

    const status = classifyReportedStatus(report.status);
    switch (status.kind) {
      case 'success':
        return this.handleSuccess(task);
      case 'failed':
      case 'cancelled':
        return this.handleFailure(productId, task.errorMessage ?? report.error ?? report.status, taskId);
      case 'queued':
      case 'processing':
        if (status.kind === 'processing' && status.unrecognized) {
          logger.warn({ taskId, status: status.unrecognized }, 'Unknown task status, treating as processing');
        }
        return {
          kind: 'deferred',
          delayMs: this.deps.config.pollIntervalMs,
          reason: `Task ${taskId} still ${task.status}`,
        };
    }
  }

  private async handleSuccess(task: GenerationTask): Promise<JobOutcome<PollResult>> {
    const { productId, taskId, modelUrl, previewImageUrl } = task;

    if (!modelUrl || !previewImageUrl) {
      return this.handleFailure(productId, MISSING_RESULT_MESSAGE, taskId);
    }

    logger.info({ productId, taskId }, 'Task completed successfully, queuing download job');

    await this.deps.store.setProductPhase(productId, 'downloading');
    await this.deps.scheduler.enqueueDownload({ productId, taskId, modelUrl, previewImageUrl });

    return { kind: 'completed', result: { taskId, status: 'success' } };
  }

  /** A redelivered poll for a task that already finished. */
  private async handleAlreadyTerminal(task: GenerationTask): Promise<JobOutcome<PollResult>> {
    if (task.status === 'success' && !task.localAssetPath) {
      // The download job owns the product once it has failed
      const product = await this.deps.store.getProduct(task.productId);
      if (product?.modelGenerationStatus !== 'download_failed') {
        return this.handleSuccess(task);
      }
      logger.info({ taskId: task.taskId }, 'Download already failed for task, not handing off again');
    } else {
      logger.info({ taskId: task.taskId, status: task.status }, 'Task already terminal, nothing to do');
    }
    if (isFailureStatus(task.status)) {
      return { kind: 'failed', reason: task.errorMessage ?? task.status };
    }
    return { kind: 'completed', result: { taskId: task.taskId, status: 'success' } };
  }

  private async handleFailure(productId: string, errorMessage: string, taskId: string): Promise<JobOutcome<PollResult>> {
    logger.error({ productId, taskId, error: errorMessage }, 'Generation task failed');

    await this.deps.store.setProductPhase(productId, 'failed');
    await this.deps.events.publish({ type: 'model_failed', productId, error: errorMessage });

    return { kind: 'failed', reason: errorMessage };
  }

  /**
   * Last attempt failed. Records a timeout unless the task already finished, in
   * which case the product is failed with the error that stopped the handoff.
   * Store errors here are logged so the product still gets a terminal phase
   * and observers still hear about it.
   */
  private async handleExhausted(productId: string, taskId: string, err: unknown): Promise<JobOutcome<PollResult>> {
    const { store, events } = this.deps;

    let finished: GenerationTask | undefined;
    try {
      const { task, transitioned } = await store.recordTimeout(productId, taskId, POLL_TIMEOUT_MESSAGE);
      if (!transitioned) finished = task;
    } catch (recordErr) {
      logger.error({ err: recordErr, productId, taskId }, 'Failed to record task timeout');
    }

    const reason = finished
      ? finished.errorMessage ?? (err instanceof Error ? err.message : 'Status polling failed')
      : 'timeout';
    const phase = finished ? 'failed' : 'timeout';

    try {
      await store.setProductPhase(productId, phase);
    } catch (phaseErr) {
      logger.error({ err: phaseErr, productId, phase }, 'Failed to record product phase');
    }
    await events.publish({ type: 'model_failed', productId, error: reason });

    return { kind: 'failed', reason };
  }
}
