import { logger } from '../logger.js';
import { ProductNotFoundError } from '../services/generation-store.js';
import type { GenerationTask, Product } from '../types/generation.js';
import type { JobContext, JobOutcome, SubmitGenerationJobData } from './generation-jobs.js';
import type { PipelineDeps } from './pipeline-deps.js';

export type SubmissionResult = { status: 'submitted'; taskId: string } | { status: 'service_disabled' };

export type GenerationRequestResult =
  | { status: 'queued'; jobId?: string }
  | { status: 'already_running'; task: GenerationTask }
  | { status: 'already_completed'; modelUrl?: string }
  | { status: 'service_disabled' };

/**
 * Pick the image the model is generated from: the primary image, else the first gallery image.
 */
export const pickSourceImage = (product: Product): string | undefined => {
  if (product.primaryImageUrl) return product.primaryImageUrl;
  return product.imageUrls?.find((url) => url.length > 0);
};

/**
 * Queue a generation for a product unless it already has a model or one is in flight.
 */
export async function requestModelGeneration(
  deps: Pick<PipelineDeps, 'config' | 'store' | 'scheduler'>,
  productId: string,
): Promise<GenerationRequestResult> {
  const { config, store, scheduler } = deps;

  const product = await store.getProduct(productId);
  if (!product) throw new ProductNotFoundError(productId);

  if (product.modelGenerationStatus === 'completed') {
    logger.info({ productId }, 'Model already exists for product');
    return { status: 'already_completed', modelUrl: product.arModelUrl ?? undefined };
  }

  if (!config.generationEnabled) {
    logger.info({ productId }, 'Model generation disabled, not queuing');
    await store.setProductPhase(productId, 'service_disabled');
    return { status: 'service_disabled' };
  }

  const active = await store.findActiveTask(productId);
  if (active) {
    logger.info({ productId, taskId: active.taskId }, 'Generation already running for product');
    return { status: 'already_running', task: active };
  }

  let jobId: string | undefined;
  try {
    jobId = await scheduler.enqueueSubmission({ productId });
  } catch (err) {
    logger.error({ err, productId }, 'Failed to queue model generation');
    await store.setProductPhase(productId, 'queue_failed');
    throw err;
  }

  await store.setProductPhase(productId, 'queued');
  logger.info({ productId, jobId }, 'Queued model generation');
  return { status: 'queued', jobId };
}

/**
 * Submits a product image to the generation service and hands the task to the status poller.
 */
export class GenerationSubmitter {
  constructor(private readonly deps: PipelineDeps) {}

  async run(data: SubmitGenerationJobData, ctx: JobContext): Promise<JobOutcome<SubmissionResult>> {
    const { productId } = data;
    const { config, store, gateway, events, scheduler } = this.deps;

    logger.info({ productId, attempt: ctx.attempt }, 'Starting model generation submission');

    if (!config.generationEnabled) {
      await store.setProductPhase(productId, 'service_disabled');
      return { kind: 'completed', result: { status: 'service_disabled' } };
    }

    const product = await store.getProduct(productId);
    if (!product) {
      return this.fail(productId, 'product_not_found');
    }

    const imageUrl = pickSourceImage(product);
    if (!imageUrl) {
      logger.error({ productId }, 'Product has no images available for 3D generation');
      return this.fail(productId, 'no_images_available');
    }

    // Retries of the same submission are not a new start
    if (ctx.attempt === 1) {
      await events.publish({ type: 'generation_started', productId, startedAt: new Date().toISOString() });
    }

    let taskId: string;
    try {
      const submitted = await gateway.submitImageTask(imageUrl, ctx.signal);
      taskId = submitted.taskId;

      try {
        await store.createTask({ productId, taskId, requestPayload: submitted.requestPayload });
      } catch (err) {
        // The poller creates the row on its first report
        logger.warn({ err, productId, taskId }, 'Failed to create generation log entry');
      }
    } catch (err) {
      logger.error({ err, productId, attempt: ctx.attempt }, 'Generation submission failed');
      if (ctx.attempt >= ctx.maxAttempts) {
        const message = err instanceof Error ? err.message : 'Submission failed';
        await this.markFailed(productId, message);
      }
      throw err;
    }

    await store.attachTaskToProduct(productId, taskId);
    await scheduler.enqueueStatusPoll({ productId, taskId });

    logger.info({ productId, taskId }, 'Submitted generation task, status polling queued');
    return { kind: 'completed', result: { status: 'submitted', taskId } };
  }

  private async markFailed(productId: string, error: string) {
    try {
      await this.deps.store.setProductPhase(productId, 'failed');
    } catch (err) {
      if (!(err instanceof ProductNotFoundError)) throw err;
      logger.warn({ productId }, 'Product missing, generation phase not recorded');
    }
    await this.deps.events.publish({ type: 'model_failed', productId, error });
  }

  private async fail(productId: string, reason: string): Promise<JobOutcome<SubmissionResult>> {
    await this.markFailed(productId, reason);
    return { kind: 'failed', reason };
  }
}
