import { join } from 'path';
import { logger } from '../logger.js';
import { downloadToFile } from '../services/asset-download.js';
import {
  MODEL_FILENAME,
  PREVIEW_FILENAME,
  ensureProductAssetDir,
  productModelUrl,
} from '../infra/static-paths.js';
import type { DownloadModelJobData, JobContext, JobOutcome } from './generation-jobs.js';
import type { PipelineDeps } from './pipeline-deps.js';

export interface DownloadResult {
  assetPath: string;
  modelBytes: number;
  previewBytes: number;
}

/**
 * Fetches the generated model and its preview into the product's static
 * directory, then marks the product completed.
 *
 * There is no deferred retry here: an execution either finishes or fails and
 * is re-run from scratch by the queue. Fixed filenames mean a retry simply
 * overwrites whatever a failed attempt left behind.
 */
export class ModelDownloader {
  constructor(private readonly deps: PipelineDeps) {}

  async run(data: DownloadModelJobData, ctx: JobContext): Promise<JobOutcome<DownloadResult>> {
    const { productId, taskId, modelUrl, previewImageUrl } = data;
    const { config, store } = this.deps;

    logger.info({ productId, taskId, attempt: ctx.attempt }, 'Starting model download');

    const assetPath = productModelUrl(productId);
    let result: DownloadResult;

    try {
      const productDir = await ensureProductAssetDir(config.staticRoot, productId);
      const options = { timeoutMs: config.downloadTimeoutMs, signal: ctx.signal };

      const modelBytes = await downloadToFile(modelUrl, join(productDir, MODEL_FILENAME), options);
      const previewBytes = await downloadToFile(previewImageUrl, join(productDir, PREVIEW_FILENAME), options);

      await store.completeDownload({ productId, taskId, assetPath, completedAt: new Date() });
      result = { assetPath, modelBytes, previewBytes };
    } catch (err) {
      await this.handleFailure(productId, taskId, err, ctx);
      throw err;
    }

    logger.info({ productId, taskId, assetPath }, 'Successfully downloaded and saved 3D model');
    await this.deps.events.publish({ type: 'model_ready', productId, modelUrl: assetPath });

    return { kind: 'completed', result };
  }

  private async handleFailure(productId: string, taskId: string, err: unknown, ctx: JobContext) {
    logger.error({ err, productId, taskId, attempt: ctx.attempt }, 'Failed to download model');

    try {
      await this.deps.store.setProductPhase(productId, 'download_failed');
    } catch (phaseErr) {
      // The download error is the one the queue should see
      logger.error({ err: phaseErr, productId }, 'Failed to mark product download_failed');
    }

    if (ctx.attempt >= ctx.maxAttempts) {
      const message = err instanceof Error ? err.message : 'Download failed';
      await this.deps.events.publish({ type: 'model_failed', productId, error: message });
    }
  }
}
