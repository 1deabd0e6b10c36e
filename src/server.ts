import express from 'express';
import type { Express, Request, Response } from 'express';
import { logger } from './logger.js';
import { productIdSchema } from './jobs/generation-jobs.js';
import { requestModelGeneration } from './jobs/generation-submitter.js';
import { ProductNotFoundError } from './services/generation-store.js';
import type { PipelineDeps } from './jobs/pipeline-deps.js';

export type ServerDeps = Pick<PipelineDeps, 'config' | 'store' | 'scheduler'>;

const parseProductId = (req: Request, res: Response): string | undefined => {
  const parsed = productIdSchema.safeParse(req.params.productId);
  if (!parsed.success) {
    res.status(400).json({ error: parsed.error.flatten().formErrors });
    return undefined;
  }
  return parsed.data;
};

export const createServer = (deps: ServerDeps): Express => {
  const app: Express = express();
  app.use(express.json());

  app.get('/health', (_req: Request, res: Response) => {
    res.json({ status: 'ok' });
  });

  // Trigger a generation; refuses once a model exists or while one is queued or processing
  app.post('/products/:productId/generations', async (req: Request, res: Response) => {
    const productId = parseProductId(req, res);
    if (!productId) return;

    try {
      const result = await requestModelGeneration(deps, productId);
      switch (result.status) {
        case 'queued':
          res.status(202).json({ status: result.status, jobId: result.jobId });
          return;
        case 'already_running':
          res.status(409).json({ status: result.status, task: result.task });
          return;
        case 'already_completed':
          res.status(409).json({ status: result.status, error: 'Model already exists', modelUrl: result.modelUrl });
          return;
        case 'service_disabled':
          res.status(503).json({ status: result.status });
          return;
      }
    } catch (err) {
      if (err instanceof ProductNotFoundError) {
        res.status(404).json({ error: 'Product not found' });
        return;
      }
      logger.error({ err, productId }, 'Failed to request model generation');
      res.status(500).json({ error: 'Failed to request model generation' });
    }
  });

  app.get('/products/:productId/generations', async (req: Request, res: Response) => {
    const productId = parseProductId(req, res);
    if (!productId) return;

    try {
      const tasks = await deps.store.listTasksForProduct(productId);
      res.json({ productId, tasks });
    } catch (err) {
      logger.error({ err, productId }, 'Failed to list generation tasks');
      res.status(500).json({ error: 'Failed to list generation tasks' });
    }
  });

  app.get('/generations/:taskId', async (req: Request, res: Response) => {
    try {
      const task = await deps.store.getTask(req.params.taskId);
      if (!task) {
        res.status(404).json({ error: 'Generation task not found' });
        return;
      }
      res.json(task);
    } catch (err) {
      logger.error({ err, taskId: req.params.taskId }, 'Failed to get generation task');
      res.status(500).json({ error: 'Failed to fetch generation task' });
    }
  });

  return app;
};
