import { createPipelineWorker, retryPolicies } from './queue.js';
import { pipeline } from './context.js';
import { logger } from './logger.js';
import { downloadModelJobSchema, pollStatusJobSchema, submitGenerationJobSchema } from './jobs/generation-jobs.js';
import { GenerationSubmitter } from './jobs/generation-submitter.js';
import { StatusPoller } from './jobs/status-poller.js';
import { ModelDownloader } from './jobs/model-downloader.js';

const submitter = new GenerationSubmitter(pipeline);
const poller = new StatusPoller(pipeline);
const downloader = new ModelDownloader(pipeline);

const workers = [
  createPipelineWorker(retryPolicies.submission, submitGenerationJobSchema, (data, ctx) => submitter.run(data, ctx)),
  createPipelineWorker(retryPolicies.statusPoll, pollStatusJobSchema, (data, ctx) => poller.run(data, ctx)),
  createPipelineWorker(retryPolicies.download, downloadModelJobSchema, (data, ctx) => downloader.run(data, ctx)),
];

for (const { worker } of workers) {
  worker
    .waitUntilReady()
    .then(() => logger.info({ queue: worker.name }, 'Pipeline worker ready'))
    .catch((err) => {
      logger.error({ err, queue: worker.name }, 'Pipeline worker failed to initialize');
      process.exitCode = 1;
    });
}
