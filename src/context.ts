import { loadConfig } from './config.js';
import { createProductEventPublisher } from './pubsub.js';
import { bullmqScheduler } from './queue.js';
import { getPipelineFirestore } from './services/firebase-client.js';
import { GenerationServiceClient } from './services/generation-client.js';
import { FirestoreGenerationStore } from './services/generation-store.js';
import type { PipelineDeps } from './jobs/pipeline-deps.js';

const config = loadConfig();

export const pipeline: PipelineDeps = {
  config,
  store: new FirestoreGenerationStore(getPipelineFirestore(config), config),
  gateway: new GenerationServiceClient(config),
  events: createProductEventPublisher(config),
  scheduler: bullmqScheduler,
};
