import type { PipelineConfig } from '../config.js';
import type { ProductEventPublisher } from '../pubsub.js';
import type { GenerationGateway } from '../services/generation-client.js';
import type { GenerationStore } from '../services/generation-store.js';
import type { JobScheduler } from './generation-jobs.js';

export interface PipelineDeps {
  config: PipelineConfig;
  store: GenerationStore;
  gateway: GenerationGateway;
  events: ProductEventPublisher;
  scheduler: JobScheduler;
}
