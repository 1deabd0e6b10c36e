import { PubSub, type Topic } from '@google-cloud/pubsub';
import type { PipelineConfig } from './config.js';
import { logger } from './logger.js';

interface ProductEventBase {
  productId: string;
}

export interface GenerationStartedEvent extends ProductEventBase {
  type: 'generation_started';
  startedAt: string;
}

export interface ModelReadyEvent extends ProductEventBase {
  type: 'model_ready';
  /** Web-relative path of the downloaded model. */
  modelUrl: string;
}

export interface ModelFailedEvent extends ProductEventBase {
  type: 'model_failed';
  error: string;
}

export type ProductEvent = GenerationStartedEvent | ModelReadyEvent | ModelFailedEvent;

export interface ProductEventPublisher {
  /** Never rejects: delivery problems are logged and the pipeline carries on. */
  publish(event: ProductEvent): Promise<void>;
}

export type ProductChannel = 'product' | 'product_updates';

export interface ChannelMessage {
  channel: ProductChannel;
  /** Subscribers filter on this attribute, e.g. `product:42`. */
  channelKey: string;
  payload: Record<string, unknown>;
}

/**
 * Wire messages for an event. The product channel carries per-product
 * detail; the updates channel always names the product.
 */
export const toChannelMessages = (event: ProductEvent): [ChannelMessage, ChannelMessage] => {
  const product = (payload: Record<string, unknown>): ChannelMessage => ({
    channel: 'product',
    channelKey: `product:${event.productId}`,
    payload,
  });
  const updates = (payload: Record<string, unknown>): ChannelMessage => ({
    channel: 'product_updates',
    channelKey: `product_updates:${event.productId}`,
    payload,
  });

  switch (event.type) {
    case 'generation_started':
      return [
        product({ event: 'generation_started', product_id: event.productId, started_at: event.startedAt }),
        updates({ event: 'generation_started', product_id: event.productId }),
      ];
    case 'model_ready':
      return [
        product({ event: 'model_generated', model_url: event.modelUrl }),
        updates({ event: 'model_ready', product_id: event.productId, model_url: event.modelUrl }),
      ];
    case 'model_failed':
      return [
        product({ event: 'model_failed', product_id: event.productId, error: event.error }),
        updates({ event: 'model_failed', product_id: event.productId, error: event.error }),
      ];
  }
};

type EventTopic = Pick<Topic, 'publishMessage'>;

export class PubSubProductEventPublisher implements ProductEventPublisher {
  constructor(private readonly topics: Record<ProductChannel, EventTopic>) {}

  async publish(event: ProductEvent): Promise<void> {
    const timestamp = new Date().toISOString();

    await Promise.all(
      toChannelMessages(event).map(async ({ channel, channelKey, payload }) => {
        try {
          await this.topics[channel].publishMessage({
            json: { ...payload, timestamp },
            attributes: { channel: channelKey, event: event.type, productId: event.productId },
          });
          logger.info({ productId: event.productId, type: event.type, channel: channelKey }, 'Published product event');
        } catch (err) {
          logger.error({ err, productId: event.productId, type: event.type, channel: channelKey }, 'Failed to publish product event');
        }
      }),
    );
  }
}

export const createProductEventPublisher = (config: PipelineConfig): ProductEventPublisher => {
  const pubsub = new PubSub({
    projectId: config.gcpProjectId,
  });
  return new PubSubProductEventPublisher({
    product: pubsub.topic(config.productEventTopic),
    product_updates: pubsub.topic(config.productUpdatesTopic),
  });
};
