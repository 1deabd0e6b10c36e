import { describe, it, expect, vi, beforeEach, type Mock } from 'vitest';
import { StatusPoller, MISSING_RESULT_MESSAGE, POLL_TIMEOUT_MESSAGE } from './status-poller.js';
import { GenerationServiceError, type GenerationGateway } from '../services/generation-client.js';
import { MemoryGenerationStore } from '../testing/memory-generation-store.js';
import {
  RecordingPublisher,
  RecordingScheduler,
  runUntilSettled,
  testConfig,
} from '../testing/pipeline-fixtures.js';
import type { TaskStatusReport } from '../types/generation.js';
import type { PollStatusJobData } from './generation-jobs.js';

const MODEL_URL = 'https://cdn.test/task-1/model.glb';
const PREVIEW_URL = 'https://cdn.test/task-1/preview.webp';

const report = (status: string, extra: Partial<TaskStatusReport> = {}): TaskStatusReport => ({
  status,
  ...extra,
  raw: { status, ...extra },
});

const successReport = () => report('success', { progress: 100, modelUrl: MODEL_URL, previewImageUrl: PREVIEW_URL });

describe('StatusPoller', () => {
  const job: PollStatusJobData = { productId: 'prod-1', taskId: 'task-1' };

  let store: MemoryGenerationStore;
  let events: RecordingPublisher;
  let scheduler: RecordingScheduler;
  let gateway: {
    submitImageTask: Mock<GenerationGateway['submitImageTask']>;
    getTaskStatus: Mock<GenerationGateway['getTaskStatus']>;
  };
  let poller: StatusPoller;

  beforeEach(async () => {
    store = new MemoryGenerationStore();
    events = new RecordingPublisher();
    scheduler = new RecordingScheduler();
    gateway = {
      submitImageTask: vi.fn<GenerationGateway['submitImageTask']>(),
      getTaskStatus: vi.fn<GenerationGateway['getTaskStatus']>(),
    };
    poller = new StatusPoller({ config: testConfig(), store, gateway, events, scheduler });

    store.addProduct({ id: 'prod-1', primaryImageUrl: 'https://img.test/shoe.png', modelGenerationStatus: 'queued' });
    await store.createTask({ productId: 'prod-1', taskId: 'task-1', requestPayload: { type: 'image_to_model' } });
  });

  it('should defer while the task is still running', async () => {
    gateway.getTaskStatus.mockResolvedValueOnce(report('processing', { progress: 35 }));

    const outcome = await poller.run(job, { attempt: 1, maxAttempts: 60, signal: new AbortController().signal });

    expect(outcome).toEqual({ kind: 'deferred', delayMs: 10000, reason: 'Task task-1 still processing' });
    expect(store.tasks.get('task-1')?.status).toBe('processing');
    expect(store.tasks.get('task-1')?.progress).toBe(35);
  });

  it('should keep a processing task processing when the service reports queued again', async () => {
    gateway.getTaskStatus
      .mockResolvedValueOnce(report('processing', { progress: 50 }))
      .mockResolvedValueOnce(report('queued', { progress: 0 }));
    const ctx = { attempt: 1, maxAttempts: 60, signal: new AbortController().signal };

    await poller.run(job, ctx);
    const outcome = await poller.run(job, ctx);

    expect(outcome.kind).toBe('deferred');
    expect(store.tasks.get('task-1')?.status).toBe('processing');
    expect(store.tasks.get('task-1')?.progress).toBe(0);
  });

  it('should queue exactly one download after queued, processing, processing, success', async () => {
    gateway.getTaskStatus
      .mockResolvedValueOnce(report('queued', { progress: 0 }))
      .mockResolvedValueOnce(report('processing', { progress: 40 }))
      .mockResolvedValueOnce(report('processing', { progress: 80 }))
      .mockResolvedValueOnce(successReport());

    const run = await runUntilSettled((data: PollStatusJobData, ctx) => poller.run(data, ctx), job, 60);

    expect(run.outcome).toEqual({ kind: 'completed', result: { taskId: 'task-1', status: 'success' } });
    expect(run.executions).toBe(4);
    expect(run.attempts).toBe(1);
    expect(scheduler.downloads).toEqual([
      { productId: 'prod-1', taskId: 'task-1', modelUrl: MODEL_URL, previewImageUrl: PREVIEW_URL },
    ]);
    expect(store.products.get('prod-1')?.modelGenerationStatus).toBe('downloading');

    const task = store.tasks.get('task-1');
    expect(task?.status).toBe('success');
    expect(task?.progress).toBe(100);
    expect(task?.modelUrl).toBe(MODEL_URL);
  });

  it('should fail the product with the reported error', async () => {
    gateway.getTaskStatus.mockResolvedValueOnce(report('failed', { error: 'bad mesh' }));

    const run = await runUntilSettled((data: PollStatusJobData, ctx) => poller.run(data, ctx), job, 60);

    expect(run.outcome).toEqual({ kind: 'failed', reason: 'bad mesh' });
    expect(store.products.get('prod-1')?.modelGenerationStatus).toBe('failed');
    expect(store.tasks.get('task-1')?.errorMessage).toBe('bad mesh');
    expect(events.events).toEqual([{ type: 'model_failed', productId: 'prod-1', error: 'bad mesh' }]);
    expect(scheduler.downloads).toEqual([]);
  });

  it('should time out after the last failed attempt', async () => {
    gateway.getTaskStatus.mockRejectedValue(new GenerationServiceError('HTTP 503', 'http', { status: 503 }));

    const run = await runUntilSettled((data: PollStatusJobData, ctx) => poller.run(data, ctx), job, 60);

    expect(gateway.getTaskStatus).toHaveBeenCalledTimes(60);
    expect(run.attempts).toBe(60);
    expect(run.outcome).toEqual({ kind: 'failed', reason: 'timeout' });
    expect(store.products.get('prod-1')?.modelGenerationStatus).toBe('timeout');
    expect(store.tasks.get('task-1')?.status).toBe('timeout');
    expect(store.tasks.get('task-1')?.errorMessage).toBe(POLL_TIMEOUT_MESSAGE);
    expect(events.events).toEqual([{ type: 'model_failed', productId: 'prod-1', error: 'timeout' }]);
  });

  it('should rethrow a transient error before the last attempt', async () => {
    gateway.getTaskStatus.mockRejectedValueOnce(new GenerationServiceError('HTTP 502', 'http', { status: 502 }));

    await expect(
      poller.run(job, { attempt: 3, maxAttempts: 60, signal: new AbortController().signal }),
    ).rejects.toThrow('HTTP 502');
    expect(store.tasks.get('task-1')?.status).toBe('queued');
    expect(events.events).toEqual([]);
  });

  it('should time out when the store fails on the last attempt', async () => {
    gateway.getTaskStatus.mockResolvedValueOnce(report('processing', { progress: 10 }));
    vi.spyOn(store, 'recordStatusReport').mockRejectedValueOnce(new Error('firestore unavailable'));

    const outcome = await poller.run(job, { attempt: 60, maxAttempts: 60, signal: new AbortController().signal });

    expect(outcome).toEqual({ kind: 'failed', reason: 'timeout' });
    expect(store.tasks.get('task-1')?.status).toBe('timeout');
    expect(store.products.get('prod-1')?.modelGenerationStatus).toBe('timeout');
    expect(events.events).toEqual([{ type: 'model_failed', productId: 'prod-1', error: 'timeout' }]);
  });

  it('should rethrow a store failure before the last attempt', async () => {
    gateway.getTaskStatus.mockResolvedValueOnce(report('processing', { progress: 10 }));
    vi.spyOn(store, 'recordStatusReport').mockRejectedValueOnce(new Error('firestore unavailable'));

    await expect(
      poller.run(job, { attempt: 59, maxAttempts: 60, signal: new AbortController().signal }),
    ).rejects.toThrow('firestore unavailable');
    expect(store.products.get('prod-1')?.modelGenerationStatus).toBe('queued');
    expect(events.events).toEqual([]);
  });

  it('should fail the product when the download handoff fails on the last attempt', async () => {
    gateway.getTaskStatus.mockResolvedValueOnce(successReport());
    vi.spyOn(scheduler, 'enqueueDownload').mockRejectedValueOnce(new Error('redis unavailable'));

    const outcome = await poller.run(job, { attempt: 60, maxAttempts: 60, signal: new AbortController().signal });

    expect(outcome).toEqual({ kind: 'failed', reason: 'redis unavailable' });
    expect(store.tasks.get('task-1')?.status).toBe('success');
    expect(store.products.get('prod-1')?.modelGenerationStatus).toBe('failed');
    expect(events.events).toEqual([{ type: 'model_failed', productId: 'prod-1', error: 'redis unavailable' }]);
  });

  it('should not hand off again once the download has failed', async () => {
    gateway.getTaskStatus.mockResolvedValue(successReport());
    const ctx = { attempt: 1, maxAttempts: 60, signal: new AbortController().signal };

    await poller.run(job, ctx);
    await store.setProductPhase('prod-1', 'download_failed');
    const outcome = await poller.run(job, ctx);

    expect(outcome).toEqual({ kind: 'completed', result: { taskId: 'task-1', status: 'success' } });
    expect(scheduler.downloads).toHaveLength(1);
    expect(store.products.get('prod-1')?.modelGenerationStatus).toBe('download_failed');
  });

  it('should keep a failed task failed when a later report says success', async () => {
    gateway.getTaskStatus
      .mockResolvedValueOnce(report('failed', { error: 'bad mesh' }))
      .mockResolvedValueOnce(successReport());
    const ctx = { attempt: 1, maxAttempts: 60, signal: new AbortController().signal };

    await poller.run(job, ctx);
    const outcome = await poller.run(job, ctx);

    expect(outcome).toEqual({ kind: 'failed', reason: 'bad mesh' });
    expect(store.tasks.get('task-1')?.status).toBe('failed');
    expect(scheduler.downloads).toEqual([]);
    expect(events.events).toHaveLength(1);
  });

  it('should not queue another download once the model is stored', async () => {
    gateway.getTaskStatus.mockResolvedValue(successReport());
    const ctx = { attempt: 1, maxAttempts: 60, signal: new AbortController().signal };

    await poller.run(job, ctx);
    await store.completeDownload({
      productId: 'prod-1',
      taskId: 'task-1',
      assetPath: '/3d/products/prod-1/model.glb',
      completedAt: new Date('2024-05-01T12:00:00.000Z'),
    });
    const outcome = await poller.run(job, ctx);

    expect(outcome).toEqual({ kind: 'completed', result: { taskId: 'task-1', status: 'success' } });
    expect(scheduler.downloads).toHaveLength(1);
    expect(store.products.get('prod-1')?.modelGenerationStatus).toBe('completed');
  });

  it('should fail a success report that has no result URLs', async () => {
    gateway.getTaskStatus.mockResolvedValueOnce(report('success', { progress: 100, modelUrl: MODEL_URL }));

    const outcome = await poller.run(job, { attempt: 1, maxAttempts: 60, signal: new AbortController().signal });

    expect(outcome).toEqual({ kind: 'failed', reason: MISSING_RESULT_MESSAGE });
    expect(store.tasks.get('task-1')?.status).toBe('failed');
    expect(store.products.get('prod-1')?.modelGenerationStatus).toBe('failed');
    expect(scheduler.downloads).toEqual([]);
  });

  it('should keep polling on a status it does not recognise', async () => {
    gateway.getTaskStatus.mockResolvedValueOnce(report('rendering', { progress: 10 }));

    const outcome = await poller.run(job, { attempt: 1, maxAttempts: 60, signal: new AbortController().signal });

    expect(outcome.kind).toBe('deferred');
    expect(store.tasks.get('task-1')?.status).toBe('processing');
  });
});
