import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, rm } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { ModelDownloader } from './model-downloader.js';
import type { DownloadModelJobData } from './generation-jobs.js';
import type { GenerationGateway } from '../services/generation-client.js';
import { MemoryGenerationStore } from '../testing/memory-generation-store.js';
import {
  RecordingPublisher,
  RecordingScheduler,
  runUntilSettled,
  testConfig,
} from '../testing/pipeline-fixtures.js';

// Mock global fetch
const fetchMock = vi.fn<typeof fetch>();
global.fetch = fetchMock;

const MODEL_URL = 'https://cdn.test/task-1/model.glb';
const PREVIEW_URL = 'https://cdn.test/task-1/preview.webp';

const modelBytes = Buffer.from([0x67, 0x6c, 0x54, 0x46, 0x02, 0x00, 0x00, 0x00, 0xff, 0x10]);
const previewBytes = Buffer.from('RIFF-preview-bytes');

describe('ModelDownloader', () => {
  const job: DownloadModelJobData = {
    productId: 'prod-1',
    taskId: 'task-1',
    modelUrl: MODEL_URL,
    previewImageUrl: PREVIEW_URL,
  };

  let staticRoot: string;
  let store: MemoryGenerationStore;
  let events: RecordingPublisher;
  let downloader: ModelDownloader;

  beforeEach(async () => {
    fetchMock.mockReset();
    staticRoot = await mkdtemp(join(tmpdir(), 'model-pipeline-'));
    store = new MemoryGenerationStore();
    events = new RecordingPublisher();

    const gateway: GenerationGateway = {
      submitImageTask: vi.fn<GenerationGateway['submitImageTask']>(),
      getTaskStatus: vi.fn<GenerationGateway['getTaskStatus']>(),
    };
    downloader = new ModelDownloader({
      config: testConfig({ staticRoot }),
      store,
      gateway,
      events,
      scheduler: new RecordingScheduler(),
    });

    store.addProduct({ id: 'prod-1', modelGenerationStatus: 'downloading' });
    await store.recordStatusReport('prod-1', 'task-1', {
      status: 'success',
      progress: 100,
      modelUrl: MODEL_URL,
      previewImageUrl: PREVIEW_URL,
      raw: { status: 'success' },
    });
  });

  afterEach(async () => {
    await rm(staticRoot, { recursive: true, force: true });
  });

  it('should complete the product after a failed download is retried', async () => {
    let modelRequests = 0;
    fetchMock.mockImplementation(async (input) => {
      const url = String(input);
      if (url === MODEL_URL) {
        modelRequests += 1;
        return modelRequests === 1 ? new Response('not found', { status: 404 }) : new Response(modelBytes);
      }
      return new Response(previewBytes);
    });

    const run = await runUntilSettled((data: DownloadModelJobData, ctx) => downloader.run(data, ctx), job, 3);

    expect(run.attempts).toBe(2);
    expect(run.outcome).toEqual({
      kind: 'completed',
      result: {
        assetPath: '/3d/products/prod-1/model.glb',
        modelBytes: modelBytes.byteLength,
        previewBytes: previewBytes.byteLength,
      },
    });

    const product = store.products.get('prod-1');
    expect(product?.modelGenerationStatus).toBe('completed');
    expect(product?.arModelUrl).toBe('/3d/products/prod-1/model.glb');
    expect(store.phaseHistory.map(({ phase }) => phase)).toEqual(['download_failed', 'completed']);
    expect(store.tasks.get('task-1')?.localAssetPath).toBe('/3d/products/prod-1/model.glb');
    expect(events.events).toEqual([
      { type: 'model_ready', productId: 'prod-1', modelUrl: '/3d/products/prod-1/model.glb' },
    ]);
  });

  it('should write the downloaded bytes unchanged', async () => {
    fetchMock.mockImplementation(async (input) =>
      String(input) === MODEL_URL ? new Response(modelBytes) : new Response(previewBytes),
    );

    await downloader.run(job, { attempt: 1, maxAttempts: 3, signal: new AbortController().signal });

    const productDir = join(staticRoot, '3d', 'products', 'prod-1');
    expect(await readFile(join(productDir, 'model.glb'))).toEqual(modelBytes);
    expect(await readFile(join(productDir, 'preview.webp'))).toEqual(previewBytes);
  });

  it('should only report failure once attempts are exhausted', async () => {
    fetchMock.mockImplementation(async () => new Response('gone', { status: 410 }));

    const run = await runUntilSettled((data: DownloadModelJobData, ctx) => downloader.run(data, ctx), job, 3);

    expect(run.attempts).toBe(3);
    expect(run.error).toMatchObject({ name: 'AssetDownloadError', message: 'HTTP 410', status: 410 });
    expect(store.products.get('prod-1')?.modelGenerationStatus).toBe('download_failed');
    expect(store.products.get('prod-1')?.arModelUrl).toBeUndefined();
    expect(events.events).toEqual([{ type: 'model_failed', productId: 'prod-1', error: 'HTTP 410' }]);
  });
});
