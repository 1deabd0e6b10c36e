import { join } from 'path';
import { config as loadEnv } from 'dotenv';

loadEnv();

export interface PipelineConfig {
  port: number;
  redisUrl: string;
  logLevel: string;
  concurrency: number;
  gcpProjectId?: string;
  firebaseServiceAccountKey?: string;
  productsCollection: string;
  generationTasksCollection: string;
  productEventTopic: string;
  productUpdatesTopic: string;
  /** Directory the web server serves static files from; assets land under 3d/products/. */
  staticRoot: string;
  generationEnabled: boolean;
  generationApiUrl: string;
  generationApiKey?: string;
  submitTimeoutMs: number;
  statusTimeoutMs: number;
  downloadTimeoutMs: number;
  pollIntervalMs: number;
  maxPollAttempts: number;
}

const parseBoolean = (value: string | undefined, fallback: boolean): boolean => {
  if (value === undefined || value === '') return fallback;
  return value === 'true' || value === '1';
};

export const loadConfig = (): PipelineConfig => {
  const {
    PORT,
    REDIS_URL,
    LOG_LEVEL,
    WORKER_CONCURRENCY,
    GOOGLE_PROJECT_ID,
    FIREBASE_SERVICE_ACCOUNT_KEY,
    FIREBASE_PRODUCTS_COLLECTION,
    FIREBASE_GENERATION_TASKS_COLLECTION,
    PRODUCT_EVENT_TOPIC,
    PRODUCT_UPDATES_TOPIC,
    STATIC_ROOT,
    GENERATION_ENABLED,
    GENERATION_API_URL,
    GENERATION_API_KEY,
    GENERATION_SUBMIT_TIMEOUT_MS,
    GENERATION_STATUS_TIMEOUT_MS,
    GENERATION_DOWNLOAD_TIMEOUT_MS,
    GENERATION_POLL_INTERVAL_MS,
    GENERATION_MAX_POLL_ATTEMPTS,
  } = process.env;

  return {
    port: Number(PORT ?? 4000),
    redisUrl: REDIS_URL ?? 'redis://127.0.0.1:6379',
    logLevel: LOG_LEVEL ?? 'info',
    concurrency: Number(WORKER_CONCURRENCY ?? 4),
    gcpProjectId: GOOGLE_PROJECT_ID || undefined,
    firebaseServiceAccountKey: FIREBASE_SERVICE_ACCOUNT_KEY || undefined,
    productsCollection: FIREBASE_PRODUCTS_COLLECTION ?? 'products',
    generationTasksCollection: FIREBASE_GENERATION_TASKS_COLLECTION ?? 'generationTasks',
    productEventTopic: PRODUCT_EVENT_TOPIC ?? 'product-events',
    productUpdatesTopic: PRODUCT_UPDATES_TOPIC ?? 'product-updates',
    staticRoot: STATIC_ROOT ?? join(process.cwd(), 'static'),
    generationEnabled: parseBoolean(GENERATION_ENABLED, true),
    generationApiUrl: GENERATION_API_URL ?? 'https://api.tripo3d.ai',
    generationApiKey: GENERATION_API_KEY || undefined,
    submitTimeoutMs: Number(GENERATION_SUBMIT_TIMEOUT_MS ?? 60000), // 1 minute
    statusTimeoutMs: Number(GENERATION_STATUS_TIMEOUT_MS ?? 30000), // 30s
    downloadTimeoutMs: Number(GENERATION_DOWNLOAD_TIMEOUT_MS ?? 120000), // 2 minutes
    pollIntervalMs: Number(GENERATION_POLL_INTERVAL_MS ?? 10000),
    maxPollAttempts: Number(GENERATION_MAX_POLL_ATTEMPTS ?? 60), // ~10 minutes at the poll interval
  };
};
