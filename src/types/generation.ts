import { z } from 'zod';

export const GENERATION_TASK_STATUSES = [
  'queued',
  'processing',
  'success',
  'failed',
  'cancelled',
  'timeout',
] as const;

export type GenerationTaskStatus = (typeof GENERATION_TASK_STATUSES)[number];

export const TERMINAL_TASK_STATUSES: readonly GenerationTaskStatus[] = [
  'success',
  'failed',
  'cancelled',
  'timeout',
];

export const PRODUCT_GENERATION_PHASES = [
  'none',
  'queued',
  'queue_failed',
  'service_disabled',
  'downloading',
  'completed',
  'failed',
  'download_failed',
  'timeout',
] as const;

export type ProductGenerationPhase = (typeof PRODUCT_GENERATION_PHASES)[number];

/**
 * One generation attempt against the external service, keyed by its task id.
 * Stored as-is in Firestore.
 */
export const generationTaskSchema = z.object({
  taskId: z.string().min(1),
  productId: z.string().min(1),
  status: z.enum(GENERATION_TASK_STATUSES),
  progress: z.number().int().min(0).max(100),
  requestPayload: z.record(z.unknown()).optional(),
  /** Latest raw status payload from the service, kept for auditing. */
  lastResponse: z.record(z.unknown()).optional(),
  modelUrl: z.string().optional(),
  previewImageUrl: z.string().optional(),
  /** Web-relative path of the downloaded model. */
  localAssetPath: z.string().optional(),
  errorMessage: z.string().optional(),
  createdAt: z.string(),
  updatedAt: z.string(),
});

export type GenerationTask = z.infer<typeof generationTaskSchema>;

/**
 * The subset of a product document this pipeline reads or writes.
 * Other product fields belong to the catalog and are left untouched.
 */
export const productSchema = z.object({
  id: z.string().min(1),
  primaryImageUrl: z.string().nullish(),
  imageUrls: z.array(z.string()).nullish(),
  arModelUrl: z.string().nullish(),
  modelGenerationStatus: z.enum(PRODUCT_GENERATION_PHASES).catch('none'),
  modelGeneratedAt: z.string().nullish(),
  generationTaskId: z.string().nullish(),
});

export type Product = z.infer<typeof productSchema>;

/** A status reading as returned by the generation service. */
export interface TaskStatusReport {
  /** Status string exactly as reported. */
  status: string;
  progress?: number;
  modelUrl?: string;
  previewImageUrl?: string;
  error?: string;
  raw: Record<string, unknown>;
}

export interface SubmittedTask {
  taskId: string;
  requestPayload: Record<string, unknown>;
}
