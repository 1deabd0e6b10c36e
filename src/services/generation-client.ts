/**
 * Client for the external 3D generation service.
 *
 * Every response is wrapped in an envelope `{ code, data, message }`; a non-zero
 * code is an application error even when the HTTP status is 200.
 */

import { extname } from 'path';
import { z } from 'zod';
import { logger } from '../logger.js';
import type { PipelineConfig } from '../config.js';
import type { SubmittedTask, TaskStatusReport } from '../types/generation.js';

export type GenerationServiceErrorKind = 'network' | 'http' | 'api' | 'decode';

export class GenerationServiceError extends Error {
  constructor(
    message: string,
    readonly kind: GenerationServiceErrorKind,
    readonly details: { status?: number; code?: number } = {},
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'GenerationServiceError';
  }
}

export interface GenerationGateway {
  submitImageTask(imageUrl: string, signal?: AbortSignal): Promise<SubmittedTask>;
  getTaskStatus(taskId: string, signal?: AbortSignal): Promise<TaskStatusReport>;
}

const envelopeSchema = z.object({
  code: z.number(),
  data: z.unknown().optional(),
  message: z.string().optional(),
});

const submitDataSchema = z.object({
  task_id: z.string().min(1),
});

const statusDataSchema = z
  .object({
    status: z.string(),
    progress: z.number().optional(),
    result: z
      .object({
        pbr_model: z.object({ url: z.string() }).partial().optional(),
        rendered_image: z.object({ url: z.string() }).partial().optional(),
      })
      .partial()
      .optional(),
    error: z.string().optional(),
  })
  .passthrough();

/**
 * Derive the `file.type` the service expects from an image URL's extension.
 */
export const fileTypeFromUrl = (url: string): string => {
  let pathname: string;
  try {
    pathname = new URL(url.toLowerCase()).pathname;
  } catch {
    pathname = url.toLowerCase();
  }
  const ext = extname(pathname).replace(/^\./, '');
  if (!ext || ext === 'jpeg') return 'jpg';
  return ext;
};

const combineSignals = (timeoutMs: number, signal?: AbortSignal): AbortSignal =>
  signal ? AbortSignal.any([signal, AbortSignal.timeout(timeoutMs)]) : AbortSignal.timeout(timeoutMs);

export class GenerationServiceClient implements GenerationGateway {
  constructor(private readonly config: PipelineConfig) {}

  private get baseUrl(): string {
    return this.config.generationApiUrl.replace(/\/$/, '');
  }

  private headers(): Record<string, string> {
    return {
      Authorization: `Bearer ${this.config.generationApiKey ?? ''}`,
      'Content-Type': 'application/json',
    };
  }

  /**
   * Perform a request and unwrap the envelope, returning `data` when `code` is 0.
   */
  private async request(
    url: string,
    init: RequestInit,
    timeoutMs: number,
    signal?: AbortSignal,
  ): Promise<unknown> {
    let response: Response;
    try {
      response = await fetch(url, { ...init, headers: this.headers(), signal: combineSignals(timeoutMs, signal) });
    } catch (err) {
      const message = err instanceof Error ? err.message : 'Unknown error';
      throw new GenerationServiceError(`Request to generation service failed: ${message}`, 'network', {}, {
        cause: err,
      });
    }

    const text = await response.text();

    if (response.status !== 200) {
      logger.error({ url, status: response.status, body: text.slice(0, 200) }, 'Generation service returned HTTP error');
      throw new GenerationServiceError(`HTTP ${response.status}`, 'http', { status: response.status });
    }

    let body: unknown;
    try {
      body = JSON.parse(text);
    } catch (err) {
      throw new GenerationServiceError('Failed to decode generation service response', 'decode', {}, { cause: err });
    }

    const envelope = envelopeSchema.safeParse(body);
    if (!envelope.success) {
      throw new GenerationServiceError('Unexpected generation service response format', 'decode');
    }

    if (envelope.data.code !== 0) {
      const message = envelope.data.message ?? 'unknown error';
      logger.error({ url, code: envelope.data.code, message }, 'Generation service API error');
      throw new GenerationServiceError(`API error: ${message}`, 'api', { code: envelope.data.code });
    }

    return envelope.data.data;
  }

  async submitImageTask(imageUrl: string, signal?: AbortSignal): Promise<SubmittedTask> {
    const requestPayload = {
      type: 'image_to_model',
      file: {
        type: fileTypeFromUrl(imageUrl),
        url: imageUrl,
      },
    };

    logger.info({ imageUrl }, 'Submitting generation task');

    const data = await this.request(
      `${this.baseUrl}/v2/openapi/task`,
      { method: 'POST', body: JSON.stringify(requestPayload) },
      this.config.submitTimeoutMs,
      signal,
    );

    const parsed = submitDataSchema.safeParse(data);
    if (!parsed.success) {
      throw new GenerationServiceError('Generation service did not return a task id', 'decode');
    }

    logger.info({ taskId: parsed.data.task_id }, 'Generation task submitted');
    return { taskId: parsed.data.task_id, requestPayload };
  }

  async getTaskStatus(taskId: string, signal?: AbortSignal): Promise<TaskStatusReport> {
    const url = `${this.baseUrl}/v2/openapi/task/${encodeURIComponent(taskId)}`;
    logger.debug({ url }, 'Fetching task status');

    const data = await this.request(url, { method: 'GET' }, this.config.statusTimeoutMs, signal);

    const parsed = statusDataSchema.safeParse(data);
    if (!parsed.success) {
      throw new GenerationServiceError('Task status payload is malformed', 'decode');
    }

    const { status, progress, result, error } = parsed.data;
    return {
      status,
      progress,
      modelUrl: result?.pbr_model?.url,
      previewImageUrl: result?.rendered_image?.url,
      error,
      raw: parsed.data,
    };
  }
}
