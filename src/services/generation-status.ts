import {
  TERMINAL_TASK_STATUSES,
  type GenerationTask,
  type GenerationTaskStatus,
  type TaskStatusReport,
} from '../types/generation.js';

/**
 * Closed classification of a status reported by the generation service.
 * Values the service may add later fall into `processing`, so an unseen
 * status keeps the task polling instead of failing it.
 */
export type ReportedStatus =
  | { kind: 'queued' }
  | { kind: 'processing'; unrecognized?: string }
  | { kind: 'success' }
  | { kind: 'failed' }
  | { kind: 'cancelled' };

export const classifyReportedStatus = (status: string): ReportedStatus => {
  switch (status) {
    case 'queued':
      return { kind: 'queued' };
    case 'processing':
      return { kind: 'processing' };
    case 'success':
      return { kind: 'success' };
    case 'failed':
      return { kind: 'failed' };
    case 'cancelled':
      return { kind: 'cancelled' };
    default:
      return { kind: 'processing', unrecognized: status };
  }
};

export const isTerminalStatus = (status: GenerationTaskStatus): boolean =>
  TERMINAL_TASK_STATUSES.includes(status);

/** `failed`, `cancelled` and `timeout` all end the pipeline without an asset. */
export const isFailureStatus = (status: GenerationTaskStatus): boolean =>
  status === 'failed' || status === 'cancelled' || status === 'timeout';

export const clampProgress = (value: number | undefined, fallback: number): number => {
  if (value === undefined || !Number.isFinite(value)) return fallback;
  return Math.min(100, Math.max(0, Math.round(value)));
};

// Terminal statuses share the top rank; leaving them is handled separately
const STATUS_RANK: Record<GenerationTaskStatus, number> = {
  queued: 0,
  processing: 1,
  success: 2,
  failed: 2,
  cancelled: 2,
  timeout: 2,
};

export interface StatusReportInput {
  productId: string;
  taskId: string;
  report: TaskStatusReport;
  now: string;
}

export interface StatusRecordResult {
  task: GenerationTask;
  /** False when the task was already terminal and kept its status. */
  transitioned: boolean;
}

/**
 * Fold a status report into the stored task. Status only moves forward: a
 * `queued` report for a task already `processing` keeps `processing`, though
 * progress and the raw response are still refreshed. A task that has reached
 * a terminal status keeps it; only the raw response is refreshed.
 */
export const applyStatusReport = (
  current: GenerationTask | undefined,
  { productId, taskId, report, now }: StatusReportInput,
): StatusRecordResult => {
  if (current && isTerminalStatus(current.status)) {
    return {
      task: { ...current, lastResponse: report.raw, updatedAt: now },
      transitioned: false,
    };
  }

  const reported = classifyReportedStatus(report.status).kind;
  const status = current && STATUS_RANK[current.status] > STATUS_RANK[reported] ? current.status : reported;
  const failed = status === 'failed' || status === 'cancelled';

  const task: GenerationTask = {
    taskId,
    productId: current?.productId ?? productId,
    status,
    progress: clampProgress(report.progress, current?.progress ?? 0),
    requestPayload: current?.requestPayload,
    lastResponse: report.raw,
    modelUrl: report.modelUrl ?? current?.modelUrl,
    previewImageUrl: report.previewImageUrl ?? current?.previewImageUrl,
    localAssetPath: current?.localAssetPath,
    errorMessage: current?.errorMessage ?? (failed ? report.error ?? report.status : undefined),
    createdAt: current?.createdAt ?? now,
    updatedAt: now,
  };

  return { task, transitioned: true };
};

export interface TimeoutInput {
  productId: string;
  taskId: string;
  message: string;
  now: string;
}

export const applyTimeout = (
  current: GenerationTask | undefined,
  { productId, taskId, message, now }: TimeoutInput,
): StatusRecordResult => {
  if (current && isTerminalStatus(current.status)) {
    return { task: current, transitioned: false };
  }

  return {
    task: {
      ...(current ?? { taskId, productId, progress: 0, createdAt: now }),
      status: 'timeout',
      lastResponse: { error: message },
      errorMessage: current?.errorMessage ?? message,
      updatedAt: now,
    },
    transitioned: true,
  };
};

/** The local asset path is written once; a repeated download keeps the first value. */
export const applyLocalAssetPath = (
  current: GenerationTask,
  localAssetPath: string,
  now: string,
): GenerationTask => ({
  ...current,
  localAssetPath: current.localAssetPath ?? localAssetPath,
  updatedAt: now,
});
