import type { DocumentData, Firestore } from 'firebase-admin/firestore';
import type { PipelineConfig } from '../config.js';
import {
  generationTaskSchema,
  productSchema,
  type GenerationTask,
  type Product,
  type ProductGenerationPhase,
  type TaskStatusReport,
} from '../types/generation.js';
import {
  applyLocalAssetPath,
  applyStatusReport,
  applyTimeout,
  type StatusRecordResult,
} from './generation-status.js';

export class ProductNotFoundError extends Error {
  constructor(readonly productId: string) {
    super(`Product not found: ${productId}`);
    this.name = 'ProductNotFoundError';
  }
}

export class GenerationTaskNotFoundError extends Error {
  constructor(readonly taskId: string) {
    super(`Generation task not found: ${taskId}`);
    this.name = 'GenerationTaskNotFoundError';
  }
}

export interface NewGenerationTask {
  productId: string;
  taskId: string;
  requestPayload: Record<string, unknown>;
}

export interface CompletedDownload {
  productId: string;
  taskId: string;
  /** Web-relative model path stored on both the task and the product. */
  assetPath: string;
  completedAt: Date;
}

/**
 * Durable state owned by the pipeline: the generation log and the
 * generation fields of a product.
 */
export interface GenerationStore {
  getProduct(productId: string): Promise<Product | undefined>;
  setProductPhase(productId: string, phase: ProductGenerationPhase): Promise<void>;
  attachTaskToProduct(productId: string, taskId: string): Promise<void>;

  createTask(input: NewGenerationTask): Promise<GenerationTask>;
  getTask(taskId: string): Promise<GenerationTask | undefined>;
  /** Newest first. */
  listTasksForProduct(productId: string): Promise<GenerationTask[]>;
  /** Most recent task still `queued` or `processing`. */
  findActiveTask(productId: string): Promise<GenerationTask | undefined>;

  /** Upserts the task row; never moves a task out of a terminal status. */
  recordStatusReport(productId: string, taskId: string, report: TaskStatusReport): Promise<StatusRecordResult>;
  recordTimeout(productId: string, taskId: string, message: string): Promise<StatusRecordResult>;
  /** Writes the task's local path and the product's completed state together. */
  completeDownload(input: CompletedDownload): Promise<void>;
}

export const ACTIVE_TASK_STATUSES = ['queued', 'processing'] as const;

/**
 * Remove undefined values so an object can be written to Firestore.
 * Firestore does not accept undefined; optional fields must be omitted instead.
 */
export function sanitizeForFirestore(value: object): DocumentData {
  const sanitized: DocumentData = {};
  for (const [key, entry] of Object.entries(value)) {
    if (entry === undefined) continue;
    sanitized[key] =
      entry !== null && typeof entry === 'object' && !Array.isArray(entry) && !(entry instanceof Date)
        ? sanitizeForFirestore(entry)
        : entry;
  }
  return sanitized;
}

const parseTask = (data: DocumentData | undefined): GenerationTask | undefined =>
  data ? generationTaskSchema.parse(data) : undefined;

export class FirestoreGenerationStore implements GenerationStore {
  constructor(
    private readonly db: Firestore,
    private readonly config: Pick<PipelineConfig, 'productsCollection' | 'generationTasksCollection'>,
  ) {}

  private products() {
    return this.db.collection(this.config.productsCollection);
  }

  private tasks() {
    return this.db.collection(this.config.generationTasksCollection);
  }

  async getProduct(productId: string): Promise<Product | undefined> {
    const doc = await this.products().doc(productId).get();
    if (!doc.exists) return undefined;
    return productSchema.parse({ ...doc.data(), id: doc.id });
  }

  private async updateProduct(productId: string, fields: DocumentData): Promise<void> {
    const ref = this.products().doc(productId);
    await this.db.runTransaction(async (tx) => {
      const doc = await tx.get(ref);
      if (!doc.exists) throw new ProductNotFoundError(productId);
      tx.update(ref, fields);
    });
  }

  async setProductPhase(productId: string, phase: ProductGenerationPhase): Promise<void> {
    await this.updateProduct(productId, { modelGenerationStatus: phase });
  }

  async attachTaskToProduct(productId: string, taskId: string): Promise<void> {
    await this.updateProduct(productId, { generationTaskId: taskId });
  }

  async createTask({ productId, taskId, requestPayload }: NewGenerationTask): Promise<GenerationTask> {
    const now = new Date().toISOString();
    const task: GenerationTask = {
      taskId,
      productId,
      status: 'queued',
      progress: 0,
      requestPayload,
      createdAt: now,
      updatedAt: now,
    };
    // create() fails if the task id already exists
    await this.tasks().doc(taskId).create(sanitizeForFirestore(task));
    return task;
  }

  async getTask(taskId: string): Promise<GenerationTask | undefined> {
    const doc = await this.tasks().doc(taskId).get();
    return parseTask(doc.data());
  }

  async listTasksForProduct(productId: string): Promise<GenerationTask[]> {
    const snapshot = await this.tasks()
      .where('productId', '==', productId)
      .orderBy('createdAt', 'desc')
      .get();
    return snapshot.docs.map((doc) => generationTaskSchema.parse(doc.data()));
  }

  async findActiveTask(productId: string): Promise<GenerationTask | undefined> {
    const snapshot = await this.tasks()
      .where('productId', '==', productId)
      .where('status', 'in', [...ACTIVE_TASK_STATUSES])
      .orderBy('createdAt', 'desc')
      .limit(1)
      .get();
    const [doc] = snapshot.docs;
    return doc ? generationTaskSchema.parse(doc.data()) : undefined;
  }

  private async transformTask(
    taskId: string,
    transform: (current: GenerationTask | undefined) => StatusRecordResult,
  ): Promise<StatusRecordResult> {
    const ref = this.tasks().doc(taskId);
    return this.db.runTransaction(async (tx) => {
      const doc = await tx.get(ref);
      const result = transform(parseTask(doc.data()));
      tx.set(ref, sanitizeForFirestore(result.task));
      return result;
    });
  }

  async recordStatusReport(productId: string, taskId: string, report: TaskStatusReport): Promise<StatusRecordResult> {
    const now = new Date().toISOString();
    return this.transformTask(taskId, (current) => applyStatusReport(current, { productId, taskId, report, now }));
  }

  async recordTimeout(productId: string, taskId: string, message: string): Promise<StatusRecordResult> {
    const now = new Date().toISOString();
    return this.transformTask(taskId, (current) => applyTimeout(current, { productId, taskId, message, now }));
  }

  async completeDownload({ productId, taskId, assetPath, completedAt }: CompletedDownload): Promise<void> {
    const taskRef = this.tasks().doc(taskId);
    const productRef = this.products().doc(productId);
    const now = completedAt.toISOString();

    await this.db.runTransaction(async (tx) => {
      const [taskDoc, productDoc] = await Promise.all([tx.get(taskRef), tx.get(productRef)]);
      const task = parseTask(taskDoc.data());
      if (!task) throw new GenerationTaskNotFoundError(taskId);
      if (!productDoc.exists) throw new ProductNotFoundError(productId);

      tx.set(taskRef, sanitizeForFirestore(applyLocalAssetPath(task, assetPath, now)));
      tx.update(productRef, {
        arModelUrl: assetPath,
        modelGenerationStatus: 'completed',
        modelGeneratedAt: now,
      });
    });
  }
}
