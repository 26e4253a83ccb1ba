/**
 * Deferred Action Tasks
 *
 * A task record tracks one deferred bulk action. The runner checkpoints
 * it after every batch, so a crash mid-run leaves a known partial count
 * instead of silent data loss. Cancellation is a flag the runner reads
 * between batches; a batch already started always finishes.
 */

import { randomUUID } from "node:crypto";
import type { ActionItemError, ContentTypeId } from "@adminforge/contracts";

export type TaskStatus = "scheduled" | "running" | "completed" | "failed" | "cancelled";

export interface TaskRecord {
  handle: string;
  contentType: ContentTypeId;
  action: string;
  subjectId: string;
  status: TaskStatus;

  /** Selection size when the task was scheduled */
  total: number;

  processed: number;
  affected: number;
  skipped: number;
  errors: ActionItemError[];
  batches: number;
  cancelRequested: boolean;

  /** Why the task failed, when it did */
  error: string | null;

  createdAt: Date;
  updatedAt: Date;
  finishedAt: Date | null;
}

export interface NewTask {
  contentType: ContentTypeId;
  action: string;
  subjectId: string;
  total: number;
}

export type TaskPatch = Partial<
  Pick<
    TaskRecord,
    "status" | "processed" | "affected" | "skipped" | "batches" | "error" | "finishedAt"
  >
>;

/** Progress after one batch; `errors` holds only that batch's failures */
export interface TaskCheckpoint {
  processed: number;
  affected: number;
  skipped: number;
  batches: number;
  errors: ActionItemError[];
}

export interface TaskStore {
  create(task: NewTask): Promise<TaskRecord>;
  get(handle: string): Promise<TaskRecord | null>;
  update(handle: string, patch: TaskPatch): Promise<TaskRecord>;

  /** Records a batch's counters and appends its errors to the record's */
  checkpoint(handle: string, progress: TaskCheckpoint): Promise<void>;

  /** False for unknown handles */
  isCancelRequested(handle: string): Promise<boolean>;

  /** Sets the cancel flag. Returns null for unknown handles. */
  requestCancel(handle: string): Promise<TaskRecord | null>;
}

export const FINISHED_STATUSES: readonly TaskStatus[] = ["completed", "failed", "cancelled"];

export function isFinished(task: TaskRecord): boolean {
  return FINISHED_STATUSES.includes(task.status);
}

export class MemoryTaskStore implements TaskStore {
  private readonly tasks = new Map<string, TaskRecord>();

  async create(task: NewTask): Promise<TaskRecord> {
    const now = new Date();
    const record: TaskRecord = {
      ...task,
      handle: randomUUID(),
      status: "scheduled",
      processed: 0,
      affected: 0,
      skipped: 0,
      errors: [],
      batches: 0,
      cancelRequested: false,
      error: null,
      createdAt: now,
      updatedAt: now,
      finishedAt: null,
    };
    this.tasks.set(record.handle, record);
    return { ...record };
  }

  async get(handle: string): Promise<TaskRecord | null> {
    const record = this.tasks.get(handle);
    return record ? { ...record, errors: [...record.errors] } : null;
  }

  async update(handle: string, patch: TaskPatch): Promise<TaskRecord> {
    const record = this.tasks.get(handle);
    if (!record) throw new Error(`Unknown task ${handle}`);
    Object.assign(record, patch, { updatedAt: new Date() });
    return { ...record };
  }

  async checkpoint(handle: string, progress: TaskCheckpoint): Promise<void> {
    const record = this.tasks.get(handle);
    if (!record) throw new Error(`Unknown task ${handle}`);
    const { errors, ...counters } = progress;
    Object.assign(record, counters, { updatedAt: new Date() });
    record.errors.push(...errors);
  }

  async isCancelRequested(handle: string): Promise<boolean> {
    return this.tasks.get(handle)?.cancelRequested ?? false;
  }

  async requestCancel(handle: string): Promise<TaskRecord | null> {
    const record = this.tasks.get(handle);
    if (!record) return null;
    if (!isFinished(record)) {
      record.cancelRequested = true;
      record.updatedAt = new Date();
    }
    return { ...record };
  }
}
