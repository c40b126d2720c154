/**
 * Task Tracker - records the lifecycle of review runs
 *
 *   pending ─▶ in_progress ─┬─▶ succeeded
 *                           └─▶ failed
 *
 * `TaskTracker` is the seam a persistent store would implement. The
 * in-memory tracker keeps tasks for the life of the process.
 */

import { randomUUID } from "node:crypto";
import {
  TaskNotFoundError,
  type ReviewTask,
  type StructuredReview,
} from "../types/review.js";

export interface TaskTracker {
  /** Create a pending task for a change-set reference */
  create(reference: string): ReviewTask;
  markInProgress(id: string): ReviewTask;
  markSucceeded(id: string, result: StructuredReview): ReviewTask;
  /** Record a failure; `detail` is "<error name>: <message>" */
  markFailed(id: string, detail: string): ReviewTask;
  /** @throws {TaskNotFoundError} */
  get(id: string): ReviewTask;
  list(): ReviewTask[];
}

export class InMemoryTaskTracker implements TaskTracker {
  private readonly tasks = new Map<string, ReviewTask>();

  constructor(
    private readonly now: () => Date = () => new Date(),
    private readonly newId: () => string = randomUUID
  ) {}

  create(reference: string): ReviewTask {
    const timestamp = this.now();
    const task: ReviewTask = {
      id: this.newId(),
      reference,
      status: "pending",
      createdAt: timestamp,
      updatedAt: timestamp,
    };
    this.tasks.set(task.id, task);
    return { ...task };
  }

  markInProgress(id: string): ReviewTask {
    return this.update(id, { status: "in_progress" });
  }

  markSucceeded(id: string, result: StructuredReview): ReviewTask {
    return this.update(id, { status: "succeeded", result });
  }

  markFailed(id: string, detail: string): ReviewTask {
    return this.update(id, { status: "failed", error: detail });
  }

  get(id: string): ReviewTask {
    const task = this.tasks.get(id);
    if (!task) {
      throw new TaskNotFoundError(id);
    }
    return { ...task };
  }

  list(): ReviewTask[] {
    return [...this.tasks.values()].map((task) => ({ ...task }));
  }

  private update(
    id: string,
    changes: Pick<ReviewTask, "status"> & Partial<Pick<ReviewTask, "result" | "error">>
  ): ReviewTask {
    const task = this.tasks.get(id);
    if (!task) {
      throw new TaskNotFoundError(id);
    }
    const updated: ReviewTask = { ...task, ...changes, updatedAt: this.now() };
    this.tasks.set(id, updated);
    return { ...updated };
  }
}
