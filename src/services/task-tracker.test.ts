import { describe, expect, it } from "vitest";
import { TaskNotFoundError, type StructuredReview } from "../types/review.js";
import { InMemoryTaskTracker } from "./task-tracker.js";

function fixedClock() {
  let tick = 0;
  return () => new Date(Date.UTC(2026, 0, 1, 0, 0, tick++));
}

function sequentialIds() {
  let next = 1;
  return () => `task-${next++}`;
}

const result: StructuredReview = { files: [] };

describe("InMemoryTaskTracker", () => {
  it("creates pending tasks", () => {
    const tracker = new InMemoryTaskTracker(fixedClock(), sequentialIds());

    const task = tracker.create("octo/widgets#7");

    expect(task).toEqual({
      id: "task-1",
      reference: "octo/widgets#7",
      status: "pending",
      createdAt: new Date(Date.UTC(2026, 0, 1, 0, 0, 0)),
      updatedAt: new Date(Date.UTC(2026, 0, 1, 0, 0, 0)),
    });
  });

  it("moves a task through to success", () => {
    const tracker = new InMemoryTaskTracker(fixedClock(), sequentialIds());
    const { id } = tracker.create("local:staged");

    expect(tracker.markInProgress(id).status).toBe("in_progress");
    const done = tracker.markSucceeded(id, result);

    expect(done.status).toBe("succeeded");
    expect(done.result).toEqual(result);
    expect(done.updatedAt).toEqual(new Date(Date.UTC(2026, 0, 1, 0, 0, 2)));
    expect(tracker.get(id)).toEqual(done);
  });

  it("records failure detail", () => {
    const tracker = new InMemoryTaskTracker(fixedClock(), sequentialIds());
    const { id } = tracker.create("local:HEAD");

    tracker.markFailed(id, "LLMGenerationError: overloaded");

    expect(tracker.get(id).status).toBe("failed");
    expect(tracker.get(id).error).toBe("LLMGenerationError: overloaded");
  });

  it("returns copies so callers cannot change stored tasks", () => {
    const tracker = new InMemoryTaskTracker(fixedClock(), sequentialIds());
    const task = tracker.create("local:staged");

    task.status = "succeeded";

    expect(tracker.get(task.id).status).toBe("pending");
  });

  it("lists tasks in creation order", () => {
    const tracker = new InMemoryTaskTracker(fixedClock(), sequentialIds());
    tracker.create("a");
    tracker.create("b");

    expect(tracker.list().map((t) => t.reference)).toEqual(["a", "b"]);
  });

  it("throws TaskNotFoundError for unknown ids", () => {
    const tracker = new InMemoryTaskTracker();

    expect(() => tracker.get("missing")).toThrow(TaskNotFoundError);
    expect(() => tracker.markFailed("missing", "x")).toThrow(
      "Review task not found: missing"
    );
  });
});
