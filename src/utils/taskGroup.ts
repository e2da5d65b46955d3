import { MAX_TIMER_MS } from "../config/defaults.js";
import { DeadlineExceededError } from "../errors/engine.errors.js";

export type TaskOutcome<T> =
  | { status: "fulfilled"; label: string; value: T }
  | { status: "rejected"; label: string; reason: unknown };

export interface Task<T> {
  label: string;
  run: () => Promise<T>;
}

export interface TaskGroupOptions {
  concurrency?: number;
}

/**
 * Runs every task through a bounded worker pool and waits for all of them.
 * Each outcome is captured on its own; a rejection never cancels siblings.
 * Outcomes come back in task order.
 */
export async function runTaskGroup<T>(tasks: readonly Task<T>[], options: TaskGroupOptions = {}): Promise<TaskOutcome<T>[]> {
  if (tasks.length === 0) return [];
  const limit = Math.max(1, Math.trunc(options.concurrency ?? tasks.length));
  const outcomes = new Array<TaskOutcome<T>>(tasks.length);
  let index = 0;
  const workers = new Array(Math.min(limit, tasks.length)).fill(0).map(async () => {
    while (index < tasks.length) {
      const current = index;
      index += 1;
      const task = tasks[current];
      try {
        outcomes[current] = { status: "fulfilled", label: task.label, value: await task.run() };
      } catch (reason) {
        outcomes[current] = { status: "rejected", label: task.label, reason };
      }
    }
  });
  await Promise.all(workers);
  return outcomes;
}

/** Rejects with DeadlineExceededError if `promise` has not settled within `deadlineMs`. The work itself keeps running. */
export async function withDeadline<T>(promise: Promise<T>, deadlineMs: number, label = "operation"): Promise<T> {
  let timer: ReturnType<typeof setTimeout> | undefined;
  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new DeadlineExceededError(label, deadlineMs)), Math.min(deadlineMs, MAX_TIMER_MS));
  });
  try {
    return await Promise.race([promise, deadline]);
  } finally {
    clearTimeout(timer);
  }
}
