/**
 * Bounded async worker pool
 * Workers pull from a shared task queue; each result lands in its own slot,
 * so no two workers ever write the same entry.
 */

import { TickerOutcome } from "../types";
import { errorMessage } from "./errors";
import { logWarn } from "./logger";

export interface PoolTask<T> {
  key: string;
  run: (signal: AbortSignal) => Promise<T>;
}

export interface PoolOptions {
  concurrency: number;
  // Per-task deadline; 0 disables it
  timeoutMs: number;
}

export class TaskTimeoutError extends Error {
  constructor(key: string, timeoutMs: number) {
    super(`Task ${key} timed out after ${timeoutMs}ms`);
    this.name = "TaskTimeoutError";
  }
}

function withDeadline<T>(task: PoolTask<T>, timeoutMs: number): Promise<T> {
  const controller = new AbortController();
  if (timeoutMs <= 0) {
    return task.run(controller.signal);
  }

  return new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => {
      controller.abort();
      reject(new TaskTimeoutError(task.key, timeoutMs));
    }, timeoutMs);

    task.run(controller.signal).then(
      (value) => {
        clearTimeout(timer);
        resolve(value);
      },
      (error: unknown) => {
        clearTimeout(timer);
        reject(error);
      }
    );
  });
}

/**
 * Run every task with at most `concurrency` in flight.
 * A failing task yields an `ok: false` outcome and never stops the others.
 * Outcomes come back in task order.
 */
export async function runPool<T>(
  tasks: PoolTask<T>[],
  options: PoolOptions
): Promise<TickerOutcome<T>[]> {
  const slots: Array<TickerOutcome<T> | undefined> = new Array(tasks.length).fill(undefined);
  let nextIndex = 0;

  const worker = async (): Promise<void> => {
    while (nextIndex < tasks.length) {
      const index = nextIndex++;
      const task = tasks[index];
      try {
        const value = await withDeadline(task, options.timeoutMs);
        slots[index] = { ticker: task.key, ok: true, value };
      } catch (error: unknown) {
        logWarn("Task failed", { error: errorMessage(error) }, task.key);
        slots[index] = { ticker: task.key, ok: false, error: errorMessage(error) };
      }
    }
  };

  const workerCount = Math.max(1, Math.min(options.concurrency, tasks.length));
  await Promise.all(Array.from({ length: workerCount }, () => worker()));

  return slots.filter((slot): slot is TickerOutcome<T> => slot !== undefined);
}

/**
 * Deterministic report order regardless of completion order
 */
export function sortByTicker<T extends { ticker: string }>(items: T[]): T[] {
  return [...items].sort((a, b) => (a.ticker < b.ticker ? -1 : a.ticker > b.ticker ? 1 : 0));
}
