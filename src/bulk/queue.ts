/**
 * Serial in-process task queue for bulk jobs. Tasks run one at a time in
 * enqueue order; a failing task is logged and does not stop the queue.
 */

import { createLogger } from "../utils/logger.js";

const log = createLogger("queue");

export type Task = () => Promise<void> | void;

export interface TaskQueue {
  enqueue(name: string, task: Task): void;
  /** Number of tasks enqueued and not finished */
  readonly size: number;
  /** Resolves once every enqueued task (including ones added meanwhile) finished */
  onIdle(): Promise<void>;
}

export function createTaskQueue(): TaskQueue {
  let tail: Promise<void> = Promise.resolve();
  let pending = 0;

  return {
    enqueue(name, task) {
      pending += 1;
      log.debug(`Enqueued ${name} (${pending} pending)`);
      tail = tail.then(async () => {
        const started = Date.now();
        try {
          await task();
          log.debug(`Task ${name} finished in ${Date.now() - started}ms`);
        } catch (err) {
          log.error(`Task ${name} failed: ${err instanceof Error ? err.message : String(err)}`);
        } finally {
          pending -= 1;
        }
      });
    },
    get size() {
      return pending;
    },
    async onIdle() {
      while (pending > 0) {
        await tail;
      }
    },
  };
}
