import { TaskQueue } from "../queue/task_queue";
import { Deferred, settleDownstream } from "./deferred";
import { RejectionError } from "./errors";
import { PromiseState } from "./state";
import { type PromiseInterface } from "./types";

let shared: TaskQueue | undefined;

/**
 * The queue promises use when none is passed to them. Created on first use
 * with the exit-time drain enabled; passing a queue installs it instead.
 */
export function queue(assign?: TaskQueue): TaskQueue {
  if (assign) {
    shared = assign;
  } else if (!shared) {
    shared = new TaskQueue();
  }
  return shared;
}

/** Runs `fn` from the queue and settles the returned promise with its outcome. */
export function task<T>(
  fn: () => T | PromiseInterface<T> | PromiseLike<T>,
  taskQueue: TaskQueue = queue(),
): PromiseInterface<T> {
  const promise = new Deferred<T>({
    waitFn: () => {
      taskQueue.run();
    },
    queue: taskQueue,
  });
  taskQueue.add(() => {
    settleDownstream(promise, fn, taskQueue);
  });
  return promise;
}

export type Inspection<T> =
  | { state: PromiseState.FULFILLED; value: T }
  | { state: PromiseState.REJECTED; reason: unknown };

/** Blocks on `promise` and reports how it settled instead of throwing. */
export function inspect<T>(promise: PromiseInterface<T>): Inspection<T> {
  try {
    return { state: PromiseState.FULFILLED, value: promise.wait() };
  } catch (err) {
    const reason = err instanceof RejectionError ? err.reason : err;
    return { state: PromiseState.REJECTED, reason };
  }
}

/** Rebinds the receiver `fn` sees as `this`. */
export function bindReceiver<A extends unknown[], R, This>(
  fn: (this: This, ...args: A) => R,
  receiver: This,
): (...args: A) => R {
  return (...args: A) => fn.call(receiver, ...args);
}
