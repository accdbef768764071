import { type TaskQueue } from "../queue/task_queue";
import { Deferred } from "./deferred";
import { FulfilledPromise } from "./fulfilled_promise";
import * as Is from "./is";
import { RejectedPromise } from "./rejected_promise";
import { type PromiseInterface } from "./types";
import { queue as sharedQueue } from "./utils";

export { exceptionFor } from "./errors";

/**
 * The single conversion point from arbitrary values into promises: our own
 * promises pass through, host thenables are followed, anything else becomes
 * a fulfilled promise.
 */
export function promiseFor<T>(
  value: T | PromiseInterface<T> | PromiseLike<T>,
  queue: TaskQueue = sharedQueue(),
): PromiseInterface<T> {
  if (Is.promise(value)) return value;
  if (Is.thenable(value)) return follow(value, queue);
  return new FulfilledPromise(value, queue);
}

export function rejectionFor<T = never>(
  reason: unknown,
  queue: TaskQueue = sharedQueue(),
): PromiseInterface<T> {
  return new RejectedPromise<T>(reason, queue);
}

function follow<T>(thenable: PromiseLike<T>, queue: TaskQueue): PromiseInterface<T> {
  const promise = new Deferred<T>({ queue });
  // The host settles thenables on its own schedule, so the promise may have
  // been cancelled by the time this runs.
  void thenable.then(
    (value) => {
      if (!promise.isResolved()) promise.resolve(value);
    },
    (reason: unknown) => {
      if (!promise.isResolved()) promise.reject(reason);
    },
  );
  return promise;
}
