import { type TaskQueue } from "../queue/task_queue";
import { Deferred, settleDownstream } from "./deferred";
import { InvalidArgumentError, LogicError, exceptionFor } from "./errors";
import * as Is from "./is";
import { PromiseState } from "./state";
import {
  PROMISE_BRAND,
  type OnFulfilled,
  type OnRejected,
  type PromiseInterface,
} from "./types";
import { queue as sharedQueue } from "./utils";

/**
 * A promise that is rejected from the start. `then` with a rejection handler
 * queues one task; without one it returns this promise.
 */
export class RejectedPromise<T = never> implements PromiseInterface<T> {
  readonly [PROMISE_BRAND] = true;

  constructor(
    private readonly reason: unknown,
    private readonly queue: TaskQueue = sharedQueue(),
  ) {
    if (Is.promise(reason) || Is.thenable(reason)) {
      throw new InvalidArgumentError("You cannot create a RejectedPromise with a promise.");
    }
  }

  then(onFulfilled?: OnFulfilled<T, unknown> | null, onRejected?: null): this;
  then<R1 = T, R2 = never>(
    onFulfilled?: OnFulfilled<T, R1> | null,
    onRejected?: OnRejected<R2> | null,
  ): PromiseInterface<R1 | R2>;
  then<R1, R2>(
    _onFulfilled?: OnFulfilled<T, R1> | null,
    onRejected?: OnRejected<R2> | null,
  ): PromiseInterface<R1 | R2> | this {
    if (!onRejected) return this;

    const downstream = new Deferred<R1 | R2>({
      waitFn: () => {
        this.queue.run();
      },
      queue: this.queue,
    });
    const reason = this.reason;
    this.queue.add(() => {
      // A handler that returns normally recovers the chain.
      settleDownstream<R1 | R2>(downstream, () => onRejected(reason), this.queue);
    });
    return downstream;
  }

  otherwise<R2 = never>(onRejected: OnRejected<R2>): PromiseInterface<T | R2> {
    return this.then<T, R2>(null, onRejected);
  }

  getState(): PromiseState {
    return PromiseState.REJECTED;
  }

  resolve(_value: T | PromiseInterface<T>): this {
    throw new LogicError("Cannot resolve a rejected promise");
  }

  reject(reason: unknown): this {
    if (reason !== this.reason) {
      throw new LogicError("Cannot reject a rejected promise");
    }
    return this;
  }

  cancel(): this {
    return this;
  }

  wait(unwrap?: true): T;
  wait(unwrap: false): this;
  wait(unwrap?: boolean): T | this;
  wait(unwrap = true): T | this {
    if (unwrap) throw exceptionFor(this.reason);
    return this;
  }
}
