import { type TaskQueue } from "../queue/task_queue";
import { Deferred, settleDownstream } from "./deferred";
import { InvalidArgumentError, LogicError } from "./errors";
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
 * A promise that is fulfilled from the start. `then` with a fulfillment
 * handler queues one task; without one it returns this promise.
 */
export class FulfilledPromise<T> implements PromiseInterface<T> {
  readonly [PROMISE_BRAND] = true;

  constructor(
    private readonly value: T,
    private readonly queue: TaskQueue = sharedQueue(),
  ) {
    if (Is.promise(value) || Is.thenable(value)) {
      throw new InvalidArgumentError("You cannot create a FulfilledPromise with a promise.");
    }
  }

  then(onFulfilled?: null, onRejected?: OnRejected<unknown> | null): this;
  then<R1 = T, R2 = never>(
    onFulfilled?: OnFulfilled<T, R1> | null,
    onRejected?: OnRejected<R2> | null,
  ): PromiseInterface<R1 | R2>;
  then<R1, R2>(
    onFulfilled?: OnFulfilled<T, R1> | null,
    _onRejected?: OnRejected<R2> | null,
  ): PromiseInterface<R1 | R2> | this {
    if (!onFulfilled) return this;

    const downstream = new Deferred<R1 | R2>({
      waitFn: () => {
        this.queue.run();
      },
      queue: this.queue,
    });
    const value = this.value;
    this.queue.add(() => {
      settleDownstream<R1 | R2>(downstream, () => onFulfilled(value), this.queue);
    });
    return downstream;
  }

  otherwise<R2 = never>(onRejected: OnRejected<R2>): PromiseInterface<T | R2> {
    return this.then<T, R2>(null, onRejected);
  }

  getState(): PromiseState {
    return PromiseState.FULFILLED;
  }

  resolve(value: T | PromiseInterface<T>): this {
    if (value !== this.value) {
      throw new LogicError("Cannot resolve a fulfilled promise");
    }
    return this;
  }

  reject(_reason: unknown): this {
    throw new LogicError("Cannot reject a fulfilled promise");
  }

  cancel(): this {
    return this;
  }

  wait(unwrap?: true): T;
  wait(unwrap: false): this;
  wait(unwrap?: boolean): T | this;
  wait(unwrap = true): T | this {
    return unwrap ? this.value : this;
  }
}
