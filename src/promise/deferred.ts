import createDebug from "debug";
import { type TaskQueue } from "../queue/task_queue";
import {
  CancellationError,
  InvalidArgumentError,
  LogicError,
  WaitError,
  exceptionFor,
} from "./errors";
import { promiseFor } from "./create";
import * as Is from "./is";
import { PromiseState, type Settlement } from "./state";
import {
  PROMISE_BRAND,
  type CancelFn,
  type OnFulfilled,
  type OnRejected,
  type PromiseInterface,
  type WaitFn,
} from "./types";
import { queue as sharedQueue } from "./utils";

const debug = createDebug("yieldpoint:promise");

export interface DeferredOptions {
  // Called by wait() to force settlement when nothing else drives the queue.
  waitFn?: WaitFn;
  cancelFn?: CancelFn;
  queue?: TaskQueue;
}

// A handler pair waiting on a pending promise, with the promise it settles.
interface Reaction {
  downstream: Deferred<unknown>;
  onFulfilled?(value: unknown): unknown;
  onRejected?(reason: unknown): unknown;
}

/**
 * The general promise: starts pending and is settled exactly once, either
 * directly or by following another promise it was resolved with.
 */
export class Deferred<T> implements PromiseInterface<T> {
  readonly [PROMISE_BRAND] = true;

  private settlement?: Settlement<T>;
  private forwardedTo?: PromiseInterface<T>;
  // The reaction registered on forwardedTo; waiting on it also drains the
  // queue that reaction was put on.
  private following?: PromiseInterface<void>;
  private waiting = false;
  private reactions: Reaction[] = [];
  // The promise this one was chained from by then(); wait() drives it first.
  private upstream?: Deferred<unknown>;
  private waitFn?: WaitFn;
  private cancelFn?: CancelFn;
  private readonly queue: TaskQueue;

  constructor(options: DeferredOptions = {}) {
    this.waitFn = options.waitFn;
    this.cancelFn = options.cancelFn;
    this.queue = options.queue ?? sharedQueue();
  }

  then<R1 = T, R2 = never>(
    onFulfilled?: OnFulfilled<T, R1> | null,
    onRejected?: OnRejected<R2> | null,
  ): PromiseInterface<R1 | R2>;
  then<R1, R2>(
    onFulfilled?: OnFulfilled<T, R1> | null,
    onRejected?: OnRejected<R2> | null,
  ): PromiseInterface<R1 | R2> | this {
    const settlement = this.settlement;
    if (settlement) {
      const handler = settlement.state === PromiseState.FULFILLED ? onFulfilled : onRejected;
      if (!handler) return this;
    }

    const downstream = settlement
      ? new Deferred<R1 | R2>({
          waitFn: () => {
            this.queue.run();
          },
          queue: this.queue,
        })
      : new Deferred<R1 | R2>({
          cancelFn: () => {
            this.cancel();
          },
          queue: this.queue,
        });

    const reaction: Reaction = { downstream };
    if (onFulfilled) reaction.onFulfilled = onFulfilled;
    if (onRejected) reaction.onRejected = onRejected;

    if (settlement) {
      // Already settled: behave like the settled variants, one queued task.
      this.queue.add(() => {
        react(reaction, settlement, this.queue);
      });
    } else {
      downstream.upstream = this;
      this.reactions.push(reaction);
    }
    return downstream;
  }

  otherwise<R2 = never>(onRejected: OnRejected<R2>): PromiseInterface<T | R2> {
    return this.then<T, R2>(null, onRejected);
  }

  getState(): PromiseState {
    return this.settlement?.state ?? PromiseState.PENDING;
  }

  /** Settled, or locked onto another promise it will follow. */
  isResolved(): boolean {
    return this.settlement !== undefined || this.forwardedTo !== undefined;
  }

  resolve(value: T | PromiseInterface<T>): this {
    if (this.settlement) {
      this.assertSameSettlement(PromiseState.FULFILLED, value);
      return this;
    }
    if (this.forwardedTo) {
      if (value === this.forwardedTo) return this;
      throw new LogicError("The promise is already resolved with another promise");
    }
    if (value === this) {
      throw new LogicError("Cannot fulfill or reject a promise with itself");
    }
    if (Is.promise(value)) {
      const inner: PromiseInterface<T> = value;
      this.follow(inner);
      return this;
    }
    if (Is.thenable(value)) {
      throw new InvalidArgumentError(
        "Cannot resolve with a foreign thenable; normalize it with promiseFor() first",
      );
    }
    this.settle({ state: PromiseState.FULFILLED, value });
    return this;
  }

  reject(reason: unknown): this {
    if (this.settlement) {
      this.assertSameSettlement(PromiseState.REJECTED, reason);
      return this;
    }
    if (this.forwardedTo) {
      throw new LogicError("The promise is already resolved with another promise");
    }
    if (reason === this) {
      throw new LogicError("Cannot fulfill or reject a promise with itself");
    }
    this.settle({ state: PromiseState.REJECTED, reason });
    return this;
  }

  cancel(): this {
    if (this.settlement) return this;

    this.waitFn = undefined;
    this.upstream = undefined;
    const cancelFn = this.cancelFn;
    this.cancelFn = undefined;
    if (cancelFn) {
      try {
        cancelFn();
      } catch (err) {
        debug("cancel function threw: %O", err);
        if (!this.settlement) this.settle({ state: PromiseState.REJECTED, reason: err });
      }
    }

    // The cancel function may have settled the promise already.
    if (!this.settlement) {
      debug("promise cancelled");
      this.settle({ state: PromiseState.REJECTED, reason: new CancellationError() });
    }
    return this;
  }

  wait(unwrap?: true): T;
  wait(unwrap: false): this;
  wait(unwrap?: boolean): T | this;
  wait(unwrap = true): T | this {
    this.waitIfPending();
    const settlement = this.settlement;
    if (!settlement) {
      throw new WaitError("The promise is still pending after waiting");
    }
    if (!unwrap) return this;
    if (settlement.state === PromiseState.FULFILLED) return settlement.value;
    throw exceptionFor(settlement.reason);
  }

  private assertSameSettlement(state: PromiseState, payload: unknown): void {
    const current = this.settlement;
    if (!current) return;
    if (current.state !== state) {
      throw new LogicError(`Cannot change a ${current.state} promise to ${state}`);
    }
    const same =
      current.state === PromiseState.FULFILLED
        ? current.value === payload
        : current.reason === payload;
    if (!same) throw new LogicError(`The promise is already ${state}.`);
  }

  private follow(inner: PromiseInterface<T>): void {
    this.forwardedTo = inner;
    this.following = inner.then(
      (value) => {
        if (!this.settlement) this.settle({ state: PromiseState.FULFILLED, value });
      },
      (reason) => {
        if (!this.settlement) this.settle({ state: PromiseState.REJECTED, reason });
      },
    );
  }

  private settle(settlement: Settlement<T>): void {
    this.settlement = settlement;
    const reactions = this.reactions;
    this.reactions = [];
    this.forwardedTo = undefined;
    this.following = undefined;
    this.upstream = undefined;
    this.waitFn = undefined;
    this.cancelFn = undefined;

    for (const reaction of reactions) {
      this.queue.add(() => {
        react(reaction, settlement, this.queue);
      });
    }
  }

  private waitIfPending(): void {
    if (this.settlement) return;
    if (this.waiting) {
      // Reached again through the promises it follows or was chained from.
      this.settle({
        state: PromiseState.REJECTED,
        reason: new WaitError("Cannot wait on a promise that is waiting on itself"),
      });
      return;
    }

    this.waiting = true;
    try {
      this.drive();
    } finally {
      this.waiting = false;
    }

    this.queue.run();

    if (!this.settlement) {
      this.settle({
        state: PromiseState.REJECTED,
        reason: new WaitError("Invoking the wait callback did not resolve the promise"),
      });
    }
  }

  private drive(): void {
    if (this.following) {
      this.following.wait(false);
    } else if (this.waitFn) {
      this.invokeWaitFn(this.waitFn);
    } else if (this.upstream) {
      this.waitUpstream();
    } else {
      this.settle({
        state: PromiseState.REJECTED,
        reason: new WaitError(
          "Cannot wait on a promise that has no internal wait function. " +
            "You must provide a wait function when constructing the promise to be able to wait on it.",
        ),
      });
    }
  }

  private invokeWaitFn(waitFn: WaitFn): void {
    this.waitFn = undefined;
    try {
      waitFn();
    } catch (err) {
      // Once settled, a throwing wait function is an application bug.
      if (this.settlement) throw err;
      debug("wait function threw: %O", err);
      this.settle({ state: PromiseState.REJECTED, reason: err });
    }
  }

  private waitUpstream(): void {
    const chain: Deferred<unknown>[] = [];
    for (let p = this.upstream; p; p = p.upstream) chain.push(p);
    this.upstream = undefined;
    // Root first, so each later link is usually settled by the time it is reached.
    for (const upstream of chain.reverse()) {
      upstream.wait(false);
    }
  }
}

/**
 * Settles `downstream` with the outcome of `handler` unless something else
 * resolved it first. Errors thrown by the handler become the rejection; a
 * host thenable it returns is followed on `queue`.
 */
export function settleDownstream<R>(
  downstream: Deferred<R>,
  handler: () => R | PromiseInterface<R> | PromiseLike<R>,
  queue: TaskQueue,
): void {
  if (downstream.isResolved()) return;
  try {
    const result = adopt(handler(), queue);
    if (!downstream.isResolved()) downstream.resolve(result);
  } catch (err) {
    if (!downstream.isResolved()) downstream.reject(err);
  }
}

function adopt<R>(
  result: R | PromiseInterface<R> | PromiseLike<R>,
  queue: TaskQueue,
): R | PromiseInterface<R> {
  if (Is.promise(result)) return result;
  if (Is.thenable(result)) return promiseFor<R>(result, queue);
  return result;
}

function react(reaction: Reaction, settlement: Settlement<unknown>, queue: TaskQueue): void {
  const { downstream, onFulfilled, onRejected } = reaction;
  if (settlement.state === PromiseState.FULFILLED) {
    const { value } = settlement;
    settleDownstream(downstream, onFulfilled ? () => onFulfilled(value) : () => value, queue);
  } else if (onRejected) {
    const { reason } = settlement;
    settleDownstream(downstream, () => onRejected(reason), queue);
  } else if (!downstream.isResolved()) {
    downstream.reject(settlement.reason);
  }
}
