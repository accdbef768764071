import { type PromiseState } from "./state";

/** Marks the objects this library treats as promises. */
export const PROMISE_BRAND = Symbol("yieldpoint.promise");

// A handler may return a host thenable; the downstream promise follows it.
export type OnFulfilled<T, R> = (value: T) => R | PromiseInterface<R> | PromiseLike<R>;
export type OnRejected<R> = (reason: unknown) => R | PromiseInterface<R> | PromiseLike<R>;

export type WaitFn = () => void;
export type CancelFn = () => void;

/**
 * The eventual result of a deferred computation.
 *
 * Handlers registered with `then` always run from a task queue, never
 * synchronously inside `then` or inside the call that settled the promise.
 */
export interface PromiseInterface<T> {
  readonly [PROMISE_BRAND]: true;

  /**
   * Registers settlement handlers and returns the downstream promise, which
   * is settled by the return value (or the thrown error) of whichever
   * handler runs. A missing handler passes the settlement through unchanged.
   */
  then<R1 = T, R2 = never>(
    onFulfilled?: OnFulfilled<T, R1> | null,
    onRejected?: OnRejected<R2> | null,
  ): PromiseInterface<R1 | R2>;

  otherwise<R2 = never>(onRejected: OnRejected<R2>): PromiseInterface<T | R2>;

  getState(): PromiseState;

  resolve(value: T | PromiseInterface<T>): PromiseInterface<T>;

  reject(reason: unknown): PromiseInterface<T>;

  /** Best effort: cannot stop work that is already running. */
  cancel(): PromiseInterface<T>;

  /**
   * Blocks until the promise settles. With `unwrap` (the default) returns
   * the value or throws the rejection; otherwise returns the promise.
   */
  wait(unwrap?: true): T;
  wait(unwrap: false): PromiseInterface<T>;
  wait(unwrap?: boolean): T | PromiseInterface<T>;
}
