import { PromiseState } from "./state";
import { PROMISE_BRAND, type PromiseInterface } from "./types";

export function pending<T>(promise: PromiseInterface<T>): boolean {
  return promise.getState() === PromiseState.PENDING;
}

export function settled<T>(promise: PromiseInterface<T>): boolean {
  return promise.getState() !== PromiseState.PENDING;
}

export function fulfilled<T>(promise: PromiseInterface<T>): boolean {
  return promise.getState() === PromiseState.FULFILLED;
}

export function rejected<T>(promise: PromiseInterface<T>): boolean {
  return promise.getState() === PromiseState.REJECTED;
}

/** True for the promises of this library (anything carrying the brand). */
export function promise<T>(
  value: T | PromiseInterface<T> | PromiseLike<T>,
): value is PromiseInterface<T> {
  return typeof value === "object" && value !== null && PROMISE_BRAND in value;
}

/** True for any object with a callable `then`, including host promises. */
export function thenable<T>(
  value: T | PromiseLike<T>,
): value is PromiseLike<T> {
  return hasThen(value);
}

function hasThen(value: unknown): boolean {
  return (
    typeof value === "object" &&
    value !== null &&
    "then" in value &&
    typeof value.then === "function"
  );
}
