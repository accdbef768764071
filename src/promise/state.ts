export enum PromiseState {
  PENDING = "pending",
  FULFILLED = "fulfilled",
  REJECTED = "rejected",
}

export type Settlement<T> =
  | { state: PromiseState.FULFILLED; value: T }
  | { state: PromiseState.REJECTED; reason: unknown };
