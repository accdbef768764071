import { inspect } from "node:util";

export class PromiseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** A settled promise was given a promise as its payload. */
export class InvalidArgumentError extends PromiseError {}

/** A promise was asked to settle a second time with a different outcome. */
export class LogicError extends PromiseError {}

/** `wait()` could not drive the promise to settlement. */
export class WaitError extends PromiseError {}

/** Carries a rejection reason that is not itself an `Error`. */
export class RejectionError extends PromiseError {
  constructor(readonly reason: unknown) {
    super(`The promise was rejected with reason: ${describe(reason)}`);
  }
}

export class CancellationError extends RejectionError {
  constructor(reason: unknown = "Promise has been cancelled") {
    super(reason);
  }
}

function describe(reason: unknown): string {
  return typeof reason === "string" ? reason : inspect(reason);
}

/** Turns any rejection reason into something that can be thrown. */
export function exceptionFor(reason: unknown): Error {
  return reason instanceof Error ? reason : new RejectionError(reason);
}
