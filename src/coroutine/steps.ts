import { type PromiseInterface } from "../promise/types";

export type Step<T> =
  | { tag: "Yielded"; item: T | PromiseInterface<T> }
  | { tag: "Done"; value: T };

/**
 * A computation that can stop at suspension points. Each call advances it
 * to the next suspension point (or to the end) and reports which.
 */
export interface StepSequence<T> {
  start(): Step<T>;
  // Resumes the suspended step with the value it was waiting for.
  resume(value: T): Step<T>;
  // Raises `error` at the suspension point instead.
  raise(error: Error): Step<T>;
}

/** Generator driven by a coroutine: yields `T` or promises of `T`, receives `T`. */
export type CoroutineGenerator<T> = Generator<T | PromiseInterface<T>, T, T>;

export class GeneratorSequence<T> implements StepSequence<T> {
  constructor(private readonly generator: CoroutineGenerator<T>) {}

  start(): Step<T> {
    return this.toStep(this.generator.next());
  }

  resume(value: T): Step<T> {
    return this.toStep(this.generator.next(value));
  }

  raise(error: Error): Step<T> {
    return this.toStep(this.generator.throw(error));
  }

  private toStep(result: IteratorResult<T | PromiseInterface<T>, T>): Step<T> {
    if (result.done) return { tag: "Done", value: result.value };
    return { tag: "Yielded", item: result.value };
  }
}
