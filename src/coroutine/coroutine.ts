import createDebug from "debug";
import { promiseFor } from "../promise/create";
import { Deferred } from "../promise/deferred";
import { exceptionFor } from "../promise/errors";
import { type PromiseState } from "../promise/state";
import {
  PROMISE_BRAND,
  type OnFulfilled,
  type OnRejected,
  type PromiseInterface,
} from "../promise/types";
import { queue as sharedQueue } from "../promise/utils";
import { type TaskQueue } from "../queue/task_queue";
import { GeneratorSequence, type CoroutineGenerator, type Step, type StepSequence } from "./steps";

const debug = createDebug("yieldpoint:coroutine");

/**
 * Runs a step sequence as a promise. Each yielded item is turned into a
 * promise; when it settles the sequence is resumed with the value, or has
 * the rejection raised at the suspension point so it can catch it.
 *
 *     const p = Coroutine.of(function* (): CoroutineGenerator<string> {
 *       const a = yield new FulfilledPromise("a");
 *       const ab = yield new FulfilledPromise(`${a}b`);
 *       return yield `${ab}c`;
 *     });
 *     p.wait(); // "abc"
 *
 * The coroutine fulfills with the last value sent back into the sequence.
 */
export class Coroutine<T> implements PromiseInterface<T> {
  readonly [PROMISE_BRAND] = true;

  private currentPromise?: PromiseInterface<void>;
  private readonly result: Deferred<T>;
  private readonly steps: StepSequence<T>;
  private readonly queue: TaskQueue;

  static of<T>(generatorFn: () => CoroutineGenerator<T>, queue?: TaskQueue): Coroutine<T> {
    return new Coroutine(new GeneratorSequence(generatorFn()), queue);
  }

  constructor(steps: StepSequence<T>, queue: TaskQueue = sharedQueue()) {
    this.steps = steps;
    this.queue = queue;
    this.result = new Deferred<T>({
      waitFn: () => {
        while (this.currentPromise) {
          this.currentPromise.wait();
        }
      },
      queue,
    });

    debug("starting coroutine");
    try {
      this.advance(steps.start());
    } catch (err) {
      this.result.reject(err);
    }
  }

  then<R1 = T, R2 = never>(
    onFulfilled?: OnFulfilled<T, R1> | null,
    onRejected?: OnRejected<R2> | null,
  ): PromiseInterface<R1 | R2> {
    return this.result.then(onFulfilled, onRejected);
  }

  otherwise<R2 = never>(onRejected: OnRejected<R2>): PromiseInterface<T | R2> {
    return this.result.otherwise(onRejected);
  }

  getState(): PromiseState {
    return this.result.getState();
  }

  resolve(value: T | PromiseInterface<T>): this {
    this.result.resolve(value);
    return this;
  }

  reject(reason: unknown): this {
    this.result.reject(reason);
    return this;
  }

  cancel(): this {
    this.currentPromise?.cancel();
    this.result.cancel();
    return this;
  }

  wait(unwrap?: true): T;
  wait(unwrap: false): this;
  wait(unwrap?: boolean): T | this;
  wait(unwrap = true): T | this {
    if (!unwrap) {
      this.result.wait(false);
      return this;
    }
    return this.result.wait();
  }

  // Done on the first step means the sequence never suspended.
  private advance(step: Step<T>): void {
    if (step.tag === "Done") {
      debug("coroutine finished without suspending");
      this.result.resolve(step.value);
      return;
    }
    this.suspend(step.item);
  }

  private suspend(item: T | PromiseInterface<T>): void {
    this.currentPromise = promiseFor(item, this.queue).then(
      (value) => {
        this.handleSuccess(value);
      },
      (reason) => {
        this.handleFailure(reason);
      },
    );
  }

  private handleSuccess(value: T): void {
    this.currentPromise = undefined;
    if (this.result.isResolved()) return;
    try {
      const step = this.steps.resume(value);
      if (step.tag === "Done") {
        debug("coroutine finished");
        this.result.resolve(value);
      } else {
        this.suspend(step.item);
      }
    } catch (err) {
      this.result.reject(err);
    }
  }

  private handleFailure(reason: unknown): void {
    this.currentPromise = undefined;
    if (this.result.isResolved()) return;
    try {
      // The sequence caught the error if this returns.
      const step = this.steps.raise(exceptionFor(reason));
      if (step.tag === "Done") {
        debug("coroutine finished after recovering");
        this.result.resolve(step.value);
      } else {
        this.suspend(step.item);
      }
    } catch (err) {
      this.result.reject(err);
    }
  }
}
