export { TaskQueue, type QueuedTask, type TaskQueueOptions } from "./queue/task_queue";
export { PromiseState, type Settlement } from "./promise/state";
export {
  PROMISE_BRAND,
  type CancelFn,
  type OnFulfilled,
  type OnRejected,
  type PromiseInterface,
  type WaitFn,
} from "./promise/types";
export {
  CancellationError,
  InvalidArgumentError,
  LogicError,
  PromiseError,
  RejectionError,
  WaitError,
} from "./promise/errors";
export { Deferred, type DeferredOptions } from "./promise/deferred";
export { FulfilledPromise } from "./promise/fulfilled_promise";
export { RejectedPromise } from "./promise/rejected_promise";
export * as Create from "./promise/create";
export * as Is from "./promise/is";
export * as Utils from "./promise/utils";
export { Coroutine } from "./coroutine/coroutine";
export {
  GeneratorSequence,
  type CoroutineGenerator,
  type Step,
  type StepSequence,
} from "./coroutine/steps";
