import createDebug from "debug";

const debug = createDebug("yieldpoint:queue");

export type QueuedTask = () => void;

// One process listener serves every queue that still wants its exit drain.
const exitHandlers = new Set<(code: number) => void>();
let exitHookInstalled = false;

function runExitHandlers(code: number): void {
  for (const handler of [...exitHandlers]) {
    handler(code);
  }
}

export interface TaskQueueOptions {
  // Drain the queue when the process exits normally.
  withShutdown?: boolean;
}

/**
 * FIFO queue of deferred actions. Every promise handler is routed through a
 * queue so that handlers never run inside the stack frame that settled the
 * promise, and so that long `then` chains run at a constant stack depth.
 *
 * Nothing drains a queue by itself except the exit hook: the host calls
 * `run()` from its own loop, or blocks on a promise with `wait()`. All
 * queues share a single process exit listener; a queue with the exit drain
 * enabled stays referenced until `disableShutdown()`.
 */
export class TaskQueue {
  private tasks: QueuedTask[] = [];
  private enableShutdown: boolean;
  private readonly onExit = (code: number): void => {
    if (!this.enableShutdown) return;
    // A non-zero exit code means something fatal already happened.
    if (code !== 0) {
      debug("skipping exit drain, process exiting with code %d", code);
      return;
    }
    debug("draining %d task(s) at exit", this.tasks.length);
    this.run();
  };

  constructor(options: TaskQueueOptions = {}) {
    this.enableShutdown = options.withShutdown ?? true;
    if (this.enableShutdown) {
      exitHandlers.add(this.onExit);
      if (!exitHookInstalled) {
        process.on("exit", runExitHandlers);
        exitHookInstalled = true;
      }
    }
  }

  isEmpty(): boolean {
    return this.tasks.length === 0;
  }

  add(task: QueuedTask): void {
    this.tasks.push(task);
  }

  /**
   * Runs tasks until the queue is empty, including tasks added by the tasks
   * being run. A task that throws stops the drain; the tasks behind it stay
   * queued.
   */
  run(): void {
    let task = this.tasks.shift();
    while (task) {
      task();
      task = this.tasks.shift();
    }
  }

  /**
   * Turns off the exit-time drain and releases the queue from the exit
   * hook. The owner must then run the queue (or wait on every outstanding
   * promise) before the process ends.
   */
  disableShutdown(): void {
    if (!this.enableShutdown) return;
    this.enableShutdown = false;
    exitHandlers.delete(this.onExit);
    debug("exit drain disabled");
  }
}
