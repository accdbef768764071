import { describe, expect, it } from "vitest";
import { TaskQueue } from "../src/queue/task_queue";

describe("TaskQueue", () => {
  it("should report whether tasks are queued", () => {
    const queue = new TaskQueue({ withShutdown: false });
    expect(queue.isEmpty()).toBe(true);
    queue.add(() => {});
    expect(queue.isEmpty()).toBe(false);
    queue.run();
    expect(queue.isEmpty()).toBe(true);
  });

  it("should run tasks in FIFO order", () => {
    const queue = new TaskQueue({ withShutdown: false });
    const order: string[] = [];
    queue.add(() => order.push("t1"));
    queue.add(() => order.push("t2"));
    queue.add(() => order.push("t3"));
    queue.run();
    expect(order).toEqual(["t1", "t2", "t3"]);
  });

  it("should drain tasks added while running", () => {
    const queue = new TaskQueue({ withShutdown: false });
    const order: string[] = [];
    queue.add(() => {
      order.push("t1");
      queue.add(() => order.push("t4"));
    });
    queue.add(() => order.push("t2"));
    queue.add(() => order.push("t3"));
    queue.run();
    expect(order).toEqual(["t1", "t2", "t3", "t4"]);
    expect(queue.isEmpty()).toBe(true);
  });

  it("should keep later tasks queued when a task throws", () => {
    const queue = new TaskQueue({ withShutdown: false });
    const order: string[] = [];
    queue.add(() => {
      throw new Error("task failed");
    });
    queue.add(() => order.push("t2"));

    expect(() => queue.run()).toThrow("task failed");
    expect(order).toEqual([]);
    expect(queue.isEmpty()).toBe(false);

    queue.run();
    expect(order).toEqual(["t2"]);
  });

  it("should not register an exit listener without shutdown", () => {
    const before = process.listenerCount("exit");
    new TaskQueue({ withShutdown: false });
    expect(process.listenerCount("exit")).toBe(before);
  });

  describe("exit drain", () => {
    function exitHook(): (code: number) => void {
      const hook = process.listeners("exit").find((l) => l.name === "runExitHandlers");
      if (!hook) throw new Error("exit hook not installed");
      return (code) => hook(code);
    }

    it("should run queued tasks on a normal exit", () => {
      const queue = new TaskQueue();
      const ran: string[] = [];
      queue.add(() => ran.push("late"));
      exitHook()(0);
      expect(ran).toEqual(["late"]);
      queue.disableShutdown();
    });

    it("should skip the drain when exiting with an error code", () => {
      const queue = new TaskQueue();
      const ran: string[] = [];
      queue.add(() => ran.push("late"));
      exitHook()(1);
      expect(ran).toEqual([]);
      expect(queue.isEmpty()).toBe(false);
      queue.disableShutdown();
    });

    it("should release the queue when shutdown is disabled", () => {
      const queue = new TaskQueue();
      const ran: string[] = [];
      queue.add(() => ran.push("late"));

      queue.disableShutdown();
      queue.disableShutdown();
      exitHook()(0);
      expect(ran).toEqual([]);
    });

    it("should share one exit listener between queues", () => {
      const first = new TaskQueue();
      const count = process.listenerCount("exit");
      const more = Array.from({ length: 20 }, () => new TaskQueue());
      expect(process.listenerCount("exit")).toBe(count);

      const ran: number[] = [];
      more.forEach((queue, i) => queue.add(() => ran.push(i)));
      first.disableShutdown();
      exitHook()(0);
      expect(ran).toHaveLength(20);
      more.forEach((queue) => queue.disableShutdown());
    });
  });
});
