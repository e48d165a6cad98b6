import { describe, expect, test } from "vitest";
import { ExecutionCancelledError } from "../src/middleware/error-handler.js";
import { ExecutionLock } from "../src/services/execution-lock.js";

describe("ExecutionLock", () => {
  test("grants waiters in arrival order", async () => {
    const lock = new ExecutionLock();
    const order: number[] = [];

    const first = await lock.acquire();
    const waiters = [1, 2, 3].map(async (id) => {
      const release = await lock.acquire();
      order.push(id);
      release();
    });
    expect(lock.pending).toBe(3);

    first();
    await Promise.all(waiters);

    expect(order).toEqual([1, 2, 3]);
    expect(lock.held).toBe(false);
  });

  test("releasing twice has no effect", async () => {
    const lock = new ExecutionLock();
    const release = await lock.acquire();
    const next = lock.acquire();

    release();
    release();
    const releaseNext = await next;
    expect(lock.held).toBe(true);
    releaseNext();
    expect(lock.held).toBe(false);
  });

  test("an already aborted signal is rejected without queueing", async () => {
    const lock = new ExecutionLock();
    const controller = new AbortController();
    controller.abort();

    await expect(lock.acquire(controller.signal)).rejects.toBeInstanceOf(ExecutionCancelledError);
    expect(lock.held).toBe(false);
  });

  test("aborting while waiting leaves the queue", async () => {
    const lock = new ExecutionLock();
    const release = await lock.acquire();
    const controller = new AbortController();

    const waiting = lock.acquire(controller.signal);
    expect(lock.pending).toBe(1);
    controller.abort();

    await expect(waiting).rejects.toBeInstanceOf(ExecutionCancelledError);
    expect(lock.pending).toBe(0);
    release();
    expect(lock.held).toBe(false);
  });
});
