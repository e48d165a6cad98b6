import { ExecutionCancelledError } from "../middleware/error-handler.js";

export type Release = () => void;

/**
 * Single-holder async mutex. Waiters are granted strictly in arrival order;
 * a release hands the lock straight to the next waiter.
 */
export class ExecutionLock {
  private locked = false;
  private readonly queue: Array<() => void> = [];

  get held(): boolean {
    return this.locked;
  }

  get pending(): number {
    return this.queue.length;
  }

  acquire(signal?: AbortSignal): Promise<Release> {
    if (signal?.aborted) {
      return Promise.reject(new ExecutionCancelledError());
    }

    if (!this.locked) {
      this.locked = true;
      return Promise.resolve(this.createRelease());
    }

    return new Promise<Release>((resolve, reject) => {
      const onAbort = () => {
        const index = this.queue.indexOf(waiter);
        if (index >= 0) this.queue.splice(index, 1);
        reject(new ExecutionCancelledError());
      };

      const waiter = () => {
        signal?.removeEventListener("abort", onAbort);
        resolve(this.createRelease());
      };

      signal?.addEventListener("abort", onAbort, { once: true });
      this.queue.push(waiter);
    });
  }

  private createRelease(): Release {
    let released = false;
    return () => {
      if (released) return;
      released = true;
      const next = this.queue.shift();
      if (next) {
        next();
        return;
      }
      this.locked = false;
    };
  }
}
