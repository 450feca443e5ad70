/**
 * Multi-producer, single-consumer queue. Producers push from I/O callbacks;
 * the orchestrator is the only consumer and drains in arrival order.
 */
export class EventBus<T> {
  private readonly queue: T[] = [];
  private waiter: ((ready: boolean) => void) | null = null;
  private closed = false;

  push(event: T): void {
    if (this.closed) {
      return;
    }
    this.queue.push(event);
    this.wake(true);
  }

  get size(): number {
    return this.queue.length;
  }

  drain(max: number = Number.POSITIVE_INFINITY): T[] {
    const count = Math.min(Math.max(0, Math.floor(max)), this.queue.length);
    return this.queue.splice(0, count);
  }

  wait(timeoutMs: number): Promise<boolean> {
    if (this.queue.length > 0) {
      return Promise.resolve(true);
    }
    if (this.closed) {
      return Promise.resolve(false);
    }
    // single consumer: a second waiter replaces the first
    this.wake(false);

    return new Promise((resolve) => {
      const timer = setTimeout(() => {
        if (this.waiter === settle) {
          this.waiter = null;
        }
        resolve(false);
      }, timeoutMs);
      const settle = (ready: boolean) => {
        clearTimeout(timer);
        resolve(ready);
      };
      this.waiter = settle;
    });
  }

  close(): void {
    this.closed = true;
    this.wake(false);
  }

  private wake(ready: boolean): void {
    const waiter = this.waiter;
    if (!waiter) {
      return;
    }
    this.waiter = null;
    waiter(ready);
  }
}
