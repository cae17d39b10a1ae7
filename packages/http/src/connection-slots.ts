/**
 * Counting semaphore bounding in-flight requests across all hosts.
 *
 * `acquire` suspends the calling task (never the process) when every slot is
 * taken; waiters are served FIFO. The executor releases its slot before any
 * backoff sleep, so a retrying call never holds capacity while idle.
 */
export class ConnectionSlots {
  private inUse = 0;
  private readonly waiters: (() => void)[] = [];

  constructor(private readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity <= 0) {
      throw new Error(`Invalid configuration: capacity must be a positive integer, got ${capacity}`);
    }
  }

  get available(): number {
    return this.capacity - this.inUse;
  }

  get pending(): number {
    return this.waiters.length;
  }

  async acquire(signal?: AbortSignal): Promise<void> {
    signal?.throwIfAborted();

    if (this.inUse < this.capacity) {
      this.inUse++;
      return;
    }

    await new Promise<void>((resolve, reject) => {
      const waiter = () => {
        signal?.removeEventListener('abort', onAbort);
        resolve();
      };
      const onAbort = () => {
        const index = this.waiters.indexOf(waiter);
        if (index !== -1) {
          this.waiters.splice(index, 1);
        }
        reject(signal?.reason);
      };
      signal?.addEventListener('abort', onAbort, { once: true });
      this.waiters.push(waiter);
    });
  }

  release(): void {
    const next = this.waiters.shift();
    if (next) {
      // Hand the slot straight to the next waiter; inUse is unchanged
      next();
      return;
    }
    this.inUse = Math.max(0, this.inUse - 1);
  }
}
