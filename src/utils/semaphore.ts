import { CancelledError } from './abort';

/**
 * Counting semaphore bounding the number of concurrently running async tasks
 */
export class Semaphore {
  private limit: number;
  private inFlight = 0;
  private waiters: Array<() => void> = [];

  constructor(limit: number) {
    this.limit = Math.max(1, Math.floor(limit));
  }

  get active(): number {
    return this.inFlight;
  }

  get pending(): number {
    return this.waiters.length;
  }

  /**
   * Change the permit count. Raising it wakes waiters immediately; lowering it
   * takes effect as running tasks release.
   */
  setLimit(limit: number): void {
    this.limit = Math.max(1, Math.floor(limit));
    this.drain();
  }

  /**
   * Wait for a permit. The returned function releases it and is safe to call more than once.
   */
  acquire(signal?: AbortSignal): Promise<() => void> {
    if (signal?.aborted) {
      return Promise.reject(new CancelledError());
    }

    return new Promise((resolve, reject) => {
      const waiter = () => {
        signal?.removeEventListener('abort', onAbort);
        resolve(this.createRelease());
      };

      const onAbort = () => {
        this.waiters = this.waiters.filter(w => w !== waiter);
        reject(new CancelledError());
      };

      signal?.addEventListener('abort', onAbort, { once: true });
      this.waiters.push(waiter);
      this.drain();
    });
  }

  /**
   * Run a task while holding a permit
   */
  async run<T>(task: () => Promise<T>, signal?: AbortSignal): Promise<T> {
    const release = await this.acquire(signal);
    try {
      return await task();
    } finally {
      release();
    }
  }

  private createRelease(): () => void {
    let released = false;
    return () => {
      if (released) return;
      released = true;
      this.inFlight--;
      this.drain();
    };
  }

  private drain(): void {
    while (this.inFlight < this.limit && this.waiters.length > 0) {
      const next = this.waiters.shift();
      if (!next) break;
      this.inFlight++;
      next();
    }
  }
}
