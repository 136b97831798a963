/**
 * Counting semaphore with FIFO waiters.
 *
 * `setPermits` narrows or widens the limit at run time; narrowing never revokes
 * permits already held, it only delays new grants until `active` drops below
 * the new limit.
 */
export class Semaphore {
  private permits: number;
  private active = 0;
  private waiters: Array<{ grant: () => void; reject: (error: Error) => void }> = [];

  constructor(permits: number) {
    if (!Number.isInteger(permits) || permits < 1) {
      throw new RangeError(`Semaphore needs at least one permit, got ${permits}`);
    }
    this.permits = permits;
  }

  get limit(): number {
    return this.permits;
  }

  get inUse(): number {
    return this.active;
  }

  get waiting(): number {
    return this.waiters.length;
  }

  acquire(signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) {
      return Promise.reject(abortReason(signal));
    }
    if (this.active < this.permits) {
      this.active++;
      return Promise.resolve();
    }
    return new Promise<void>((resolve, reject) => {
      const waiter = {
        grant: () => {
          signal?.removeEventListener('abort', onAbort);
          this.active++;
          resolve();
        },
        reject,
      };
      const onAbort = () => {
        const index = this.waiters.indexOf(waiter);
        if (index >= 0) this.waiters.splice(index, 1);
        reject(signal ? abortReason(signal) : new Error('Aborted'));
      };
      signal?.addEventListener('abort', onAbort, { once: true });
      this.waiters.push(waiter);
    });
  }

  release(): void {
    if (this.active === 0) {
      throw new Error('Semaphore released more times than acquired');
    }
    this.active--;
    this.drain();
  }

  async use<T>(fn: () => Promise<T>, signal?: AbortSignal): Promise<T> {
    await this.acquire(signal);
    try {
      return await fn();
    } finally {
      this.release();
    }
  }

  setPermits(permits: number): void {
    if (!Number.isInteger(permits) || permits < 1) {
      throw new RangeError(`Semaphore needs at least one permit, got ${permits}`);
    }
    this.permits = permits;
    this.drain();
  }

  private drain(): void {
    while (this.active < this.permits && this.waiters.length > 0) {
      const next = this.waiters.shift();
      next?.grant();
    }
  }
}

function abortReason(signal: AbortSignal): Error {
  return signal.reason instanceof Error ? signal.reason : new Error('Aborted');
}
