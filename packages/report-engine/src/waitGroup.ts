/**
 * Join counter for a set of tasks that can grow while it is being awaited:
 * `add` before submitting, `done` when the task settles, `wait` until zero.
 */
export class WaitGroup {
  private pending = 0;
  private waiters: Array<() => void> = [];

  get count(): number {
    return this.pending;
  }

  add(delta = 1): void {
    if (!Number.isInteger(delta) || delta < 0) {
      throw new RangeError(`WaitGroup delta must be a non-negative integer, got ${delta}`);
    }
    this.pending += delta;
  }

  done(): void {
    if (this.pending === 0) {
      throw new Error('WaitGroup counter went negative');
    }
    this.pending -= 1;
    if (this.pending === 0) {
      const waiters = this.waiters;
      this.waiters = [];
      for (const resolve of waiters) {
        resolve();
      }
    }
  }

  wait(): Promise<void> {
    if (this.pending === 0) {
      return Promise.resolve();
    }
    return new Promise<void>((resolve) => {
      this.waiters.push(resolve);
    });
  }
}
