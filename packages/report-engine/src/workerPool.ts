import { AsyncLocalStorage } from 'node:async_hooks';
import { PoolClosedError } from './errors';
import { noopLogger, type ReporterLogger } from './logger';

export type PoolTask = () => Promise<void> | void;

export interface WorkerPoolOptions {
  /** Queue capacity as a multiple of the worker count. */
  queueMultiplier?: number;
  /** Where errors escaping a task are logged when no `onTaskError` is given. */
  logger?: ReporterLogger;
  /** Receives errors thrown by tasks; tasks are expected to report their own failures. */
  onTaskError?: (err: unknown) => void;
}

const DEFAULT_QUEUE_MULTIPLIER = 2;

interface BlockedSubmission {
  task: PoolTask;
  accept: () => void;
}

type IdleWorker = (task: PoolTask | null) => void;

function logTaskError(logger: ReporterLogger): (err: unknown) => void {
  return (err) => {
    logger.error(err instanceof Error ? err : String(err), { source: 'worker-pool' });
  };
}

/**
 * Fixed set of long-lived async workers draining a bounded queue.
 *
 * `submit` resolves once a task is accepted. When the queue is full an outside
 * caller waits for room; a task already running on one of this pool's workers
 * runs the new task itself instead, so recursive submissions never park every
 * worker behind its own queue. At most `size` tasks execute at any moment.
 */
export class WorkerPool {
  readonly size: number;
  readonly capacity: number;

  private readonly queue: PoolTask[] = [];
  private readonly idleWorkers: IdleWorker[] = [];
  private readonly blocked: BlockedSubmission[] = [];
  private readonly workerScope = new AsyncLocalStorage<boolean>();
  private readonly workers: Promise<void>[];
  private readonly onTaskError: (err: unknown) => void;
  private running = 0;
  private isClosed = false;

  constructor(size: number, options: WorkerPoolOptions = {}) {
    if (!Number.isInteger(size) || size < 1) {
      throw new RangeError(`worker pool size must be a positive integer, got ${size}`);
    }
    const multiplier = options.queueMultiplier ?? DEFAULT_QUEUE_MULTIPLIER;
    if (!Number.isInteger(multiplier) || multiplier < 1) {
      throw new RangeError(`queue multiplier must be a positive integer, got ${multiplier}`);
    }
    this.size = size;
    this.capacity = size * multiplier;
    this.onTaskError = options.onTaskError ?? logTaskError(options.logger ?? noopLogger);
    this.workers = Array.from({ length: size }, () => this.runWorker());
  }

  get activeCount(): number {
    return this.running;
  }

  get queueLength(): number {
    return this.queue.length;
  }

  get closed(): boolean {
    return this.isClosed;
  }

  submit(task: PoolTask): Promise<void> {
    if (this.isClosed) {
      throw new PoolClosedError();
    }

    const idle = this.idleWorkers.shift();
    if (idle) {
      idle(task);
      return Promise.resolve();
    }

    if (this.queue.length < this.capacity) {
      this.queue.push(task);
      return Promise.resolve();
    }

    if (this.workerScope.getStore() === true) {
      return this.invoke(task);
    }

    return new Promise<void>((resolve) => {
      this.blocked.push({ task, accept: resolve });
    });
  }

  /**
   * Stops accepting tasks and resolves once every queued task has run and all
   * workers have exited. Must not be awaited from inside a pool task.
   */
  async shutdown(): Promise<void> {
    if (!this.isClosed) {
      this.isClosed = true;
      for (const idle of this.idleWorkers.splice(0)) {
        idle(null);
      }
    }
    await Promise.all(this.workers);
  }

  private async runWorker(): Promise<void> {
    for (;;) {
      const task = await this.take();
      if (!task) {
        return;
      }
      this.running += 1;
      try {
        await this.workerScope.run(true, () => this.invoke(task));
      } finally {
        this.running -= 1;
      }
    }
  }

  private take(): Promise<PoolTask | null> {
    const next = this.queue.shift();
    if (next) {
      const waiting = this.blocked.shift();
      if (waiting) {
        this.queue.push(waiting.task);
        waiting.accept();
      }
      return Promise.resolve(next);
    }
    if (this.isClosed) {
      return Promise.resolve(null);
    }
    return new Promise<PoolTask | null>((resolve) => {
      this.idleWorkers.push(resolve);
    });
  }

  private async invoke(task: PoolTask): Promise<void> {
    try {
      await task();
    } catch (err) {
      this.onTaskError(err);
    }
  }
}
