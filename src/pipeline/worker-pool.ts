import { QueueFullError } from "../lib/errors.js";
import { logError, logWarn, serializeError } from "../lib/logging.js";

export interface PoolJob {
  id: string;
  run: (signal: AbortSignal) => Promise<void>;
}

export interface WorkerPoolOptions {
  concurrency: number;
  queueLimit: number;
}

export interface WorkerPoolStats {
  active: number;
  queued: number;
  concurrency: number;
  queueLimit: number;
}

/**
 * Runs at most `concurrency` jobs at a time with up to `queueLimit` waiting.
 * Jobs beyond that are refused at submission. Closing the pool drops queued
 * jobs and aborts the running ones through their signal.
 */
export class WorkerPool {
  private readonly queue: PoolJob[] = [];
  private readonly controller = new AbortController();
  private idleWaiters: Array<() => void> = [];
  private active = 0;
  private closed = false;

  constructor(private readonly options: WorkerPoolOptions) {
    if (options.concurrency < 1) {
      throw new Error("WorkerPool concurrency must be at least 1.");
    }
  }

  canAccept(): boolean {
    if (this.closed) {
      return false;
    }

    return this.active < this.options.concurrency || this.queue.length < this.options.queueLimit;
  }

  submit(job: PoolJob): void {
    if (!this.canAccept()) {
      throw new QueueFullError(this.options.queueLimit);
    }

    this.queue.push(job);
    this.pump();
  }

  stats(): WorkerPoolStats {
    return {
      active: this.active,
      queued: this.queue.length,
      concurrency: this.options.concurrency,
      queueLimit: this.options.queueLimit
    };
  }

  onIdle(): Promise<void> {
    if (this.active === 0 && this.queue.length === 0) {
      return Promise.resolve();
    }

    return new Promise((resolve) => {
      this.idleWaiters.push(resolve);
    });
  }

  async close(): Promise<void> {
    this.closed = true;

    const dropped = this.queue.splice(0, this.queue.length);
    if (dropped.length > 0) {
      logWarn("pool.jobs_dropped", { jobIds: dropped.map((job) => job.id) });
    }

    this.controller.abort();
    await this.onIdle();
  }

  private pump(): void {
    while (this.active < this.options.concurrency && this.queue.length > 0) {
      const job = this.queue.shift();
      if (!job) {
        break;
      }

      this.active += 1;
      void this.execute(job);
    }

    this.notifyIfIdle();
  }

  private async execute(job: PoolJob): Promise<void> {
    try {
      await job.run(this.controller.signal);
    } catch (error) {
      logError("pool.job_failed", {
        jobId: job.id,
        ...serializeError(error)
      });
    } finally {
      this.active -= 1;
      this.pump();
    }
  }

  private notifyIfIdle(): void {
    if (this.active !== 0 || this.queue.length !== 0) {
      return;
    }

    const waiters = this.idleWaiters;
    this.idleWaiters = [];
    for (const resolve of waiters) {
      resolve();
    }
  }
}
