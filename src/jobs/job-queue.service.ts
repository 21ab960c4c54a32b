import {
  Inject,
  Injectable,
  Logger,
  OnModuleDestroy,
  Optional,
} from '@nestjs/common';
import { randomUUID } from 'crypto';
import {
  isJobOf,
  JOB_QUEUE_OPTIONS,
  type JobHandler,
  type JobPayloads,
  type JobQueueOptions,
  type JobType,
  type QueuedJob,
} from './job.types';

type RegisteredHandler = (job: QueuedJob) => Promise<unknown>;

const DEFAULT_OPTIONS: JobQueueOptions = {
  maxAttempts: 3,
  retryDelayMs: 1000,
  maxFinishedJobs: 1000,
};

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * In-process FIFO job queue. Jobs run one at a time; a handler that throws
 * is retried with linear backoff until its attempts are used up.
 */
@Injectable()
export class JobQueueService implements OnModuleDestroy {
  private readonly logger = new Logger(JobQueueService.name);
  private readonly options: JobQueueOptions;
  private readonly handlers = new Map<JobType, RegisteredHandler>();
  private readonly jobs = new Map<string, QueuedJob>();
  private readonly finished: string[] = [];
  private readonly pending: QueuedJob[] = [];
  private readonly retryTimers = new Set<NodeJS.Timeout>();
  private idleWaiters: Array<() => void> = [];
  private draining = false;
  private stopped = false;

  constructor(
    @Optional()
    @Inject(JOB_QUEUE_OPTIONS)
    options?: Partial<JobQueueOptions>,
  ) {
    this.options = { ...DEFAULT_OPTIONS, ...options };
  }

  register<K extends JobType>(type: K, handler: JobHandler<K>): void {
    if (this.handlers.has(type)) {
      this.logger.warn(`Replacing handler for job type ${type}`);
    }
    this.handlers.set(type, (job) => {
      if (!isJobOf(job, type)) {
        throw new Error(`Job ${job.id} is a ${job.type} job, not ${type}`);
      }
      return handler(job.payload, job);
    });
  }

  /** Queues a job and returns its id without waiting for it to run. */
  enqueue<K extends JobType>(type: K, payload: JobPayloads[K]): string {
    const job: QueuedJob<K> = {
      id: randomUUID(),
      type,
      payload,
      status: 'pending',
      attempts: 0,
      maxAttempts: Math.max(1, this.options.maxAttempts),
      createdAt: new Date(),
    };

    this.jobs.set(job.id, job);

    if (this.stopped) {
      this.logger.warn(`Queue stopped; job ${job.id} (${type}) will not run`);
      return job.id;
    }

    this.pending.push(job);
    this.logger.debug(`Queued job ${job.id} (${type})`);
    this.scheduleDrain();
    return job.id;
  }

  getJob(id: string): QueuedJob | undefined {
    return this.jobs.get(id);
  }

  getJobs(type?: JobType): QueuedJob[] {
    const all = Array.from(this.jobs.values());
    return type ? all.filter((job) => job.type === type) : all;
  }

  /** Resolves once nothing is queued, running or waiting to retry. */
  onIdle(): Promise<void> {
    if (this.isIdle()) return Promise.resolve();
    return new Promise((resolve) => this.idleWaiters.push(resolve));
  }

  stop(): void {
    this.stopped = true;
    this.retryTimers.forEach((timer) => clearTimeout(timer));
    this.retryTimers.clear();
    this.pending.length = 0;
    this.notifyIdle();
  }

  onModuleDestroy(): void {
    this.stop();
  }

  private isIdle(): boolean {
    return (
      this.stopped ||
      (!this.draining && this.pending.length === 0 && this.retryTimers.size === 0)
    );
  }

  private notifyIdle(): void {
    if (!this.isIdle()) return;
    const waiters = this.idleWaiters;
    this.idleWaiters = [];
    waiters.forEach((resolve) => resolve());
  }

  private scheduleDrain(): void {
    if (this.draining || this.stopped) return;
    this.draining = true;
    setImmediate(() => {
      this.drain().catch((err: unknown) => {
        this.logger.error(`Job queue drain failed: ${errorMessage(err)}`);
      });
    });
  }

  private async drain(): Promise<void> {
    try {
      let job = this.pending.shift();
      while (job && !this.stopped) {
        await this.execute(job);
        job = this.pending.shift();
      }
    } finally {
      this.draining = false;
      this.notifyIdle();
    }
  }

  private async execute(job: QueuedJob): Promise<void> {
    const handler = this.handlers.get(job.type);
    if (!handler) {
      job.status = 'failed';
      job.lastError = `No handler registered for ${job.type}`;
      this.finish(job);
      this.logger.error(`Job ${job.id} (${job.type}) failed: ${job.lastError}`);
      return;
    }

    job.status = 'running';
    job.attempts += 1;
    job.startedAt = new Date();
    this.logger.log(
      `Job ${job.id} (${job.type}) started, attempt ${job.attempts}/${job.maxAttempts}`,
    );

    try {
      job.result = await handler(job);
      job.status = 'completed';
      this.finish(job);
      this.logger.log(`Job ${job.id} (${job.type}) completed`);
    } catch (err) {
      job.lastError = errorMessage(err);

      if (job.attempts < job.maxAttempts && !this.stopped) {
        const delay = this.options.retryDelayMs * job.attempts;
        job.status = 'retrying';
        this.logger.warn(
          `Job ${job.id} (${job.type}) failed on attempt ${job.attempts}; retrying in ${delay}ms: ${job.lastError}`,
        );
        this.scheduleRetry(job, delay);
        return;
      }

      job.status = 'failed';
      this.finish(job);
      this.logger.error(
        `Job ${job.id} (${job.type}) failed after ${job.attempts} attempt(s): ${job.lastError}`,
        err instanceof Error ? err.stack : undefined,
      );
    }
  }

  private finish(job: QueuedJob): void {
    job.completedAt = new Date();
    this.finished.push(job.id);

    const limit = Math.max(0, this.options.maxFinishedJobs);
    while (this.finished.length > limit) {
      const evicted = this.finished.shift();
      if (evicted) this.jobs.delete(evicted);
    }
  }

  private scheduleRetry(job: QueuedJob, delay: number): void {
    const timer = setTimeout(() => {
      this.retryTimers.delete(timer);
      if (this.stopped) return;
      job.status = 'pending';
      this.pending.push(job);
      this.scheduleDrain();
    }, delay);
    timer.unref();
    this.retryTimers.add(timer);
  }
}
