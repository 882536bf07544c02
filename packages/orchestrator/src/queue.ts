import { Queue, Worker, type Job } from 'bullmq';
import {
  JobFailedError,
  QueueUnavailableError,
  errorMessage,
  sleep,
  throwIfCancelled,
  type Logger,
} from '@factreel/shared';
import { QUEUE_NAMES, type JobEnvelope } from './jobs.js';

/** Job queue client over BullMQ + Redis.
 * Submitting work and waiting for it are separate calls, so a handle can be
 * re-attached to after a restart. Waiting is read-only polling. */

export interface JobHandle {
  readonly queueName: string;
  readonly jobName: string;
  readonly jobId: string;
  readonly enqueuedAt: Date;
}

export interface EnqueueOptions {
  timeoutMs: number;
}

export interface AwaitOptions {
  pollIntervalMs?: number;
  signal?: AbortSignal;
}

export interface JobQueueClient {
  enqueue<P>(queueName: string, jobName: string, payload: P, options: EnqueueOptions): Promise<JobHandle>;
  awaitResult(handle: JobHandle, options?: AwaitOptions): Promise<unknown>;
}

export type JobProcessor = (payload: unknown, job: Job<JobEnvelope, unknown>) => Promise<unknown>;

export interface QueueClientOptions {
  redisUrl: string;
  /** Broker-level attempts per job; pipeline semantics assume 1 */
  attempts?: number;
  concurrency?: number;
  connectTimeoutMs?: number;
}

export interface QueueHealth {
  waiting: number;
  active: number;
  completed: number;
  failed: number;
  delayed: number;
}

interface RedisConnectionSettings {
  host: string;
  port: number;
  username?: string;
  password?: string;
  db?: number;
}

const DEFAULT_POLL_INTERVAL_MS = 1000;
const DEFAULT_CONNECT_TIMEOUT_MS = 10_000;
const KEEP_COMPLETED_S = 7 * 24 * 3600;
const KEEP_FAILED_S = 30 * 24 * 3600;

export class BullJobQueueClient implements JobQueueClient {
  private queues = new Map<string, Queue<JobEnvelope, unknown>>();
  private processors = new Map<string, Map<string, JobProcessor>>();
  private workers: Worker<JobEnvelope, unknown>[] = [];
  private connection: RedisConnectionSettings;

  constructor(
    private options: QueueClientOptions,
    private logger: Logger,
  ) {
    this.connection = parseRedisUrl(options.redisUrl);
  }

  async enqueue<P>(
    queueName: string,
    jobName: string,
    payload: P,
    options: EnqueueOptions,
  ): Promise<JobHandle> {
    const queue = this.getQueue(queueName);
    const attempts = this.options.attempts ?? 1;
    const envelope: JobEnvelope<P> = {
      payload,
      timeoutMs: options.timeoutMs,
      enqueuedAt: new Date().toISOString(),
    };

    let jobId: string | undefined;
    try {
      await this.ready(queue);
      const job = await queue.add(jobName, envelope, {
        attempts,
        backoff: attempts > 1 ? { type: 'exponential', delay: 5000 } : undefined,
        removeOnComplete: { age: KEEP_COMPLETED_S },
        removeOnFail: { age: KEEP_FAILED_S },
      });
      jobId = job.id;
    } catch (err) {
      throw new QueueUnavailableError(
        `Could not enqueue '${jobName}' on ${queueName}: ${errorMessage(err)}`,
        { queueName, jobName },
        err,
      );
    }

    if (!jobId) {
      throw new QueueUnavailableError(`Broker returned no id for '${jobName}'`, { queueName, jobName });
    }

    this.logger.info({ jobId, queueName, jobName, timeoutMs: options.timeoutMs }, 'Job added to queue');
    return { queueName, jobName, jobId, enqueuedAt: new Date(envelope.enqueuedAt) };
  }

  /** Poll until the job is completed or failed. Returns the job's return value. */
  async awaitResult(handle: JobHandle, options: AwaitOptions = {}): Promise<unknown> {
    const pollIntervalMs = options.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS;
    const queue = this.getQueue(handle.queueName);
    const context = { queueName: handle.queueName, jobName: handle.jobName, jobId: handle.jobId };

    // A handle from another process may be the first use of this queue here.
    throwIfCancelled(options.signal, context);
    await this.brokerCall(handle, () => this.ready(queue));

    for (;;) {
      throwIfCancelled(options.signal, context);

      const state = await this.brokerCall(handle, () => queue.getJobState(handle.jobId));

      if (state === 'completed') {
        const job = await this.brokerCall(handle, () => queue.getJob(handle.jobId));
        if (!job) {
          throw new JobFailedError(handle.jobName, handle.jobId, 'unknown', 'job removed before its result was read', context);
        }
        this.logger.debug({ ...context, waitedMs: Date.now() - handle.enqueuedAt.getTime() }, 'Job completed');
        return job.returnvalue;
      }

      if (state === 'failed' || state === 'unknown') {
        const job = await this.brokerCall(handle, () => queue.getJob(handle.jobId));
        const reason = job?.failedReason || (state === 'unknown' ? 'job no longer exists' : 'no failure reason recorded');
        throw new JobFailedError(handle.jobName, handle.jobId, state, reason, context);
      }

      await sleep(pollIntervalMs, options.signal);
    }
  }

  /** Register a processor for one job name. Each queue gets a single worker
   * that dispatches on job name and enforces the envelope's timeout. */
  registerProcessor(queueName: string, jobName: string, processor: JobProcessor): void {
    const existing = this.processors.get(queueName);
    if (existing) {
      existing.set(jobName, processor);
      return;
    }

    const byName = new Map<string, JobProcessor>([[jobName, processor]]);
    this.processors.set(queueName, byName);

    const worker = new Worker<JobEnvelope, unknown>(
      queueName,
      async (job) => {
        const handler = byName.get(job.name);
        if (!handler) {
          throw new Error(`No processor registered for '${job.name}' on ${queueName}`);
        }
        this.logger.info({ jobId: job.id, queueName, jobName: job.name }, 'Processing job');
        const { payload, timeoutMs } = job.data;
        // The processor keeps running after a timeout; only the job is failed.
        return withTimeout(handler(payload, job), timeoutMs, `Job '${job.name}' timed out after ${timeoutMs}ms`);
      },
      {
        connection: { ...this.connection, maxRetriesPerRequest: null },
        concurrency: this.options.concurrency ?? 1,
      },
    );

    worker.on('completed', (job) => {
      this.logger.info({ jobId: job.id, queueName, jobName: job.name }, 'Job completed');
    });

    worker.on('failed', (job, err) => {
      this.logger.error({ jobId: job?.id, queueName, jobName: job?.name, err: err.message }, 'Job failed');
    });

    this.workers.push(worker);
  }

  /** Counts per pipeline queue */
  async getHealth(): Promise<Record<string, QueueHealth>> {
    const entries = await Promise.all(
      Object.values(QUEUE_NAMES).map(async (name): Promise<[string, QueueHealth]> => {
        const queue = this.getQueue(name);
        const [waiting, active, completed, failed, delayed] = await Promise.all([
          queue.getWaitingCount(),
          queue.getActiveCount(),
          queue.getCompletedCount(),
          queue.getFailedCount(),
          queue.getDelayedCount(),
        ]);
        return [name, { waiting, active, completed, failed, delayed }];
      }),
    );
    return Object.fromEntries(entries);
  }

  /** Close workers first so no job is picked up while queues shut down */
  async close(): Promise<void> {
    await Promise.all(this.workers.map((w) => w.close()));
    await Promise.all([...this.queues.values()].map((q) => q.close()));
    this.workers = [];
    this.queues.clear();
    this.processors.clear();
    this.logger.info('Queue client shut down');
  }

  private getQueue(name: string): Queue<JobEnvelope, unknown> {
    let queue = this.queues.get(name);
    if (!queue) {
      queue = new Queue<JobEnvelope, unknown>(name, {
        connection: { ...this.connection, enableOfflineQueue: false },
      });
      this.queues.set(name, queue);
    }
    return queue;
  }

  /** Offline queueing is off, so commands fail fast until the connection is up */
  private async ready(queue: Queue<JobEnvelope, unknown>): Promise<void> {
    const timeoutMs = this.options.connectTimeoutMs ?? DEFAULT_CONNECT_TIMEOUT_MS;
    await withTimeout(queue.waitUntilReady(), timeoutMs, `Redis not ready after ${timeoutMs}ms`);
  }

  private async brokerCall<T>(handle: JobHandle, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (err) {
      throw new QueueUnavailableError(
        `Lost broker while waiting on '${handle.jobName}' (${handle.jobId}): ${errorMessage(err)}`,
        { queueName: handle.queueName, jobName: handle.jobName, jobId: handle.jobId },
        err,
      );
    }
  }
}

export function withTimeout<T>(promise: Promise<T>, ms: number, message: string): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new Error(message)), ms);
  });
  return Promise.race([promise, timeout]).finally(() => clearTimeout(timer));
}

export function parseRedisUrl(url: string): RedisConnectionSettings {
  const parsed = new URL(url);
  const settings: RedisConnectionSettings = {
    host: parsed.hostname,
    port: parseInt(parsed.port || '6379', 10),
  };
  if (parsed.username) settings.username = decodeURIComponent(parsed.username);
  if (parsed.password) settings.password = decodeURIComponent(parsed.password);
  const db = parsed.pathname.replace(/^\//, '');
  if (db) settings.db = parseInt(db, 10);
  return settings;
}
