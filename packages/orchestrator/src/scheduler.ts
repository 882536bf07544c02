import { Queue, Worker } from 'bullmq';
import { errorMessage, type Logger } from '@factreel/shared';
import type { BatchResult } from './orchestrator.js';
import { parseRedisUrl } from './queue.js';

/** Recurring batches through a BullMQ job scheduler. The worker runs with
 * concurrency 1, so at most one batch is active per deployment. */

export const SCHEDULER_QUEUE = 'pipeline-orchestrator';
export const SCHEDULER_ID = 'daily-batch';
export const RUN_BATCH_JOB = 'run-batch';

export interface SchedulerOptions {
  redisUrl: string;
  /** Cron pattern */
  pattern: string;
  timezone: string;
}

export interface BatchSummary {
  channelId: string;
  candidates: number;
  approved: number;
  succeeded: number;
  failed: number;
  durationMs: number;
}

export type BatchRunner = (signal: AbortSignal) => Promise<BatchResult>;

export class BatchScheduler {
  private queue: Queue | undefined;
  private worker: Worker<Record<string, never>, BatchSummary> | undefined;
  private controller = new AbortController();

  constructor(
    private runBatch: BatchRunner,
    private options: SchedulerOptions,
    private logger: Logger,
  ) {}

  async start(): Promise<void> {
    const connection = parseRedisUrl(this.options.redisUrl);
    const queue = new Queue(SCHEDULER_QUEUE, { connection });
    this.queue = queue;

    await queue.upsertJobScheduler(
      SCHEDULER_ID,
      { pattern: this.options.pattern, tz: this.options.timezone },
      { name: RUN_BATCH_JOB, data: {}, opts: { removeOnComplete: 50, removeOnFail: 100 } },
    );

    const worker = new Worker<Record<string, never>, BatchSummary>(
      SCHEDULER_QUEUE,
      async (job): Promise<BatchSummary> => {
        this.logger.info({ jobId: job.id }, 'Scheduled batch starting');
        return summarize(await this.runBatch(this.controller.signal));
      },
      { connection: { ...connection, maxRetriesPerRequest: null }, concurrency: 1 },
    );

    worker.on('completed', (job, summary) => {
      this.logger.info({ jobId: job.id, ...summary }, 'Scheduled batch finished');
    });
    worker.on('failed', (job, err) => {
      this.logger.error({ jobId: job?.id, err: errorMessage(err) }, 'Scheduled batch failed');
    });
    this.worker = worker;

    this.logger.info({ pattern: this.options.pattern, timezone: this.options.timezone }, 'Batch schedule registered');
  }

  /** Abort the running batch, then wait for the worker to release it */
  async stop(): Promise<void> {
    this.controller.abort(new Error('scheduler stopping'));
    await this.worker?.close();
    await this.queue?.close();
    this.worker = undefined;
    this.queue = undefined;
    this.logger.info('Scheduler stopped');
  }
}

export function summarize(result: BatchResult): BatchSummary {
  return {
    channelId: result.channelId,
    candidates: result.candidates.length,
    approved: result.approved.length,
    succeeded: result.succeeded.length,
    failed: result.itemsFailed,
    durationMs: result.durationMs,
  };
}
