import {
  PipelineCancelledError,
  PipelineError,
  errorMessage,
  isBatchFatal,
  shortId,
  throwIfCancelled,
  type Logger,
  type VideoRecord,
} from '@factreel/shared';
import { mineTopicsResultSchema } from './jobs.js';
import type { ApprovalGate } from './approval-gate.js';
import type { RetryLoopProcessor } from './retry-loop.js';
import type { RunRecord, RunRecorder } from './run-recorder.js';
import type { WorkflowStateStore } from './state-store.js';
import type { StageRunner } from './stages.js';

/** One batch: mine -> approval gate -> retry loop per approved topic -> audit row.
 *
 * Channel resolution, mining and the gate are batch-level; anything thrown
 * there fails the batch. Inside an item everything but broker loss and
 * cancellation is contained and counted as a failed item. The audit row is written exactly once on every
 * path out of `run`. */

export interface OrchestratorDeps {
  stages: StageRunner;
  store: WorkflowStateStore;
  gate: ApprovalGate;
  processor: RetryLoopProcessor;
  recorder: RunRecorder;
  logger: Logger;
}

export interface OrchestratorOptions {
  approvalTimeoutMs: number;
  approvalPollIntervalMs: number;
  itemConcurrency?: number;
}

export interface RunOptions {
  /** Defaults to the first configured channel */
  channelId?: string;
  signal?: AbortSignal;
}

export interface BatchResult {
  channelId: string;
  candidates: string[];
  approved: string[];
  /** Approved topics left alone because their latest video already failed */
  skipped: string[];
  succeeded: VideoRecord[];
  itemsFailed: number;
  durationMs: number;
}

type ItemOutcome = { kind: 'skipped' } | { kind: 'succeeded'; item: VideoRecord } | { kind: 'failed' };

interface Tally {
  channelId: string | null;
  candidates: number;
  succeeded: number;
  failed: number;
}

export class Orchestrator {
  private itemConcurrency: number;

  constructor(
    private deps: OrchestratorDeps,
    private options: OrchestratorOptions,
  ) {
    const concurrency = options.itemConcurrency ?? 1;
    if (!Number.isInteger(concurrency) || concurrency < 1) {
      throw new RangeError(`itemConcurrency must be an integer >= 1, got ${concurrency}`);
    }
    this.itemConcurrency = concurrency;
  }

  async run(options: RunOptions = {}): Promise<BatchResult> {
    const startedAt = Date.now();
    const tally: Tally = { channelId: options.channelId ?? null, candidates: 0, succeeded: 0, failed: 0 };

    try {
      const result = await this.runBatch(options, tally, startedAt);
      await this.record(tally, 'success', result.durationMs);
      this.deps.logger.info(
        {
          channelId: result.channelId,
          candidates: result.candidates.length,
          approved: result.approved.length,
          skipped: result.skipped.length,
          succeeded: result.succeeded.length,
          failed: result.itemsFailed,
          durationMs: result.durationMs,
        },
        'Batch complete',
      );
      return result;
    } catch (err) {
      const durationMs = Date.now() - startedAt;
      if (err instanceof PipelineCancelledError) {
        this.deps.logger.warn({ ...tally, durationMs }, 'Batch cancelled');
      } else {
        this.deps.logger.error({ ...tally, durationMs, err: errorMessage(err) }, 'Batch failed');
      }
      await this.record(tally, 'failed', durationMs, errorMessage(err));
      throw err;
    }
  }

  private async runBatch(options: RunOptions, tally: Tally, startedAt: number): Promise<BatchResult> {
    const { stages, store, gate, logger } = this.deps;
    const { signal } = options;
    throwIfCancelled(signal, { stage: 'start' });

    const channelId = options.channelId ?? (await store.fetchChannelId());
    tally.channelId = channelId;

    logger.info({ channelId }, 'Mining topics');
    const mined = await stages.runParsed('mine', { channelId }, mineTopicsResultSchema, signal);
    const candidates = [...new Set(mined.map((t) => t.id))];
    tally.candidates = candidates.length;
    logger.info({ channelId, candidates: candidates.length }, 'Mining complete');

    const approved = await gate.waitForApprovals(channelId, candidates, {
      timeoutMs: this.options.approvalTimeoutMs,
      pollIntervalMs: this.options.approvalPollIntervalMs,
      signal,
    });

    const skipped: string[] = [];
    const succeeded: VideoRecord[] = [];
    await forEachWithConcurrency(approved, this.itemConcurrency, async (topicId) => {
      throwIfCancelled(signal, { stage: 'item', topicId });
      const outcome = await this.runItem(topicId, signal);
      if (outcome.kind === 'skipped') {
        skipped.push(topicId);
      } else if (outcome.kind === 'succeeded') {
        succeeded.push(outcome.item);
        tally.succeeded++;
      } else {
        tally.failed++;
      }
    });

    return {
      channelId,
      candidates,
      approved,
      skipped,
      succeeded,
      itemsFailed: tally.failed,
      durationMs: Date.now() - startedAt,
    };
  }

  /** Errors other than broker loss and cancellation stay inside the item */
  private async runItem(topicId: string, signal?: AbortSignal): Promise<ItemOutcome> {
    const { store, processor, logger } = this.deps;
    try {
      const latest = await store.fetchLatestVideo(topicId);
      if (latest?.status === 'failed') {
        logger.info({ topicId: shortId(topicId), videoId: shortId(latest.id) }, 'Skipping topic with a failed video');
        return { kind: 'skipped' };
      }

      const item = await processor.process(topicId, { signal });
      return item ? { kind: 'succeeded', item } : { kind: 'failed' };
    } catch (err) {
      if (isBatchFatal(err)) throw err;
      logger.error(
        err instanceof PipelineError
          ? { topicId: shortId(topicId), code: err.code, err: err.message, context: err.context }
          : { topicId: shortId(topicId), err: errorMessage(err) },
        'Work item failed',
      );
      return { kind: 'failed' };
    }
  }

  private async record(
    tally: Tally,
    status: RunRecord['status'],
    durationMs: number,
    error?: string,
  ): Promise<void> {
    try {
      await this.deps.recorder.record({
        channelId: tally.channelId,
        status,
        candidatesProcessed: tally.candidates,
        itemsSucceeded: tally.succeeded,
        itemsFailed: tally.failed,
        durationMs,
        error,
      });
    } catch (recordErr) {
      this.deps.logger.error({ err: errorMessage(recordErr), status }, 'Could not record batch run');
    }
  }
}

/** Runs `fn` over `items` with at most `limit` in flight. After the first
 * error no new item starts; in-flight items settle before it is rethrown. */
export async function forEachWithConcurrency<T>(
  items: readonly T[],
  limit: number,
  fn: (item: T) => Promise<void>,
): Promise<void> {
  let next = 0;
  const failure: { failed: boolean; error?: unknown } = { failed: false };

  async function worker(): Promise<void> {
    while (!failure.failed && next < items.length) {
      const item = items[next++];
      try {
        await fn(item);
      } catch (error) {
        if (!failure.failed) {
          failure.failed = true;
          failure.error = error;
        }
      }
    }
  }

  await Promise.all(Array.from({ length: Math.min(limit, items.length) }, () => worker()));
  if (failure.failed) throw failure.error;
}
