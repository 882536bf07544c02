import {
  InvariantViolationError,
  shortId,
  throwIfCancelled,
  type Logger,
  type VideoRecord,
} from '@factreel/shared';
import { researchResultSchema, reviewResultSchema, type ReviewResult } from './jobs.js';
import type { WorkflowStateStore } from './state-store.js';
import type { StageRunner } from './stages.js';

/** Drives one topic through research, then generate -> review until the
 * review approves or the attempt ceiling is reached.
 *
 *   generate -> review -> approved            (done)
 *                      -> rejected, k < max   (generate again)
 *                      -> rejected, k == max  (video marked failed)
 *
 * Every attempt overwrites the previous script and review outcome, so a crash
 * mid-loop loses only the attempt in flight. Nothing here is shared between
 * concurrent calls. */

export const DEFAULT_MAX_ATTEMPTS = 2;

export interface RetryLoopOptions {
  maxAttempts?: number;
}

export interface ProcessOptions {
  signal?: AbortSignal;
}

export class RetryLoopProcessor {
  readonly maxAttempts: number;

  constructor(
    private stages: StageRunner,
    private store: WorkflowStateStore,
    private logger: Logger,
    options: RetryLoopOptions = {},
  ) {
    const maxAttempts = options.maxAttempts ?? DEFAULT_MAX_ATTEMPTS;
    if (!Number.isInteger(maxAttempts) || maxAttempts < 1) {
      throw new RangeError(`maxAttempts must be an integer >= 1, got ${maxAttempts}`);
    }
    this.maxAttempts = maxAttempts;
  }

  /** Returns the assembled work item, or null when the review never approved. */
  async process(topicId: string, options: ProcessOptions = {}): Promise<VideoRecord | null> {
    const { signal } = options;
    const log = this.logger.child({ topicId: shortId(topicId) });

    // Research failures are not retried at this layer.
    log.info('Starting research');
    const claims = await this.stages.runParsed('research', { topicId }, researchResultSchema, signal);
    log.info({ claims: claims.length }, 'Research complete');

    const video = await this.store.fetchLatestVideo(topicId);
    if (!video) {
      throw new InvariantViolationError(`No video found for topic ${topicId} after research`, { topicId });
    }
    const videoLog = log.child({ videoId: shortId(video.id) });

    if (video.status === 'failed') {
      videoLog.warn('Video already failed in an earlier run; leaving it terminal');
      return null;
    }

    let review: ReviewResult | undefined;
    for (let attempt = 1; attempt <= this.maxAttempts; attempt++) {
      throwIfCancelled(signal, { stage: 'attempt', topicId, attempt });
      review = await this.runAttempt(topicId, video.id, attempt, videoLog, signal);

      if (review.approved) {
        videoLog.info({ attempt, riskScore: review.riskScore }, 'Review approved script');
        const item = await this.store.fetchWorkItem(video.id);
        videoLog.info({ status: item.status, claims: item.claims.length }, 'Work item assembled');
        return item;
      }

      videoLog.warn(
        { attempt, maxAttempts: this.maxAttempts, riskScore: review.riskScore, issues: review.issues },
        'Review rejected script',
      );
    }

    const lastRisk = review ? review.riskScore.toFixed(3) : 'n/a';
    const reason = `review: max ${this.maxAttempts} attempts exhausted (last riskScore=${lastRisk})`;
    await this.store.markVideoFailed(video.id, reason);
    videoLog.error({ reason }, "Video marked 'failed'");
    return null;
  }

  /** One generate -> review pair. Generation strictly precedes review.
   * A failed job propagates without a status write; only exhaustion marks the
   * video failed. */
  private async runAttempt(
    topicId: string,
    videoId: string,
    attempt: number,
    log: Logger,
    signal?: AbortSignal,
  ): Promise<ReviewResult> {
    log.info({ attempt, maxAttempts: this.maxAttempts }, 'Writing script');
    await this.stages.run('script', { topicId }, signal);

    log.info({ attempt, maxAttempts: this.maxAttempts }, 'Checking script');
    return this.stages.runParsed('review', { videoId }, reviewResultSchema, signal);
  }
}
