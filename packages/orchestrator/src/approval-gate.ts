import { sleep, throwIfCancelled, type Logger } from '@factreel/shared';
import type { WorkflowStateStore } from './state-store.js';

/** Human-in-the-loop checkpoint between mining and generation.
 * Polls until at least one candidate is approved or the deadline passes. */

export interface ApprovalWaitOptions {
  timeoutMs: number;
  pollIntervalMs: number;
  signal?: AbortSignal;
}

export class ApprovalGate {
  constructor(
    private store: Pick<WorkflowStateStore, 'fetchApprovedTopicIds'>,
    private logger: Logger,
    private now: () => number = Date.now,
  ) {}

  /** Returns the approved subset of `candidateIds`, or [] on timeout. */
  async waitForApprovals(
    channelId: string,
    candidateIds: readonly string[],
    options: ApprovalWaitOptions,
  ): Promise<string[]> {
    if (candidateIds.length === 0) return [];

    const candidates = new Set(candidateIds);
    const deadline = this.now() + options.timeoutMs;
    this.logger.info(
      { candidates: candidates.size, timeoutMs: options.timeoutMs, pollIntervalMs: options.pollIntervalMs },
      'Waiting for manual topic approval',
    );

    let polls = 0;
    for (;;) {
      throwIfCancelled(options.signal, { stage: 'approval', polls });

      const rows = await this.store.fetchApprovedTopicIds(channelId, candidateIds);
      polls++;
      const approved = [...new Set(rows)].filter((id) => candidates.has(id));
      if (approved.length > 0) {
        this.logger.info({ approved, polls }, 'Topics approved');
        return approved;
      }

      const remainingMs = deadline - this.now();
      if (remainingMs <= 0) break;

      const waitMs = Math.min(options.pollIntervalMs, remainingMs);
      this.logger.debug(
        { polls, nextPollMs: waitMs, remainingHours: Math.round((remainingMs / 3_600_000) * 10) / 10 },
        'No topic approved yet',
      );
      await sleep(waitMs, options.signal);
    }

    this.logger.warn({ polls, timeoutMs: options.timeoutMs }, 'Approval timeout reached with no approved topic');
    return [];
  }
}
