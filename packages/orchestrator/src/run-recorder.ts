import { withRetry, type Database, type Logger } from '@factreel/shared';
import { agentRuns } from '@factreel/shared/db';

export type BatchStatus = 'success' | 'failed';

export interface RunRecord {
  channelId: string | null;
  status: BatchStatus;
  candidatesProcessed: number;
  itemsSucceeded: number;
  itemsFailed: number;
  durationMs: number;
  error?: string;
}

/** Appends one audit row per batch. Rows are never updated. */
export interface RunRecorder {
  record(run: RunRecord): Promise<void>;
}

export const ORCHESTRATOR_AGENT_NAME = 'orchestrator';

export class DrizzleRunRecorder implements RunRecorder {
  constructor(
    private db: Database,
    private logger: Logger,
  ) {}

  async record(run: RunRecord): Promise<void> {
    await withRetry(
      () =>
        this.db.insert(agentRuns).values({
          agentName: ORCHESTRATOR_AGENT_NAME,
          status: run.status,
          inputJson: { channelId: run.channelId, candidatesProcessed: run.candidatesProcessed },
          outputJson: { itemsSucceeded: run.itemsSucceeded, itemsFailed: run.itemsFailed },
          durationMs: Math.round(run.durationMs),
          errorMessage: run.error ?? null,
        }),
      this.logger,
      'record orchestrator run',
    );

    this.logger.info(
      {
        status: run.status,
        candidates: run.candidatesProcessed,
        succeeded: run.itemsSucceeded,
        failed: run.itemsFailed,
        durationMs: Math.round(run.durationMs),
      },
      'Batch run recorded',
    );
  }
}
