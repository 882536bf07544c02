import { approvalTimings, createDb, type Config, type Logger } from '@factreel/shared';
import { ApprovalGate } from './approval-gate.js';
import { Orchestrator } from './orchestrator.js';
import { BullJobQueueClient } from './queue.js';
import { RetryLoopProcessor } from './retry-loop.js';
import { DrizzleRunRecorder } from './run-recorder.js';
import { DrizzleWorkflowStateStore } from './state-store.js';
import { StageRunner } from './stages.js';

export interface Pipeline {
  orchestrator: Orchestrator;
  queue: BullJobQueueClient;
  store: DrizzleWorkflowStateStore;
  close(): Promise<void>;
}

/** Build every collaborator once per process. `close` releases Redis and the pg pool. */
export function createPipeline(config: Config, logger: Logger): Pipeline {
  const { db, close: closeDb } = createDb(config.databaseUrl);
  const queue = new BullJobQueueClient({ redisUrl: config.redisUrl, attempts: config.jobAttempts }, logger);
  const store = new DrizzleWorkflowStateStore(db);
  const stages = new StageRunner(queue, { pollIntervalMs: config.jobPollIntervalMs });
  const approval = approvalTimings(config);

  const orchestrator = new Orchestrator(
    {
      stages,
      store,
      gate: new ApprovalGate(store, logger.child({ component: 'approval-gate' })),
      processor: new RetryLoopProcessor(stages, store, logger.child({ component: 'retry-loop' }), {
        maxAttempts: config.maxReviewAttempts,
      }),
      recorder: new DrizzleRunRecorder(db, logger),
      logger: logger.child({ component: 'orchestrator' }),
    },
    {
      approvalTimeoutMs: approval.timeoutMs,
      approvalPollIntervalMs: approval.pollIntervalMs,
      itemConcurrency: config.itemConcurrency,
    },
  );

  return {
    orchestrator,
    queue,
    store,
    async close() {
      await queue.close();
      await closeDb();
    },
  };
}
