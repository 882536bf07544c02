export {
  BullJobQueueClient,
  parseRedisUrl,
  type JobQueueClient,
  type JobHandle,
  type JobProcessor,
  type QueueClientOptions,
  type QueueHealth,
} from './queue.js';
export {
  QUEUE_NAMES,
  JOB_NAMES,
  PIPELINE_STAGES,
  type QueueName,
  type JobName,
  type StageKey,
  type StageDefinition,
  type StagePayloads,
  type JobEnvelope,
  type MineTopicsJobData,
  type ResearchTopicJobData,
  type WriteScriptJobData,
  type CheckScriptJobData,
  type ReviewResult,
} from './jobs.js';
export { StageRunner, type StageRunnerOptions } from './stages.js';
export { DrizzleWorkflowStateStore, type WorkflowStateStore, type ReviewStore } from './state-store.js';
export { ApprovalGate, type ApprovalWaitOptions } from './approval-gate.js';
export { RetryLoopProcessor, DEFAULT_MAX_ATTEMPTS, type RetryLoopOptions } from './retry-loop.js';
export { DrizzleRunRecorder, type RunRecorder, type RunRecord, type BatchStatus } from './run-recorder.js';
export { Orchestrator, type OrchestratorDeps, type OrchestratorOptions, type BatchResult, type RunOptions } from './orchestrator.js';
export { createPipeline, type Pipeline } from './pipeline.js';
export { BatchScheduler, type SchedulerOptions, type BatchSummary } from './scheduler.js';
export { createDashboard, createDashboardApp, type DashboardDeps } from './dashboard.js';
