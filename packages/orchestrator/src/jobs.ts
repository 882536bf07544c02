import { z } from 'zod';

/** Pipeline job definitions: one BullMQ queue per collaborator stage. */

export const QUEUE_NAMES = {
  TOPIC_MINER: 'topic-miner',
  RESEARCHER: 'researcher',
  SCRIPTWRITER: 'scriptwriter',
  FACT_CHECKER: 'fact-checker',
} as const;

export type QueueName = (typeof QUEUE_NAMES)[keyof typeof QUEUE_NAMES];

export const JOB_NAMES = {
  MINE_TOPICS: 'mine-topics',
  RESEARCH_TOPIC: 'research-topic',
  WRITE_SCRIPT: 'write-script',
  CHECK_SCRIPT: 'check-script',
} as const;

export type JobName = (typeof JOB_NAMES)[keyof typeof JOB_NAMES];

export interface MineTopicsJobData {
  channelId: string;
}

export interface ResearchTopicJobData {
  topicId: string;
}

export interface WriteScriptJobData {
  topicId: string;
}

export interface CheckScriptJobData {
  videoId: string;
}

export interface StageDefinition {
  queueName: QueueName;
  jobName: JobName;
  timeoutMs: number;
}

export type StageKey = 'mine' | 'research' | 'script' | 'review';

export interface StagePayloads {
  mine: MineTopicsJobData;
  research: ResearchTopicJobData;
  script: WriteScriptJobData;
  review: CheckScriptJobData;
}

/** Ordered stage table. Timeouts bound how long a worker may hold a job. */
export const PIPELINE_STAGES: Readonly<Record<StageKey, StageDefinition>> = {
  mine: { queueName: QUEUE_NAMES.TOPIC_MINER, jobName: JOB_NAMES.MINE_TOPICS, timeoutMs: 300_000 },
  research: { queueName: QUEUE_NAMES.RESEARCHER, jobName: JOB_NAMES.RESEARCH_TOPIC, timeoutMs: 120_000 },
  script: { queueName: QUEUE_NAMES.SCRIPTWRITER, jobName: JOB_NAMES.WRITE_SCRIPT, timeoutMs: 180_000 },
  review: { queueName: QUEUE_NAMES.FACT_CHECKER, jobName: JOB_NAMES.CHECK_SCRIPT, timeoutMs: 60_000 },
};

// ─── Job Results ───

export const minedTopicSchema = z.object({
  id: z.string().min(1),
  title: z.string(),
  similarityScore: z.number().nullable().optional(),
});

export const mineTopicsResultSchema = z.array(minedTopicSchema);
export type MinedTopic = z.infer<typeof minedTopicSchema>;

export const researchResultSchema = z.array(
  z.object({ claimText: z.string() }).passthrough(),
);

export const reviewResultSchema = z.object({
  riskScore: z.number().min(0).max(1),
  issues: z.array(z.string()),
  approved: z.boolean(),
});

export type ReviewResult = z.infer<typeof reviewResultSchema>;

/** Envelope every pipeline job carries; workers unwrap `payload`. */
export interface JobEnvelope<P = unknown> {
  payload: P;
  timeoutMs: number;
  enqueuedAt: string;
}
