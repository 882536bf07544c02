import { config as dotenvConfig } from 'dotenv';
import { z } from 'zod';
import { resolve } from 'path';
import { ConfigError } from './errors.js';

const LOG_LEVELS = ['trace', 'debug', 'info', 'warn', 'error', 'fatal'] as const;

const configSchema = z.object({
  // Queue broker
  redisUrl: z.string().url().default('redis://localhost:6379'),

  // Datastore
  databaseUrl: z.string().url(),

  // Approval gate
  approvalTimeoutHours: z.coerce.number().positive().default(48),
  approvalPollIntervalS: z.coerce.number().positive().default(60),

  // Scheduling
  pipelineSchedule: z.string().min(1).default('0 8 * * *'),
  pipelineTimezone: z.string().min(1).default('UTC'),

  // Quality loop
  maxReviewAttempts: z.coerce.number().int().min(1).default(2),
  itemConcurrency: z.coerce.number().int().min(1).default(1),

  // Job waits
  jobPollIntervalMs: z.coerce.number().int().positive().default(1000),
  jobAttempts: z.coerce.number().int().min(1).default(1),

  // Dashboard
  dashboardPort: z.coerce.number().int().positive().default(3000),

  // Logging
  logLevel: z.enum(LOG_LEVELS).default('info'),
});

export type Config = z.infer<typeof configSchema>;

type Env = Record<string, string | undefined>;

/** Read `.env` from the working directory into process.env. */
export function loadDotenv(): void {
  dotenvConfig({ path: resolve(process.cwd(), '.env') });
}

export function loadConfig(env: Env = process.env): Config {
  const result = configSchema.safeParse({
    redisUrl: env.REDIS_URL,
    databaseUrl: env.DATABASE_URL,
    approvalTimeoutHours: env.APPROVAL_TIMEOUT_HOURS,
    approvalPollIntervalS: env.APPROVAL_POLL_INTERVAL_S,
    pipelineSchedule: env.PIPELINE_SCHEDULE,
    pipelineTimezone: env.PIPELINE_TIMEZONE,
    maxReviewAttempts: env.MAX_REVIEW_ATTEMPTS,
    itemConcurrency: env.ITEM_CONCURRENCY,
    jobPollIntervalMs: env.JOB_POLL_INTERVAL_MS,
    jobAttempts: env.JOB_ATTEMPTS,
    dashboardPort: env.DASHBOARD_PORT,
    logLevel: env.LOG_LEVEL,
  });

  if (!result.success) {
    const fields = result.error.flatten().fieldErrors;
    const detail: Record<string, string[]> = {};
    for (const [key, messages] of Object.entries(fields)) {
      if (messages) detail[key] = messages;
    }
    const missing = Object.entries(detail)
      .map(([k, v]) => `  ${k}: ${v.join(', ')}`)
      .join('\n');
    throw new ConfigError(`Invalid configuration:\n${missing}`, detail);
  }

  return result.data;
}

/** Durations in milliseconds derived from the hour/second settings */
export function approvalTimings(config: Pick<Config, 'approvalTimeoutHours' | 'approvalPollIntervalS'>): {
  timeoutMs: number;
  pollIntervalMs: number;
} {
  return {
    timeoutMs: Math.round(config.approvalTimeoutHours * 3_600_000),
    pollIntervalMs: Math.round(config.approvalPollIntervalS * 1000),
  };
}
