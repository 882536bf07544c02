import type { z } from 'zod';
import { InvariantViolationError, throwIfCancelled } from '@factreel/shared';
import { PIPELINE_STAGES, type StageDefinition, type StageKey, type StagePayloads } from './jobs.js';
import type { JobQueueClient } from './queue.js';

export interface StageRunnerOptions {
  pollIntervalMs?: number;
  /** Per-stage timeout overrides in milliseconds */
  timeouts?: Partial<Record<StageKey, number>>;
}

/** Enqueue-then-await for one named pipeline stage. */
export class StageRunner {
  private pollIntervalMs: number;
  private stages: Record<StageKey, StageDefinition>;

  constructor(
    private queue: JobQueueClient,
    options: StageRunnerOptions = {},
  ) {
    this.pollIntervalMs = options.pollIntervalMs ?? 1000;
    this.stages = {
      mine: withTimeout(PIPELINE_STAGES.mine, options.timeouts?.mine),
      research: withTimeout(PIPELINE_STAGES.research, options.timeouts?.research),
      script: withTimeout(PIPELINE_STAGES.script, options.timeouts?.script),
      review: withTimeout(PIPELINE_STAGES.review, options.timeouts?.review),
    };
  }

  async run<K extends StageKey>(key: K, payload: StagePayloads[K], signal?: AbortSignal): Promise<unknown> {
    const stage = this.stages[key];
    throwIfCancelled(signal, { stage: key });
    const handle = await this.queue.enqueue(stage.queueName, stage.jobName, payload, {
      timeoutMs: stage.timeoutMs,
    });
    return this.queue.awaitResult(handle, { pollIntervalMs: this.pollIntervalMs, signal });
  }

  async runParsed<K extends StageKey, S extends z.ZodTypeAny>(
    key: K,
    payload: StagePayloads[K],
    schema: S,
    signal?: AbortSignal,
  ): Promise<z.infer<S>> {
    const result = await this.run(key, payload, signal);
    return parseStageResult(this.stages[key].jobName, schema, result);
  }
}

export function parseStageResult<S extends z.ZodTypeAny>(jobName: string, schema: S, value: unknown): z.infer<S> {
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    throw new InvariantViolationError(`Job '${jobName}' returned a malformed result`, {
      jobName,
      issues: parsed.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`),
    });
  }
  return parsed.data;
}

function withTimeout(stage: StageDefinition, timeoutMs: number | undefined): StageDefinition {
  return timeoutMs === undefined ? stage : { ...stage, timeoutMs };
}
