/** Error taxonomy for the pipeline.
 * Batch-level errors abort the whole run; item-level errors abort one work item. */

export type PipelineErrorCode =
  | 'QUEUE_UNAVAILABLE'
  | 'JOB_FAILED'
  | 'INVARIANT_VIOLATION'
  | 'NOT_FOUND'
  | 'ILLEGAL_TRANSITION'
  | 'PIPELINE_CANCELLED'
  | 'CONFIG_INVALID';

export class PipelineError extends Error {
  constructor(
    message: string,
    public readonly code: PipelineErrorCode,
    public readonly context: Record<string, unknown> = {},
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'PipelineError';
  }
}

// ─── Error Classes ───

/** The broker refused or could not be reached. */
export class QueueUnavailableError extends PipelineError {
  constructor(message: string, context: Record<string, unknown> = {}, cause?: unknown) {
    super(message, 'QUEUE_UNAVAILABLE', context, { cause });
    this.name = 'QueueUnavailableError';
  }
}

export class JobFailedError extends PipelineError {
  constructor(
    public readonly jobName: string,
    public readonly jobId: string,
    public readonly state: string,
    public readonly reason: string,
    context: Record<string, unknown> = {},
  ) {
    super(`Job '${jobName}' (${jobId}) ended with state=${state}: ${reason}`, 'JOB_FAILED', {
      ...context,
      jobName,
      jobId,
      state,
    });
    this.name = 'JobFailedError';
  }
}

/** An expected linked record is missing or malformed. */
export class InvariantViolationError extends PipelineError {
  constructor(message: string, context: Record<string, unknown> = {}, code: PipelineErrorCode = 'INVARIANT_VIOLATION') {
    super(message, code, context);
    this.name = 'InvariantViolationError';
  }
}

export class IllegalTransitionError extends InvariantViolationError {
  constructor(
    public readonly entity: 'topic' | 'video',
    public readonly entityId: string,
    public readonly from: string,
    public readonly to: string,
  ) {
    super(
      `Illegal ${entity} transition ${from} -> ${to} for ${entityId}`,
      { entity, entityId, from, to },
      'ILLEGAL_TRANSITION',
    );
    this.name = 'IllegalTransitionError';
  }
}

export class PipelineCancelledError extends PipelineError {
  constructor(context: Record<string, unknown> = {}) {
    super('Pipeline cancelled', 'PIPELINE_CANCELLED', context);
    this.name = 'PipelineCancelledError';
  }
}

export class ConfigError extends PipelineError {
  constructor(message: string, public readonly fields: Record<string, string[]>) {
    super(message, 'CONFIG_INVALID', { fields });
    this.name = 'ConfigError';
  }
}

/** Errors that must escape the per-item boundary and stop the batch. */
export function isBatchFatal(err: unknown): boolean {
  return err instanceof QueueUnavailableError || err instanceof PipelineCancelledError;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
