import { vi } from 'vitest';
import {
  InvariantViolationError,
  JobFailedError,
  assertVideoTransition,
  errorMessage,
  isBatchFatal,
  throwIfCancelled,
  type Logger,
  type VideoRecord,
  type VideoRef,
  type VideoStatus,
} from '@factreel/shared';
import type { AwaitOptions, EnqueueOptions, JobHandle, JobQueueClient } from './queue.js';
import type { WorkflowStateStore } from './state-store.js';
import type { RunRecord, RunRecorder } from './run-recorder.js';

// In-process stand-ins for the broker, the datastore and the audit table.

export function createMockLogger(): Logger {
  const logger = {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
    child: vi.fn(),
  };
  logger.child.mockReturnValue(logger);
  return logger as unknown as Logger;
}

export type FakeJobHandler = (payload: unknown) => unknown;

export interface EnqueuedJob {
  queueName: string;
  jobName: string;
  jobId: string;
  payload: unknown;
  timeoutMs: number;
}

/** Runs a registered handler when the job is awaited. A throwing handler
 * becomes a failed job unless it throws a batch-fatal error. */
export class FakeJobQueue implements JobQueueClient {
  readonly jobs: EnqueuedJob[] = [];
  enqueueError: Error | undefined;
  private handlers = new Map<string, FakeJobHandler>();

  on(jobName: string, handler: FakeJobHandler): this {
    this.handlers.set(jobName, handler);
    return this;
  }

  count(jobName: string): number {
    return this.jobs.filter((j) => j.jobName === jobName).length;
  }

  async enqueue<P>(queueName: string, jobName: string, payload: P, options: EnqueueOptions): Promise<JobHandle> {
    if (this.enqueueError) throw this.enqueueError;
    const jobId = `job-${this.jobs.length + 1}`;
    this.jobs.push({ queueName, jobName, jobId, payload, timeoutMs: options.timeoutMs });
    return { queueName, jobName, jobId, enqueuedAt: new Date() };
  }

  async awaitResult(handle: JobHandle, options: AwaitOptions = {}): Promise<unknown> {
    throwIfCancelled(options.signal, { jobId: handle.jobId });

    const job = this.jobs.find((j) => j.jobId === handle.jobId);
    const handler = this.handlers.get(handle.jobName);
    if (!job || !handler) {
      throw new JobFailedError(handle.jobName, handle.jobId, 'unknown', 'job no longer exists');
    }

    try {
      return await handler(job.payload);
    } catch (err) {
      if (isBatchFatal(err)) throw err;
      throw new JobFailedError(handle.jobName, handle.jobId, 'failed', errorMessage(err));
    }
  }
}

interface FakeVideo {
  id: string;
  topicId: string;
  status: VideoStatus;
  errorMessage: string | null;
}

/** Keeps one video per topic; a video's id is `video-<topicId>`. */
export class FakeStateStore implements WorkflowStateStore {
  readonly approved = new Set<string>();
  readonly failedWrites: Array<{ videoId: string; reason: string }> = [];
  private videos = new Map<string, FakeVideo>();

  constructor(readonly channelId = 'channel-1') {}

  addVideo(topicId: string, status: VideoStatus = 'draft'): FakeVideo {
    const video: FakeVideo = { id: `video-${topicId}`, topicId, status, errorMessage: null };
    this.videos.set(topicId, video);
    return video;
  }

  setVideoStatus(topicId: string, status: VideoStatus): void {
    const video = this.videos.get(topicId);
    if (video) video.status = status;
  }

  video(topicId: string): FakeVideo | undefined {
    return this.videos.get(topicId);
  }

  async fetchChannelId(): Promise<string> {
    return this.channelId;
  }

  async fetchApprovedTopicIds(channelId: string, candidateIds: readonly string[]): Promise<string[]> {
    if (channelId !== this.channelId) return [];
    return candidateIds.filter((id) => this.approved.has(id));
  }

  async fetchLatestVideo(topicId: string): Promise<VideoRef | null> {
    const video = this.videos.get(topicId);
    return video ? { id: video.id, status: video.status } : null;
  }

  async markVideoFailed(videoId: string, reason: string): Promise<void> {
    const video = [...this.videos.values()].find((v) => v.id === videoId);
    if (!video) throw new InvariantViolationError(`Video ${videoId} not found`, { videoId });
    assertVideoTransition(videoId, video.status, 'failed');
    video.status = 'failed';
    video.errorMessage = reason;
    this.failedWrites.push({ videoId, reason });
  }

  async fetchWorkItem(videoId: string): Promise<VideoRecord> {
    const video = [...this.videos.values()].find((v) => v.id === videoId);
    if (!video) throw new InvariantViolationError(`Video ${videoId} not found`, { videoId });
    return makeWorkItem({ videoId, topicId: video.topicId, channelId: this.channelId, status: video.status });
  }
}

export class FakeRunRecorder implements RunRecorder {
  readonly runs: RunRecord[] = [];
  failWith: Error | undefined;

  async record(run: RunRecord): Promise<void> {
    this.runs.push(run);
    if (this.failWith) throw this.failWith;
  }
}

export function makeWorkItem(overrides: Partial<VideoRecord> = {}): VideoRecord {
  return {
    videoId: 'video-1',
    topicId: 'topic-1',
    topicTitle: 'Why octopuses have three hearts',
    channelId: 'channel-1',
    status: 'scripted',
    claims: [
      {
        claimText: 'Octopuses have three hearts.',
        sourceUrl: 'https://example.org/octopus',
        confidence: 0.9,
        verified: true,
      },
    ],
    script: {
      hook: 'One heart is not enough for an octopus.',
      beats: [
        { fact: 'Two hearts pump blood through the gills.', analogy: 'Like two small pumps at a pool.' },
        { fact: 'The third heart feeds the body.', analogy: 'Like the main water line of a house.' },
        { fact: 'That heart rests while the octopus swims.', analogy: 'Like a runner holding their breath.' },
      ],
      payoff: 'So octopuses would rather crawl than swim.',
      cta: null,
    },
    similarityScore: 0.2,
    templateScore: 0.4,
    createdAt: new Date('2026-03-01T08:00:00Z'),
    ...overrides,
  };
}
