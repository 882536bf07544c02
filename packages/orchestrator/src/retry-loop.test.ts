import { describe, it, expect } from 'vitest';
import { RetryLoopProcessor } from './retry-loop.js';
import { StageRunner } from './stages.js';
import { FakeJobQueue, FakeStateStore, createMockLogger } from './test-fakes.js';
import {
  InvariantViolationError,
  JobFailedError,
  PipelineCancelledError,
} from '@factreel/shared';

const TOPIC = 'topic-1';
const VIDEO = 'video-topic-1';

type ReviewOutcome = boolean | Error | Record<string, unknown>;

function setup(reviews: ReviewOutcome[], maxAttempts = 2) {
  const queue = new FakeJobQueue();
  const store = new FakeStateStore();

  queue.on('research-topic', () => {
    store.addVideo(TOPIC);
    return [{ claimText: 'Octopuses have three hearts.', sourceUrl: 'https://example.org/octopus' }];
  });
  queue.on('write-script', () => ({ ok: true }));
  // Only an accepting review advances the video
  queue.on('check-script', () => {
    const next = reviews.shift();
    if (next instanceof Error) throw next;
    if (typeof next === 'object') return next;
    if (!next) return { riskScore: 0.7, issues: ['unsourced claim'], approved: false };
    store.setVideoStatus(TOPIC, 'scripted');
    return { riskScore: 0.1, issues: [], approved: true };
  });

  const processor = new RetryLoopProcessor(new StageRunner(queue, { pollIntervalMs: 1 }), store, createMockLogger(), {
    maxAttempts,
  });
  return { queue, store, processor };
}

describe('RetryLoopProcessor', () => {
  it('returns the work item when the first review approves', async () => {
    const { queue, store, processor } = setup([true]);

    const item = await processor.process(TOPIC);

    expect(item?.videoId).toBe(VIDEO);
    expect(item?.status).toBe('scripted');
    expect(queue.count('write-script')).toBe(1);
    expect(queue.count('check-script')).toBe(1);
    expect(store.failedWrites).toEqual([]);
  });

  it('regenerates after a rejected review and succeeds on the second attempt', async () => {
    const { queue, store, processor } = setup([false, true]);

    const item = await processor.process(TOPIC);

    expect(item?.status).toBe('scripted');
    expect(queue.count('write-script')).toBe(2);
    expect(queue.count('check-script')).toBe(2);
    expect(store.failedWrites).toEqual([]);
  });

  it('runs stages in order with their payloads and timeouts', async () => {
    const { queue, processor } = setup([false, true]);

    await processor.process(TOPIC);

    expect(queue.jobs.map((j) => [j.jobName, j.payload, j.timeoutMs])).toEqual([
      ['research-topic', { topicId: TOPIC }, 120_000],
      ['write-script', { topicId: TOPIC }, 180_000],
      ['check-script', { videoId: VIDEO }, 60_000],
      ['write-script', { topicId: TOPIC }, 180_000],
      ['check-script', { videoId: VIDEO }, 60_000],
    ]);
  });

  it('marks the video failed exactly once after the last rejected review', async () => {
    const { queue, store, processor } = setup([false, false]);

    const item = await processor.process(TOPIC);

    expect(item).toBeNull();
    expect(queue.count('write-script')).toBe(2);
    expect(queue.count('check-script')).toBe(2);
    expect(store.failedWrites).toEqual([
      { videoId: VIDEO, reason: 'review: max 2 attempts exhausted (last riskScore=0.700)' },
    ]);
    expect(store.video(TOPIC)?.status).toBe('failed');
  });

  it('honours a larger attempt ceiling', async () => {
    const { queue, store, processor } = setup([false, false, false], 3);

    await expect(processor.process(TOPIC)).resolves.toBeNull();

    expect(queue.count('check-script')).toBe(3);
    expect(store.failedWrites).toHaveLength(1);
    expect(store.failedWrites[0].reason).toContain('max 3 attempts');
  });

  it('does not retry a failed research job', async () => {
    const { queue, store, processor } = setup([true]);
    queue.on('research-topic', () => {
      throw new Error('search backend down');
    });

    const err = await processor.process(TOPIC).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(JobFailedError);
    expect(queue.count('research-topic')).toBe(1);
    expect(queue.count('write-script')).toBe(0);
    expect(store.failedWrites).toEqual([]);
  });

  it('raises an invariant violation when research created no video', async () => {
    const { queue, processor } = setup([true]);
    queue.on('research-topic', () => []);

    await expect(processor.process(TOPIC)).rejects.toBeInstanceOf(InvariantViolationError);
    expect(queue.count('write-script')).toBe(0);
  });

  it('leaves a video that already failed untouched', async () => {
    const { queue, store, processor } = setup([true]);
    queue.on('research-topic', () => {
      store.addVideo(TOPIC, 'failed');
      return [];
    });

    await expect(processor.process(TOPIC)).resolves.toBeNull();
    expect(queue.count('write-script')).toBe(0);
    expect(store.failedWrites).toEqual([]);
  });

  it('moves a video from draft straight to failed when every review rejects', async () => {
    const { store, processor } = setup([false, false]);
    const statuses: string[] = [];
    const markVideoFailed = store.markVideoFailed.bind(store);
    store.markVideoFailed = async (videoId, reason) => {
      statuses.push(store.video(TOPIC)?.status ?? 'missing');
      await markVideoFailed(videoId, reason);
    };

    await processor.process(TOPIC);

    expect(statuses).toEqual(['draft']);
    expect(store.video(TOPIC)?.status).toBe('failed');
  });

  it('rethrows a failed review job without writing a status', async () => {
    const { queue, store, processor } = setup([new Error('model overloaded')]);

    const err = await processor.process(TOPIC).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(JobFailedError);
    expect(queue.count('write-script')).toBe(1);
    expect(store.failedWrites).toEqual([]);
    expect(store.video(TOPIC)?.status).toBe('draft');
  });

  it('rethrows a failed script job before the last attempt without writing a status', async () => {
    const { queue, store, processor } = setup([true]);
    queue.on('write-script', () => {
      throw new Error('llm 503');
    });

    const err = await processor.process(TOPIC).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(JobFailedError);
    expect(queue.count('write-script')).toBe(1);
    expect(queue.count('check-script')).toBe(0);
    expect(store.failedWrites).toEqual([]);
    expect(store.video(TOPIC)?.status).toBe('draft');
  });

  it('starts no further attempt once the signal fires', async () => {
    const { queue, store, processor } = setup([]);
    const controller = new AbortController();
    queue.on('check-script', () => {
      controller.abort();
      return { riskScore: 0.7, issues: ['unsourced claim'], approved: false };
    });

    await expect(processor.process(TOPIC, { signal: controller.signal })).rejects.toBeInstanceOf(
      PipelineCancelledError,
    );
    expect(queue.jobs.map((j) => j.jobName)).toEqual(['research-topic', 'write-script', 'check-script']);
    expect(store.failedWrites).toEqual([]);
  });

  it('treats a malformed review result as an invariant violation', async () => {
    const { store, processor } = setup([{ riskScore: 3, approved: 'yes' }]);

    await expect(processor.process(TOPIC)).rejects.toThrow("Job 'check-script' returned a malformed result");
    expect(store.failedWrites).toEqual([]);
  });

  it('stops before research when already cancelled', async () => {
    const { queue, processor } = setup([true]);
    const controller = new AbortController();
    controller.abort();

    await expect(processor.process(TOPIC, { signal: controller.signal })).rejects.toBeInstanceOf(
      PipelineCancelledError,
    );
    expect(queue.count('research-topic')).toBe(0);
    expect(queue.count('write-script')).toBe(0);
  });

  it('rejects an attempt ceiling below one', () => {
    const queue = new FakeJobQueue();
    expect(
      () => new RetryLoopProcessor(new StageRunner(queue), new FakeStateStore(), createMockLogger(), { maxAttempts: 0 }),
    ).toThrow('maxAttempts must be an integer >= 1, got 0');
  });
});
