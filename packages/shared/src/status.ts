import { IllegalTransitionError } from './errors.js';

// ─── Status Enumerations ───

export const TOPIC_STATUSES = ['pending', 'approved', 'rejected', 'published'] as const;
export type TopicStatus = (typeof TOPIC_STATUSES)[number];

export const VIDEO_STATUSES = ['draft', 'scripted', 'rendered', 'published', 'failed'] as const;
export type VideoStatus = (typeof VIDEO_STATUSES)[number];

export const AGENT_RUN_STATUSES = ['success', 'failed', 'retry'] as const;
export type AgentRunStatus = (typeof AGENT_RUN_STATUSES)[number];

// ─── Transition Tables ───

export const TOPIC_TRANSITIONS: Readonly<Record<TopicStatus, readonly TopicStatus[]>> = {
  pending: ['approved', 'rejected'],
  approved: ['published', 'rejected'],
  rejected: [],
  published: [],
};

/** Forward only; `failed` is reachable from every non-terminal status. */
export const VIDEO_TRANSITIONS: Readonly<Record<VideoStatus, readonly VideoStatus[]>> = {
  draft: ['scripted', 'failed'],
  scripted: ['rendered', 'failed'],
  rendered: ['published', 'failed'],
  published: [],
  failed: [],
};

export function canTopicTransition(from: TopicStatus, to: TopicStatus): boolean {
  return TOPIC_TRANSITIONS[from].includes(to);
}

export function canVideoTransition(from: VideoStatus, to: VideoStatus): boolean {
  return VIDEO_TRANSITIONS[from].includes(to);
}

export function assertTopicTransition(topicId: string, from: TopicStatus, to: TopicStatus): void {
  if (!canTopicTransition(from, to)) {
    throw new IllegalTransitionError('topic', topicId, from, to);
  }
}

export function assertVideoTransition(videoId: string, from: VideoStatus, to: VideoStatus): void {
  if (!canVideoTransition(from, to)) {
    throw new IllegalTransitionError('video', videoId, from, to);
  }
}

/** Statuses a row may hold for a write to `to` to be legal. Used as the
 * guard of single-statement conditional updates. */
export function topicSourcesFor(to: TopicStatus): TopicStatus[] {
  return sourcesOf(TOPIC_STATUSES, TOPIC_TRANSITIONS, to);
}

export function videoSourcesFor(to: VideoStatus): VideoStatus[] {
  return sourcesOf(VIDEO_STATUSES, VIDEO_TRANSITIONS, to);
}

export function isTerminalVideoStatus(status: VideoStatus): boolean {
  return VIDEO_TRANSITIONS[status].length === 0;
}

function sourcesOf<S extends string>(
  all: readonly S[],
  table: Readonly<Record<S, readonly S[]>>,
  to: S,
): S[] {
  return all.filter((from) => table[from].includes(to));
}
