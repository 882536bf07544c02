import {
  InvariantViolationError,
  assertTopicTransition,
  assertVideoTransition,
  riskToConfidence,
  topicSourcesFor,
  videoRecordSchema,
  videoSourcesFor,
  type Database,
  type OrchestratorRunSummary,
  type TopicStatus,
  type TopicSummary,
  type VideoRecord,
  type VideoRef,
} from '@factreel/shared';
import {
  agentRuns,
  channelConfig,
  scripts,
  topics,
  videos,
  and,
  asc,
  desc,
  eq,
  inArray,
} from '@factreel/shared/db';

/** Durable workflow state the orchestrator reads and writes.
 * Every write is one auto-committed statement; nothing is held open across job waits. */
export interface WorkflowStateStore {
  fetchChannelId(): Promise<string>;
  /** Approved topics of the channel, restricted to `candidateIds` */
  fetchApprovedTopicIds(channelId: string, candidateIds: readonly string[]): Promise<string[]>;
  fetchLatestVideo(topicId: string): Promise<VideoRef | null>;
  markVideoFailed(videoId: string, reason: string): Promise<void>;
  fetchWorkItem(videoId: string): Promise<VideoRecord>;
}

/** Operator-facing reads and the human approval write. */
export interface ReviewStore {
  listTopics(channelId: string, status: TopicStatus, limit?: number): Promise<TopicSummary[]>;
  setTopicStatus(topicId: string, status: TopicStatus, reason?: string): Promise<void>;
  listRecentRuns(limit?: number): Promise<OrchestratorRunSummary[]>;
}

export class DrizzleWorkflowStateStore implements WorkflowStateStore, ReviewStore {
  constructor(private db: Database) {}

  async fetchChannelId(): Promise<string> {
    const row = await this.db.query.channelConfig.findFirst({
      columns: { id: true },
      orderBy: [asc(channelConfig.createdAt)],
    });
    if (!row) {
      throw new InvariantViolationError('No channel found in channel_config; seed one before running the pipeline');
    }
    return row.id;
  }

  async fetchApprovedTopicIds(channelId: string, candidateIds: readonly string[]): Promise<string[]> {
    if (candidateIds.length === 0) return [];

    const rows = await this.db.query.topics.findMany({
      columns: { id: true },
      where: and(
        eq(topics.channelId, channelId),
        eq(topics.status, 'approved'),
        inArray(topics.id, [...candidateIds]),
      ),
    });
    return rows.map((r) => r.id);
  }

  async fetchLatestVideo(topicId: string): Promise<VideoRef | null> {
    const row = await this.db.query.videos.findFirst({
      columns: { id: true, status: true },
      where: eq(videos.topicId, topicId),
      orderBy: [desc(videos.createdAt)],
    });
    return row ? { id: row.id, status: row.status } : null;
  }

  async markVideoFailed(videoId: string, reason: string): Promise<void> {
    const updated = await this.db
      .update(videos)
      .set({ status: 'failed', errorMessage: reason, updatedAt: new Date() })
      .where(and(eq(videos.id, videoId), inArray(videos.status, videoSourcesFor('failed'))))
      .returning({ id: videos.id });

    if (updated.length > 0) return;

    const current = await this.db.query.videos.findFirst({
      columns: { status: true },
      where: eq(videos.id, videoId),
    });
    if (!current) {
      throw new InvariantViolationError(`Video ${videoId} not found`, { videoId }, 'NOT_FOUND');
    }
    assertVideoTransition(videoId, current.status, 'failed');
    throw new InvariantViolationError(`Video ${videoId} changed status while being marked failed`, {
      videoId,
      status: current.status,
    });
  }

  async fetchWorkItem(videoId: string): Promise<VideoRecord> {
    const row = await this.db.query.videos.findFirst({
      where: eq(videos.id, videoId),
      with: {
        topic: { columns: { title: true } },
        scripts: { orderBy: [desc(scripts.createdAt)], limit: 1 },
        claims: true,
      },
    });
    if (!row) {
      throw new InvariantViolationError(`Video ${videoId} not found`, { videoId }, 'NOT_FOUND');
    }

    const script = row.scripts[0];
    if (!script) {
      throw new InvariantViolationError(`Video ${videoId} has no script`, { videoId });
    }

    const parsed = videoRecordSchema.safeParse({
      videoId: row.id,
      topicId: row.topicId,
      topicTitle: row.topic.title,
      channelId: row.channelId,
      status: row.status,
      claims: row.claims.map((c) => ({
        claimText: c.claimText,
        sourceUrl: c.sourceUrl,
        confidence: riskToConfidence(c.riskScore),
        verified: c.verified,
      })),
      script: {
        hook: script.hook,
        beats: script.beats,
        payoff: script.payoff,
        cta: script.cta || null,
      },
      similarityScore: script.similarityScore,
      templateScore: script.templateScore,
      createdAt: row.createdAt,
    });

    if (!parsed.success) {
      throw new InvariantViolationError(`Work item for video ${videoId} is malformed`, {
        videoId,
        issues: parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`),
      });
    }
    return parsed.data;
  }

  async listTopics(channelId: string, status: TopicStatus, limit = 50): Promise<TopicSummary[]> {
    const rows = await this.db.query.topics.findMany({
      columns: { id: true, title: true, status: true, rationale: true, similarityScore: true, createdAt: true },
      where: and(eq(topics.channelId, channelId), eq(topics.status, status)),
      orderBy: [desc(topics.createdAt)],
      limit,
    });
    return rows;
  }

  async setTopicStatus(topicId: string, status: TopicStatus, reason?: string): Promise<void> {
    const updated = await this.db
      .update(topics)
      .set({
        status,
        rejectedReason: status === 'rejected' ? (reason ?? null) : null,
        updatedAt: new Date(),
      })
      .where(and(eq(topics.id, topicId), inArray(topics.status, topicSourcesFor(status))))
      .returning({ id: topics.id });

    if (updated.length > 0) return;

    const current = await this.db.query.topics.findFirst({
      columns: { status: true },
      where: eq(topics.id, topicId),
    });
    if (!current) {
      throw new InvariantViolationError(`Topic ${topicId} not found`, { topicId }, 'NOT_FOUND');
    }
    assertTopicTransition(topicId, current.status, status);
    throw new InvariantViolationError(`Topic ${topicId} changed status during update`, {
      topicId,
      status: current.status,
    });
  }

  async listRecentRuns(limit = 20): Promise<OrchestratorRunSummary[]> {
    const rows = await this.db.query.agentRuns.findMany({
      where: eq(agentRuns.agentName, 'orchestrator'),
      orderBy: [desc(agentRuns.createdAt)],
      limit,
    });

    return rows.map((r) => ({
      id: r.id,
      status: r.status,
      channelId: stringField(r.inputJson, 'channelId'),
      candidatesProcessed: numberField(r.inputJson, 'candidatesProcessed'),
      itemsSucceeded: numberField(r.outputJson, 'itemsSucceeded'),
      itemsFailed: numberField(r.outputJson, 'itemsFailed'),
      durationMs: r.durationMs,
      errorMessage: r.errorMessage,
      createdAt: r.createdAt,
    }));
  }
}

function numberField(json: Record<string, unknown> | null, key: string): number {
  const value = json?.[key];
  return typeof value === 'number' ? value : 0;
}

function stringField(json: Record<string, unknown> | null, key: string): string | null {
  const value = json?.[key];
  return typeof value === 'string' ? value : null;
}
