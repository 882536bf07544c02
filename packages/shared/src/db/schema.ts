import { relations } from 'drizzle-orm';
import {
  pgTable,
  text,
  integer,
  real,
  boolean,
  timestamp,
  jsonb,
  pgEnum,
  uuid,
  index,
} from 'drizzle-orm/pg-core';
import { AGENT_RUN_STATUSES, TOPIC_STATUSES, VIDEO_STATUSES } from '../status.js';

// ─── Enums ───

export const topicStatusEnum = pgEnum('topic_status', TOPIC_STATUSES);
export const videoStatusEnum = pgEnum('video_status', VIDEO_STATUSES);
export const agentStatusEnum = pgEnum('agent_status', AGENT_RUN_STATUSES);

// ─── Channels ───

export const channelConfig = pgTable('channel_config', {
  id: uuid('id').primaryKey().defaultRandom(),
  channelName: text('channel_name').notNull(),
  niche: text('niche').notNull(),
  tone: text('tone').notNull().default('direct'),
  targetAudience: text('target_audience').notNull(),
  language: text('language').notNull().default('en'),
  weeklyTarget: integer('weekly_target').notNull().default(2),
  youtubeChannelId: text('youtube_channel_id'),
  createdAt: timestamp('created_at', { withTimezone: true }).defaultNow().notNull(),
  updatedAt: timestamp('updated_at', { withTimezone: true }).defaultNow().notNull(),
});

// ─── Topics (mined, then approved or rejected by a human) ───

export const topics = pgTable(
  'topics',
  {
    id: uuid('id').primaryKey().defaultRandom(),
    channelId: uuid('channel_id')
      .notNull()
      .references(() => channelConfig.id, { onDelete: 'cascade' }),
    title: text('title').notNull(),
    rationale: text('rationale'),
    sourceUrls: text('source_urls').array().notNull().default([]),
    status: topicStatusEnum('status').notNull().default('pending'),
    similarityScore: real('similarity_score'), // cosine similarity from dedup
    rejectedReason: text('rejected_reason'),
    createdAt: timestamp('created_at', { withTimezone: true }).defaultNow().notNull(),
    updatedAt: timestamp('updated_at', { withTimezone: true }).defaultNow().notNull(),
  },
  (table) => [index('idx_topics_channel_status').on(table.channelId, table.status)],
);

// ─── Videos (the work item) ───

export const videos = pgTable(
  'videos',
  {
    id: uuid('id').primaryKey().defaultRandom(),
    channelId: uuid('channel_id')
      .notNull()
      .references(() => channelConfig.id, { onDelete: 'cascade' }),
    topicId: uuid('topic_id')
      .notNull()
      .references(() => topics.id, { onDelete: 'restrict' }),
    title: text('title'),
    status: videoStatusEnum('status').notNull().default('draft'),
    youtubeVideoId: text('youtube_video_id'),
    publishedAt: timestamp('published_at', { withTimezone: true }),
    errorMessage: text('error_message'),
    createdAt: timestamp('created_at', { withTimezone: true }).defaultNow().notNull(),
    updatedAt: timestamp('updated_at', { withTimezone: true }).defaultNow().notNull(),
  },
  (table) => [
    index('idx_videos_channel_status').on(table.channelId, table.status),
    index('idx_videos_topic').on(table.topicId),
  ],
);

// ─── Claims (written by research, scored by review) ───

export const claims = pgTable('claims', {
  id: uuid('id').primaryKey().defaultRandom(),
  videoId: uuid('video_id')
    .notNull()
    .references(() => videos.id, { onDelete: 'cascade' }),
  claimText: text('claim_text').notNull(),
  sourceUrl: text('source_url'),
  verified: boolean('verified').notNull().default(false),
  riskScore: real('risk_score').notNull().default(0), // 0-1; review rejects above its threshold
  notes: text('notes'),
  createdAt: timestamp('created_at', { withTimezone: true }).defaultNow().notNull(),
});

// ─── Scripts (one row per generation attempt; latest wins) ───

export const scripts = pgTable('scripts', {
  id: uuid('id').primaryKey().defaultRandom(),
  videoId: uuid('video_id')
    .notNull()
    .references(() => videos.id, { onDelete: 'cascade' }),
  hook: text('hook').notNull(),
  beats: jsonb('beats').$type<Array<{ fact: string; analogy: string }>>().notNull().default([]),
  payoff: text('payoff').notNull(),
  cta: text('cta'),
  templateScore: real('template_score').notNull().default(0),
  similarityScore: real('similarity_score'),
  version: integer('version').notNull().default(1),
  createdAt: timestamp('created_at', { withTimezone: true }).defaultNow().notNull(),
});

// ─── Agent Runs (audit log; the orchestrator writes agent_name='orchestrator') ───

export const agentRuns = pgTable(
  'agent_runs',
  {
    id: uuid('id').primaryKey().defaultRandom(),
    agentName: text('agent_name').notNull(),
    videoId: uuid('video_id').references(() => videos.id, { onDelete: 'set null' }),
    topicId: uuid('topic_id').references(() => topics.id, { onDelete: 'set null' }),
    status: agentStatusEnum('status').notNull().default('success'),
    inputJson: jsonb('input_json').$type<Record<string, unknown>>().notNull().default({}),
    outputJson: jsonb('output_json').$type<Record<string, unknown>>(),
    tokensInput: integer('tokens_input').notNull().default(0),
    tokensOutput: integer('tokens_output').notNull().default(0),
    costUsd: real('cost_usd').notNull().default(0),
    durationMs: integer('duration_ms'),
    errorMessage: text('error_message'),
    createdAt: timestamp('created_at', { withTimezone: true }).defaultNow().notNull(),
  },
  (table) => [index('idx_agent_runs_agent_name').on(table.agentName, table.createdAt)],
);

// ─── Relations ───

export const topicsRelations = relations(topics, ({ one, many }) => ({
  channel: one(channelConfig, { fields: [topics.channelId], references: [channelConfig.id] }),
  videos: many(videos),
}));

export const videosRelations = relations(videos, ({ one, many }) => ({
  topic: one(topics, { fields: [videos.topicId], references: [topics.id] }),
  scripts: many(scripts),
  claims: many(claims),
}));

export const scriptsRelations = relations(scripts, ({ one }) => ({
  video: one(videos, { fields: [scripts.videoId], references: [videos.id] }),
}));

export const claimsRelations = relations(claims, ({ one }) => ({
  video: one(videos, { fields: [claims.videoId], references: [videos.id] }),
}));
