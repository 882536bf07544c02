import { z } from 'zod';
import { VIDEO_STATUSES, type TopicStatus, type VideoStatus } from './status.js';

// ─── Work Item Contracts ───
// The assembled work item handed to downstream production. Built from rows,
// never from raw job payloads.

export const claimSchema = z.object({
  claimText: z.string().min(1),
  sourceUrl: z.string().nullable(),
  confidence: z.number().min(0).max(1),
  verified: z.boolean(),
});

export type Claim = z.infer<typeof claimSchema>;

export const scriptBeatSchema = z.object({
  fact: z.string().min(1),
  analogy: z.string().min(1),
});

export type ScriptBeat = z.infer<typeof scriptBeatSchema>;

export const scriptSchema = z.object({
  hook: z.string().min(1).max(200),
  beats: z.array(scriptBeatSchema).length(3),
  payoff: z.string().min(1),
  cta: z.string().nullable(),
});

export type Script = z.infer<typeof scriptSchema>;

export const videoRecordSchema = z.object({
  videoId: z.string().min(1),
  topicId: z.string().min(1),
  topicTitle: z.string(),
  channelId: z.string().min(1),
  status: z.enum(VIDEO_STATUSES),
  claims: z.array(claimSchema).min(1),
  script: scriptSchema,
  similarityScore: z.number().min(0).max(1).nullable(),
  templateScore: z.number().min(0).max(1).nullable(),
  createdAt: z.date(),
});

export type VideoRecord = z.infer<typeof videoRecordSchema>;

/** Stored risk is the complement of the confidence callers see. */
export function riskToConfidence(riskScore: number): number {
  return Math.round((1 - riskScore) * 1_000_000) / 1_000_000;
}

// ─── Store Views ───

export interface VideoRef {
  id: string;
  status: VideoStatus;
}

export interface TopicSummary {
  id: string;
  title: string;
  status: TopicStatus;
  rationale: string | null;
  similarityScore: number | null;
  createdAt: Date;
}

export interface OrchestratorRunSummary {
  id: string;
  status: string;
  channelId: string | null;
  candidatesProcessed: number;
  itemsSucceeded: number;
  itemsFailed: number;
  durationMs: number | null;
  errorMessage: string | null;
  createdAt: Date;
}
