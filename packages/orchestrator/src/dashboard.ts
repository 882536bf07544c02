import express, { type Response } from 'express';
import type { Server } from 'http';
import { z } from 'zod';
import { PipelineError, TOPIC_STATUSES, errorMessage, type Logger } from '@factreel/shared';
import type { QueueHealth } from './queue.js';
import type { ReviewStore, WorkflowStateStore } from './state-store.js';

/** Express dashboard API: queue health, batch history, and the manual
 * topic approval action that the approval gate waits on. */

export interface DashboardDeps {
  queue: { getHealth(): Promise<Record<string, QueueHealth>> };
  store: ReviewStore & Pick<WorkflowStateStore, 'fetchChannelId'>;
  logger: Logger;
}

const topicQuerySchema = z.object({
  status: z.enum(TOPIC_STATUSES).default('pending'),
  channelId: z.string().min(1).optional(),
  limit: z.coerce.number().int().min(1).max(200).default(50),
});

const runsQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(200).default(20),
});

const rejectBodySchema = z.object({
  reason: z.string().max(500).optional(),
});

export function createDashboardApp({ queue, store, logger }: DashboardDeps) {
  const app = express();
  app.use(express.json());

  // ─── Health ───

  app.get('/health', async (_req, res) => {
    try {
      const health = await queue.getHealth();
      res.json({
        status: 'ok',
        uptime: process.uptime(),
        queue: health,
        timestamp: new Date().toISOString(),
      });
    } catch (err) {
      res.status(503).json({ status: 'error', error: errorMessage(err) });
    }
  });

  // ─── Queue Stats ───

  app.get('/api/queue/stats', async (_req, res) => {
    try {
      res.json(await queue.getHealth());
    } catch (err) {
      sendError(res, err, logger);
    }
  });

  // ─── Batch History ───

  app.get('/api/runs', async (req, res) => {
    const query = runsQuerySchema.safeParse(req.query);
    if (!query.success) {
      res.status(400).json({ error: 'Invalid query', issues: query.error.flatten().fieldErrors });
      return;
    }
    try {
      const runs = await store.listRecentRuns(query.data.limit);
      res.json({ runs, total: runs.length });
    } catch (err) {
      sendError(res, err, logger);
    }
  });

  // ─── Topics Awaiting Approval ───

  app.get('/api/topics', async (req, res) => {
    const query = topicQuerySchema.safeParse(req.query);
    if (!query.success) {
      res.status(400).json({ error: 'Invalid query', issues: query.error.flatten().fieldErrors });
      return;
    }
    try {
      const channelId = query.data.channelId ?? (await store.fetchChannelId());
      const topics = await store.listTopics(channelId, query.data.status, query.data.limit);
      res.json({ channelId, status: query.data.status, topics, total: topics.length });
    } catch (err) {
      sendError(res, err, logger);
    }
  });

  // ─── Manual Approval Gate ───

  app.post('/api/topics/:id/approve', async (req, res) => {
    try {
      await store.setTopicStatus(req.params.id, 'approved');
      logger.info({ topicId: req.params.id }, 'Topic approved');
      res.json({ status: 'approved', topicId: req.params.id });
    } catch (err) {
      sendError(res, err, logger);
    }
  });

  app.post('/api/topics/:id/reject', async (req, res) => {
    const body = rejectBodySchema.safeParse(req.body ?? {});
    if (!body.success) {
      res.status(400).json({ error: 'Invalid body', issues: body.error.flatten().fieldErrors });
      return;
    }
    const reason = body.data.reason || 'No reason provided';
    try {
      await store.setTopicStatus(req.params.id, 'rejected', reason);
      logger.info({ topicId: req.params.id, reason }, 'Topic rejected');
      res.json({ status: 'rejected', topicId: req.params.id, reason });
    } catch (err) {
      sendError(res, err, logger);
    }
  });

  return app;
}

export function createDashboard(deps: DashboardDeps, port = 3000): Server {
  const app = createDashboardApp(deps);
  return app.listen(port, () => {
    deps.logger.info({ port }, 'Dashboard API running');
  });
}

export function httpStatusFor(err: unknown): number {
  if (!(err instanceof PipelineError)) return 500;
  switch (err.code) {
    case 'NOT_FOUND':
      return 404;
    case 'ILLEGAL_TRANSITION':
    case 'INVARIANT_VIOLATION':
      return 409;
    case 'QUEUE_UNAVAILABLE':
      return 503;
    default:
      return 500;
  }
}

function sendError(res: Response, err: unknown, logger: Logger): void {
  const status = httpStatusFor(err);
  if (status >= 500) {
    logger.error({ err: errorMessage(err) }, 'Dashboard request failed');
  }
  res.status(status).json({ error: errorMessage(err) });
}
