import { describe, it, expect, vi, beforeEach } from 'vitest';
import { createDashboard, httpStatusFor, type DashboardDeps } from './dashboard.js';
import { createMockLogger } from './test-fakes.js';
import {
  IllegalTransitionError,
  InvariantViolationError,
  QueueUnavailableError,
} from '@factreel/shared';
import type { Server } from 'http';

type Handler = (req: unknown, res: unknown) => Promise<void> | void;

// We don't want to start actual servers in tests, so mock express
const routes = vi.hoisted(() => ({
  get: new Map<string, (req: unknown, res: unknown) => Promise<void> | void>(),
  post: new Map<string, (req: unknown, res: unknown) => Promise<void> | void>(),
}));

vi.mock('express', () => {
  const app = {
    use: vi.fn(),
    get: vi.fn((path: string, handler: Handler) => {
      routes.get.set(path, handler);
    }),
    post: vi.fn((path: string, handler: Handler) => {
      routes.post.set(path, handler);
    }),
    listen: vi.fn((_port: number, cb: () => void) => {
      cb();
      return { close: vi.fn() } as unknown as Server;
    }),
  };

  const express = vi.fn(() => app);
  (express as unknown as Record<string, unknown>).json = vi.fn(() => vi.fn());
  return { default: express };
});

function mockResponse() {
  const res = { statusCode: 200, body: undefined as unknown, status: vi.fn(), json: vi.fn() };
  res.status.mockImplementation((code: number) => {
    res.statusCode = code;
    return res;
  });
  res.json.mockImplementation((body: unknown) => {
    res.body = body;
    return res;
  });
  return res;
}

async function call(method: 'get' | 'post', path: string, req: Record<string, unknown> = {}) {
  const handler = routes[method].get(path);
  if (!handler) throw new Error(`No ${method.toUpperCase()} ${path} route`);
  const res = mockResponse();
  await handler({ params: {}, query: {}, body: {}, ...req }, res);
  return res;
}

const HEALTH = {
  'topic-miner': { waiting: 0, active: 1, completed: 4, failed: 0, delayed: 0 },
};

function createDeps() {
  const deps = {
    queue: { getHealth: vi.fn().mockResolvedValue(HEALTH) },
    store: {
      fetchChannelId: vi.fn().mockResolvedValue('channel-1'),
      listTopics: vi.fn().mockResolvedValue([{ id: 'topic-1', title: 'Why leaves change color' }]),
      setTopicStatus: vi.fn().mockResolvedValue(undefined),
      listRecentRuns: vi.fn().mockResolvedValue([{ id: 'run-1', status: 'success' }]),
    },
    logger: createMockLogger(),
  };
  return { deps, typed: deps as unknown as DashboardDeps };
}

describe('createDashboard', () => {
  let ctx: ReturnType<typeof createDeps>;

  beforeEach(() => {
    vi.clearAllMocks();
    routes.get.clear();
    routes.post.clear();
    ctx = createDeps();
    createDashboard(ctx.typed, 3001);
  });

  it('listens on the given port', () => {
    expect(ctx.deps.logger.info).toHaveBeenCalledWith({ port: 3001 }, 'Dashboard API running');
  });

  it('registers all API endpoints', () => {
    expect([...routes.get.keys()]).toEqual(['/health', '/api/queue/stats', '/api/runs', '/api/topics']);
    expect([...routes.post.keys()]).toEqual(['/api/topics/:id/approve', '/api/topics/:id/reject']);
  });

  it('reports queue health', async () => {
    const res = await call('get', '/health');
    expect(res.body).toMatchObject({ status: 'ok', queue: HEALTH });
  });

  it('answers 503 from /health when the broker is down', async () => {
    ctx.deps.queue.getHealth.mockRejectedValue(new Error('connect ECONNREFUSED'));

    const res = await call('get', '/health');

    expect(res.status).toHaveBeenCalledWith(503);
    expect(res.body).toEqual({ status: 'error', error: 'connect ECONNREFUSED' });
  });

  it('lists recent runs with the requested limit', async () => {
    const res = await call('get', '/api/runs', { query: { limit: '5' } });

    expect(ctx.deps.store.listRecentRuns).toHaveBeenCalledWith(5);
    expect(res.body).toEqual({ runs: [{ id: 'run-1', status: 'success' }], total: 1 });
  });

  it('lists pending topics of the default channel', async () => {
    const res = await call('get', '/api/topics');

    expect(ctx.deps.store.listTopics).toHaveBeenCalledWith('channel-1', 'pending', 50);
    expect(res.body).toEqual({
      channelId: 'channel-1',
      status: 'pending',
      topics: [{ id: 'topic-1', title: 'Why leaves change color' }],
      total: 1,
    });
  });

  it('rejects an unknown topic status filter', async () => {
    const res = await call('get', '/api/topics', { query: { status: 'archived' } });

    expect(res.status).toHaveBeenCalledWith(400);
    expect(ctx.deps.store.listTopics).not.toHaveBeenCalled();
  });

  it('approves a topic', async () => {
    const res = await call('post', '/api/topics/:id/approve', { params: { id: 'topic-1' } });

    expect(ctx.deps.store.setTopicStatus).toHaveBeenCalledWith('topic-1', 'approved');
    expect(res.body).toEqual({ status: 'approved', topicId: 'topic-1' });
  });

  it('answers 409 for an illegal transition', async () => {
    ctx.deps.store.setTopicStatus.mockRejectedValue(
      new IllegalTransitionError('topic', 'topic-1', 'rejected', 'approved'),
    );

    const res = await call('post', '/api/topics/:id/approve', { params: { id: 'topic-1' } });

    expect(res.status).toHaveBeenCalledWith(409);
    expect(res.body).toEqual({ error: 'Illegal topic transition rejected -> approved for topic-1' });
  });

  it('rejects a topic with the given reason', async () => {
    const res = await call('post', '/api/topics/:id/reject', {
      params: { id: 'topic-2' },
      body: { reason: 'covered last week' },
    });

    expect(ctx.deps.store.setTopicStatus).toHaveBeenCalledWith('topic-2', 'rejected', 'covered last week');
    expect(res.body).toEqual({ status: 'rejected', topicId: 'topic-2', reason: 'covered last week' });
  });

  it('falls back to a default rejection reason', async () => {
    const res = await call('post', '/api/topics/:id/reject', { params: { id: 'topic-2' } });
    expect(res.body).toEqual({ status: 'rejected', topicId: 'topic-2', reason: 'No reason provided' });
  });
});

describe('httpStatusFor', () => {
  it('maps pipeline error codes to HTTP statuses', () => {
    expect(httpStatusFor(new InvariantViolationError('Topic t-1 not found', {}, 'NOT_FOUND'))).toBe(404);
    expect(httpStatusFor(new IllegalTransitionError('topic', 't-1', 'rejected', 'approved'))).toBe(409);
    expect(httpStatusFor(new QueueUnavailableError('down'))).toBe(503);
    expect(httpStatusFor(new Error('boom'))).toBe(500);
  });
});
