import pino from 'pino';

export function createLogger(name: string, level = 'info') {
  return pino({
    name,
    level,
    transport:
      process.env.NODE_ENV !== 'production'
        ? { target: 'pino-pretty', options: { colorize: true } }
        : undefined,
  });
}

export type Logger = pino.Logger;

/** First 8 chars of an id, enough to tell items apart in log lines */
export function shortId(id: string): string {
  return id.slice(0, 8);
}
