import { closePools, getPool } from '@board/shared';
import { initOtel, logger } from '@board/observability';
import { buildApp } from './app';
import { loadConfig } from './config';
import { PgSessionStore } from './session';
import { PgBoardStore } from './store';

const config = loadConfig();
const pool = getPool('board');

initOtel();

const app = buildApp({
  store: new PgBoardStore(pool),
  sessions: new PgSessionStore(pool, config.sessionTtlSeconds),
  sessionSecret: config.sessionSecret,
  sessionTtlSeconds: config.sessionTtlSeconds,
  bodyLimit: config.bodyLimit,
  logger: { level: config.logLevel },
});

const shutdown = async (signal: string) => {
  logger.info('board shutting down', { signal });
  await app.close();
  await closePools();
  process.exit(0);
};

const start = async () => {
  await app.ready();
  await app.listen({ port: config.port, host: config.host });
  app.log.info(`board running on ${config.port}`);
};

for (const signal of ['SIGINT', 'SIGTERM'] as const) {
  process.once(signal, () => {
    shutdown(signal).catch((err: unknown) => {
      logger.error('board shutdown failed', { err });
      process.exit(1);
    });
  });
}

start().catch((err: unknown) => {
  logger.error('failed to start board', { err });
  process.exit(1);
});
