import * as Sentry from '@sentry/node';
import { env } from './config/env';
import { logger } from './utils/logger';
import { errorMessage } from './utils/errors';
import { createApp } from './app';
import { ConversationStoreFactory } from './services/store/store.factory';
import { ConversationManager, buildConversationConfig } from './services/conversation.service';
import { ResponseService } from './services/response.service';
import { startCleanupSchedule } from './workers/cleanup.worker';

// Initialize Sentry
if (env.SENTRY_DSN) {
  Sentry.init({
    dsn: env.SENTRY_DSN,
    environment: env.NODE_ENV,
    tracesSampleRate: env.NODE_ENV === 'production' ? 0.1 : 1.0,
  });
}

async function start() {
  const config = buildConversationConfig(env);

  const store = await ConversationStoreFactory.create({
    redisUrl: env.REDIS_URL,
    connectTimeoutMs: env.REDIS_CONNECT_TIMEOUT_MS,
    conversationTimeoutMs: config.timeoutMs,
  });

  const manager = new ConversationManager({ store, config });
  const responder = new ResponseService({ timezone: env.BUSINESS_TIMEZONE });

  const cleanup = await startCleanupSchedule(manager, {
    intervalMinutes: env.CLEANUP_INTERVAL_MINUTES,
    redisUrl: env.REDIS_URL,
  });

  const app = createApp({ manager, responder });
  const server = app.listen(parseInt(env.PORT, 10), () => {
    logger.info(`Server running on port ${env.PORT}`, {
      env: env.NODE_ENV,
      storage: manager.storageType,
      cleanup: cleanup.mode,
    });
  });

  const shutdown = (signal: string) => {
    logger.info('Shutting down', { signal });
    server.close();
    cleanup
      .stop()
      .then(() => manager.shutdown())
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        logger.error('Shutdown failed', { error: errorMessage(error) });
        process.exit(1);
      });
  };

  process.once('SIGTERM', () => shutdown('SIGTERM'));
  process.once('SIGINT', () => shutdown('SIGINT'));
}

start().catch((error: unknown) => {
  logger.error('Failed to start server', { error: errorMessage(error) });
  process.exit(1);
});
