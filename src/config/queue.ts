import { ConnectionOptions, Queue } from 'bullmq';
import { logger } from '../utils/logger';

export const QUEUE_NAMES = {
  CONVERSATION_CLEANUP: 'conversation-cleanup',
} as const;

export const CLEANUP_JOB_NAME = 'cleanup-expired-conversations';

const DEFAULT_REDIS_PORT = 6379;

/**
 * BullMQ takes ioredis options rather than a URL. Workers block on Redis, so
 * ioredis must not cap retries per request.
 */
export function parseRedisConnection(redisUrl: string): ConnectionOptions {
  const url = new URL(redisUrl);
  return {
    host: url.hostname,
    port: url.port ? parseInt(url.port, 10) : DEFAULT_REDIS_PORT,
    password: url.password ? decodeURIComponent(url.password) : undefined,
    maxRetriesPerRequest: null,
    ...(url.protocol === 'rediss:' ? { tls: {} } : {}),
  };
}

export function createCleanupQueue(connection: ConnectionOptions): Queue {
  const queue = new Queue(QUEUE_NAMES.CONVERSATION_CLEANUP, {
    connection,
    defaultJobOptions: {
      attempts: 2,
      backoff: { type: 'exponential', delay: 5000 },
      removeOnComplete: 100,
      removeOnFail: 500,
    },
  });

  queue.on('error', (err: Error) => {
    logger.error('Queue error', { queue: QUEUE_NAMES.CONVERSATION_CLEANUP, error: err.message });
  });

  return queue;
}
