import { Worker } from 'bullmq';
import { CLEANUP_JOB_NAME, QUEUE_NAMES, createCleanupQueue, parseRedisConnection } from '../config/queue';
import { ConversationManager } from '../services/conversation.service';
import { errorMessage } from '../utils/errors';
import { logger } from '../utils/logger';

export interface CleanupScheduleOptions {
  intervalMinutes: number;
  redisUrl?: string;
}

export interface CleanupSchedule {
  mode: 'queue' | 'interval';
  stop(): Promise<void>;
}

export async function runCleanup(manager: ConversationManager): Promise<{ removedConversations: number }> {
  try {
    const removed = await manager.cleanupExpiredConversations();
    logger.info('Cleanup completed', { removedConversations: removed });
    return { removedConversations: removed };
  } catch (error) {
    logger.error('Cleanup failed', { error: errorMessage(error) });
    throw error;
  }
}

/**
 * With Redis storage the sweep runs as a repeatable BullMQ job, so only one
 * instance runs it per interval. The in-memory store is process-local and
 * gets a plain timer.
 */
export async function startCleanupSchedule(
  manager: ConversationManager,
  options: CleanupScheduleOptions
): Promise<CleanupSchedule> {
  const intervalMs = options.intervalMinutes * 60 * 1000;

  if (manager.storageType === 'redis' && options.redisUrl) {
    const connection = parseRedisConnection(options.redisUrl);
    const queue = createCleanupQueue(connection);

    const worker = new Worker(QUEUE_NAMES.CONVERSATION_CLEANUP, () => runCleanup(manager), {
      connection,
      concurrency: 1,
    });

    worker.on('failed', (job, err: Error) => {
      logger.error('Cleanup job failed', { jobId: job?.id, error: err.message });
    });

    await queue.add(CLEANUP_JOB_NAME, {}, { repeat: { every: intervalMs }, jobId: CLEANUP_JOB_NAME });
    logger.info('Cleanup job scheduled', { intervalMinutes: options.intervalMinutes });

    return {
      mode: 'queue',
      stop: async () => {
        await worker.close();
        await queue.close();
      },
    };
  }

  const timer = setInterval(() => {
    runCleanup(manager).catch((error: unknown) => {
      logger.warn('Scheduled cleanup did not complete', { error: errorMessage(error) });
    });
  }, intervalMs);
  timer.unref();
  logger.info('Cleanup timer started', { intervalMinutes: options.intervalMinutes });

  return {
    mode: 'interval',
    stop: async () => {
      clearInterval(timer);
    },
  };
}
