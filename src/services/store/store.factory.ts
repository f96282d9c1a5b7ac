import { probeRedis } from '../../config/redis';
import { logger } from '../../utils/logger';
import { ConversationStore } from './conversation.store';
import { InMemoryConversationStore } from './memory.store';
import { RedisConversationStore } from './redis.store';

export interface StoreFactoryConfig {
  redisUrl?: string;
  connectTimeoutMs: number;
  conversationTimeoutMs: number;
}

export class ConversationStoreFactory {
  /**
   * Picks the backend once, at startup. An unreachable Redis means in-memory
   * storage for the rest of the process; callers only see it via `storageType`.
   */
  static async create(config: StoreFactoryConfig, probe = probeRedis): Promise<ConversationStore> {
    if (!config.redisUrl) {
      logger.info('REDIS_URL not set, using in-memory conversation storage');
      return new InMemoryConversationStore();
    }

    const result = await probe(config.redisUrl, config.connectTimeoutMs);
    if (!result.available) {
      logger.warn('Redis unavailable, falling back to in-memory storage', { reason: result.reason });
      return new InMemoryConversationStore();
    }

    logger.info('Redis connection established for conversation storage');
    return new RedisConversationStore(result.client, config.conversationTimeoutMs);
  }
}
