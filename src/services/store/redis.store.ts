import { ConversationThread } from '../../types/conversation';
import { KeyValueClient, checkRedisHealth } from '../../config/redis';
import { StoreError, toError } from '../../utils/errors';
import { logger } from '../../utils/logger';
import { ConversationStore, StoreHealth, conversationKey, CONVERSATION_KEY_PREFIX } from './conversation.store';
import { decodeThread, encodeThread } from './thread.codec';

// Keys outlive the expiry window so the cleanup sweep, not Redis, retires stale threads.
const TTL_GRACE_SECONDS = 60 * 60;

export class RedisConversationStore implements ConversationStore {
  readonly storageType = 'redis' as const;
  private ttlSeconds: number;

  constructor(private client: KeyValueClient, conversationTimeoutMs: number) {
    this.ttlSeconds = Math.ceil(conversationTimeoutMs / 1000) + TTL_GRACE_SECONDS;
  }

  async load(phoneNumber: string): Promise<ConversationThread | null> {
    const key = conversationKey(phoneNumber);
    let raw: string | null;
    try {
      raw = await this.client.get(key);
    } catch (error) {
      logger.error('Conversation load failed', { phoneNumber, error: toError(error).message });
      throw new StoreError('load', phoneNumber, toError(error));
    }
    return raw === null ? null : decodeThread(raw);
  }

  async save(thread: ConversationThread): Promise<void> {
    try {
      await this.client.set(conversationKey(thread.phone_number), encodeThread(thread), this.ttlSeconds);
    } catch (error) {
      logger.error('Conversation save failed', {
        phoneNumber: thread.phone_number,
        conversationId: thread.conversation_id,
        error: toError(error).message,
      });
      throw new StoreError('save', thread.phone_number, toError(error));
    }
  }

  async delete(phoneNumber: string): Promise<boolean> {
    try {
      const removed = await this.client.del(conversationKey(phoneNumber));
      return removed > 0;
    } catch (error) {
      logger.error('Conversation delete failed', { phoneNumber, error: toError(error).message });
      throw new StoreError('delete', phoneNumber, toError(error));
    }
  }

  async listActive(): Promise<ConversationThread[]> {
    const threads: ConversationThread[] = [];
    try {
      for await (const key of this.client.scanKeys(`${CONVERSATION_KEY_PREFIX}*`)) {
        const raw = await this.client.get(key);
        // Key may have been deleted between SCAN and GET.
        if (raw === null) continue;
        const thread = decodeThread(raw);
        if (thread) threads.push(thread);
      }
    } catch (error) {
      logger.error('Conversation scan failed', { error: toError(error).message });
      throw new StoreError('listActive', null, toError(error));
    }
    return threads;
  }

  healthCheck(): Promise<StoreHealth> {
    return checkRedisHealth(this.client);
  }

  async close(): Promise<void> {
    await this.client.quit();
  }
}
