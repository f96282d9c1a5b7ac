import { ConversationThread } from '../../types/conversation';
import { ConversationStore, StoreHealth, conversationKey, CONVERSATION_KEY_PREFIX } from './conversation.store';
import { decodeThread, encodeThread } from './thread.codec';

/**
 * Process-local store used when Redis is not configured or unreachable at startup.
 * Documents are kept serialized so a loaded thread never aliases the stored one.
 * Contents are lost on restart.
 */
export class InMemoryConversationStore implements ConversationStore {
  readonly storageType = 'memory' as const;
  private documents = new Map<string, string>();

  async load(phoneNumber: string): Promise<ConversationThread | null> {
    const raw = this.documents.get(conversationKey(phoneNumber));
    return raw === undefined ? null : decodeThread(raw);
  }

  async save(thread: ConversationThread): Promise<void> {
    this.documents.set(conversationKey(thread.phone_number), encodeThread(thread));
  }

  async delete(phoneNumber: string): Promise<boolean> {
    return this.documents.delete(conversationKey(phoneNumber));
  }

  async listActive(): Promise<ConversationThread[]> {
    const threads: ConversationThread[] = [];
    for (const [key, raw] of this.documents) {
      if (!key.startsWith(CONVERSATION_KEY_PREFIX)) continue;
      const thread = decodeThread(raw);
      if (thread) threads.push(thread);
    }
    return threads;
  }

  async healthCheck(): Promise<StoreHealth> {
    return { status: 'healthy' };
  }

  async close(): Promise<void> {
    this.documents.clear();
  }
}
