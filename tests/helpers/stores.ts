import { KeyValueClient } from '../../src/config/redis';
import { ConversationStore } from '../../src/services/store/conversation.store';
import { InMemoryConversationStore } from '../../src/services/store/memory.store';

/** In-process stand-in for the Redis commands the store uses. */
export class FakeKeyValueClient implements KeyValueClient {
  data = new Map<string, string>();
  ttls = new Map<string, number>();

  async get(key: string): Promise<string | null> {
    return this.data.get(key) ?? null;
  }

  async set(key: string, value: string, ttlSeconds: number): Promise<void> {
    this.data.set(key, value);
    this.ttls.set(key, ttlSeconds);
  }

  async del(key: string): Promise<number> {
    this.ttls.delete(key);
    return this.data.delete(key) ? 1 : 0;
  }

  async *scanKeys(match: string): AsyncIterable<string> {
    const prefix = match.replace(/\*$/, '');
    for (const key of Array.from(this.data.keys())) {
      if (key.startsWith(prefix)) yield key;
    }
  }

  async ping(): Promise<string> {
    return 'PONG';
  }

  async quit(): Promise<void> {
    this.data.clear();
  }
}

/** Memory-backed store that reports itself as Redis, for code that branches on the backend. */
export function redisLabelledStore(inner = new InMemoryConversationStore()): ConversationStore {
  return {
    storageType: 'redis',
    load: (phone) => inner.load(phone),
    save: (thread) => inner.save(thread),
    delete: (phone) => inner.delete(phone),
    listActive: () => inner.listActive(),
    healthCheck: () => inner.healthCheck(),
    close: () => inner.close(),
  };
}
