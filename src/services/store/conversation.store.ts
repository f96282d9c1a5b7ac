import { ConversationThread, StorageType } from '../../types/conversation';

export interface StoreHealth {
  status: 'healthy' | 'unhealthy';
  error?: string;
}

export const CONVERSATION_KEY_PREFIX = 'conversation:';

export function conversationKey(phoneNumber: string): string {
  return `${CONVERSATION_KEY_PREFIX}${phoneNumber}`;
}

/**
 * Keyed document store for conversation threads, one document per phone number.
 *
 * `save` always overwrites the whole document; there are no partial updates and
 * no locking here. Callers serialize read-modify-write per phone number.
 */
export interface ConversationStore {
  readonly storageType: StorageType;

  /** Resolves `null` when there is no document (or it cannot be decoded). */
  load(phoneNumber: string): Promise<ConversationThread | null>;

  save(thread: ConversationThread): Promise<void>;

  /** Resolves `false` when nothing was stored under the key. */
  delete(phoneNumber: string): Promise<boolean>;

  listActive(): Promise<ConversationThread[]>;

  healthCheck(): Promise<StoreHealth>;

  close(): Promise<void>;
}
