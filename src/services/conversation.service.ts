import { v4 as uuidv4 } from 'uuid';
import { DateTime } from 'luxon';
import {
  AddMessageOptions,
  ContextSummary,
  ConversationMessage,
  ConversationState,
  ConversationStats,
  ConversationThread,
  CustomerInfo,
  MessageDirection,
  MessageType,
  RecentMessage,
  StorageType,
} from '../types/conversation';
import { ConversationStore, StoreHealth } from './store/conversation.store';
import { MessageClassifierService } from './classifier.service';
import { ContextExtractionService } from './context.service';
import { KeyedLock } from '../utils/keyedLock';
import { normalizePhoneNumber } from '../utils/phone';
import { errorMessage } from '../utils/errors';
import { logger } from '../utils/logger';

const HOUR_MS = 60 * 60 * 1000;
const SUMMARY_MESSAGE_COUNT = 3;
const SUMMARY_SNIPPET_LENGTH = 100;

export interface ConversationConfig {
  timeoutMs: number;
  /** When true a thread idle for exactly `timeoutMs` counts as expired. */
  expiryInclusive: boolean;
  contextWindow: number;
}

export const DEFAULT_CONVERSATION_CONFIG: ConversationConfig = {
  timeoutMs: 24 * HOUR_MS,
  expiryInclusive: false,
  contextWindow: 10,
};

export function buildConversationConfig(env: {
  CONVERSATION_TIMEOUT_HOURS: number;
  CONVERSATION_EXPIRY_INCLUSIVE: boolean;
  CONTEXT_WINDOW: number;
}): ConversationConfig {
  return {
    timeoutMs: env.CONVERSATION_TIMEOUT_HOURS * HOUR_MS,
    expiryInclusive: env.CONVERSATION_EXPIRY_INCLUSIVE,
    contextWindow: env.CONTEXT_WINDOW,
  };
}

interface TransitionRow {
  on: Partial<Record<MessageType, ConversationState>>;
  otherwise: ConversationState;
}

// Emergencies are handled before this table is consulted.
const TRANSITION_TABLE: Record<ConversationState, TransitionRow> = {
  initial_contact: {
    on: { appointment_request: 'scheduling' },
    otherwise: 'gathering_info',
  },
  gathering_info: {
    on: { appointment_request: 'scheduling' },
    otherwise: 'gathering_info',
  },
  scheduling: {
    on: { appointment_request: 'scheduling', confirmation: 'confirming' },
    otherwise: 'scheduling',
  },
  confirming: {
    on: { appointment_request: 'scheduling', confirmation: 'complete' },
    otherwise: 'confirming',
  },
  complete: {
    on: {},
    otherwise: 'complete',
  },
};

export function nextState(
  state: ConversationState,
  messageType: MessageType,
  emergency: boolean
): ConversationState {
  if (emergency) return 'complete';
  const row = TRANSITION_TABLE[state];
  return row.on[messageType] ?? row.otherwise;
}

export function timeAgo(from: Date, to: Date): string {
  const seconds = Math.max(0, Math.floor((to.getTime() - from.getTime()) / 1000));
  if (seconds >= 86400) return `${Math.floor(seconds / 86400)}d ago`;
  if (seconds >= 3600) return `${Math.floor(seconds / 3600)}h ago`;
  if (seconds >= 60) return `${Math.floor(seconds / 60)}m ago`;
  return 'just now';
}

export interface AppendResult {
  thread: ConversationThread;
  message: ConversationMessage;
  duplicate: boolean;
}

export interface ConversationManagerDeps {
  store: ConversationStore;
  config?: Partial<ConversationConfig>;
  classifier?: MessageClassifierService;
  extractor?: ContextExtractionService;
  clock?: () => Date;
}

/**
 * Tracks one active SMS thread per phone number: appends messages, merges
 * extracted context, drives the conversation state machine and retires
 * threads that have been idle past the expiry window.
 *
 * Every load-mutate-save for a phone number runs under a per-number lock, so
 * concurrent webhook deliveries for the same customer are applied in call order.
 */
export class ConversationManager {
  private store: ConversationStore;
  private config: ConversationConfig;
  private classifier: MessageClassifierService;
  private extractor: ContextExtractionService;
  private clock: () => Date;
  private lock = new KeyedLock();

  constructor(deps: ConversationManagerDeps) {
    this.store = deps.store;
    this.config = { ...DEFAULT_CONVERSATION_CONFIG, ...deps.config };
    this.classifier = deps.classifier ?? new MessageClassifierService();
    this.extractor = deps.extractor ?? new ContextExtractionService(this.classifier);
    this.clock = deps.clock ?? (() => new Date());
  }

  get storageType(): StorageType {
    return this.store.storageType;
  }

  /**
   * Starts a thread for the number, or continues the active one if it has not
   * expired. Either way the message is appended exactly once.
   */
  async startConversation(
    phone: string,
    initialText: string | null,
    customerInfo?: CustomerInfo,
    options?: AddMessageOptions
  ): Promise<ConversationThread> {
    const { thread } = await this.applyMessage(
      normalizePhoneNumber(phone),
      initialText,
      'inbound',
      options,
      customerInfo
    );
    return thread;
  }

  async addMessage(
    phone: string,
    text: string | null,
    direction: MessageDirection,
    options?: AddMessageOptions
  ): Promise<ConversationThread> {
    const { thread } = await this.recordMessage(phone, text, direction, options);
    return thread;
  }

  /**
   * Like `addMessage`, but also reports which message was applied. A message
   * whose `messageId` is already in the active thread is not appended again.
   */
  async recordMessage(
    phone: string,
    text: string | null,
    direction: MessageDirection,
    options?: AddMessageOptions
  ): Promise<AppendResult> {
    return this.applyMessage(normalizePhoneNumber(phone), text, direction, options);
  }

  async getContext(phone: string): Promise<ContextSummary> {
    const phoneNumber = normalizePhoneNumber(phone);
    const now = this.clock();
    const thread = await this.store.load(phoneNumber);

    if (!thread || this.isExpired(thread, now)) {
      return {
        has_conversation: false,
        state: null,
        message_count: 0,
        recent_messages: [],
        conversation_summary: '',
        context: {},
        customer_info: {},
        requires_human: false,
      };
    }

    const recent: RecentMessage[] = thread.messages.slice(-this.config.contextWindow).map((msg) => ({
      content: msg.content,
      direction: msg.direction,
      message_type: msg.message_type,
      timestamp: msg.timestamp,
      time_ago: timeAgo(new Date(msg.timestamp), now),
    }));

    return {
      has_conversation: true,
      conversation_id: thread.conversation_id,
      state: thread.state,
      message_count: thread.messages.length,
      created_at: thread.created_at,
      last_activity: thread.last_activity,
      time_since_last_activity: timeAgo(new Date(thread.last_activity), now),
      recent_messages: recent,
      conversation_summary: this.summarize(thread),
      context: thread.context,
      customer_info: thread.customer_info,
      requires_human: thread.context.requires_human === true,
    };
  }

  /**
   * Removes the thread from active storage. Resolves `false` when there was
   * no thread for the number.
   */
  async closeConversation(phone: string, reason = 'completed'): Promise<boolean> {
    const phoneNumber = normalizePhoneNumber(phone);

    return this.lock.run(phoneNumber, async () => {
      const thread = await this.store.load(phoneNumber);
      // An expired thread is left for the cleanup sweep
      if (!thread || this.isExpired(thread, this.clock())) {
        logger.warn('No active conversation to close', { phoneNumber });
        return false;
      }

      const removed = await this.store.delete(phoneNumber);
      if (removed) {
        logger.info('Conversation closed', {
          conversationId: thread.conversation_id,
          phoneNumber,
          reason,
          finalState: thread.state,
          messageCount: thread.messages.length,
        });
      }
      return removed;
    });
  }

  async cleanupExpiredConversations(): Promise<number> {
    const now = this.clock();
    const threads = await this.store.listActive();
    let removed = 0;

    for (const candidate of threads) {
      if (!this.isExpired(candidate, now)) continue;

      const phoneNumber = candidate.phone_number;
      try {
        const deleted = await this.lock.run(phoneNumber, async () => {
          // Re-read: a message may have arrived since the scan.
          const current = await this.store.load(phoneNumber);
          if (!current || !this.isExpired(current, now)) return false;
          return this.store.delete(phoneNumber);
        });

        if (deleted) {
          removed++;
          logger.info('Expired conversation removed', {
            conversationId: candidate.conversation_id,
            phoneNumber,
            lastActivity: candidate.last_activity,
            finalState: candidate.state,
          });
        }
      } catch (error) {
        logger.error('Failed to remove expired conversation', { phoneNumber, error: errorMessage(error) });
      }
    }

    if (removed > 0) {
      logger.info('Cleaned up expired conversations', { removed });
    }
    return removed;
  }

  async getConversationStats(): Promise<ConversationStats> {
    const threads = await this.store.listActive();

    const states: Record<ConversationState, number> = {
      initial_contact: 0,
      gathering_info: 0,
      scheduling: 0,
      confirming: 0,
      complete: 0,
    };
    let totalMessages = 0;

    for (const thread of threads) {
      states[thread.state] += 1;
      totalMessages += thread.messages.length;
    }

    return {
      active_conversations: threads.length,
      states,
      average_messages: threads.length > 0 ? totalMessages / threads.length : 0,
      storage_type: this.store.storageType,
    };
  }

  isExpired(thread: ConversationThread, now: Date = this.clock()): boolean {
    const idleMs = now.getTime() - new Date(thread.last_activity).getTime();
    return this.config.expiryInclusive ? idleMs >= this.config.timeoutMs : idleMs > this.config.timeoutMs;
  }

  checkHealth(): Promise<StoreHealth> {
    return this.store.healthCheck();
  }

  async shutdown(): Promise<void> {
    await this.store.close();
  }

  private async applyMessage(
    phoneNumber: string,
    text: string | null,
    direction: MessageDirection,
    options?: AddMessageOptions,
    customerInfo?: CustomerInfo
  ): Promise<AppendResult> {
    return this.lock.run(phoneNumber, async () => {
      const now = this.clock();
      const existing = await this.store.load(phoneNumber);

      let thread: ConversationThread;
      if (existing && !this.isExpired(existing, now)) {
        thread = existing;

        const messageId = options?.messageId;
        const duplicate = messageId ? thread.messages.find((m) => m.message_id === messageId) : undefined;
        if (duplicate) {
          logger.info('Duplicate message ignored', { conversationId: thread.conversation_id, messageId });
          return { thread, message: duplicate, duplicate: true };
        }
      } else {
        if (existing) {
          logger.info('Conversation expired, starting new one', {
            phoneNumber,
            expiredConversationId: existing.conversation_id,
            lastActivity: existing.last_activity,
          });
        }
        thread = this.createThread(phoneNumber, now);
      }

      const message = this.appendMessage(thread, text, direction, now, options);
      if (customerInfo) {
        thread.customer_info = { ...thread.customer_info, ...customerInfo };
      }

      await this.store.save(thread);

      logger.info('Message added to conversation', {
        conversationId: thread.conversation_id,
        direction,
        messageType: message.message_type,
        state: thread.state,
        messageCount: thread.messages.length,
      });

      return { thread, message, duplicate: false };
    });
  }

  private createThread(phoneNumber: string, now: Date): ConversationThread {
    const timestamp = now.toISOString();
    const thread: ConversationThread = {
      conversation_id: `conv_${uuidv4()}`,
      phone_number: phoneNumber,
      state: 'initial_contact',
      created_at: timestamp,
      last_activity: timestamp,
      messages: [],
      context: { message_type_counts: {} },
      customer_info: {},
      state_history: [],
    };

    logger.info('Started new conversation', { conversationId: thread.conversation_id, phoneNumber });
    return thread;
  }

  private appendMessage(
    thread: ConversationThread,
    text: string | null,
    direction: MessageDirection,
    now: Date,
    options?: AddMessageOptions
  ): ConversationMessage {
    const content = text ?? '';
    const messageType = this.classifier.classify(content);

    const message: ConversationMessage = {
      message_id: options?.messageId ?? `msg_${uuidv4()}`,
      phone_number: thread.phone_number,
      content,
      direction,
      timestamp: now.toISOString(),
      message_type: messageType,
      metadata: { ...options?.metadata },
    };

    thread.messages.push(message);
    if (now.getTime() > new Date(thread.last_activity).getTime()) {
      thread.last_activity = message.timestamp;
    }

    // Only the customer's words feed the extracted facts; replies never overwrite them.
    const extracted = direction === 'inbound' ? this.extractor.extract(content) : {};
    const counts = thread.context.message_type_counts;
    thread.context = {
      ...thread.context,
      ...extracted,
      message_type_counts: { ...counts, [messageType]: (counts[messageType] ?? 0) + 1 },
    };

    this.transition(thread, message, now);
    return message;
  }

  private transition(thread: ConversationThread, message: ConversationMessage, now: Date): void {
    const emergency = message.message_type === 'emergency';
    if (emergency) {
      thread.context.requires_human = true;
    }

    const from = thread.state;
    const to = nextState(from, message.message_type, emergency);
    if (to === from) return;

    thread.state = to;
    thread.state_history.push({
      from,
      to,
      timestamp: now.toISOString(),
      trigger_message_id: message.message_id,
    });

    logger.info('State transition', {
      conversationId: thread.conversation_id,
      from,
      to,
      trigger: message.message_type,
    });
  }

  private summarize(thread: ConversationThread): string {
    const lines: string[] = [
      `Conversation started: ${DateTime.fromISO(thread.created_at, { zone: 'utc' }).toFormat("yyyy-MM-dd HH:mm 'UTC'")}`,
      `Messages exchanged: ${thread.messages.length}`,
      `Current state: ${thread.state}`,
    ];

    const { intent, service_type, urgency } = thread.context;
    if (intent) lines.push(`Intent: ${intent}`);
    if (service_type) lines.push(`Service type: ${service_type}`);
    if (urgency) lines.push(`Urgency: ${urgency}`);

    lines.push('Recent messages:');
    for (const msg of thread.messages.slice(-SUMMARY_MESSAGE_COUNT)) {
      const speaker = msg.direction === 'inbound' ? 'Customer' : 'Karen';
      const snippet =
        msg.content.length > SUMMARY_SNIPPET_LENGTH
          ? `${msg.content.slice(0, SUMMARY_SNIPPET_LENGTH)}...`
          : msg.content;
      lines.push(`  ${speaker}: "${snippet}"`);
    }

    return lines.join('\n');
  }
}
