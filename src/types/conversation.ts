export const MESSAGE_TYPES = [
  'greeting',
  'appointment_request',
  'quote_request',
  'confirmation',
  'emergency',
  'question',
  'other',
] as const;

export type MessageType = (typeof MESSAGE_TYPES)[number];

export const CONVERSATION_STATES = [
  'initial_contact',
  'gathering_info',
  'scheduling',
  'confirming',
  'complete',
] as const;

export type ConversationState = (typeof CONVERSATION_STATES)[number];

export const MESSAGE_DIRECTIONS = ['inbound', 'outbound'] as const;

export type MessageDirection = (typeof MESSAGE_DIRECTIONS)[number];

export type ServiceType =
  | 'plumbing'
  | 'electrical'
  | 'hvac'
  | 'carpentry'
  | 'painting'
  | 'appliance'
  | 'handyman'
  | 'repair';

export type PreferredTime = 'morning' | 'afternoon' | 'evening';

export type Urgency = 'high' | 'medium';

export type Intent = 'schedule_appointment' | 'get_quote' | 'emergency_service' | 'get_information';

export interface ExtractedContext {
  service_type?: ServiceType;
  preferred_time?: PreferredTime;
  preferred_day?: string;
  urgency?: Urgency;
  is_emergency?: boolean;
  intent?: Intent;
}

export interface ConversationContext extends ExtractedContext {
  requires_human?: boolean;
  message_type_counts: Partial<Record<MessageType, number>>;
}

export interface ConversationMessage {
  message_id: string;
  phone_number: string;
  content: string;
  direction: MessageDirection;
  timestamp: string;
  message_type: MessageType;
  metadata: Record<string, unknown>;
}

export interface StateTransition {
  from: ConversationState;
  to: ConversationState;
  timestamp: string;
  trigger_message_id: string;
}

export interface CustomerInfo {
  name?: string;
  [key: string]: unknown;
}

export interface ConversationThread {
  conversation_id: string;
  phone_number: string;
  state: ConversationState;
  created_at: string;
  last_activity: string;
  messages: ConversationMessage[];
  context: ConversationContext;
  customer_info: CustomerInfo;
  state_history: StateTransition[];
}

export interface RecentMessage {
  content: string;
  direction: MessageDirection;
  message_type: MessageType;
  timestamp: string;
  time_ago: string;
}

export interface ContextSummary {
  has_conversation: boolean;
  conversation_id?: string;
  state: ConversationState | null;
  message_count: number;
  created_at?: string;
  last_activity?: string;
  time_since_last_activity?: string;
  recent_messages: RecentMessage[];
  conversation_summary: string;
  context: Partial<ConversationContext>;
  customer_info: CustomerInfo;
  requires_human: boolean;
}

export interface ConversationStats {
  active_conversations: number;
  states: Record<ConversationState, number>;
  average_messages: number;
  storage_type: StorageType;
}

export type StorageType = 'redis' | 'memory';

export interface AddMessageOptions {
  messageId?: string;
  metadata?: Record<string, unknown>;
}
