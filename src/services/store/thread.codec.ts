import { z } from 'zod';
import {
  CONVERSATION_STATES,
  ConversationThread,
  MESSAGE_DIRECTIONS,
  MESSAGE_TYPES,
} from '../../types/conversation';
import { logger } from '../../utils/logger';
import { errorMessage } from '../../utils/errors';

const messageTypeSchema = z.enum(MESSAGE_TYPES);
const stateSchema = z.enum(CONVERSATION_STATES);

const messageSchema = z.object({
  message_id: z.string().min(1),
  phone_number: z.string().min(1),
  content: z.string(),
  direction: z.enum(MESSAGE_DIRECTIONS),
  timestamp: z.string(),
  message_type: messageTypeSchema,
  metadata: z.record(z.unknown()),
});

const contextSchema = z.object({
  service_type: z
    .enum(['plumbing', 'electrical', 'hvac', 'carpentry', 'painting', 'appliance', 'handyman', 'repair'])
    .optional(),
  preferred_time: z.enum(['morning', 'afternoon', 'evening']).optional(),
  preferred_day: z.string().optional(),
  urgency: z.enum(['high', 'medium']).optional(),
  is_emergency: z.boolean().optional(),
  intent: z.enum(['schedule_appointment', 'get_quote', 'emergency_service', 'get_information']).optional(),
  requires_human: z.boolean().optional(),
  message_type_counts: z.record(messageTypeSchema, z.number().int().nonnegative()),
});

const threadSchema = z.object({
  conversation_id: z.string().min(1),
  phone_number: z.string().min(1),
  state: stateSchema,
  created_at: z.string(),
  last_activity: z.string(),
  messages: z.array(messageSchema),
  context: contextSchema,
  customer_info: z.object({ name: z.string().optional() }).catchall(z.unknown()),
  state_history: z.array(
    z.object({
      from: stateSchema,
      to: stateSchema,
      timestamp: z.string(),
      trigger_message_id: z.string(),
    })
  ),
});

export function encodeThread(thread: ConversationThread): string {
  return JSON.stringify(thread);
}

/** Returns `null` for anything that is not a well-formed thread document. */
export function decodeThread(raw: string): ConversationThread | null {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error) {
    logger.warn('Conversation document is not valid JSON', {
      error: errorMessage(error),
    });
    return null;
  }

  const parsed = threadSchema.safeParse(json);
  if (!parsed.success) {
    logger.warn('Conversation document failed validation', {
      issues: parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`),
    });
    return null;
  }

  return parsed.data;
}
