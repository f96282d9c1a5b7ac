import { Router, Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import { ConversationManager } from '../services/conversation.service';
import { MESSAGE_DIRECTIONS } from '../types/conversation';
import { ValidationError } from '../utils/errors';
import { logger } from '../utils/logger';

const customerInfoSchema = z.object({ name: z.string().optional() }).catchall(z.unknown());

const startSchema = z.object({
  phone_number: z.string().min(1),
  text: z.string().nullable().default(''),
  customer_info: customerInfoSchema.optional(),
  message_id: z.string().min(1).optional(),
});

const messageSchema = z.object({
  text: z.string().nullable().default(''),
  direction: z.enum(MESSAGE_DIRECTIONS).default('inbound'),
  message_id: z.string().min(1).optional(),
  metadata: z.record(z.unknown()).optional(),
});

const closeSchema = z.object({
  reason: z.string().min(1).optional(),
});

function parseBody<T extends z.ZodTypeAny>(schema: T, body: unknown): z.infer<T> {
  const parsed = schema.safeParse(body ?? {});
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ValidationError(`${issue.path.join('.') || 'body'}: ${issue.message}`);
  }
  return parsed.data;
}

export function createConversationRouter(manager: ConversationManager): Router {
  const router = Router();

  router.get('/stats', async (_req: Request, res: Response, next: NextFunction) => {
    try {
      const stats = await manager.getConversationStats();
      res.json({ success: true, data: stats });
    } catch (error) {
      next(error);
    }
  });

  router.post('/cleanup', async (_req: Request, res: Response, next: NextFunction) => {
    try {
      const removed = await manager.cleanupExpiredConversations();
      res.json({ success: true, data: { removed } });
    } catch (error) {
      next(error);
    }
  });

  router.post('/', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const input = parseBody(startSchema, req.body);
      const thread = await manager.startConversation(input.phone_number, input.text, input.customer_info, {
        messageId: input.message_id,
      });
      res.status(201).json({ success: true, data: thread });
    } catch (error) {
      next(error);
    }
  });

  router.get('/:phone/context', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const summary = await manager.getContext(req.params.phone);
      res.json({ success: true, data: summary });
    } catch (error) {
      next(error);
    }
  });

  router.post('/:phone/messages', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const input = parseBody(messageSchema, req.body);
      const result = await manager.recordMessage(req.params.phone, input.text, input.direction, {
        messageId: input.message_id,
        metadata: input.metadata,
      });
      res.status(result.duplicate ? 200 : 201).json({
        success: true,
        data: { ...result.thread, duplicate: result.duplicate },
      });
    } catch (error) {
      next(error);
    }
  });

  router.delete('/:phone', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const input = parseBody(closeSchema, req.body);
      const closed = await manager.closeConversation(req.params.phone, input.reason);
      if (!closed) {
        return res.status(404).json({ success: false, error: 'No active conversation' });
      }
      logger.info('Conversation closed via API', { reason: input.reason ?? 'completed' });
      res.json({ success: true });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
