import { Router, Request, Response } from 'express';
import twilio from 'twilio';
import { z } from 'zod';
import { ConversationManager } from '../services/conversation.service';
import { ResponseService } from '../services/response.service';
import { validateTwilioWebhook } from '../middleware/twilio.validator';
import { ValidationError, errorMessage } from '../utils/errors';
import { logger } from '../utils/logger';

export const FALLBACK_REPLY =
  "Thanks for your message! We're having trouble on our end, and a team member will follow up shortly.";

const inboundSmsSchema = z.object({
  From: z.string().trim().min(1),
  Body: z.string().optional().default(''),
  MessageSid: z.string().min(1).optional(),
});

function sendTwiml(res: Response, twiml: InstanceType<typeof twilio.twiml.MessagingResponse>) {
  res.type('text/xml').send(twiml.toString());
}

export function createWebhookRouter(manager: ConversationManager, responder: ResponseService): Router {
  const router = Router();

  // Twilio sends form-encoded POST and expects TwiML back
  router.post('/sms', validateTwilioWebhook, async (req: Request, res: Response) => {
    const parsed = inboundSmsSchema.safeParse(req.body);
    if (!parsed.success) {
      return res.status(400).json({ error: 'Missing From' });
    }

    const { From: from, Body: body, MessageSid: messageSid } = parsed.data;
    const twiml = new twilio.twiml.MessagingResponse();

    try {
      const inbound = await manager.recordMessage(from, body, 'inbound', {
        messageId: messageSid,
        metadata: { channel: 'sms', provider: 'twilio' },
      });

      if (inbound.duplicate) {
        logger.info('Redelivered SMS ignored', { messageSid });
        return sendTwiml(res, twiml);
      }

      const summary = await manager.getContext(from);
      const reply = responder.compose({ summary, messageType: inbound.message.message_type });

      await manager.addMessage(from, reply.text, 'outbound', {
        metadata: { channel: 'sms', provider: 'twilio', template: reply.template },
      });

      logger.info('SMS handled', {
        conversationId: inbound.thread.conversation_id,
        messageType: inbound.message.message_type,
        template: reply.template,
      });

      twiml.message(reply.text);
      sendTwiml(res, twiml);
    } catch (error) {
      if (error instanceof ValidationError) {
        return res.status(400).json({ error: error.message });
      }

      logger.error('SMS processing incomplete', { from, error: errorMessage(error) });
      // Always answer Twilio with 200 so the customer still gets a reply
      twiml.message(FALLBACK_REPLY);
      sendTwiml(res, twiml);
    }
  });

  return router;
}
