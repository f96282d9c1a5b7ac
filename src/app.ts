import express, { Express } from 'express';
import helmet from 'helmet';
import rateLimit from 'express-rate-limit';
import * as Sentry from '@sentry/node';
import { env } from './config/env';
import { errorHandler } from './middleware/errorHandler';
import { apiKeyAuth } from './middleware/auth';
import { createWebhookRouter } from './routes/webhook.routes';
import { createConversationRouter } from './routes/conversation.routes';
import { ConversationManager } from './services/conversation.service';
import { ResponseService } from './services/response.service';

export interface AppDependencies {
  manager: ConversationManager;
  responder: ResponseService;
}

export function createApp({ manager, responder }: AppDependencies): Express {
  const app = express();

  // Middleware
  app.use(helmet());

  // Twilio webhooks are form-encoded, API routes use JSON
  app.use('/webhook', express.urlencoded({ extended: false }));
  app.use(express.json());

  // Rate limiting
  const limiter = rateLimit({
    windowMs: 60 * 1000, // 1 minute
    max: 100,
    standardHeaders: true,
    legacyHeaders: false,
  });
  app.use('/api', limiter);

  // Auth (skips webhooks and health)
  app.use(apiKeyAuth);

  // Routes
  app.use('/webhook', createWebhookRouter(manager, responder));
  app.use('/api/conversations', createConversationRouter(manager));

  // Health check (no auth)
  app.get('/health', async (_req, res) => {
    const storage = await manager.checkHealth();
    const healthy = storage.status === 'healthy';
    res.status(healthy ? 200 : 503).json({
      status: healthy ? 'ok' : 'degraded',
      storage: { type: manager.storageType, ...storage },
      timestamp: new Date().toISOString(),
    });
  });

  // Error handler
  if (env.SENTRY_DSN) {
    Sentry.setupExpressErrorHandler(app);
  }
  app.use(errorHandler);

  return app;
}
