import express, { Express } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import rateLimit from 'express-rate-limit';
import * as Sentry from '@sentry/node';
import { env } from './config/env';
import { EligibilityChatbot } from './services/chatbot.service';
import { apiKeyAuth } from './middleware/auth';
import { errorHandler } from './middleware/errorHandler';
import { createChatRouter } from './routes/chat.routes';
import healthRoutes from './routes/health.routes';

export function createApp(chatbot: EligibilityChatbot): Express {
  const app = express();

  app.use(helmet());
  app.use(cors());
  app.use(express.json());

  const limiter = rateLimit({
    windowMs: 60 * 1000, // 1 minute
    max: 100,
    standardHeaders: true,
    legacyHeaders: false,
  });
  app.use('/api', limiter);

  // Auth (skips health)
  app.use(apiKeyAuth);

  app.use('/', healthRoutes);
  app.use('/api/chat', createChatRouter(chatbot));

  if (env.SENTRY_DSN) {
    Sentry.setupExpressErrorHandler(app);
  }
  app.use(errorHandler);

  return app;
}
