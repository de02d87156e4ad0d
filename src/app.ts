import express from 'express';
import cors from 'cors';
import helmet from 'helmet';
import rateLimit from 'express-rate-limit';
import * as Sentry from '@sentry/node';
import { apiKeyAuth } from './middleware/auth';
import { errorHandler } from './middleware/errorHandler';
import { createAdminRouter } from './routes/admin.routes';
import { createSessionRouter } from './routes/session.routes';
import { HoneypotLedger } from './services/ledger';

export interface AppOptions {
  apiKeys: Set<string>;
  sentryEnabled: boolean;
}

export function createApp(ledger: HoneypotLedger, options: AppOptions) {
  const app = express();

  // Middleware
  app.use(helmet());
  app.use(cors());
  app.use(express.json());

  // Rate limiting
  const limiter = rateLimit({
    windowMs: 60 * 1000, // 1 minute
    max: 100,
    standardHeaders: true,
    legacyHeaders: false,
  });
  app.use('/api', limiter);

  // Auth (skips health)
  app.use(apiKeyAuth(options.apiKeys));

  // Routes
  app.use('/', createAdminRouter(ledger));
  app.use('/api/sessions', createSessionRouter(ledger));

  // Error handler
  if (options.sentryEnabled) {
    Sentry.setupExpressErrorHandler(app);
  }
  app.use(errorHandler);

  return app;
}
