import * as Sentry from '@sentry/node';
import { env, loadConfig } from './config/env';
import { createApp } from './app';
import { parseApiKeys } from './middleware/auth';
import { createLedger } from './services/ledger';
import { logger } from './utils/logger';
import { toError } from './utils/errors';

// Initialize Sentry
if (env.SENTRY_DSN) {
  Sentry.init({
    dsn: env.SENTRY_DSN,
    environment: env.NODE_ENV,
    tracesSampleRate: env.NODE_ENV === 'production' ? 0.1 : 1.0,
  });
}

// Start
async function start() {
  try {
    const ledger = await createLedger(loadConfig());
    const app = createApp(ledger, {
      apiKeys: parseApiKeys(env.API_KEYS),
      sentryEnabled: Boolean(env.SENTRY_DSN),
    });

    const server = app.listen(env.PORT, () => {
      logger.info(`Server running on port ${env.PORT}`, { env: env.NODE_ENV });
    });

    const shutdown = (signal: string) => {
      logger.info('Shutting down', { signal });
      server.close(() => {
        ledger.close().then(
          () => process.exit(0),
          (error: unknown) => {
            logger.error('Shutdown failed', { error: toError(error).message });
            process.exit(1);
          }
        );
      });
    };
    process.on('SIGTERM', () => shutdown('SIGTERM'));
    process.on('SIGINT', () => shutdown('SIGINT'));
  } catch (error) {
    logger.error('Failed to start server', { error: toError(error).message });
    process.exit(1);
  }
}

void start();
