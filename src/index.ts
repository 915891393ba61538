import { config } from './config/env.js';
import { POST_VARIANTS } from './config/constants.js';
import { buildServer } from './server.js';
import { logger } from './lib/logger.js';
import { GeminiClient } from './services/gemini/client.js';

async function main() {
  const variant = POST_VARIANTS[config.POST_VARIANT];
  const generator = new GeminiClient({
    apiKey: config.GEMINI_API_KEY,
    model: config.GEMINI_MODEL,
    variant,
    retry: {
      maxAttempts: config.RETRY_MAX_ATTEMPTS,
      minDelay: config.RETRY_MIN_DELAY_MS,
      maxDelay: config.RETRY_MAX_DELAY_MS,
    },
  });

  if (!generator.hasCredential) {
    logger.warn('GEMINI_API_KEY is not set; every generation request will fail');
  }

  const app = await buildServer({ generator, variant });

  // Graceful shutdown
  const shutdown = async (signal: string) => {
    logger.info({ signal }, 'Received shutdown signal');
    await app.close();
    logger.info('Server shut down gracefully');
    process.exit(0);
  };

  const onSignal = (signal: string) => {
    shutdown(signal).catch((err) => {
      logger.fatal({ err }, 'Shutdown failed');
      process.exit(1);
    });
  };

  process.on('SIGTERM', () => onSignal('SIGTERM'));
  process.on('SIGINT', () => onSignal('SIGINT'));

  process.on('unhandledRejection', (reason) => {
    logger.fatal({ err: reason }, 'Unhandled rejection');
  });

  await app.listen({ port: config.PORT, host: config.HOST });
  logger.info({ variant: variant.name, model: generator.model }, `Server running on port ${config.PORT}`);
}

main().catch((err) => {
  logger.fatal({ err }, 'Failed to start server');
  process.exit(1);
});
