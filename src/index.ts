import { buildApp } from './app';
import { env } from './config/env';
import { logger } from './observability/logger';

async function main(): Promise<void> {
  const { app, redis } = await buildApp();

  // Graceful shutdown
  const shutdown = async (signal: string) => {
    logger.info({ signal }, 'Shutting down...');
    await app.close();
    if (redis) {
      redis.disconnect();
    }
    process.exit(0);
  };

  process.on('SIGTERM', () => {
    shutdown('SIGTERM').catch((err: unknown) => logger.error({ err }, 'Shutdown failed'));
  });
  process.on('SIGINT', () => {
    shutdown('SIGINT').catch((err: unknown) => logger.error({ err }, 'Shutdown failed'));
  });

  try {
    await app.listen({ port: env.port, host: '0.0.0.0' });
    logger.info({ port: env.port, env: env.nodeEnv, generation: env.generation.provider }, 'Threadline assistant started');
  } catch (err) {
    logger.fatal({ err }, 'Failed to start server');
    process.exit(1);
  }
}

main().catch((err: unknown) => {
  logger.fatal({ err }, 'Startup failed');
  process.exit(1);
});
