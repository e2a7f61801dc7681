import { createApp } from './app';
import { config } from './config';
import { database } from './database/connection';
import { createRepositories } from './database/repositories';
import { createServices } from './services';
import { logger } from './utils/logger';

const SHUTDOWN_TIMEOUT_MS = 30000;

async function startServer(): Promise<void> {
  logger.info('Testing database connection...');
  await database.connect();
  await database.testConnection();
  logger.info('Database connection successful');

  const app = createApp(createServices(createRepositories(), database));

  const server = app.listen(config.port, () => {
    logger.info('Workforce HR API server started', {
      port: config.port,
      environment: config.nodeEnv
    });
  });

  const gracefulShutdown = (signal: string) => {
    logger.info(`Received ${signal}, starting graceful shutdown...`);

    server.close(() => {
      logger.info('HTTP server closed');
      database.disconnect().then(
        () => {
          logger.info('Database connections closed');
          process.exit(0);
        },
        (error: unknown) => {
          logger.error('Error during database shutdown', { error });
          process.exit(1);
        }
      );
    });

    setTimeout(() => {
      logger.error('Forced shutdown after timeout');
      process.exit(1);
    }, SHUTDOWN_TIMEOUT_MS).unref();
  };

  process.on('SIGTERM', () => gracefulShutdown('SIGTERM'));
  process.on('SIGINT', () => gracefulShutdown('SIGINT'));

  process.on('uncaughtException', (error) => {
    logger.error('Uncaught Exception', { error: error.message, stack: error.stack });
    process.exit(1);
  });

  process.on('unhandledRejection', (reason) => {
    logger.error('Unhandled Rejection', { reason });
    process.exit(1);
  });
}

startServer().catch((error: unknown) => {
  logger.error('Failed to start server', { error });
  process.exit(1);
});
