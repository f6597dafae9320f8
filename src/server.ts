import { createApp, createServices, AppServices } from './app';
import { config } from './config/config';
import { logger } from './utils/logger';

/**
 * Start the server
 */
function startServer(): void {
  let services: AppServices;

  // A bad signing key is fatal: refuse to serve any login at all
  try {
    services = createServices(config);
  } catch (error) {
    logger.error('Failed to start server:', {
      error: error instanceof Error ? error.message : String(error),
    });
    process.exit(1);
  }

  const app = createApp(services, config);

  const server = app.listen(config.port, () => {
    logger.info('Server started successfully', {
      port: config.port,
      environment: config.nodeEnv,
      tokenTtlSeconds: config.auth.tokenTtlSeconds,
    });
  });

  // Graceful shutdown handlers
  const gracefulShutdown = (signal: string) => {
    logger.info(`${signal} received, starting graceful shutdown`);

    // Stop accepting new connections
    server.close((error) => {
      if (error) {
        logger.error('Error during graceful shutdown:', { error: error.message });
        process.exit(1);
      }
      logger.info('HTTP server closed');
      logger.info('Graceful shutdown completed');
      process.exit(0);
    });

    // Force shutdown after 10 seconds
    setTimeout(() => {
      logger.error('Forced shutdown after timeout');
      process.exit(1);
    }, 10000).unref();
  };

  process.on('SIGTERM', () => gracefulShutdown('SIGTERM'));
  process.on('SIGINT', () => gracefulShutdown('SIGINT'));

  process.on('uncaughtException', (error) => {
    logger.error('Uncaught exception:', { message: error.message, stack: error.stack });
    gracefulShutdown('uncaughtException');
  });

  process.on('unhandledRejection', (reason) => {
    logger.error('Unhandled rejection:', { reason: String(reason) });
    gracefulShutdown('unhandledRejection');
  });
}

startServer();
