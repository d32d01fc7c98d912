import { createApp } from './app';
import { env } from './config';
import { logger, Logging } from './utils';
import { RuleTableError, describeIssue } from './classification';
import { disconnectRedis, getRedisClient } from './redis';
import { ruleSetService } from './services';
import { closeClassificationQueue, processClassificationJob, setupClassificationWorker } from './workers';

/**
 * Loads the rule tables; the server does not start without them
 */
const loadRuleSet = async (): Promise<void> => {
  try {
    await ruleSetService.loadFromDirectory(env.RULES_DIR);
  } catch (error) {
    if (error instanceof RuleTableError) {
      logger.error(`Rule tables in ${env.RULES_DIR} are invalid:`);
      error.issues.forEach((issue) => logger.error(`  ${describeIssue(issue)}`));
    }
    throw error;
  }
};

/**
 * Start the server
 */
const startServer = async (): Promise<void> => {
  try {
    await loadRuleSet();

    // Trigger Redis connection (for early logging and availability check)
    getRedisClient();

    // Setup background workers
    const worker = setupClassificationWorker(processClassificationJob);
    logger.info(`👷 Classification worker initialized (concurrency ${env.WORKER_CONCURRENCY})`);

    const app = createApp();

    const server = app.listen(env.PORT, () => {
      Logging.box('🚀 CHARGE MAPPING BACKEND', `Server started in ${env.NODE_ENV} mode`);
      Logging.success(`Server listening on http://${env.HOST}:${env.PORT}`);
      Logging.info(`API available at http://${env.HOST}:${env.PORT}${env.API_PREFIX}`);
      Logging.info(`Health check at http://${env.HOST}:${env.PORT}${env.API_PREFIX}/health`);
    });

    // SIGHUP reloads the rule tables in place
    process.on('SIGHUP', () => {
      logger.info('SIGHUP received. Reloading rule tables...');
      ruleSetService.reload().catch((error: unknown) => {
        logger.error(`Rule reload failed: ${error instanceof Error ? error.message : 'Unknown error'}`);
      });
    });

    const closeResources = async (): Promise<void> => {
      // Finish in-flight jobs before the connections go
      await worker.close();
      await closeClassificationQueue();
      await disconnectRedis();
    };

    // Graceful shutdown handlers
    const gracefulShutdown = (signal: string): void => {
      logger.info(`\n${signal} received. Starting graceful shutdown...`);

      server.close((err) => {
        if (err) {
          logger.error('Error during server shutdown:', err);
          process.exit(1);
        }

        closeResources().then(
          () => {
            logger.info('Server closed successfully');
            process.exit(0);
          },
          (error: unknown) => {
            logger.error('Error while closing resources:', error);
            process.exit(1);
          }
        );
      });

      // Force shutdown after 30 seconds
      setTimeout(() => {
        logger.error('Forced shutdown due to timeout');
        process.exit(1);
      }, 30000).unref();
    };

    // Handle termination signals
    process.on('SIGTERM', () => gracefulShutdown('SIGTERM'));
    process.on('SIGINT', () => gracefulShutdown('SIGINT'));

    // Handle uncaught exceptions
    process.on('uncaughtException', (err: Error) => {
      logger.error('Uncaught Exception:', err);
      process.exit(1);
    });

    // Handle unhandled promise rejections
    process.on('unhandledRejection', (reason: unknown) => {
      logger.error('Unhandled Rejection:', reason);
      process.exit(1);
    });
  } catch (error) {
    logger.error('Failed to start server:', error);
    process.exit(1);
  }
};

// Start server
void startServer();
