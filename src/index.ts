import { Worker } from 'bullmq';
import { createApp } from './app';
import { env } from './config';
import { logger, Logging } from './utils';
import { disconnectRedis, getRedisClient, isRedisEnabled } from './redis';
import {
  closeReconciliationQueue,
  processReconciliationJob,
  setupReconciliationWorker,
  type ReconciliationJobData,
} from './workers';

/**
 * Start the server
 */
const startServer = async (): Promise<void> => {
  try {
    let worker: Worker<ReconciliationJobData> | null = null;

    if (isRedisEnabled()) {
      // Trigger Redis connection (for early logging and availability check)
      getRedisClient();

      worker = setupReconciliationWorker(processReconciliationJob);
      logger.info(`👷 Reconciliation worker initialized (concurrency ${env.WORKER_CONCURRENCY})`);
    } else {
      logger.info('Redis disabled; reconciliation jobs run in process');
    }

    const app = createApp();

    const server = app.listen(env.PORT, () => {
      Logging.box('🏥 FACILITY RECONCILIATION', `Server started in ${env.NODE_ENV} mode`);
      Logging.success(`Server listening on http://${env.HOST}:${env.PORT}`);
      Logging.info(`API available at http://${env.HOST}:${env.PORT}${env.API_PREFIX}`);
      Logging.info(`Health check at http://${env.HOST}:${env.PORT}${env.API_PREFIX}/health`);
    });

    // Graceful shutdown handlers
    const gracefulShutdown = (signal: string): void => {
      logger.info(`${signal} received. Starting graceful shutdown...`);

      server.close((err) => {
        if (err) {
          logger.error('Error during server shutdown:', err);
          process.exit(1);
        }

        const closeAll = async (): Promise<void> => {
          // Close BullMQ worker and queue before their Redis connection
          await worker?.close();
          await closeReconciliationQueue();
          await disconnectRedis();
        };

        closeAll()
          .then(() => {
            logger.info('Server closed successfully');
            process.exit(0);
          })
          .catch((closeError: unknown) => {
            logger.error('Error while closing connections:', closeError);
            process.exit(1);
          });
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
