import type { Server } from 'http';
// Loads .env before anything reads process.env
import { loadConfig } from './config';
import { createApp } from './app';
import { InMemoryStudentStore } from './services/studentStore';
import { logger, setLogLevel } from './utils/logger';
import { seedStudents } from './utils/seed';
import { onServerError } from './utils/serverErrors';

const startServer = () => {
  try {
    const config = loadConfig();
    setLogLevel(config.logLevel);
    logger.info('Starting application...');

    const store = new InMemoryStudentStore();
    if (config.seedDemoData) {
      seedStudents(store);
    }

    const app = createApp({ store, config });
    const httpServer: Server = app.listen(config.port, () => {
      logger.info(`Server is running on port ${config.port}`);
      if (config.docsEnabled) {
        logger.info(`API documentation available at http://localhost:${config.port}/docs`);
      }
    });
    httpServer.on('error', onServerError(config.port));

    // Handle graceful shutdown
    const shutdown = (signal: NodeJS.Signals) => {
      logger.info(`${signal} signal received: closing HTTP server`);
      httpServer.close(error => {
        if (error) {
          logger.error('Error while closing HTTP server:', error);
        }
        store.clear();
        logger.info('Shutting down application...');
        process.exit(error ? 1 : 0);
      });
    };

    process.once('SIGTERM', shutdown);
    process.once('SIGINT', shutdown);
  } catch (error) {
    logger.error('Failed to start server:', error);
    process.exit(1);
  }
};

startServer();
