import { logger } from './logger';

export const onServerError =
  (port: number) =>
  (error: NodeJS.ErrnoException): never => {
    if (error.code === 'EADDRINUSE') {
      logger.error(`Port ${port} is already in use`);
    } else {
      logger.error('HTTP server error:', error);
    }
    process.exit(1);
  };
