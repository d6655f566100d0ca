import express, { type Express } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import compression from 'compression';
import swaggerUi from 'swagger-ui-express';

import type { AppConfig } from './config';
import { buildSwaggerSpec } from './config/swagger';
import { errorHandler, notFoundHandler } from './middleware/errorHandler';
import { createRateLimiter } from './middleware/rateLimiter';
import { requestLogger } from './middleware/requestLogger';
import { createStudentRoutes } from './routes/student.routes';
import type { StudentStore } from './services/studentStore';

export interface AppDeps {
  store: StudentStore;
  config: AppConfig;
}

export function createApp({ store, config }: AppDeps): Express {
  const app = express();

  // Middleware
  app.use(requestLogger);
  app.use(helmet());
  app.use(cors({ origin: config.corsOrigin }));
  app.use(compression());
  app.use(express.json());
  app.use(createRateLimiter(config.rateLimit));

  // API Documentation
  if (config.docsEnabled) {
    const swaggerSpec = buildSwaggerSpec(config.version);
    app.get('/docs.json', (req, res) => {
      res.json(swaggerSpec);
    });
    app.use('/docs', swaggerUi.serve, swaggerUi.setup(swaggerSpec));
  }

  // Health check endpoint
  app.get('/', (req, res) => {
    res.json({ status: 'running', version: config.version });
  });

  app.use('/students', createStudentRoutes(store));

  app.use(notFoundHandler);
  // Error handling middleware (must be last)
  app.use(errorHandler);

  return app;
}
