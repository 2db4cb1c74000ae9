import express from 'express';
import cors from 'cors';
import helmet from 'helmet';
import morgan from 'morgan';
import swaggerJsdoc from 'swagger-jsdoc';
import swaggerUi from 'swagger-ui-express';

import { config } from './config';
import { logger } from './utils/logger';
import { bigIntReplacer } from './utils/serialization';

import { errorHandler } from './middleware/errorHandler';
import { notFoundHandler } from './middleware/notFoundHandler';

import { FeedRegistryService } from './services/feeds/feedRegistryService';
import { createFeedRoutes } from './routes/feeds';
import { CalculatedFeedFactory, createGovernanceRoutes } from './routes/governance';
import { createPaymentRoutes } from './routes/payments';

export interface AppOptions {
  registry: FeedRegistryService;
  calculatedFeedFactory: CalculatedFeedFactory;
  enableDocs?: boolean;
}

export function createApp(options: AppOptions): express.Express {
  const { registry, calculatedFeedFactory } = options;
  const app = express();

  // bigint values (fees, wei amounts, timestamps) go out as decimal strings
  app.set('json replacer', bigIntReplacer);

  app.use(helmet());
  app.use(cors({
    origin: config.server.corsOrigin,
    credentials: true
  }));
  app.use(morgan('combined', { stream: { write: message => logger.info(message.trim()) } }));
  app.use(express.json({ limit: '1mb' }));

  if (options.enableDocs ?? true) {
    const swaggerSpec = swaggerJsdoc({
      definition: {
        openapi: '3.0.0',
        info: {
          title: 'Feed Registry API',
          version: '1.0.0',
          description: 'Unified access to index-addressed and calculated oracle feeds, fee quotes and proof verification'
        },
        servers: [
          {
            url: `http://localhost:${config.server.port}`,
            description: 'Development server'
          }
        ]
      },
      apis: ['./src/routes/*.ts']
    });
    app.use('/api-docs', swaggerUi.serve, swaggerUi.setup(swaggerSpec));
  }

  app.get('/health', (req, res) => {
    res.json({
      status: 'healthy',
      timestamp: new Date().toISOString(),
      version: '1.0.0',
      service: 'feed-registry'
    });
  });

  const apiPrefix = config.server.apiPrefix;
  app.use(`${apiPrefix}/feeds`, createFeedRoutes(registry));
  app.use(`${apiPrefix}/governance`, createGovernanceRoutes(registry, calculatedFeedFactory));
  app.use(`${apiPrefix}/payments`, createPaymentRoutes(registry.payments));

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}

export default createApp;
