import Fastify from 'fastify';
import { config } from '../config.js';
import type { AppDeps } from './deps.js';
import { errorHandler } from './errors.js';
import { gamesRoutes } from './routes/games.js';
import { healthRoutes } from './routes/health.js';
import { predictionsRoutes } from './routes/predictions.js';
import { validationRoutes } from './routes/validation.js';

export async function createServer(deps: AppDeps) {
  const app = Fastify({
    logger:
      config.NODE_ENV === 'development'
        ? {
            level: config.LOG_LEVEL,
            transport: {
              target: 'pino-pretty',
              options: { colorize: true },
            },
          }
        : { level: config.LOG_LEVEL },
  });

  app.setErrorHandler(errorHandler);

  await app.register(healthRoutes, deps);
  await app.register(predictionsRoutes, { prefix: '/predictions', ...deps });
  await app.register(validationRoutes, { prefix: '/validation', ...deps });
  await app.register(gamesRoutes, { prefix: '/games', ...deps });

  return app;
}
