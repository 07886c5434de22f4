import express, { Express } from 'express';
import cors from 'cors';
import swaggerUi from 'swagger-ui-express';
import type { RoutingConfig, ServerConfig } from './config/routing';
import { createErrorHandler, notFoundHandler } from './middleware/errors';
import { requestLogging } from './middleware/logging';
import { buildRateLimiter, securityHeaders } from './middleware/security';
import buildingRoutes from './routes/buildings.route';
import catalogRoutes from './routes/catalog.route';
import { floorRoutes, poiRoutes } from './routes/floors.route';
import healthRoutes from './routes/health.route';
import navigationRoutes from './routes/navigation.route';
import type { RoutingCache } from './services/routingCache';
import type { RoutingStore } from './services/store/types';
import { applyTrustProxy } from './utils/httpConfig';
import openApiDocument from './openapi.json';

export interface AppDeps {
  store: RoutingStore;
  cache: RoutingCache;
  routing: RoutingConfig;
  server: Pick<
    ServerConfig,
    'rateLimitWindowMs' | 'rateLimitMax' | 'trustProxy' | 'corsOrigins' | 'isProduction' | 'exposeDocs'
  >;
  version?: string;
}

export function createApp(deps: AppDeps): Express {
  const { store, cache, routing, server } = deps;
  const app: Express = express();

  applyTrustProxy(app, server.trustProxy);

  app.use(requestLogging);
  app.use(securityHeaders({ isProduction: server.isProduction }));
  app.use(cors({ origin: server.corsOrigins.includes('*') ? '*' : server.corsOrigins }));
  app.use(express.json({ limit: '100kb' }));

  // ROUTE DOCUMENTATION
  if (server.exposeDocs) {
    app.use('/api-docs', swaggerUi.serve, swaggerUi.setup(openApiDocument));
  }

  app.use(
    '/health',
    healthRoutes({
      store,
      cache,
      version: deps.version ?? '1.0.0',
      environment: server.isProduction ? 'production' : 'development',
    }),
  );

  app.use(
    '/api',
    buildRateLimiter({ windowMs: server.rateLimitWindowMs, max: server.rateLimitMax }),
  );
  app.use('/api/navigation', navigationRoutes({ store, cache, routing }));
  app.use('/api/buildings', buildingRoutes(store));
  app.use('/api/floors', floorRoutes(store));
  app.use('/api/pois', poiRoutes(store));
  app.use('/api', catalogRoutes(store));

  app.use(notFoundHandler);
  app.use(createErrorHandler({ isProduction: server.isProduction }));

  return app;
}
