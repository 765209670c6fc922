import { serve, type ServerType } from '@hono/node-server';
import { Hono } from 'hono';
import type { RequestRepository } from '../db/RequestRepository.js';
import { getLogger, requestLoggingMiddleware } from '../monitoring/logger.js';
import type { RequestOrchestrator } from '../workers/RequestOrchestrator.js';
import { errorHandler, serviceKeyAuth } from './middleware/index.js';
import { createEventRoutes } from './routes/events.js';
import { createHealthRoutes, type SchedulerProbe } from './routes/health.js';
import { createRequestRoutes } from './routes/requests.js';

export interface AppDeps {
  orchestrator: Pick<
    RequestOrchestrator,
    'handlePaymentConfirmed' | 'handlePaymentFailed' | 'recordRefund' | 'requeue'
  >;
  repository: Pick<RequestRepository, 'findByRequestId' | 'create'>;
  serviceKey: string | undefined;
  scheduler?: SchedulerProbe;
}

export function createApp(deps: AppDeps) {
  const app = new Hono();

  app.use('*', requestLoggingMiddleware());
  app.onError(errorHandler);

  // Health check (no auth)
  const health = createHealthRoutes(deps.scheduler);
  app.route('/health', health);
  app.route('/api/v1/health', health);

  // Authenticated API routes
  const api = new Hono();
  api.use('*', serviceKeyAuth(deps.serviceKey));
  api.route('/events', createEventRoutes(deps.orchestrator));
  api.route('/requests', createRequestRoutes({ repository: deps.repository, orchestrator: deps.orchestrator }));

  app.route('/api/v1', api);

  app.notFound((c) => c.json({ error: 'not_found', message: 'Route not found' }, 404));

  return app;
}

export function startServer(deps: AppDeps, port: number): ServerType {
  const app = createApp(deps);
  const server = serve({ fetch: app.fetch, port });
  getLogger().info('Records API listening', { port });
  return server;
}
