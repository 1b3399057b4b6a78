import type { Express } from 'express';
import type { Env } from '@shared/env';
import { handleAsyncError } from '../lib/errors';
import { globalRateLimit } from '../middleware/security';
import type { Services } from '../services';
import { registerCustomerRoutes, registerProductRoutes } from './routes.catalog';
import { registerPosRoutes } from './routes.pos';
import { registerReportRoutes } from './routes.reports';
import { registerSalesRoutes } from './routes.sales';
import { registerSyncRoutes } from './routes.sync';

export async function registerRoutes(app: Express, services: Services, env: Env) {
  app.use('/api', globalRateLimit);

  // Healthcheck
  app.get('/healthz', handleAsyncError(async (_req, res) => {
    const database = await services.checkHealth();
    res.status(database ? 200 : 503).json({ ok: database, uptime: process.uptime(), database });
  }));

  // API routes
  await registerPosRoutes(app, services, env);
  await registerSalesRoutes(app, services, env);
  await registerReportRoutes(app, services);
  await registerProductRoutes(app, services);
  await registerCustomerRoutes(app, services, env);
  await registerSyncRoutes(app, services, env);
}
