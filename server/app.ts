import express, { type Express, type NextFunction, type Request, type Response } from 'express';
import type { Env } from '@shared/env';
import { InvalidDateError } from '@shared/lib/dates';
import { registerRoutes } from './api';
import { AppError, NotFoundError, ValidationError, sendErrorResponse } from './lib/errors';
import { logger, pinoHttpMiddleware, requestLogger } from './lib/logger';
import { helmetConfig, requestId, securityHeaders } from './middleware/security';
import type { Services } from './services';
import { configureSession, type RedisClient } from './session';

export interface AppOptions {
  redis?: RedisClient;
}

// TRUST_PROXY may be a hop count, 'true' or 'false'
function trustProxySetting(env: Env): boolean | number {
  const raw = env.TRUST_PROXY?.toLowerCase();
  if (raw === 'true') return true;
  if (raw === 'false') return false;
  const hops = raw ? parseInt(raw, 10) : NaN;
  if (!Number.isNaN(hops)) return hops;
  return env.NODE_ENV === 'production' ? 1 : false;
}

function toAppError(err: unknown): AppError | Error {
  if (err instanceof AppError) return err;
  if (err instanceof InvalidDateError) return new ValidationError(err.message);
  // body-parser rejects malformed JSON with a 400 SyntaxError
  if (err instanceof SyntaxError && 'status' in err && err.status === 400) {
    return new AppError('Malformed JSON body', 400, 'BAD_REQUEST');
  }
  return err instanceof Error ? err : new Error(String(err));
}

export async function createApp(services: Services, env: Env, options: AppOptions = {}): Promise<Express> {
  const app = express();
  app.set('trust proxy', trustProxySetting(env));

  // Security middleware (order is important)
  app.use(requestId);
  app.use(helmetConfig);
  app.use(securityHeaders);

  app.use(express.json({ limit: '1mb' }));
  app.use(configureSession({
    secret: env.SESSION_SECRET,
    production: env.NODE_ENV === 'production',
    redis: options.redis,
  }));

  app.use(pinoHttpMiddleware);
  app.use(requestLogger);

  await registerRoutes(app, services, env);

  app.use('/api', (req: Request, _res: Response, next: NextFunction) => {
    next(new NotFoundError(`Route ${req.method} ${req.originalUrl}`));
  });

  app.use((err: unknown, req: Request, res: Response, _next: NextFunction) => {
    const error = toAppError(err);
    if (!(error instanceof AppError) || error.statusCode >= 500) {
      logger.error('Request failed', {
        path: req.path,
        method: req.method,
        requestId: res.locals.requestId,
        code: error instanceof AppError ? error.code : undefined,
      }, error);
    }
    sendErrorResponse(res, error, req.path);
  });

  return app;
}
