import { randomUUID } from "node:crypto";
import { Request, Response, NextFunction } from "express";
import rateLimit from "express-rate-limit";
import helmet from "helmet";
import { logger } from "../lib/logger";

const requestKeyGenerator = (req: Request): string => (
  req.ip
  || req.headers['x-forwarded-for']?.toString()
  || req.socket.remoteAddress
  || 'unknown'
);

const GLOBAL_WINDOW_MS = Number(process.env.RATE_LIMIT_GLOBAL_WINDOW_MS || 15 * 60 * 1000);

// Global rate limiting (configurable via env)
export const globalRateLimit = rateLimit({
  windowMs: GLOBAL_WINDOW_MS,
  max: Number(process.env.RATE_LIMIT_GLOBAL_MAX || 300),
  standardHeaders: true,
  legacyHeaders: false,
  keyGenerator: requestKeyGenerator,
  // Disable rate limiting during tests
  skip: () => process.env.NODE_ENV === 'test',
  handler: (req: Request, res: Response) => {
    logger.logSecurityEvent('rate_limit_exceeded', {
      ipAddress: req.ip,
      path: req.path,
      userAgent: req.get('User-Agent'),
    });
    res.status(429).json({
      status: 'error',
      message: 'Too many requests from this IP, please try again later.',
      code: 'RATE_LIMIT_EXCEEDED',
      details: { retryAfter: Math.ceil(GLOBAL_WINDOW_MS / 60000) },
      timestamp: new Date().toISOString(),
      path: req.path,
    });
  },
});

// Sync clients share one key, so they get their own, wider budget
export const syncRateLimit = rateLimit({
  windowMs: Number(process.env.RATE_LIMIT_SYNC_WINDOW_MS || 60 * 1000),
  max: Number(process.env.RATE_LIMIT_SYNC_MAX || 120),
  standardHeaders: true,
  legacyHeaders: false,
  keyGenerator: requestKeyGenerator,
  skip: () => process.env.NODE_ENV === 'test',
});

// JSON API only: no scripts, frames or styles are ever served
export const helmetConfig = helmet({
  contentSecurityPolicy: {
    directives: {
      defaultSrc: ["'none'"],
      frameAncestors: ["'none'"],
    },
  },
  crossOriginEmbedderPolicy: false,
  hsts: process.env.NODE_ENV === 'production'
    ? { maxAge: 31536000, includeSubDomains: true, preload: true }
    : false,
  noSniff: true,
  referrerPolicy: { policy: 'no-referrer' },
  frameguard: { action: 'deny' },
});

export const securityHeaders = (req: Request, res: Response, next: NextFunction) => {
  res.setHeader('Permissions-Policy', 'geolocation=(), microphone=(), camera=(), payment=()');
  res.removeHeader('X-Powered-By');
  next();
};

// Reuse an incoming X-Request-Id when present so logs line up across hops
export const requestId = (req: Request, res: Response, next: NextFunction) => {
  const incoming = req.get('X-Request-Id');
  const id = incoming && /^[\w-]{1,128}$/.test(incoming) ? incoming : randomUUID();
  res.locals.requestId = id;
  res.setHeader('X-Request-Id', id);
  next();
};
