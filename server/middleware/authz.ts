import { timingSafeEqual } from 'node:crypto';
import type { Request, Response, NextFunction, RequestHandler } from 'express';
import { AuthenticationError, sendErrorResponse } from '../lib/errors';
import { extractLogContext, logger } from '../lib/logger';

function presentedKey(req: Request): string | undefined {
  const header = req.get('X-API-KEY');
  if (header) return header;
  const query = req.query.api_key;
  return typeof query === 'string' && query.length > 0 ? query : undefined;
}

function matches(candidate: string, key: string): boolean {
  const a = Buffer.from(candidate);
  const b = Buffer.from(key);
  return a.length === b.length && timingSafeEqual(a, b);
}

/**
 * Guards the sync API. The key is read from the X-API-KEY header, falling back to the
 * `api_key` query parameter. An empty key list rejects every request.
 */
export function requireApiKey(keys: readonly string[]): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    const candidate = presentedKey(req);
    if (candidate && keys.some((key) => matches(candidate, key))) {
      return next();
    }
    logger.logSecurityEvent('invalid_api_key', extractLogContext(req, { path: req.path, keyPresent: candidate !== undefined }));
    sendErrorResponse(res, new AuthenticationError('A valid API key is required'), req.path);
  };
}
