import cors from 'cors';
import helmet from 'helmet';
import rateLimit from 'express-rate-limit';
import { timingSafeEqual } from 'crypto';
import type { Request, Response, NextFunction } from 'express';
import { NewsRagError } from '../utils/errors';

/**
 * Security headers. The API serves JSON and plain-text streams only.
 */
export const securityHeaders = helmet({
  contentSecurityPolicy: {
    directives: {
      defaultSrc: ["'none'"],
      frameAncestors: ["'none'"],
    },
  },
  crossOriginResourcePolicy: { policy: 'same-origin' },
  frameguard: { action: 'deny' },
  referrerPolicy: { policy: 'no-referrer' },
});

/**
 * Optional API key authentication.
 * If API_KEY is set, requires a matching X-API-Key header.
 */
export function apiKeyAuth(req: Request, res: Response, next: NextFunction): void {
  const apiKey = process.env.API_KEY;
  if (!apiKey) {
    next();
    return;
  }

  const providedKey = req.header('X-API-Key');
  if (!providedKey) {
    res.status(401).json({ error: 'API key required. Provide X-API-Key header.' });
    return;
  }

  const expected = Buffer.from(apiKey);
  const provided = Buffer.from(providedKey);
  if (expected.length !== provided.length || !timingSafeEqual(expected, provided)) {
    res.status(403).json({ error: 'Invalid API key' });
    return;
  }

  next();
}

export const corsMiddleware = cors({
  origin: process.env.FRONTEND_URL || (process.env.NODE_ENV === 'production' ? false : true),
});

/**
 * Per-IP limit on query streams
 */
export const queryRateLimiter = rateLimit({
  windowMs: 60 * 1000,
  max: parseInt(process.env.QUERY_RATE_LIMIT || '20', 10),
  message: { error: 'Too many requests, please try again later.' },
  standardHeaders: true,
  legacyHeaders: false,
});

export function errorHandler(
  err: Error & { status?: number },
  _req: Request,
  res: Response,
  _next: NextFunction
): void {
  console.error('Error:', err);

  if (res.headersSent) {
    res.end();
    return;
  }

  const status = err.status || (err instanceof NewsRagError && err.code === 'INDEX_UNAVAILABLE' ? 503 : 500);
  res.status(status).json({
    error: status === 503 ? 'Service unavailable' : 'Internal server error',
    message: process.env.NODE_ENV === 'development' ? err.message : undefined,
  });
}

export function requestLogger(req: Request, res: Response, next: NextFunction): void {
  const start = Date.now();

  res.on('finish', () => {
    const duration = Date.now() - start;
    console.log(`${req.method} ${req.path} - ${res.statusCode} - ${duration}ms`);
  });

  next();
}
