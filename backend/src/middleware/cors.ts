/**
 * CORS Middleware Configuration
 *
 * The upload form may be hosted on another origin than the gateway, so the
 * download's Content-Disposition header is exposed to browser scripts.
 */

import type { RequestHandler } from 'express';
import cors from 'cors';
import { createServiceLogger } from '../services/logger';

const corsLogger = createServiceLogger('cors-middleware');

/**
 * Parse a comma separated origin list; `*` anywhere means any origin.
 */
export function parseOrigins(value: string): string[] | '*' {
  const origins = value
    .split(',')
    .map(origin => origin.trim())
    .filter(origin => origin.length > 0);

  if (origins.length === 0 || origins.includes('*')) {
    return '*';
  }

  return origins.filter(origin => {
    try {
      new URL(origin);
      return true;
    } catch {
      corsLogger.warn('invalid_origin', `Ignoring invalid CORS origin: ${origin}`);
      return false;
    }
  });
}

export function createCorsMiddleware(corsOrigin: string): RequestHandler {
  const origins = parseOrigins(corsOrigin);

  corsLogger.debug('cors_config_loaded', 'CORS configuration loaded', undefined, {
    origins: origins === '*' ? ['*'] : origins
  });

  return cors({
    origin: origins === '*' ? true : origins,
    methods: ['GET', 'POST', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'Accept', 'X-Requested-With'],
    exposedHeaders: ['Content-Disposition', 'Content-Length'],
    maxAge: 86400
  });
}
