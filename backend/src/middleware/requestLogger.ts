import type { RequestHandler } from 'express';
import { createServiceLogger } from '../services/logger';

const log = createServiceLogger('http');

/**
 * One line per request on completion: method, path, status, duration.
 */
export const requestLogger: RequestHandler = (req, res, next) => {
  const startedAt = Date.now();

  log.debug('request_received', `Request: ${req.method} ${req.path}`, undefined, {
    contentType: req.headers['content-type'],
    contentLength: req.headers['content-length']
  });

  res.on('finish', () => {
    log.info('request_completed', `${req.method} ${req.path} ${res.statusCode}`, undefined, {
      status: res.statusCode,
      durationMs: Date.now() - startedAt,
      responseBytes: res.getHeader('content-length')
    });
  });

  next();
};
