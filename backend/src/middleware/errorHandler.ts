import type { ErrorRequestHandler, RequestHandler } from 'express';
import multer from 'multer';
import type { UploadConfig } from '../config';
import { createServiceLogger } from '../services/logger';
import { ProtectionError } from '../services/protection/errors';
import type { ErrorResponseBody } from '../types/protection';

const log = createServiceLogger('http');

/**
 * multer's own errors are all caused by the request, so they map to 400.
 */
function describeMulterError(error: multer.MulterError, upload: Pick<UploadConfig, 'maxUploadBytes' | 'fileField'>): ErrorResponseBody {
  switch (error.code) {
    case 'LIMIT_FILE_SIZE':
      return {
        error: `File size exceeds maximum allowed size (${(upload.maxUploadBytes / (1024 * 1024)).toFixed(2)} MB)`,
        details: 'Please use a smaller package file.'
      };
    case 'LIMIT_UNEXPECTED_FILE':
      return {
        error: 'Unexpected file field',
        details: `Send the package in the "${upload.fileField}" field only (got "${error.field ?? 'unknown'}")`
      };
    default:
      return { error: 'Invalid upload', details: error.message };
  }
}

export function createErrorHandler(upload: Pick<UploadConfig, 'maxUploadBytes' | 'fileField'>): ErrorRequestHandler {
  return (err, req, res, next) => {
    if (res.headersSent) {
      log.error('response_aborted', 'Error after response started', err instanceof Error ? err : undefined, undefined, {
        path: req.path
      });
      next(err);
      return;
    }

    if (err instanceof ProtectionError) {
      const body: ErrorResponseBody = { error: err.message, details: err.details ?? err.message };
      res.status(err.httpStatus).json(body);
      return;
    }

    if (err instanceof multer.MulterError) {
      log.warn('upload_rejected', err.message, undefined, { code: err.code, field: err.field });
      res.status(400).json(describeMulterError(err, upload));
      return;
    }

    const message = err instanceof Error && err.message ? err.message : 'Unknown error';
    log.error('server_error', 'Unhandled server error', err instanceof Error ? err : undefined, undefined, {
      method: req.method,
      path: req.path
    });
    const body: ErrorResponseBody = { error: 'Server error', details: message };
    res.status(500).json(body);
  };
}

export const notFoundHandler: RequestHandler = (req, res) => {
  const body: ErrorResponseBody = {
    error: 'Not found',
    details: `Route ${req.method} ${req.path} not found`
  };
  res.status(404).json(body);
};
