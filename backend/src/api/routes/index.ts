import { Router } from 'express';
import { appPaths } from '../../config';
import type { AppContext } from '../../types/appContext';
import { createHealthHandler } from './health';
import { createProtectHandler, createUploadMiddleware } from './protect';

export function createApiRouter(ctx: AppContext): Router {
  const routes = Router();

  // Upload form
  routes.get('/', (_req, res, next) => {
    res.sendFile(appPaths.uploadFormFile, error => {
      if (error) next(error);
    });
  });

  routes.get('/health', createHealthHandler(ctx));

  routes.post('/protect', createUploadMiddleware(ctx), createProtectHandler(ctx));

  return routes;
}
