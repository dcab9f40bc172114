import express from 'express';
import type { Express } from 'express';
import type { Server } from 'http';
import { createCorsMiddleware } from '../middleware/cors';
import { createErrorHandler, notFoundHandler } from '../middleware/errorHandler';
import { requestLogger } from '../middleware/requestLogger';
import type { AppContext } from '../types/appContext';
import { createApiRouter } from './routes';

export const createServer = (ctx: AppContext): Express => {
  const app = express();

  app.disable('x-powered-by');

  app.use(createCorsMiddleware(ctx.config.server.corsOrigin));
  app.use(requestLogger);

  app.use(createApiRouter(ctx));

  app.use(notFoundHandler);
  app.use(createErrorHandler(ctx.config.upload));

  return app;
};

export const startServer = (ctx: AppContext): Server => {
  const app = createServer(ctx);
  const { port, host } = ctx.config.server;

  const server = app.listen(port, host, () => {
    // eslint-disable-next-line no-console
    console.log(`Protect gateway listening on http://${host}:${port}`);
  });

  return server;
};
