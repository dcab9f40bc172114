import type { Request, RequestHandler, Response } from 'express';
import type { AppContext } from '../../types/appContext';

/**
 * GET /health
 *
 * Always 200; missing capabilities show up as false / "Not found".
 */
export function createHealthHandler({ healthReporter }: AppContext): RequestHandler {
  return async (_req: Request, res: Response) => {
    const payload = await healthReporter.probe();
    res.status(200).json(payload);
  };
}
