/**
 * Express application for the lineup API, without a listening socket.
 */

import express, { type NextFunction, type Request, type Response } from 'express';
import cors from 'cors';

import { API } from '../config/tracker.js';
import routes from './routes/index.js';

export function logRequest(req: Request, _res: Response, next: NextFunction): void {
  console.log(`[Server] ${req.method} ${req.path}`);
  next();
}

export function notFound(req: Request, res: Response): void {
  res.status(404).json({ error: 'Not found', path: req.path });
}

/**
 * Last-resort handler; tracker errors are mapped inside the routes.
 * Body parser failures carry their own 4xx status.
 */
export function handleError(err: Error & { status?: number }, _req: Request, res: Response, _next: NextFunction): void {
  const status = err.status && err.status >= 400 && err.status < 500 ? err.status : 500;
  if (status === 500) {
    console.error('[Server] Unhandled error:', err);
  }
  res.status(status).json({
    error: status === 500 ? 'Internal server error' : err.message,
    code: status === 500 ? 'INTERNAL_ERROR' : 'BAD_REQUEST',
  });
}

export function createApp(): express.Express {
  const app = express();

  app.use(cors());
  app.use(express.json({ limit: API.BODY_LIMIT }));
  app.use(logRequest);

  app.use('/api', routes);

  app.use(notFound);
  app.use(handleError);

  return app;
}
