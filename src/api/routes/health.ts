/**
 * Health Route
 *
 * GET /api/health - Service status and the input formats the API accepts
 */

import { Router, type Request, type Response } from 'express';

import { API } from '../../config/tracker.js';

export interface HealthStatus {
  status: 'ok';
  timestamp: string;
  service: string;
  inputFormats: string[];
}

export function buildHealthStatus(now: Date = new Date()): HealthStatus {
  return {
    status: 'ok',
    timestamp: now.toISOString(),
    service: API.SERVICE_NAME,
    inputFormats: ['game-record', 'nba-page-payload'],
  };
}

const router = Router();

router.get('/', (_req: Request, res: Response) => {
  res.json(buildHealthStatus());
});

export default router;
