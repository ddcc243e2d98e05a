/**
 * Lineup Routes
 *
 * POST /api/lineups          - Lineup timeline and substitutions for a game
 * POST /api/lineups/on-court - Players on court at ?period=&clock=
 *
 * The request body is a game record or an NBA.com game page payload.
 */

import { Router, type Request, type Response } from 'express';

import {
  processLineupRequest,
  processOnCourtRequest,
  toErrorResponse,
} from '../processors/lineup.processor.js';

const router = Router();

function sendError(res: Response, error: unknown): void {
  const { status, body } = toErrorResponse(error);
  if (status >= 500) {
    console.error('[Lineups] Unhandled error:', error);
  }
  res.status(status).json(body);
}

router.post('/', (req: Request, res: Response) => {
  try {
    res.json(processLineupRequest(req.body));
  } catch (error) {
    sendError(res, error);
  }
});

router.post('/on-court', (req: Request, res: Response) => {
  try {
    res.json(processOnCourtRequest(req.body, req.query));
  } catch (error) {
    sendError(res, error);
  }
});

export default router;
