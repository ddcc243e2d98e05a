/**
 * API Routes
 */

import { Router } from 'express';

import health from './health.js';
import lineups from './lineups.js';

const router = Router();

router.use('/health', health);
router.use('/lineups', lineups);

export default router;
