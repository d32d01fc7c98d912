/**
 * Rule Set Routes
 *
 * Endpoints:
 * - GET / - Summary of the live rule set snapshot
 * - POST /reload - Re-read RULES_DIR and swap in a new snapshot
 */

import { Router, Request, Response } from 'express';
import { asyncHandler, sendSuccess } from '../utils';
import { ruleSetService } from '../services/ruleSet.service';

const router = Router();

/**
 * @route   GET /rules
 * @desc    Version, load time and table sizes of the live rule set
 */
router.get(
  '/',
  asyncHandler(async (_req: Request, res: Response): Promise<void> => {
    sendSuccess(res, ruleSetService.summary());
  })
);

/**
 * @route   POST /rules/reload
 * @desc    Hot reload; an invalid table leaves the current snapshot live
 *
 * Response:
 * - 200 OK: summary of the new snapshot
 * - 422 Unprocessable Entity: { details: RuleTableIssue[] }
 */
router.post(
  '/reload',
  asyncHandler(async (_req: Request, res: Response): Promise<void> => {
    await ruleSetService.reload();
    sendSuccess(res, ruleSetService.summary(), 'Rule set reloaded');
  })
);

export default router;
