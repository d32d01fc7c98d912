import { Router } from 'express';
import { healthController } from '../controllers';

const router = Router();

/**
 * @route   GET /health
 * @desc    Uptime, environment and version
 * @access  Public
 */
router.get('/', healthController.getHealth);

/**
 * @route   GET /health/ready
 * @desc    503 until a rule set snapshot is live; Redis is reported, not required
 * @access  Public
 */
router.get('/ready', healthController.getReadiness);

/**
 * @route   GET /health/live
 * @desc    Process is up
 * @access  Public
 */
router.get('/live', healthController.getLiveness);

export default router;
