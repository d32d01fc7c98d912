import { Router } from 'express';
import healthRoutes from './health.routes';
import classificationRoutes from './classification.routes';
import rulesRoutes from './rules.routes';
import mappingsRoutes from './mappings.routes';

const router = Router();

// Health check routes
router.use('/health', healthRoutes);

// Line item classification (sync + CSV batches)
router.use('/classification', classificationRoutes);

// Rule set inspection and hot reload
router.use('/rules', rulesRoutes);

// Invoice ↔ billing join for rule curation
router.use('/mappings', mappingsRoutes);

export default router;
