/**
 * Classification API Routes
 *
 * These routes handle HTTP concerns only - classification is delegated to
 * the classification service.
 *
 * Endpoints:
 * - POST /normalize - Normalize a description and show what it extracts to
 * - POST /line-items - Classify up to 5000 line items synchronously
 * - POST /documents - Classify the line items of a Document AI invoice
 * - POST /batches - Upload a line-item CSV for background classification
 * - GET /batches/:batchId - Batch progress
 * - GET /batches/:batchId/results - Classified items of a finished batch (CURSOR-BASED)
 */

import { Router, Request, Response } from 'express';
import { z } from 'zod';
import { asyncHandler, sendSuccess, AppError } from '../utils';
import { commonSchemas, uploadLineItemCsv, validateRequest } from '../middlewares';
import {
  classifyDocument,
  classifyItems,
  createBatch,
  getBatchProgress,
  getBatchResults,
  inspectText,
} from '../services/classification.service';
import { parsePaginationParams } from '../services/pagination.service';

const router = Router();

// ============================================
// Request Schemas
// ============================================

export const MAX_SYNC_LINE_ITEMS = 5000;

const nullableNumber = z.number().finite().nullable().default(null);
const optionalText = z.string().nullable().optional();

const lineItemSchema = z.object({
  vendorName: z.string(),
  accountIdentifier: z.string(),
  rawDescription: z.string(),
  amount: nullableNumber,
  quantity: nullableNumber,
  unitPrice: nullableNumber,
  serviceDate: z.string().nullable().default(null),
  invoiceNumber: optionalText,
  invoiceDate: optionalText,
  documentId: optionalText,
});

const classifyLineItemsSchema = z.object({
  lineItems: z
    .array(lineItemSchema)
    .min(1, 'At least one line item is required')
    .max(MAX_SYNC_LINE_ITEMS, `At most ${MAX_SYNC_LINE_ITEMS} line items per request; upload a CSV batch instead`),
});

const normalizeSchema = z.object({
  text: z.string().max(2000),
});

const documentQuerySchema = z.object({
  documentId: z.string().min(1).optional(),
});

type ClassifyLineItemsBody = z.infer<typeof classifyLineItemsSchema>;
type NormalizeBody = z.infer<typeof normalizeSchema>;

const queryString = (value: unknown): string | undefined => (typeof value === 'string' ? value : undefined);

// ============================================
// Synchronous Classification
// ============================================

/**
 * @route   POST /classification/normalize
 * @desc    Normalized text plus the equipment and material it extracts to
 *
 * Request Body: { "text": "30 YD. COMPACTOR -- OCC" }
 */
router.post(
  '/normalize',
  validateRequest({ body: normalizeSchema }),
  asyncHandler(async (req: Request, res: Response): Promise<void> => {
    const { text }: NormalizeBody = req.body;
    sendSuccess(res, inspectText(text));
  })
);

/**
 * @route   POST /classification/line-items
 * @desc    Classify line items against the live rule set
 *
 * Response:
 * - 200 OK: { ruleSetVersion, items, stats }
 * - 400 Bad Request: validation errors
 */
router.post(
  '/line-items',
  validateRequest({ body: classifyLineItemsSchema }),
  asyncHandler(async (req: Request, res: Response): Promise<void> => {
    const { lineItems }: ClassifyLineItemsBody = req.body;
    const result = classifyItems(lineItems);
    sendSuccess(res, result, `Classified ${result.stats.total} line items`);
  })
);

/**
 * @route   POST /classification/documents
 * @desc    Classify the line items of one Document AI invoice JSON
 *
 * Query params:
 * - documentId: string (optional, copied onto each item; usually the JSON md5)
 */
router.post(
  '/documents',
  validateRequest({ query: documentQuerySchema }),
  asyncHandler(async (req: Request, res: Response): Promise<void> => {
    const documentId = queryString(req.query.documentId) ?? null;
    const result = classifyDocument(req.body, documentId);
    sendSuccess(res, result, `Classified ${result.stats.total} line items`);
  })
);

// ============================================
// Background Batches
// ============================================

/**
 * @route   POST /classification/batches
 * @desc    Upload a line-item CSV (multipart field "file") for background classification
 *
 * Response:
 * - 202 Accepted: { batchId, jobId }
 * - 400 Bad Request: no file / not a CSV
 * - 503 Service Unavailable: queue (Redis) unreachable
 */
router.post(
  '/batches',
  uploadLineItemCsv,
  asyncHandler(async (req: Request, res: Response): Promise<void> => {
    if (!req.file) {
      throw AppError.badRequest('No file uploaded. Use multipart field "file"');
    }

    const batch = await createBatch({ filePath: req.file.path, fileName: req.file.originalname });
    sendSuccess(res, batch, 'Batch queued for classification', 202);
  })
);

/**
 * @route   GET /classification/batches/:batchId
 * @desc    Batch status and counters
 */
router.get(
  '/batches/:batchId',
  validateRequest({ params: commonSchemas.batchId }),
  asyncHandler(async (req: Request, res: Response): Promise<void> => {
    const progress = await getBatchProgress(req.params.batchId);
    sendSuccess(res, progress);
  })
);

/**
 * @route   GET /classification/batches/:batchId/results
 * @desc    Summary and classified items of a finished batch
 *
 * Query params:
 * - limit: number (default: 100, max: 1000)
 * - cursor: string (nextCursor of the previous page)
 */
router.get(
  '/batches/:batchId/results',
  validateRequest({ params: commonSchemas.batchId, query: commonSchemas.pagination }),
  asyncHandler(async (req: Request, res: Response): Promise<void> => {
    const pagination = parsePaginationParams({
      limit: queryString(req.query.limit),
      cursor: queryString(req.query.cursor),
    });
    const results = await getBatchResults(req.params.batchId, pagination);
    sendSuccess(res, results);
  })
);

export default router;
