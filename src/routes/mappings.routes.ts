/**
 * Charge Mapping Routes
 *
 * Endpoints:
 * - POST /join - Join extracted invoice lines with billing charges and
 *   summarize which invoice wording maps to which billed charge
 */

import { Router, Request, Response } from 'express';
import { z } from 'zod';
import { asyncHandler, sendSuccess } from '../utils';
import { validateRequest } from '../middlewares';
import {
  DEFAULT_SUMMARY_LIMIT,
  joinInvoiceToBilling,
  summarizeJoinedMappings,
} from '../services/billingJoin.service';

const router = Router();

const amountSchema = z.union([z.number(), z.string()]).nullable().optional();
const optionalText = z.string().nullable().optional();

const invoiceLineSchema = z.object({
  documentId: z.string().trim().min(1, 'documentId is required'),
  description: z.string(),
  amount: amountSchema,
  vendorName: optionalText,
  accountIdentifier: optionalText,
  invoiceDate: optionalText,
  parsedEquipment: optionalText,
  parsedMaterial: optionalText,
});

const billingChargeSchema = z.object({
  documentId: z.string().trim().min(1, 'documentId is required'),
  chargeDescription: z.string(),
  cost: amountSchema,
  price: amountSchema,
  equipmentType: optionalText,
  material: optionalText,
  serviceType: optionalText,
  serviceId: z.union([z.string(), z.number().int().transform(String)]).nullable().optional(),
});

const joinSchema = z.object({
  invoiceLines: z.array(invoiceLineSchema).min(1, 'At least one invoice line is required'),
  billingCharges: z.array(billingChargeSchema),
  limit: z.number().int().positive().max(500).default(DEFAULT_SUMMARY_LIMIT),
});

type JoinBody = z.infer<typeof joinSchema>;

/**
 * @route   POST /mappings/join
 * @desc    Pair invoice lines with billing charges of the same document
 *
 * Response:
 * - 200 OK: { joined, unmatched, counts, summary }
 */
router.post(
  '/join',
  validateRequest({ body: joinSchema }),
  asyncHandler(async (req: Request, res: Response): Promise<void> => {
    const { invoiceLines, billingCharges, limit }: JoinBody = req.body;
    const result = joinInvoiceToBilling(invoiceLines, billingCharges);

    sendSuccess(
      res,
      { ...result, summary: summarizeJoinedMappings(result.joined, limit) },
      `Joined ${result.counts.joinedRows} of ${invoiceLines.length} invoice lines`
    );
  })
);

export default router;
