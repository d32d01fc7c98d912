/**
 * Pagination Service
 *
 * CURSOR-BASED pagination over stored batch results.
 *
 * Results are JSON Lines files, so a position is a line number. Cursors
 * are Base64-encoded JSON ({ line }) so clients treat them as opaque and
 * the encoding can change without breaking the API.
 */

import { z } from 'zod';
import { AppError } from '../utils';

// ============================================
// Types
// ============================================

/**
 * Decoded cursor: zero-based line the next page starts at
 */
export interface DecodedCursor {
  line: number;
}

export interface PaginationParams {
  limit: number;
  cursor?: DecodedCursor;
}

export interface PaginatedResponse<T> {
  data: T[];
  nextCursor?: string;
  hasMore: boolean;
}

// ============================================
// Configuration
// ============================================

export const DEFAULT_LIMIT = 100;

export const MAX_LIMIT = 1000;

const cursorSchema = z.object({
  line: z.number().int().nonnegative(),
});

// ============================================
// Cursor Encoding/Decoding
// ============================================

export function encodeCursor(line: number): string {
  const cursorData: DecodedCursor = { line };
  return Buffer.from(JSON.stringify(cursorData), 'utf-8').toString('base64url');
}

/**
 * @throws AppError (400) if the cursor was not produced by encodeCursor
 */
export function decodeCursor(cursor: string): DecodedCursor {
  let decoded: unknown;
  try {
    decoded = JSON.parse(Buffer.from(cursor, 'base64url').toString('utf-8'));
  } catch {
    throw AppError.badRequest('Invalid pagination cursor');
  }

  const parsed = cursorSchema.safeParse(decoded);
  if (!parsed.success) {
    throw AppError.badRequest('Invalid pagination cursor');
  }
  return parsed.data;
}

// ============================================
// Limit Validation
// ============================================

/**
 * Validates and clamps the limit parameter
 */
export function validateLimit(limit: number | string | undefined, max: number = MAX_LIMIT): number {
  if (limit === undefined || limit === '') {
    return DEFAULT_LIMIT;
  }

  const parsed = typeof limit === 'string' ? parseInt(limit, 10) : limit;

  if (Number.isNaN(parsed) || parsed < 1) {
    return DEFAULT_LIMIT;
  }

  return Math.min(parsed, max);
}

// ============================================
// Page Assembly
// ============================================

/**
 * Trims a page fetched with one extra record and builds the next cursor
 *
 * Strategy: read limit + 1 records starting at `startLine`; the extra one
 * only signals that another page exists.
 */
export function paginateResults<T>(records: T[], limit: number, startLine: number): PaginatedResponse<T> {
  const hasMore = records.length > limit;
  const data = hasMore ? records.slice(0, limit) : records;

  return {
    data,
    nextCursor: hasMore ? encodeCursor(startLine + data.length) : undefined,
    hasMore,
  };
}

/**
 * Parses pagination parameters from request query
 */
export function parsePaginationParams(query: { limit?: string; cursor?: string }): PaginationParams {
  const limit = validateLimit(query.limit);
  const cursor = query.cursor ? decodeCursor(query.cursor) : undefined;

  return { limit, cursor };
}

export const paginationService = {
  encodeCursor,
  decodeCursor,
  validateLimit,
  paginateResults,
  parsePaginationParams,
};
