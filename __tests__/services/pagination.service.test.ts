/**
 * Tests for Pagination Service
 *
 * Tests cursor-based pagination over result files:
 * - Cursor encoding/decoding
 * - Limit validation
 * - Page assembly
 */

import {
  encodeCursor,
  decodeCursor,
  validateLimit,
  paginateResults,
  parsePaginationParams,
  DEFAULT_LIMIT,
  MAX_LIMIT,
} from '../../src/services/pagination.service';
import { AppError } from '../../src/utils';

describe('Pagination Service', () => {
  describe('constants', () => {
    it('should have DEFAULT_LIMIT = 100', () => {
      expect(DEFAULT_LIMIT).toBe(100);
    });

    it('should have MAX_LIMIT = 1000', () => {
      expect(MAX_LIMIT).toBe(1000);
    });
  });

  // ============================================
  // Cursor encoding/decoding
  // ============================================
  describe('cursors', () => {
    it('should decode what it encodes', () => {
      expect(decodeCursor(encodeCursor(250))).toEqual({ line: 250 });
    });

    it('should produce URL-safe cursors', () => {
      expect(encodeCursor(123456)).toMatch(/^[A-Za-z0-9_-]+$/);
    });

    it('should reject garbage', () => {
      expect(() => decodeCursor('not-a-cursor')).toThrow(AppError);
    });

    it('should reject a negative line', () => {
      const cursor = Buffer.from(JSON.stringify({ line: -1 }), 'utf-8').toString('base64url');

      expect(() => decodeCursor(cursor)).toThrow('Invalid pagination cursor');
    });
  });

  // ============================================
  // Limit validation
  // ============================================
  describe('validateLimit', () => {
    it('should default when missing or invalid', () => {
      expect(validateLimit(undefined)).toBe(DEFAULT_LIMIT);
      expect(validateLimit('')).toBe(DEFAULT_LIMIT);
      expect(validateLimit('abc')).toBe(DEFAULT_LIMIT);
      expect(validateLimit(0)).toBe(DEFAULT_LIMIT);
    });

    it('should clamp to the maximum', () => {
      expect(validateLimit('5000')).toBe(MAX_LIMIT);
      expect(validateLimit(20, 10)).toBe(10);
    });

    it('should accept values in range', () => {
      expect(validateLimit('25')).toBe(25);
    });
  });

  // ============================================
  // Page assembly
  // ============================================
  describe('paginateResults', () => {
    it('should trim the extra record and point past the page', () => {
      const page = paginateResults(['a', 'b', 'c'], 2, 10);

      expect(page.data).toEqual(['a', 'b']);
      expect(page.hasMore).toBe(true);
      expect(page.nextCursor).toBe(encodeCursor(12));
    });

    it('should stop on the last page', () => {
      const page = paginateResults(['a'], 2, 10);

      expect(page).toEqual({ data: ['a'], nextCursor: undefined, hasMore: false });
    });
  });

  describe('parsePaginationParams', () => {
    it('should combine limit and cursor', () => {
      expect(parsePaginationParams({ limit: '5', cursor: encodeCursor(5) })).toEqual({
        limit: 5,
        cursor: { line: 5 },
      });
    });

    it('should leave the cursor out for the first page', () => {
      expect(parsePaginationParams({})).toEqual({ limit: DEFAULT_LIMIT, cursor: undefined });
    });
  });
});
