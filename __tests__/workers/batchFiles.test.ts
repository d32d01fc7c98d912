import path from 'path';
import { getBatchResultPaths, parseBatchSummary, type BatchSummary } from '../../src/workers/batchFiles';

const summary: BatchSummary = {
  batchId: 'batch-1',
  fileName: 'items.csv',
  ruleSetVersion: 'abc123def456',
  completedAt: '2024-04-01T00:00:00.000Z',
  processedCount: 2,
  invalidRowCount: 1,
  invalidRows: [{ rowNumber: 3, error: 'Missing or empty vendor_name' }],
  stats: {
    total: 2,
    byTier: { 'vendor-specific': 1, default: 0, unclassified: 1 },
    byResolution: { RESOLVED: 1, AMBIGUOUS: 0, NOT_FOUND: 1 },
    unclassifiedByVendor: { Rumpke: 1 },
    ambiguousByAccount: {},
    ruleHits: { 'lw-haul': 1 },
    topUnclassifiedDescriptions: [{ description: 'TIRE REMOVAL', count: 1 }],
  },
};

describe('Batch result files', () => {
  it('should place items and summary beside each other', () => {
    expect(getBatchResultPaths('/results', 'batch-1')).toEqual({
      items: path.join('/results', 'batch-1.jsonl'),
      summary: path.join('/results', 'batch-1.summary.json'),
    });
  });

  describe('parseBatchSummary', () => {
    it('should read a written summary', () => {
      expect(parseBatchSummary(JSON.stringify(summary))).toEqual(summary);
    });

    it('should return null for content that is not JSON', () => {
      expect(parseBatchSummary('{"batchId": ')).toBeNull();
    });

    it('should return null when fields are missing or mistyped', () => {
      expect(parseBatchSummary(JSON.stringify({ ...summary, stats: undefined }))).toBeNull();
      expect(parseBatchSummary(JSON.stringify({ ...summary, processedCount: -1 }))).toBeNull();
      expect(parseBatchSummary(JSON.stringify({ ...summary, stats: { ...summary.stats, byTier: {} } }))).toBeNull();
    });
  });
});
