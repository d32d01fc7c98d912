/**
 * Aggregate statistics for rule-table maintenance: which vendors need more
 * vendor-specific rules, which accounts have ambiguous service data, which
 * descriptions no rule covers yet.
 */

import { TOP_UNCLASSIFIED_LIMIT } from './constants';
import { toLookupKey } from './normalizeText';
import type {
  ClassificationStats,
  ClassifiedLineItem,
  DescriptionCount,
  MatchTier,
  ResolutionStatus,
} from './types';

export interface StatsAccumulator {
  add(item: ClassifiedLineItem): void;
  addAll(items: readonly ClassifiedLineItem[]): void;
  snapshot(): ClassificationStats;
}

const increment = (counts: Map<string, number>, key: string): void => {
  counts.set(key, (counts.get(key) ?? 0) + 1);
};

// Sorted by key so equal inputs serialize identically
const toRecord = (counts: Map<string, number>): Record<string, number> =>
  Object.fromEntries([...counts.entries()].sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0)));

/**
 * Counts under the lookup key and reports each under the first spelling seen,
 * so "Rumpke" and "RUMPKE " share one entry.
 */
class NameCounter {
  private readonly labels = new Map<string, string>();
  private readonly counts = new Map<string, number>();

  add(name: string): void {
    const key = toLookupKey(name);
    if (!this.labels.has(key)) {
      this.labels.set(key, name.trim());
    }
    increment(this.counts, key);
  }

  toRecord(): Record<string, number> {
    const byLabel = new Map<string, number>();
    for (const [key, count] of this.counts) {
      byLabel.set(this.labels.get(key) ?? key, count);
    }
    return toRecord(byLabel);
  }
}

/**
 * Incremental form used by the batch worker, which folds one chunk at a time.
 */
export function createStatsAccumulator(topLimit: number = TOP_UNCLASSIFIED_LIMIT): StatsAccumulator {
  let total = 0;
  const byTier: Record<MatchTier, number> = { 'vendor-specific': 0, default: 0, unclassified: 0 };
  const byResolution: Record<ResolutionStatus, number> = { RESOLVED: 0, AMBIGUOUS: 0, NOT_FOUND: 0 };
  const unclassifiedByVendor = new NameCounter();
  const ambiguousByAccount = new NameCounter();
  const ruleHits = new Map<string, number>();
  const unclassifiedDescriptions = new Map<string, number>();

  const add = (item: ClassifiedLineItem): void => {
    total++;
    byTier[item.matchTier]++;
    byResolution[item.serviceResolution.status]++;

    if (item.matchedRuleId) {
      increment(ruleHits, item.matchedRuleId);
    }
    if (item.matchTier === 'unclassified') {
      unclassifiedByVendor.add(item.vendorName);
      if (item.normalizedDescription) {
        increment(unclassifiedDescriptions, item.normalizedDescription);
      }
    }
    if (item.serviceResolution.status === 'AMBIGUOUS') {
      ambiguousByAccount.add(item.accountIdentifier);
    }
  };

  const topUnclassified = (): DescriptionCount[] =>
    [...unclassifiedDescriptions.entries()]
      .map(([description, count]) => ({ description, count }))
      .sort((a, b) => b.count - a.count || (a.description < b.description ? -1 : 1))
      .slice(0, topLimit);

  return {
    add,
    addAll: (items) => items.forEach(add),
    snapshot: () => ({
      total,
      byTier: { ...byTier },
      byResolution: { ...byResolution },
      unclassifiedByVendor: unclassifiedByVendor.toRecord(),
      ambiguousByAccount: ambiguousByAccount.toRecord(),
      ruleHits: toRecord(ruleHits),
      topUnclassifiedDescriptions: topUnclassified(),
    }),
  };
}

/**
 * @example
 * summarizeClassifications(items).unclassifiedByVendor // { "Rumpke": 3 }
 */
export function summarizeClassifications(items: readonly ClassifiedLineItem[]): ClassificationStats {
  const accumulator = createStatsAccumulator();
  accumulator.addAll(items);
  return accumulator.snapshot();
}
