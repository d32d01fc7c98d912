/**
 * Rule Set Snapshot
 *
 * Compiles the four tables together. A snapshot is frozen once built; a
 * reload builds a new one rather than touching the old.
 */

import { createHash } from 'crypto';
import { compileAliasTable } from './aliasRules';
import { compileChargeTable } from './chargeRules';
import { RuleTableError } from './errors';
import { compileServiceMap } from './serviceMap';
import type { RuleSet, RuleSetSources, RuleTableIssue } from './types';

export const EQUIPMENT_TABLE_NAME = 'equipment-aliases';
export const MATERIAL_TABLE_NAME = 'material-aliases';

function collect<T>(compile: () => T, issues: RuleTableIssue[]): T | null {
  try {
    return compile();
  } catch (error) {
    if (error instanceof RuleTableError) {
      issues.push(...error.issues);
      return null;
    }
    throw error;
  }
}

/**
 * Short content hash identifying the tables a snapshot was built from.
 */
export function ruleSetVersion(sources: RuleSetSources): string {
  return createHash('sha256').update(JSON.stringify(sources)).digest('hex').slice(0, 12);
}

/**
 * Builds a snapshot from raw tables.
 *
 * @throws RuleTableError with the issues of every table, not only the first
 */
export function buildRuleSet(sources: RuleSetSources, loadedAt: Date = new Date()): RuleSet {
  const issues: RuleTableIssue[] = [];

  const equipment = collect(() => compileAliasTable(EQUIPMENT_TABLE_NAME, sources.equipment), issues);
  const material = collect(() => compileAliasTable(MATERIAL_TABLE_NAME, sources.material), issues);
  const charges = collect(() => compileChargeTable(sources.charges), issues);
  const services = collect(() => compileServiceMap(sources.services), issues);

  if (!equipment || !material || !charges || !services) {
    throw new RuleTableError(issues);
  }

  return Object.freeze({
    version: ruleSetVersion(sources),
    loadedAt,
    equipment,
    material,
    charges,
    services,
  });
}
