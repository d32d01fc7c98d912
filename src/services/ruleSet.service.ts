/**
 * Rule Set Service
 *
 * Owns the live RuleSet snapshot. Tables are read from RULES_DIR:
 * - equipment-aliases.json
 * - material-aliases.json
 * - charge-patterns.json | charge-patterns.csv
 * - account-services.json | account-services.csv
 *
 * A reload compiles a complete new snapshot before swapping it in; when any
 * table is invalid the previous snapshot stays live. Requests and batches that
 * already hold a snapshot keep using it.
 */

import { readFile } from 'fs/promises';
import path from 'path';
import { env } from '../config';
import {
  CHARGE_TABLE_NAME,
  EQUIPMENT_TABLE_NAME,
  MATERIAL_TABLE_NAME,
  SERVICE_MAP_NAME,
  RuleTableError,
  buildRuleSet,
  type RuleSet,
  type RuleSetSources,
  type RuleTableIssue,
} from '../classification';
import { AppError, Logging } from '../utils';
import { parseCsvRecords } from '../utils/csv';

// ============================================
// Types
// ============================================

type TableFormat = 'json' | 'csv';

interface TableFile {
  table: string;
  formats: readonly TableFormat[];
  fromCsv?: (records: Array<Record<string, string>>) => unknown[];
}

export interface RuleSetSummary {
  version: string;
  loadedAt: string;
  equipmentRules: number;
  materialRules: number;
  chargeRules: number;
  vendorSpecificRules: number;
  defaultRules: number;
  vendors: string[];
  serviceEntries: number;
  accounts: number;
}

// ============================================
// CSV Table Conversion
// ============================================

const blankToNull = (value: string | undefined): string | null => (value ? value : null);

// Non-numeric text is passed through so validation reports it
const toOptionalNumber = (value: string | undefined): number | string | undefined => {
  if (!value) return undefined;
  const parsed = Number(value);
  return Number.isNaN(parsed) ? value : parsed;
};

/**
 * Columns: id, vendor_name, invoice_pattern, charge_type, service_type,
 * priority, sample_count, equipment, material
 */
export function chargeRulesFromCsv(records: Array<Record<string, string>>): unknown[] {
  return records.map((record) => ({
    id: record.id || undefined,
    vendor: blankToNull(record.vendor_name),
    pattern: record.invoice_pattern ?? '',
    chargeType: record.charge_type ?? '',
    serviceType: blankToNull(record.service_type),
    priority: toOptionalNumber(record.priority),
    sampleCount: toOptionalNumber(record.sample_count),
    equipment: blankToNull(record.equipment),
    material: blankToNull(record.material),
  }));
}

/**
 * Columns: account_number, equipment_type (or equipment), material, service_id
 */
export function serviceEntriesFromCsv(records: Array<Record<string, string>>): unknown[] {
  return records.map((record) => ({
    accountIdentifier: record.account_number ?? '',
    equipment: record.equipment_type || record.equipment || '',
    material: record.material ?? '',
    serviceId: record.service_id ?? '',
  }));
}

const TABLE_FILES: Record<keyof RuleSetSources, TableFile> = {
  equipment: { table: EQUIPMENT_TABLE_NAME, formats: ['json'] },
  material: { table: MATERIAL_TABLE_NAME, formats: ['json'] },
  charges: { table: CHARGE_TABLE_NAME, formats: ['json', 'csv'], fromCsv: chargeRulesFromCsv },
  services: { table: SERVICE_MAP_NAME, formats: ['json', 'csv'], fromCsv: serviceEntriesFromCsv },
};

// ============================================
// File Loading
// ============================================

const isMissingFile = (error: unknown): boolean =>
  error instanceof Error && 'code' in error && error.code === 'ENOENT';

/**
 * Reads one table, trying each format in order. Problems are pushed to
 * `issues` so every table is reported in one pass.
 */
async function readTable(dir: string, file: TableFile, issues: RuleTableIssue[]): Promise<unknown> {
  for (const format of file.formats) {
    const filePath = path.join(dir, `${file.table}.${format}`);
    let content: string;
    try {
      content = await readFile(filePath, 'utf-8');
    } catch (error) {
      if (isMissingFile(error)) continue;
      throw error;
    }

    if (format === 'csv' && file.fromCsv) {
      try {
        return file.fromCsv(parseCsvRecords(content));
      } catch (error) {
        issues.push({ table: file.table, message: `unreadable CSV: ${error instanceof Error ? error.message : 'unknown error'}` });
        return null;
      }
    }

    try {
      const parsed: unknown = JSON.parse(content);
      return parsed;
    } catch (error) {
      issues.push({ table: file.table, message: `invalid JSON: ${error instanceof Error ? error.message : 'unknown error'}` });
      return null;
    }
  }

  const looked = file.formats.map((format) => `${file.table}.${format}`).join(', ');
  issues.push({ table: file.table, message: `not found in ${dir} (looked for ${looked})` });
  return null;
}

/**
 * Reads all four tables from a directory.
 *
 * @throws RuleTableError when a file is missing or unreadable
 */
export async function readRuleSetSources(dir: string): Promise<RuleSetSources> {
  const issues: RuleTableIssue[] = [];

  const [equipment, material, charges, services] = await Promise.all([
    readTable(dir, TABLE_FILES.equipment, issues),
    readTable(dir, TABLE_FILES.material, issues),
    readTable(dir, TABLE_FILES.charges, issues),
    readTable(dir, TABLE_FILES.services, issues),
  ]);

  if (issues.length > 0) {
    throw new RuleTableError(issues);
  }

  return { equipment, material, charges, services };
}

// ============================================
// Service
// ============================================

export class RuleSetService {
  private snapshot: RuleSet | null = null;

  /**
   * Compiles raw tables and swaps the result in.
   *
   * @throws RuleTableError; the previous snapshot stays live
   */
  loadFromSources(sources: RuleSetSources): RuleSet {
    const next = buildRuleSet(sources);
    const previous = this.snapshot;
    this.snapshot = next;

    if (previous?.version === next.version) {
      Logging.info(`Rule set reloaded, unchanged (version ${next.version})`);
    } else {
      Logging.success(
        `Rule set ${next.version} live: ${next.charges.rules.length} charge rules, ` +
          `${next.services.entryCount} service entries`
      );
    }
    return next;
  }

  async loadFromDirectory(dir: string = env.RULES_DIR): Promise<RuleSet> {
    const sources = await readRuleSetSources(dir);
    return this.loadFromSources(sources);
  }

  /**
   * Re-reads RULES_DIR. Failures are logged and rethrown.
   */
  async reload(dir: string = env.RULES_DIR): Promise<RuleSet> {
    try {
      return await this.loadFromDirectory(dir);
    } catch (error) {
      if (error instanceof RuleTableError) {
        Logging.warn(`Rule set reload rejected, keeping ${this.snapshot?.version ?? 'no snapshot'}: ${error.message}`);
      }
      throw error;
    }
  }

  /**
   * @throws AppError (503) before the first successful load
   */
  current(): RuleSet {
    if (!this.snapshot) {
      throw AppError.serviceUnavailable('Rule set not loaded');
    }
    return this.snapshot;
  }

  isLoaded(): boolean {
    return this.snapshot !== null;
  }

  summary(): RuleSetSummary {
    const ruleSet = this.current();
    const vendors = new Set<string>();
    let vendorSpecificRules = 0;

    for (const rule of ruleSet.charges.rules) {
      if (rule.vendorScope.kind === 'vendor') {
        vendorSpecificRules++;
        vendors.add(rule.vendorScope.vendorName);
      }
    }

    return {
      version: ruleSet.version,
      loadedAt: ruleSet.loadedAt.toISOString(),
      equipmentRules: ruleSet.equipment.rules.length,
      materialRules: ruleSet.material.rules.length,
      chargeRules: ruleSet.charges.rules.length,
      vendorSpecificRules,
      defaultRules: ruleSet.charges.rules.length - vendorSpecificRules,
      vendors: [...vendors].sort(),
      serviceEntries: ruleSet.services.entryCount,
      accounts: ruleSet.services.byAccount.size,
    };
  }
}

// Singleton instance
export const ruleSetService = new RuleSetService();

export default ruleSetService;
