/**
 * Account Service Map
 *
 * (account, equipment, material) → service id, sourced from billing records.
 */

import { z } from 'zod';
import { UNCLASSIFIED } from './constants';
import { RuleTableError } from './errors';
import { toLookupKey } from './normalizeText';
import { toTableIssues } from './patterns';
import type { AccountServiceEntry, CompiledServiceMap, RuleTableIssue } from './types';

export const SERVICE_MAP_NAME = 'account-services';

const requiredText = (field: string) => z.string().trim().min(1, `${field} is required`);

const serviceEntrySchema = z.object({
  accountIdentifier: requiredText('accountIdentifier'),
  equipment: requiredText('equipment'),
  material: requiredText('material'),
  serviceId: z.union([requiredText('serviceId'), z.number().int().transform(String)]),
});

export const serviceMapSchema = z.array(serviceEntrySchema);

export function compositeKey(accountIdentifier: string, equipment: string, material: string): string {
  return [accountIdentifier, equipment, material].map(toLookupKey).join('\u0000');
}

/**
 * Validates the service map and indexes it by account.
 *
 * @throws RuleTableError on schema violations or a repeated composite key
 */
export function compileServiceMap(raw: unknown): CompiledServiceMap {
  const parsed = serviceMapSchema.safeParse(raw);
  if (!parsed.success) {
    throw new RuleTableError(toTableIssues(SERVICE_MAP_NAME, parsed.error.issues));
  }

  const issues: RuleTableIssue[] = [];
  const seenKeys = new Map<string, number>();
  const byAccount = new Map<string, AccountServiceEntry[]>();

  parsed.data.forEach((entry, index) => {
    if (toLookupKey(entry.equipment) === UNCLASSIFIED || toLookupKey(entry.material) === UNCLASSIFIED) {
      issues.push({ table: SERVICE_MAP_NAME, index, message: `${UNCLASSIFIED} is reserved` });
    }

    const key = compositeKey(entry.accountIdentifier, entry.equipment, entry.material);
    const previous = seenKeys.get(key);
    if (previous !== undefined) {
      issues.push({
        table: SERVICE_MAP_NAME,
        index,
        message: `duplicate service for account "${entry.accountIdentifier}", ${entry.equipment} / ${entry.material} (first declared at ${previous})`,
      });
      return;
    }
    seenKeys.set(key, index);

    const accountKey = toLookupKey(entry.accountIdentifier);
    const entries = byAccount.get(accountKey) ?? [];
    entries.push(Object.freeze({ ...entry }));
    byAccount.set(accountKey, entries);
  });

  if (issues.length > 0) {
    throw new RuleTableError(issues);
  }

  return Object.freeze({ entryCount: parsed.data.length, byAccount });
}
