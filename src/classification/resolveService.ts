/**
 * Service Disambiguation
 *
 * An account can carry several concurrent services (two compactors, one
 * for trash and one for OCC). The equipment + material pair picks one.
 *
 * Resolution policy:
 * - exact (account, equipment, material) entry → RESOLVED
 * - exactly one entry for (account, equipment) → RESOLVED on equipment alone
 * - several entries remain → AMBIGUOUS (reported, never tie-broken)
 * - no entry for (account, equipment) → NOT_FOUND
 */

import { UNCLASSIFIED } from './constants';
import { toLookupKey } from './normalizeText';
import type { CompiledServiceMap, ExtractedLabel, ServiceResolution } from './types';

/**
 * @example
 * resolveService('ACCT-1', '30YD Compactor', 'OCC', ruleSet.services)
 * // { status: 'RESOLVED', serviceId: '73913', matchedOn: 'equipment+material' }
 */
export function resolveService(
  accountIdentifier: string,
  parsedEquipment: ExtractedLabel,
  parsedMaterial: ExtractedLabel,
  serviceMap: CompiledServiceMap
): ServiceResolution {
  if (parsedEquipment === UNCLASSIFIED) {
    return { status: 'NOT_FOUND' };
  }

  const accountEntries = serviceMap.byAccount.get(toLookupKey(accountIdentifier)) ?? [];
  const equipmentKey = toLookupKey(parsedEquipment);
  const sameEquipment = accountEntries.filter((entry) => toLookupKey(entry.equipment) === equipmentKey);

  if (sameEquipment.length === 0) {
    return { status: 'NOT_FOUND' };
  }

  if (parsedMaterial !== UNCLASSIFIED) {
    const materialKey = toLookupKey(parsedMaterial);
    const exact = sameEquipment.find((entry) => toLookupKey(entry.material) === materialKey);
    if (exact) {
      return { status: 'RESOLVED', serviceId: exact.serviceId, matchedOn: 'equipment+material' };
    }
  }

  if (sameEquipment.length === 1) {
    return { status: 'RESOLVED', serviceId: sameEquipment[0].serviceId, matchedOn: 'equipment' };
  }

  return {
    status: 'AMBIGUOUS',
    candidateServiceIds: sameEquipment.map((entry) => entry.serviceId),
  };
}

export default resolveService;
