/**
 * Small rule tables for classification tests. The shipped tables under
 * data/ are exercised separately.
 */

import { readFileSync } from 'fs';
import path from 'path';
import type { LineItem, RuleSetSources } from '../../src/classification';

export const equipmentAliases = [
  { label: 'Split Body {1}YD', patterns: [{ regex: '\\bSPLIT\\s*BODY\\s*(\\d+)\\s*YD\\b' }] },
  { label: '{1}YD Compactor', patterns: [{ regex: '\\b(\\d+)\\s*YD\\s*COMPACTOR\\b' }] },
  { label: '{1}YD Container', patterns: [{ regex: '\\b(\\d+)\\s*YD\\b' }] },
  { label: 'Compactor', patterns: [{ contains: 'compactor' }] },
];

export const materialAliases = [
  { label: 'OCC', patterns: [{ regex: '\\bOCC\\b' }, { contains: 'cardboard' }] },
  { label: 'Trash', patterns: [{ regex: '\\bTRASH\\b' }, { regex: '\\bMSW\\b' }] },
];

export const chargePatterns = [
  { id: 'lw-haul', vendor: 'Lawrence Waste', pattern: '\\bHAUL\\b', chargeType: 'Empty & Return', serviceType: 'On Call' },
  { id: 'occ-monthly', vendor: null, pattern: 'MONTHLY', chargeType: 'Recycling Monthly', serviceType: 'Recurring', material: 'OCC' },
  { id: 'monthly', vendor: null, pattern: 'MONTHLY.*FEE', chargeType: 'Monthly Service Commercial', serviceType: 'Recurring' },
  { id: 'haul', vendor: null, pattern: '\\bHAUL\\b', chargeType: 'Haul', serviceType: 'On Call' },
];

export const accountServices = [
  { accountIdentifier: 'LW-100245', equipment: '30YD Compactor', material: 'Trash', serviceId: '73912' },
  { accountIdentifier: 'LW-100245', equipment: '30YD Compactor', material: 'OCC', serviceId: '73913' },
  { accountIdentifier: 'LW-100245', equipment: '8YD Container', material: 'Trash', serviceId: 73914 },
  { accountIdentifier: 'RMP-55810', equipment: '42YD Compactor', material: 'Trash', serviceId: '80221' },
];

export const fixtureSources = (): RuleSetSources => ({
  equipment: equipmentAliases,
  material: materialAliases,
  charges: chargePatterns,
  services: accountServices,
});

const DATA_DIR = path.join(__dirname, '..', '..', 'data');

const readJson = (file: string): unknown => JSON.parse(readFileSync(path.join(DATA_DIR, file), 'utf-8'));

/**
 * The tables shipped in data/
 */
export const shippedSources = (): RuleSetSources => ({
  equipment: readJson('equipment-aliases.json'),
  material: readJson('material-aliases.json'),
  charges: readJson('charge-patterns.json'),
  services: readJson('account-services.json'),
});

export const lineItem = (overrides: Partial<LineItem> = {}): LineItem => ({
  vendorName: 'Rumpke',
  accountIdentifier: 'RMP-55810',
  rawDescription: '42YD COMPACTOR MONTHLY FEE',
  amount: 811,
  quantity: 1,
  unitPrice: 811,
  serviceDate: null,
  ...overrides,
});
