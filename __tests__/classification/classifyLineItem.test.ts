import {
  UNCLASSIFIED,
  buildRuleSet,
  classifyLineItem,
  classifyLineItems,
} from '../../src/classification';
import { fixtureSources, lineItem, shippedSources } from '../fixtures/ruleTables';

describe('classifyLineItem', () => {
  const ruleSet = buildRuleSet(fixtureSources());

  describe('with fixture tables', () => {
    it('should classify a default-tier monthly fee and resolve its service', () => {
      const result = classifyLineItem(lineItem({ rawDescription: '42 yd. Compactor -- Monthly Fee' }), ruleSet);

      expect(result).toEqual({
        ...lineItem({ rawDescription: '42 yd. Compactor -- Monthly Fee' }),
        normalizedDescription: '42 YD COMPACTOR MONTHLY FEE',
        parsedEquipment: '42YD Compactor',
        parsedMaterial: UNCLASSIFIED,
        chargeType: 'Monthly Service Commercial',
        serviceType: 'Recurring',
        matchTier: 'default',
        matchedRuleId: 'monthly',
        serviceResolution: { status: 'RESOLVED', serviceId: '80221', matchedOn: 'equipment' },
        resolvedServiceId: '80221',
      });
    });

    it('should apply the vendor rule and resolve on equipment and material', () => {
      const result = classifyLineItem(
        lineItem({
          vendorName: 'Lawrence Waste',
          accountIdentifier: 'LW-100245',
          rawDescription: '30YD Compactor OCC Haul',
        }),
        ruleSet
      );

      expect(result.chargeType).toBe('Empty & Return');
      expect(result.matchTier).toBe('vendor-specific');
      expect(result.parsedEquipment).toBe('30YD Compactor');
      expect(result.parsedMaterial).toBe('OCC');
      expect(result.serviceResolution).toEqual({
        status: 'RESOLVED',
        serviceId: '73913',
        matchedOn: 'equipment+material',
      });
    });

    it('should report an ambiguous service and an unclassified charge as data', () => {
      const result = classifyLineItem(
        lineItem({
          vendorName: 'Lawrence Waste',
          accountIdentifier: 'LW-100245',
          rawDescription: '30YD COMPACTOR EXTRA LIFT',
        }),
        ruleSet
      );

      expect(result.chargeType).toBe(UNCLASSIFIED);
      expect(result.matchTier).toBe('unclassified');
      expect(result.matchedRuleId).toBeNull();
      expect(result.serviceResolution).toEqual({ status: 'AMBIGUOUS', candidateServiceIds: ['73912', '73913'] });
      expect(result.resolvedServiceId).toBeNull();
    });

    it('should handle an empty description', () => {
      const result = classifyLineItem(lineItem({ rawDescription: '  ' }), ruleSet);

      expect(result.normalizedDescription).toBe('');
      expect(result.parsedEquipment).toBe(UNCLASSIFIED);
      expect(result.chargeType).toBe(UNCLASSIFIED);
      expect(result.serviceResolution).toEqual({ status: 'NOT_FOUND' });
    });
  });

  describe('with shipped tables', () => {
    const shipped = buildRuleSet(shippedSources());

    it('should classify a compactor monthly fee', () => {
      const result = classifyLineItem(lineItem({ rawDescription: '42YD COMPACTOR MONTHLY FEE' }), shipped);

      expect(result.parsedEquipment).toBe('42YD Compactor');
      expect(result.chargeType).toBe('Monthly Service Commercial');
      expect(result.matchedRuleId).toBe('default-monthly-service');
      expect(result.resolvedServiceId).toBe('80221');
    });

    it('should prefer the hauler-specific rule', () => {
      const result = classifyLineItem(
        lineItem({
          vendorName: 'Lawrence Waste',
          accountIdentifier: 'LW-100245',
          rawDescription: '30YD COMPACTOR OCC HAUL',
        }),
        shipped
      );

      expect(result.matchedRuleId).toBe('lawrence-haul');
      expect(result.resolvedServiceId).toBe('73913');
    });

    it('should extract equipment and material from one description', () => {
      const result = classifyLineItem(
        lineItem({ accountIdentifier: 'LW-100245', rawDescription: '30YD COMPACTOR TRASH DISPOSAL' }),
        shipped
      );

      expect(result.parsedEquipment).toBe('30YD Compactor');
      expect(result.parsedMaterial).toBe('Trash');
      expect(result.chargeType).toBe('Disposal');
      expect(result.resolvedServiceId).toBe('73912');
    });
  });
});

describe('classifyLineItems', () => {
  it('should classify every item and summarize them', () => {
    const ruleSet = buildRuleSet(fixtureSources());
    const items = [
      lineItem(),
      lineItem({ rawDescription: 'EXTRA LIFT' }),
      lineItem({ vendorName: 'Lawrence Waste', accountIdentifier: 'LW-100245', rawDescription: '30YD COMPACTOR HAUL' }),
    ];

    const { items: classified, stats } = classifyLineItems(items, ruleSet);

    expect(classified.map((item) => item.matchTier)).toEqual(['default', 'unclassified', 'vendor-specific']);
    expect(stats.total).toBe(3);
    expect(stats.byResolution).toEqual({ RESOLVED: 1, AMBIGUOUS: 1, NOT_FOUND: 1 });
  });
});
