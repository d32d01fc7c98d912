import {
  joinInvoiceToBilling,
  scoreAmount,
  scoreDescriptionOverlap,
  summarizeJoinedMappings,
  toAmount,
  type BillingChargeInput,
  type InvoiceLineInput,
  type JoinedMappingRow,
} from '../../src/services/billingJoin.service';

describe('Billing Join Service', () => {
  describe('toAmount', () => {
    it('should pass finite numbers through', () => {
      expect(toAmount(811)).toBe(811);
      expect(toAmount(Number.NaN)).toBeNull();
    });

    it('should parse currency text', () => {
      expect(toAmount('$1,250.50')).toBe(1250.5);
      expect(toAmount('')).toBeNull();
      expect(toAmount(undefined)).toBeNull();
    });
  });

  describe('scoreAmount', () => {
    it('should score amounts within two cents as exact', () => {
      expect(scoreAmount(100, 100.01)).toBe(10);
    });

    it('should score amounts within a dollar as close', () => {
      expect(scoreAmount(100, 100.5)).toBe(5);
    });

    it('should not score larger differences', () => {
      expect(scoreAmount(100, 101)).toBe(0);
    });

    it('should not score missing or zero amounts', () => {
      expect(scoreAmount(null, 100)).toBe(0);
      expect(scoreAmount(0, 0)).toBe(0);
    });
  });

  describe('scoreDescriptionOverlap', () => {
    it('should count distinct shared words ignoring case', () => {
      expect(scoreDescriptionOverlap('Monthly monthly FEE', 'MONTHLY Service Fee')).toBe(2);
    });

    it('should return 0 for an empty description', () => {
      expect(scoreDescriptionOverlap('', 'MONTHLY')).toBe(0);
    });
  });

  describe('joinInvoiceToBilling', () => {
    const invoiceLines: InvoiceLineInput[] = [
      { documentId: 'ABC123', description: 'MONTHLY EQUIPMENT FEE', amount: 811, vendorName: 'Rumpke' },
      { documentId: 'ABC123', description: 'FUEL SURCHARGE', amount: '42.50' },
      { documentId: 'ABC123', description: 'EXTRA LIFT', amount: 75 },
      { documentId: 'XYZ789', description: 'TRASH PICKUP', amount: 120 },
    ];
    const billingCharges: BillingChargeInput[] = [
      { documentId: ' abc123 ', chargeDescription: 'Monthly Service Commercial', cost: 811, serviceId: '80221' },
      { documentId: 'abc123', chargeDescription: 'Fuel Surcharge', cost: '$42.17', serviceType: 'Recurring' },
      { documentId: 'other', chargeDescription: 'Delivery', cost: 95 },
    ];

    const result = joinInvoiceToBilling(invoiceLines, billingCharges);

    it('should join lines to the best scoring charge of the same document', () => {
      expect(result.joined).toEqual([
        {
          documentId: 'abc123',
          vendorName: 'Rumpke',
          accountIdentifier: null,
          invoiceDate: null,
          invoiceDescription: 'MONTHLY EQUIPMENT FEE',
          parsedEquipment: null,
          parsedMaterial: null,
          invoiceAmount: 811,
          billingDescription: 'Monthly Service Commercial',
          billingEquipmentType: null,
          billingMaterial: null,
          billingServiceType: null,
          billingServiceId: '80221',
          billingAmount: 811,
          matchScore: 11,
          amountVariance: 0,
        },
        {
          documentId: 'abc123',
          vendorName: null,
          accountIdentifier: null,
          invoiceDate: null,
          invoiceDescription: 'FUEL SURCHARGE',
          parsedEquipment: null,
          parsedMaterial: null,
          invoiceAmount: 42.5,
          billingDescription: 'Fuel Surcharge',
          billingEquipmentType: null,
          billingMaterial: null,
          billingServiceType: 'Recurring',
          billingServiceId: null,
          billingAmount: 42.17,
          matchScore: 7,
          amountVariance: 0.33,
        },
      ]);
    });

    it('should report lines without a confident match and documents billing never saw', () => {
      expect(result.unmatched.map((row) => [row.invoiceDescription, row.reason, row.matchScore])).toEqual([
        ['EXTRA LIFT', 'NO_CONFIDENT_MATCH', 0],
        ['TRASH PICKUP', 'DOCUMENT_NOT_IN_BILLING', 0],
      ]);
    });

    it('should count documents and rows', () => {
      expect(result.counts).toEqual({
        invoiceDocuments: 2,
        billingDocuments: 2,
        commonDocuments: 1,
        joinedRows: 2,
        unmatchedRows: 2,
        exactAmountMatches: 1,
      });
    });

    it('should keep the first charge when scores tie', () => {
      const { joined } = joinInvoiceToBilling(
        [{ documentId: 'd1', description: 'HAUL', amount: 200 }],
        [
          { documentId: 'd1', chargeDescription: 'Haul A', cost: 200 },
          { documentId: 'd1', chargeDescription: 'Haul B', cost: 200 },
        ]
      );

      expect(joined[0].billingDescription).toBe('Haul A');
    });

    it('should fall back to price when cost is missing', () => {
      const { joined } = joinInvoiceToBilling(
        [{ documentId: 'd1', description: 'RENT', amount: 811 }],
        [{ documentId: 'd1', chargeDescription: 'Container Rental', cost: null, price: '811.00' }]
      );

      expect(joined[0].billingAmount).toBe(811);
      expect(joined[0].matchScore).toBe(10);
    });

    it('should join on words alone and leave the variance empty without an invoice amount', () => {
      const { joined } = joinInvoiceToBilling(
        [{ documentId: 'd1', description: '30 YD COMPACTOR TRASH HAUL' }],
        [{ documentId: 'd1', chargeDescription: '30 YD Compactor Trash Haul', cost: 450 }]
      );

      expect(joined[0].matchScore).toBe(5);
      expect(joined[0].amountVariance).toBeNull();
    });

    it('should not match below the minimum score', () => {
      const { joined, unmatched } = joinInvoiceToBilling(
        [{ documentId: 'd1', description: 'COMPACTOR TRASH HAUL', amount: 10 }],
        [{ documentId: 'd1', chargeDescription: 'Compactor Trash Haul', cost: 450 }]
      );

      expect(joined).toEqual([]);
      expect(unmatched[0].matchScore).toBe(3);
    });
  });

  describe('summarizeJoinedMappings', () => {
    const row = (invoiceDescription: string, billingDescription: string): JoinedMappingRow => ({
      documentId: 'd1',
      vendorName: null,
      accountIdentifier: null,
      invoiceDate: null,
      invoiceDescription,
      parsedEquipment: null,
      parsedMaterial: null,
      invoiceAmount: null,
      billingDescription,
      billingEquipmentType: null,
      billingMaterial: null,
      billingServiceType: null,
      billingServiceId: null,
      billingAmount: null,
      matchScore: 10,
      amountVariance: null,
    });

    const rows = [
      row('TRASH', 'Monthly Service'),
      row('FUEL', 'Fuel Surcharge'),
      row('TRASH', 'Monthly Service'),
      row('FUEL', 'Fuel'),
    ];

    it('should count pairs by frequency, then by description', () => {
      expect(summarizeJoinedMappings(rows)).toEqual([
        { invoiceDescription: 'TRASH', billingDescription: 'Monthly Service', count: 2 },
        { invoiceDescription: 'FUEL', billingDescription: 'Fuel', count: 1 },
        { invoiceDescription: 'FUEL', billingDescription: 'Fuel Surcharge', count: 1 },
      ]);
    });

    it('should apply the limit', () => {
      expect(summarizeJoinedMappings(rows, 1)).toHaveLength(1);
    });
  });
});
