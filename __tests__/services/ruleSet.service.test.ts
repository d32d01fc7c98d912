import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import os from 'os';
import path from 'path';
import { RuleTableError } from '../../src/classification';
import {
  RuleSetService,
  chargeRulesFromCsv,
  readRuleSetSources,
  serviceEntriesFromCsv,
} from '../../src/services/ruleSet.service';
import { AppError } from '../../src/utils/AppError';
import { equipmentAliases, fixtureSources, materialAliases } from '../fixtures/ruleTables';

const DATA_DIR = path.join(__dirname, '..', '..', 'data');

describe('Rule Set Service', () => {
  let tmpDir: string;

  const writeTable = (file: string, content: unknown) => {
    writeFileSync(
      path.join(tmpDir, file),
      typeof content === 'string' ? content : JSON.stringify(content),
      'utf-8'
    );
  };

  beforeEach(() => {
    tmpDir = mkdtempSync(path.join(os.tmpdir(), 'rule-set-'));
  });

  afterEach(() => {
    rmSync(tmpDir, { recursive: true, force: true });
  });

  describe('chargeRulesFromCsv', () => {
    it('should map CSV columns to rule fields', () => {
      expect(
        chargeRulesFromCsv([
          {
            id: 'lw-haul',
            vendor_name: 'Lawrence Waste',
            invoice_pattern: '\\bHAUL\\b',
            charge_type: 'Empty & Return',
            service_type: '',
            priority: '1',
            sample_count: 'many',
            equipment: '',
            material: 'OCC',
          },
        ])
      ).toEqual([
        {
          id: 'lw-haul',
          vendor: 'Lawrence Waste',
          pattern: '\\bHAUL\\b',
          chargeType: 'Empty & Return',
          serviceType: null,
          priority: 1,
          sampleCount: 'many',
          equipment: null,
          material: 'OCC',
        },
      ]);
    });
  });

  describe('serviceEntriesFromCsv', () => {
    it('should accept either equipment column name', () => {
      expect(
        serviceEntriesFromCsv([
          { account_number: 'A-1', equipment_type: '30YD Compactor', material: 'Trash', service_id: '1' },
          { account_number: 'A-2', equipment: '8YD Container', material: 'OCC', service_id: '2' },
        ])
      ).toEqual([
        { accountIdentifier: 'A-1', equipment: '30YD Compactor', material: 'Trash', serviceId: '1' },
        { accountIdentifier: 'A-2', equipment: '8YD Container', material: 'OCC', serviceId: '2' },
      ]);
    });
  });

  describe('readRuleSetSources', () => {
    it('should read CSV tables when no JSON file exists', async () => {
      writeTable('equipment-aliases.json', equipmentAliases);
      writeTable('material-aliases.json', materialAliases);
      writeTable(
        'charge-patterns.csv',
        [
          'id,vendor_name,invoice_pattern,charge_type,service_type,priority,sample_count,equipment,material',
          'lw-haul,Lawrence Waste,\\bHAUL\\b,Empty & Return,On Call,1,64,,',
          'monthly,,MONTHLY.*FEE,Monthly Service Commercial,Recurring,99,,,',
        ].join('\n')
      );
      writeTable(
        'account-services.csv',
        ['account_number,equipment_type,material,service_id', 'LW-100245,30YD Compactor,Trash,73912'].join('\n')
      );

      const sources = await readRuleSetSources(tmpDir);

      expect(sources.services).toEqual([
        { accountIdentifier: 'LW-100245', equipment: '30YD Compactor', material: 'Trash', serviceId: '73912' },
      ]);

      const service = new RuleSetService();
      service.loadFromSources(sources);
      expect(service.summary()).toMatchObject({
        chargeRules: 2,
        vendorSpecificRules: 1,
        defaultRules: 1,
        vendors: ['Lawrence Waste'],
        serviceEntries: 1,
        accounts: 1,
      });
    });

    it('should report every missing or unreadable table', async () => {
      writeTable('equipment-aliases.json', equipmentAliases);
      writeTable('material-aliases.json', '{ not json');

      const error = await readRuleSetSources(tmpDir).catch((caught: unknown) => caught);

      expect(error).toBeInstanceOf(RuleTableError);
      if (!(error instanceof RuleTableError)) return;
      expect(error.issues.map((issue) => issue.table).sort()).toEqual([
        'account-services',
        'charge-patterns',
        'material-aliases',
      ]);
      expect(error.issues.find((issue) => issue.table === 'charge-patterns')?.message).toBe(
        `not found in ${tmpDir} (looked for charge-patterns.json, charge-patterns.csv)`
      );
    });
  });

  describe('RuleSetService', () => {
    it('should refuse to serve before the first load', () => {
      const service = new RuleSetService();

      expect(service.isLoaded()).toBe(false);
      expect(() => service.current()).toThrow(AppError);
      expect(() => service.current()).toThrow('Rule set not loaded');
    });

    it('should load the shipped tables', async () => {
      const service = new RuleSetService();
      const ruleSet = await service.loadFromDirectory(DATA_DIR);

      expect(service.current()).toBe(ruleSet);
      expect(service.summary()).toMatchObject({
        version: ruleSet.version,
        equipmentRules: 15,
        materialRules: 11,
        chargeRules: 26,
        vendorSpecificRules: 8,
        defaultRules: 18,
        vendors: ['GFL Environmental', 'Lawrence Waste', 'Republic Services', 'Rumpke', 'Waste Management - National'],
        serviceEntries: 4,
        accounts: 2,
      });
    });

    it('should keep the previous snapshot when a reload fails', async () => {
      const service = new RuleSetService();
      const first = service.loadFromSources(fixtureSources());

      writeTable('equipment-aliases.json', equipmentAliases);
      writeTable('material-aliases.json', materialAliases);
      writeTable('charge-patterns.json', [{ pattern: '(', chargeType: 'Broken' }]);
      writeTable('account-services.json', []);

      await expect(service.reload(tmpDir)).rejects.toThrow(RuleTableError);
      expect(service.current()).toBe(first);
    });

    it('should swap in a new snapshot on a successful reload', async () => {
      const service = new RuleSetService();
      const first = service.loadFromSources(fixtureSources());

      const second = await service.reload(DATA_DIR);

      expect(second.version).not.toBe(first.version);
      expect(service.current()).toBe(second);
    });
  });
});
