import request from 'supertest';
import { Application } from 'express';
import { createApp } from '../src/app';
import { ruleSetService } from '../src/services';
import { fixtureSources } from './fixtures/ruleTables';

describe('Rule Set Endpoints', () => {
  let app: Application;

  beforeAll(() => {
    app = createApp();
  });

  describe('GET /api/v1/rules', () => {
    it('should return 503 before a rule set is loaded', async () => {
      const response = await request(app).get('/api/v1/rules');

      expect(response.status).toBe(503);
      expect(response.body).toHaveProperty('success', false);
    });

    it('should summarize the live rule set', async () => {
      const ruleSet = ruleSetService.loadFromSources(fixtureSources());

      const response = await request(app).get('/api/v1/rules');

      expect(response.status).toBe(200);
      expect(response.body.data).toEqual({
        version: ruleSet.version,
        loadedAt: ruleSet.loadedAt.toISOString(),
        equipmentRules: 4,
        materialRules: 2,
        chargeRules: 4,
        vendorSpecificRules: 1,
        defaultRules: 3,
        vendors: ['Lawrence Waste'],
        serviceEntries: 4,
        accounts: 2,
      });
    });
  });

  describe('POST /api/v1/rules/reload', () => {
    it('should load the tables from the rules directory', async () => {
      const previous = ruleSetService.current().version;

      const response = await request(app).post('/api/v1/rules/reload');

      expect(response.status).toBe(200);
      expect(response.body.message).toBe('Rule set reloaded');
      expect(response.body.data.version).not.toBe(previous);
      expect(response.body.data.chargeRules).toBe(26);
    });
  });
});
