import request from 'supertest';
import { createApp } from '../src/app';
import { Application } from 'express';

describe('App', () => {
  let app: Application;

  beforeAll(() => {
    app = createApp();
  });

  describe('GET /', () => {
    it('should return API information', async () => {
      const response = await request(app).get('/');

      expect(response.status).toBe(200);
      expect(response.body).toHaveProperty('success', true);
      expect(response.body).toHaveProperty('message', 'Charge Mapping API');
      expect(response.body).toHaveProperty('version');
      expect(response.body).toHaveProperty('health', '/api/v1/health');
      expect(response.body).toHaveProperty('timestamp');
    });
  });

  describe('Classification routes before the rule set loads', () => {
    it('should refuse line items with 503', async () => {
      const response = await request(app)
        .post('/api/v1/classification/line-items')
        .send({
          lineItems: [{ vendorName: 'Rumpke', accountIdentifier: 'RMP-55810', rawDescription: 'TRASH PICKUP' }],
        });

      expect(response.status).toBe(503);
      expect(response.body).toHaveProperty('error', 'Rule set not loaded');
    });

    it('should refuse the rule set summary with 503', async () => {
      const response = await request(app).get('/api/v1/rules');

      expect(response.status).toBe(503);
      expect(response.body).toHaveProperty('error', 'Rule set not loaded');
    });
  });

  describe('Body parsing', () => {
    it('should accept Document AI exports larger than the default JSON limit', async () => {
      const document = { text: 'x'.repeat(2 * 1024 * 1024), entities: [] };

      const response = await request(app).post('/api/v1/classification/documents').send(document);

      expect(response.status).toBe(503);
      expect(response.body).toHaveProperty('error', 'Rule set not loaded');
    });

    it('should reject malformed JSON with 400', async () => {
      const response = await request(app)
        .post('/api/v1/classification/line-items')
        .set('Content-Type', 'application/json')
        .send('{"lineItems": [');

      expect(response.status).toBe(400);
      expect(response.body).toHaveProperty('error', 'Malformed JSON body');
    });
  });

  describe('404 Handler', () => {
    it('should return 404 for unknown routes', async () => {
      const response = await request(app).get('/unknown-route');

      expect(response.status).toBe(404);
      expect(response.body).toHaveProperty('success', false);
      expect(response.body).toHaveProperty('error', 'Route not found');
    });

    it('should return 404 for unknown API routes', async () => {
      const response = await request(app).get('/api/v1/unknown');

      expect(response.status).toBe(404);
      expect(response.body).toHaveProperty('success', false);
      expect(response.body.details).toEqual({ method: 'GET', path: '/api/v1/unknown' });
    });
  });

  describe('Security Headers', () => {
    it('should include security headers', async () => {
      const response = await request(app).get('/');

      // Helmet adds these headers
      expect(response.headers).toHaveProperty('x-content-type-options');
      expect(response.headers).toHaveProperty('x-frame-options');
    });
  });

  describe('CORS', () => {
    it('should handle CORS preflight requests', async () => {
      const response = await request(app)
        .options('/')
        .set('Origin', 'http://localhost:8080')
        .set('Access-Control-Request-Method', 'GET');

      expect(response.status).toBe(204);
    });
  });
});
