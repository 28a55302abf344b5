import request from 'supertest';
import type { Express } from 'express';
import { describe, it, expect, beforeAll } from 'vitest';
import { err } from '../../src/domain/result.js';
import { createAppError, ErrorCode } from '../../src/domain/errors.js';
import { createApp } from '../../src/api/app.js';
import { StubProvider } from '../../src/infrastructure/llm/stub.js';
import type { LLMProvider } from '../../src/infrastructure/llm/types.js';
import { testCatalog, validCandidate } from '../fixtures/deeds.js';

describe('App', () => {
  let app: Express;

  beforeAll(() => {
    app = createApp({ llm: new StubProvider(JSON.stringify(validCandidate())), catalog: testCatalog });
  });

  describe('GET /health', () => {
    it('reports status and catalog size', async () => {
      const response = await request(app).get('/health');

      expect(response.status).toBe(200);
      expect(response.body).toHaveProperty('status', 'ok');
      expect(response.body).toHaveProperty('counties', 4);
      expect(response.body).toHaveProperty('timestamp');
    });
  });

  describe('POST /deeds/validate', () => {
    it('returns the enriched deed for an accepted record', async () => {
      const response = await request(app).post('/deeds/validate').send({ record: validCandidate() });

      expect(response.status).toBe(200);
      expect(response.body.success).toBe(true);
      expect(response.body.error).toBeNull();
      expect(response.body.data).toMatchObject({
        documentId: 'DEED-TRUST-0042',
        countyCanonical: 'Santa Clara',
        taxRate: 1.25,
        amountCents: 125_000_000,
      });
    });

    it('returns 422 with the reason and failing stage for a rejected record', async () => {
      const response = await request(app)
        .post('/deeds/validate')
        .send({ record: validCandidate({ date_recorded: '2024-01-09' }) });

      expect(response.status).toBe(422);
      expect(response.body).toEqual({
        success: false,
        data: null,
        error: {
          code: 'INVALID_DATE_ORDER',
          message: 'Invalid date order: recorded date (2024-01-09) is earlier than signed date (2024-01-10)',
          details: 'coerced',
          retryable: false,
        },
      });
    });

    it('returns 422 VALIDATION_ERROR when the body has no record', async () => {
      const response = await request(app).post('/deeds/validate').send({ deed: {} });

      expect(response.status).toBe(422);
      expect(response.body.error.code).toBe('VALIDATION_ERROR');
      expect(response.body.error.message).toBe('Invalid request body');
    });

    it('returns 422 VALIDATION_ERROR for a body that is not valid JSON', async () => {
      const response = await request(app)
        .post('/deeds/validate')
        .set('Content-Type', 'application/json')
        .send('{"record": ');

      expect(response.status).toBe(422);
      expect(response.body.success).toBe(false);
      expect(response.body.error.code).toBe('VALIDATION_ERROR');
      expect(response.body.error.message).toBe('Request body is not valid JSON');
      expect(response.body.error.retryable).toBe(false);
    });
  });

  describe('POST /deeds/process', () => {
    it('extracts and validates the document text', async () => {
      const response = await request(app).post('/deeds/process').send({ text: 'raw deed text' });

      expect(response.status).toBe(200);
      expect(response.body.data.countyCanonical).toBe('Santa Clara');
    });

    it('returns 422 VALIDATION_ERROR for empty text', async () => {
      const response = await request(app).post('/deeds/process').send({ text: '' });

      expect(response.status).toBe(422);
      expect(response.body.error.code).toBe('VALIDATION_ERROR');
      expect(response.body.error.details).toBe('text: Document text is required');
    });

    it('returns 502 when extraction fails', async () => {
      const failing: LLMProvider = {
        chat: async () => err(createAppError(ErrorCode.LLM_API_ERROR, 'Groq API returned 503', true)),
      };
      const failingApp = createApp({ llm: failing, catalog: testCatalog });

      const response = await request(failingApp).post('/deeds/process').send({ text: 'raw deed text' });

      expect(response.status).toBe(502);
      expect(response.body.error).toEqual({
        code: 'EXTRACTION_FAILURE',
        message: 'Extraction failed [LLM_API_ERROR]: Groq API returned 503',
        details: 'received',
        retryable: false,
      });
    });
  });

  describe('GET /openapi.json', () => {
    it('serves the API description', async () => {
      const response = await request(app).get('/openapi.json');

      expect(response.status).toBe(200);
      expect(response.body.info.title).toBe('Deed Validation API');
    });
  });
});
