/**
 * Validation Middleware Tests
 */

import { describe, it, expect } from 'vitest';
import express, { type Express } from 'express';
import request from 'supertest';
import { z } from 'zod';
import { EntityIdParamSchema, validate, validateBody, validateParams, validateQuery } from '../validation.middleware.js';

function appWith(setup: (app: Express) => void): Express {
  const app = express();
  app.use(express.json());
  setup(app);
  return app;
}

describe('Validation Middleware', () => {
  describe('validate', () => {
    it('should pass a valid body through with defaults applied', async () => {
      const schema = z.object({ name: z.string(), verbose: z.boolean().default(false) });
      const app = appWith((a) => a.post('/', validateBody(schema), (req, res) => {
        res.json(req.body);
      }));

      const response = await request(app).post('/').send({ name: 'Test', extra: 1 });

      expect(response.status).toBe(200);
      expect(response.body).toEqual({ name: 'Test', verbose: false });
    });

    it('should return 400 with details for an invalid body', async () => {
      const schema = z.object({ name: z.string(), age: z.number() });
      const app = appWith((a) => a.post('/', validateBody(schema), (_req, res) => {
        res.json({ reached: true });
      }));

      const response = await request(app).post('/').send({ name: 'Test', age: 'old' });

      expect(response.status).toBe(400);
      expect(response.body.success).toBe(false);
      expect(response.body.error.code).toBe('VALIDATION_ERROR');
      expect(response.body.error.message).toBe('Request validation failed');
      expect(response.body.error.details).toEqual([{ path: 'age', message: 'Expected number, received string' }]);
    });

    it('should check body and params together', async () => {
      const app = appWith((a) => a.put(
        '/:id',
        validate({ params: EntityIdParamSchema, body: z.object({ status: z.enum(['pending', 'approved']) }) }),
        (_req, res) => {
          res.json({ reached: true });
        }
      ));

      const ok = await request(app).put('/0123456789abcdef').send({ status: 'approved' });
      const bad = await request(app).put('/0123456789abcdef').send({ status: 'unknown' });

      expect(ok.body).toEqual({ reached: true });
      expect(bad.status).toBe(400);
      expect(bad.body.error.details[0].path).toBe('status');
    });
  });

  describe('validateQuery', () => {
    it('should validate query strings', async () => {
      const schema = z.object({ status: z.enum(['pending', 'approved']).optional() });
      const app = appWith((a) => a.get('/', validateQuery(schema), (req, res) => {
        res.json(req.query);
      }));

      expect((await request(app).get('/?status=approved')).body).toEqual({ status: 'approved' });
      expect((await request(app).get('/?status=other')).status).toBe(400);
    });
  });

  describe('validateParams', () => {
    it('should accept only 16-digit hex entity ids', async () => {
      const app = appWith((a) => a.get('/:id', validateParams(EntityIdParamSchema), (req, res) => {
        res.json(req.params);
      }));

      expect((await request(app).get('/0123456789abcdef')).body).toEqual({ id: '0123456789abcdef' });
      expect((await request(app).get('/0123456789ABCDEF')).status).toBe(400);
      expect((await request(app).get('/abc')).body.error.details).toEqual([
        { path: 'id', message: 'Invalid entity ID format' },
      ]);
    });
  });
});
