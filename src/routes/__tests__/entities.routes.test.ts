/**
 * Entity and Scan Routes API Tests
 *
 * Drives the full app through supertest against a temp library tree and
 * store. Tags are never readable, so names alone drive resolution.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import type { Express } from 'express';
import request from 'supertest';
import { mkdir, mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { dirname, join } from 'path';

vi.mock('music-metadata', () => ({
  parseFile: vi.fn(async () => {
    throw new Error('Unsupported container');
  }),
}));

import { createApp, VERSION } from '../../app.js';
import { getDefaultConfig } from '../../services/config.service.js';
import { ApprovalStore } from '../../services/approval-store.service.js';
import { AudiobookLibrary } from '../../services/library.service.js';
import { CascadeResolver } from '../../services/resolver.service.js';
import { createHeuristicAdapter } from '../../services/source-adapters/heuristic.adapter.js';
import { candidateId } from '../../services/grouper/index.js';

const BLADEBORN = [
  'The Bladeborn Saga/01 - The Song of the First Blade.mp3',
  'The Bladeborn Saga/02 - Ghost of the Shadowfort.mp3',
];
const FIRST_ID = candidateId(BLADEBORN[0] ?? '');
const MISSING_ID = 'ffffffffffffffff';

// =============================================================================
// Test Setup
// =============================================================================

describe('Entity Routes', () => {
  let workDir: string;
  let root: string;
  let app: Express;

  beforeEach(async () => {
    workDir = await mkdtemp(join(tmpdir(), 'routes-test-'));
    root = join(workDir, 'library');
    for (const file of BLADEBORN) {
      await mkdir(dirname(join(root, file)), { recursive: true });
      await writeFile(join(root, file), '');
    }

    const config = getDefaultConfig();
    const library = new AudiobookLibrary({
      store: new ApprovalStore(join(workDir, 'entities.json')),
      resolver: new CascadeResolver({ adapters: [createHeuristicAdapter()], confidenceThreshold: 0.7, adapterTimeoutMs: 0 }),
      groupingSettings: config.grouping,
      resolverSettings: config.resolver,
      coversDir: join(workDir, 'covers'),
    });
    app = createApp(library);
  });

  afterEach(async () => {
    await rm(workDir, { recursive: true, force: true });
  });

  async function scan(resolve = false) {
    return request(app).post('/api/scan').send({ rootPath: root, resolve });
  }

  // ===========================================================================
  // Health & Fallbacks
  // ===========================================================================

  describe('GET /api/health', () => {
    it('should report status and entity count', async () => {
      await scan();

      const response = await request(app).get('/api/health');

      expect(response.status).toBe(200);
      expect(response.body.data).toMatchObject({ status: 'ok', version: VERSION, entities: 2 });
    });
  });

  it('should answer unknown API routes with 404', async () => {
    const response = await request(app).get('/api/unknown');

    expect(response.status).toBe(404);
    expect(response.body.error).toEqual({ code: 'NOT_FOUND', message: 'Route not found: GET /api/unknown' });
  });

  // ===========================================================================
  // Scan
  // ===========================================================================

  describe('POST /api/scan', () => {
    it('should scan a tree and create pending entities', async () => {
      const response = await scan(true);

      expect(response.status).toBe(201);
      expect(response.body.success).toBe(true);
      expect(response.body.data).toMatchObject({ added: 2, updated: 0, extractionErrors: 2 });
      expect(response.body.data.entityIds[0]).toBe(FIRST_ID);
      expect(response.body.data.resolution).toMatchObject({ total: 2, resolved: 2, failed: 0 });
    });

    it('should reject a missing root path', async () => {
      const response = await request(app).post('/api/scan').send({});

      expect(response.status).toBe(400);
      expect(response.body.error.code).toBe('VALIDATION_ERROR');
      expect(response.body.error.details[0].path).toBe('rootPath');
    });

    it('should report an inaccessible root as a bad request', async () => {
      const missing = join(workDir, 'nowhere');

      const response = await request(app).post('/api/scan').send({ rootPath: missing });

      expect(response.status).toBe(400);
      expect(response.body.error).toEqual({ code: 'BAD_REQUEST', message: `Scan root is not accessible: ${missing}` });
    });
  });

  // ===========================================================================
  // Entities
  // ===========================================================================

  describe('GET /api/entities', () => {
    it('should list entities with a total', async () => {
      await scan();

      const response = await request(app).get('/api/entities');

      expect(response.status).toBe(200);
      expect(response.body.data.entities).toHaveLength(2);
      expect(response.body.meta).toEqual({ total: 2 });
    });

    it('should filter by status', async () => {
      await scan();
      await request(app).put(`/api/entities/${FIRST_ID}/status`).send({ status: 'approved' });

      const response = await request(app).get('/api/entities?status=approved');

      expect(response.body.data.entities).toHaveLength(1);
      expect(response.body.data.entities[0].id).toBe(FIRST_ID);
    });

    it('should reject an unknown status filter', async () => {
      const response = await request(app).get('/api/entities?status=maybe');

      expect(response.status).toBe(400);
      expect(response.body.error.code).toBe('VALIDATION_ERROR');
    });
  });

  describe('GET /api/entities/:id', () => {
    it('should return one entity', async () => {
      await scan(true);

      const response = await request(app).get(`/api/entities/${FIRST_ID}`);

      expect(response.status).toBe(200);
      expect(response.body.data.entity.fields.title).toEqual({
        value: 'The Song of the First Blade',
        provenance: 'heuristic',
        confidence: 0.35,
      });
    });

    it('should return 404 for an unknown id', async () => {
      const response = await request(app).get(`/api/entities/${MISSING_ID}`);

      expect(response.status).toBe(404);
      expect(response.body.error).toEqual({ code: 'NOT_FOUND', message: `Entity not found: ${MISSING_ID}` });
    });

    it('should reject a malformed id', async () => {
      const response = await request(app).get('/api/entities/not-an-id');

      expect(response.status).toBe(400);
      expect(response.body.error.details).toEqual([{ path: 'id', message: 'Invalid entity ID format' }]);
    });
  });

  describe('POST /api/entities/:id/resolve', () => {
    it('should resolve one entity', async () => {
      await scan();

      const response = await request(app).post(`/api/entities/${FIRST_ID}/resolve`);

      expect(response.status).toBe(200);
      expect(response.body.data.entity.fields.seriesIndex).toEqual({ value: 1, provenance: 'heuristic', confidence: 0.4 });
      expect(response.body.data.entity.audit.noMatch).toEqual(['author']);
    });
  });

  describe('POST /api/entities/resolve', () => {
    it('should resolve the whole library', async () => {
      await scan();

      const response = await request(app).post('/api/entities/resolve').send({ concurrency: 2 });

      expect(response.status).toBe(200);
      expect(response.body.data).toMatchObject({ total: 2, resolved: 2, failed: 0, cancelled: 0 });
    });

    it('should reject an out-of-range concurrency', async () => {
      const response = await request(app).post('/api/entities/resolve').send({ concurrency: 0 });

      expect(response.status).toBe(400);
    });
  });

  describe('PUT /api/entities/:id/status', () => {
    it('should update the approval status', async () => {
      await scan();

      const response = await request(app).put(`/api/entities/${FIRST_ID}/status`).send({ status: 'rejected' });

      expect(response.status).toBe(200);
      expect(response.body.data.entity.status).toBe('rejected');
    });

    it('should reject an unknown status', async () => {
      await scan();

      const response = await request(app).put(`/api/entities/${FIRST_ID}/status`).send({ status: 'maybe' });

      expect(response.status).toBe(400);
      expect(response.body.error.details[0].path).toBe('status');
    });

    it('should return 404 for an unknown id', async () => {
      const response = await request(app).put(`/api/entities/${MISSING_ID}/status`).send({ status: 'approved' });

      expect(response.status).toBe(404);
    });
  });

  // ===========================================================================
  // Persistence
  // ===========================================================================

  describe('POST /api/entities/save and /load', () => {
    it('should save changed entities and load them back', async () => {
      await scan();

      const saved = await request(app).post('/api/entities/save');
      expect(saved.status).toBe(200);
      expect(saved.body.data).toEqual({ path: join(workDir, 'entities.json'), saved: 2, total: 2 });

      const loaded = await request(app).post('/api/entities/load');
      expect(loaded.status).toBe(200);
      expect(loaded.body.data).toEqual({ path: join(workDir, 'entities.json'), loaded: 2, skipped: 0, reseeded: 0 });
    });

    it('should report a document it cannot merge with as a persistence error', async () => {
      await scan();
      await writeFile(join(workDir, 'entities.json'), 'not json', 'utf-8');

      const response = await request(app).post('/api/entities/save');

      expect(response.status).toBe(500);
      expect(response.body.error.code).toBe('PERSISTENCE_ERROR');
    });
  });
});
