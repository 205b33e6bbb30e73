/**
 * Entity Routes
 *
 * API endpoints for the approval UI:
 * - Listing and reading book entities
 * - Resolving one entity or a batch
 * - Approving/rejecting and saving
 */

import { Router, Request, Response } from 'express';
import type { AudiobookLibrary } from '../services/library.service.js';
import { createServiceLogger } from '../services/logger.service.js';
import { validate, validateBody, validateParams, validateQuery, EntityIdParamSchema } from '../middleware/validation.middleware.js';
import { sendSuccess, asyncHandler } from '../middleware/response.middleware.js';
import {
  ListEntitiesQuerySchema,
  ResolveAllSchema,
  SetStatusSchema,
} from '../schemas/entity.schemas.js';

const logger = createServiceLogger('entity-routes');

export function createEntityRoutes(library: AudiobookLibrary): Router {
  const router = Router();

  // ===========================================================================
  // Collection Endpoints (must be before /:id routes)
  // ===========================================================================

  /**
   * GET /api/entities
   * List entities, optionally filtered by approval status
   */
  router.get('/', validateQuery(ListEntitiesQuerySchema), (req: Request, res: Response) => {
    const { status } = ListEntitiesQuerySchema.parse(req.query);
    const entities = library.listEntities(status ? { status } : {});
    sendSuccess(res, { entities }, { total: entities.length });
  });

  /**
   * POST /api/entities/save
   * Merge changed entities into the persisted document
   */
  router.post('/save', asyncHandler(async (_req: Request, res: Response) => {
    const result = await library.save();
    sendSuccess(res, result);
  }));

  /**
   * POST /api/entities/load
   * Reload the persisted document into memory
   */
  router.post('/load', asyncHandler(async (_req: Request, res: Response) => {
    const result = await library.load();
    sendSuccess(res, result);
  }));

  /**
   * POST /api/entities/resolve
   * Resolve every entity (or those with a given status)
   * Body: { status?, concurrency? }
   */
  router.post('/resolve', validateBody(ResolveAllSchema), asyncHandler(async (req: Request, res: Response) => {
    const { status, concurrency } = ResolveAllSchema.parse(req.body);
    const result = await library.resolveAll({ status, concurrency });
    logger.info({ resolved: result.resolved, failed: result.failed }, 'Batch resolve requested');
    sendSuccess(res, result);
  }));

  // ===========================================================================
  // Single Entity Endpoints
  // ===========================================================================

  /**
   * GET /api/entities/:id
   */
  router.get('/:id', validateParams(EntityIdParamSchema), (req: Request, res: Response) => {
    const { id } = EntityIdParamSchema.parse(req.params);
    sendSuccess(res, { entity: library.getEntity(id) });
  });

  /**
   * POST /api/entities/:id/resolve
   * Run one cascade pass for an entity
   */
  router.post('/:id/resolve', validateParams(EntityIdParamSchema), asyncHandler(async (req: Request, res: Response) => {
    const { id } = EntityIdParamSchema.parse(req.params);
    const entity = await library.resolve(id);
    sendSuccess(res, { entity });
  }));

  /**
   * PUT /api/entities/:id/status
   * Body: { status: 'pending' | 'approved' | 'rejected' }
   */
  router.put(
    '/:id/status',
    validate({ params: EntityIdParamSchema, body: SetStatusSchema }),
    (req: Request, res: Response) => {
      const { id } = EntityIdParamSchema.parse(req.params);
      const { status } = SetStatusSchema.parse(req.body);
      sendSuccess(res, { entity: library.setStatus(id, status) });
    }
  );

  return router;
}

export default createEntityRoutes;
