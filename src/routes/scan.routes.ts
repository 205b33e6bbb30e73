/**
 * Scan Routes
 *
 * POST /api/scan groups a directory tree into book entities.
 */

import { Router, Request, Response } from 'express';
import type { AudiobookLibrary } from '../services/library.service.js';
import { createServiceLogger } from '../services/logger.service.js';
import { validateBody } from '../middleware/validation.middleware.js';
import { sendSuccess, asyncHandler } from '../middleware/response.middleware.js';
import { ScanRequestSchema } from '../schemas/entity.schemas.js';

const logger = createServiceLogger('scan-routes');

export function createScanRoutes(library: AudiobookLibrary): Router {
  const router = Router();

  /**
   * POST /api/scan
   * Body: { rootPath: string, resolve?: boolean }
   */
  router.post('/', validateBody(ScanRequestSchema), asyncHandler(async (req: Request, res: Response) => {
    const { rootPath, resolve } = ScanRequestSchema.parse(req.body);

    logger.info({ rootPath, resolve }, 'Scan requested');
    const result = await library.scan(rootPath, { resolve });

    sendSuccess(res, result, undefined, 201);
  }));

  return router;
}

export default createScanRoutes;
