/**
 * Validation Middleware
 *
 * Request validation using Zod schemas.
 * Validates body, query, and params.
 */

import { Request, Response, NextFunction } from 'express';
import { z, ZodError, ZodSchema } from 'zod';

// =============================================================================
// Types
// =============================================================================

export interface ValidationSchemas {
  body?: ZodSchema;
  query?: ZodSchema;
  params?: ZodSchema;
}

// =============================================================================
// Middleware
// =============================================================================

/**
 * Validate request against Zod schemas. Parsed values replace the raw ones.
 */
export function validate(schemas: ValidationSchemas) {
  return async (req: Request, res: Response, next: NextFunction) => {
    try {
      if (schemas.body) {
        req.body = await schemas.body.parseAsync(req.body);
      }
      if (schemas.query) {
        req.query = await schemas.query.parseAsync(req.query);
      }
      if (schemas.params) {
        req.params = await schemas.params.parseAsync(req.params);
      }
      next();
    } catch (error) {
      if (error instanceof ZodError) {
        res.status(400).json({
          success: false,
          error: {
            code: 'VALIDATION_ERROR',
            message: 'Request validation failed',
            details: error.issues.map((e) => ({
              path: e.path.join('.'),
              message: e.message,
            })),
          },
        });
        return;
      }
      next(error);
    }
  };
}

export function validateBody<T extends ZodSchema>(schema: T) {
  return validate({ body: schema });
}

export function validateQuery<T extends ZodSchema>(schema: T) {
  return validate({ query: schema });
}

export function validateParams<T extends ZodSchema>(schema: T) {
  return validate({ params: schema });
}

// =============================================================================
// Common Schemas
// =============================================================================

/** Entity ids are truncated sha-256 hex digests */
export const EntityIdParamSchema = z.object({
  id: z.string().regex(/^[0-9a-f]{16}$/, 'Invalid entity ID format'),
});
