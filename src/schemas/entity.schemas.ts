/**
 * Entity Validation Schemas
 *
 * Zod schemas for entity and scan API endpoints.
 */

import { z } from 'zod';
import { ApprovalStatusSchema } from '../services/approval-store.service.js';

// =============================================================================
// Entity Schemas
// =============================================================================

export const ListEntitiesQuerySchema = z.object({
  status: ApprovalStatusSchema.optional(),
});

export const SetStatusSchema = z.object({
  status: ApprovalStatusSchema,
});

// =============================================================================
// Scan Schemas
// =============================================================================

export const ScanRequestSchema = z.object({
  rootPath: z.string().min(1, 'Root path is required'),
  resolve: z.boolean().default(false),
});

export const ResolveAllSchema = z.object({
  status: ApprovalStatusSchema.optional(),
  concurrency: z.number().int().min(1).max(16).optional(),
});

// =============================================================================
// Type Exports
// =============================================================================

export type ListEntitiesQuery = z.infer<typeof ListEntitiesQuerySchema>;
export type SetStatusInput = z.infer<typeof SetStatusSchema>;
export type ScanRequestInput = z.infer<typeof ScanRequestSchema>;
export type ResolveAllInput = z.infer<typeof ResolveAllSchema>;
