/**
 * Approval Store Service
 *
 * In-memory map of book entities with approval status, persisted to one
 * JSON document keyed by entity id. Saves merge against the document on
 * disk: only entities changed in this session overwrite their record, and
 * every other record is kept as it is.
 */

import { mkdir, readFile, rename, rm, writeFile } from 'fs/promises';
import { dirname } from 'path';
import { z } from 'zod';
import { getEntitiesDocumentPath } from './app-paths.service.js';
import { storeLogger as logger } from './logger.service.js';
import {
  emptyAudit,
  type ApprovalStatus,
  type BookEntity,
  type FieldValue,
} from '../types/book.types.js';

// =============================================================================
// Errors
// =============================================================================

/**
 * Raised when the entity document cannot be read for merging or written
 */
export class PersistenceError extends Error {
  readonly path: string;

  constructor(path: string, message: string) {
    super(`Failed to persist ${path}: ${message}`);
    this.name = 'PersistenceError';
    this.path = path;
  }
}

export class EntityNotFoundError extends Error {
  readonly entityId: string;

  constructor(entityId: string) {
    super(`Entity not found: ${entityId}`);
    this.name = 'EntityNotFoundError';
    this.entityId = entityId;
  }
}

// =============================================================================
// Document Schema
// =============================================================================

const ProvenanceSchema = z.enum(['metadata', 'catalog_api', 'language_model', 'web_search', 'heuristic', 'unresolved']);
const AdapterSourceSchema = z.enum(['catalog_api', 'language_model', 'web_search', 'heuristic']);
const CanonicalFieldSchema = z.enum(['author', 'series', 'seriesIndex', 'title']);

export const ApprovalStatusSchema = z.enum(['pending', 'approved', 'rejected']);
export const FolderPatternSchema = z.enum(['SingleFile', 'ChapteredFolder', 'MultiBookFolder', 'AuthorFolder>Book']);

const TextFieldSchema = z.object({
  value: z.string(),
  source: ProvenanceSchema,
  confidence: z.number().min(0).max(1),
});

const IndexFieldSchema = z.object({
  value: z.number().int().nullable(),
  source: ProvenanceSchema,
  confidence: z.number().min(0).max(1),
});

const AuditSchema = z.object({
  unavailable_sources: z.array(z.object({ source: AdapterSourceSchema, error: z.string() })).default([]),
  discarded: z
    .array(z.object({
      field: CanonicalFieldSchema,
      value: z.union([z.string(), z.number()]),
      confidence: z.number(),
      source: AdapterSourceSchema,
    }))
    .default([]),
  no_match: z.array(CanonicalFieldSchema).default([]),
  resolved_at: z.string().optional(),
});

export const EntityRecordSchema = z.object({
  source_path: z.string(),
  files: z.array(z.string()),
  folder_pattern: FolderPatternSchema,
  author: TextFieldSchema,
  series: TextFieldSchema,
  series_index: IndexFieldSchema,
  title: TextFieldSchema,
  cover_image_path: z.string().nullable(),
  status: ApprovalStatusSchema,
  updated_at: z.string().optional(),
  // Grouping details, optional so hand-edited documents still load
  auxiliary_files: z.array(z.string()).default([]),
  folder_name: z.string().optional(),
  work_name: z.string().optional(),
  hints: z
    .object({ author: z.string().optional(), series: z.string().optional(), confidence: z.number() })
    .default({ confidence: 0 }),
  grouping_confidence: z.number().min(0).max(1).default(0),
  audit: AuditSchema.optional(),
});

export type EntityRecord = z.input<typeof EntityRecordSchema>;
type ParsedEntityRecord = z.output<typeof EntityRecordSchema>;

const DocumentSchema = z.record(z.string(), z.unknown());

// =============================================================================
// Record Conversion
// =============================================================================

function toRecordField<V>(field: FieldValue<V>) {
  return { value: field.value, source: field.provenance, confidence: field.confidence };
}

function fromRecordField<V>(field: { value: V; source: FieldValue<V>['provenance']; confidence: number }): FieldValue<V> {
  return { value: field.value, provenance: field.source, confidence: field.confidence };
}

function baseName(path: string): string {
  return path.split(/[\\/]/).filter(Boolean).pop() ?? path;
}

export function toRecord(entity: BookEntity): EntityRecord {
  const { candidate, fields, audit } = entity;
  const record: EntityRecord = {
    source_path: candidate.rootPath,
    files: [...candidate.files],
    folder_pattern: candidate.pattern,
    author: toRecordField(fields.author),
    series: toRecordField(fields.series),
    series_index: toRecordField(fields.seriesIndex),
    title: toRecordField(fields.title),
    cover_image_path: entity.coverImagePath,
    status: entity.status,
    updated_at: entity.updatedAt,
    auxiliary_files: [...candidate.auxiliaryFiles],
    folder_name: candidate.folderName,
    hints: { ...candidate.hints },
    grouping_confidence: candidate.confidence,
    audit: {
      unavailable_sources: audit.unavailableSources.map((u) => ({ ...u })),
      discarded: audit.discarded.map((d) => ({ ...d })),
      no_match: [...audit.noMatch],
      resolved_at: audit.resolvedAt,
    },
  };
  if (candidate.workName) record.work_name = candidate.workName;
  return record;
}

export function fromRecord(id: string, record: ParsedEntityRecord): BookEntity {
  const audit = record.audit
    ? {
        unavailableSources: record.audit.unavailable_sources,
        discarded: record.audit.discarded,
        noMatch: record.audit.no_match,
        resolvedAt: record.audit.resolved_at,
      }
    : emptyAudit();

  return {
    id,
    candidate: {
      id,
      pattern: record.folder_pattern,
      rootPath: record.source_path,
      files: record.files,
      auxiliaryFiles: record.auxiliary_files,
      folderName: record.folder_name ?? baseName(record.source_path),
      workName: record.work_name,
      hints: record.hints,
      confidence: record.grouping_confidence,
    },
    fields: {
      author: fromRecordField(record.author),
      series: fromRecordField(record.series),
      seriesIndex: fromRecordField(record.series_index),
      title: fromRecordField(record.title),
    },
    coverImagePath: record.cover_image_path,
    status: record.status,
    audit,
    updatedAt: record.updated_at ?? new Date(0).toISOString(),
  };
}

// =============================================================================
// Store
// =============================================================================

export interface SaveResult {
  path: string;
  /** Records written from this session */
  saved: number;
  /** Records in the document after the merge */
  total: number;
}

export interface LoadResult {
  path: string;
  loaded: number;
  skipped: number;
  /** In-memory entities whose approval status was taken from disk */
  reseeded: number;
}

export interface ListFilter {
  status?: ApprovalStatus;
}

export class ApprovalStore {
  readonly documentPath: string;

  private entities = new Map<string, BookEntity>();
  /** Entities changed since they were last saved */
  private dirty = new Set<string>();
  /** Entities whose status was set explicitly in this session */
  private statusTouched = new Set<string>();
  /** Bumped on every mutation so a save can tell if an entity changed mid-write */
  private versions = new Map<string, number>();
  private saveChain: Promise<unknown> = Promise.resolve();

  constructor(documentPath: string = getEntitiesDocumentPath()) {
    this.documentPath = documentPath;
  }

  list(filter: ListFilter = {}): BookEntity[] {
    const all = Array.from(this.entities.values());
    const matching = filter.status ? all.filter((e) => e.status === filter.status) : all;
    return matching.map((e) => structuredClone(e));
  }

  /**
   * Get an entity by id. Throws EntityNotFoundError for unknown ids.
   */
  get(id: string): BookEntity {
    const entity = this.entities.get(id);
    if (!entity) {
      throw new EntityNotFoundError(id);
    }
    return structuredClone(entity);
  }

  has(id: string): boolean {
    return this.entities.has(id);
  }

  get size(): number {
    return this.entities.size;
  }

  /**
   * Insert or replace an entity and mark it for saving
   */
  upsert(entity: BookEntity): void {
    this.entities.set(entity.id, structuredClone(entity));
    this.touch(entity.id);
  }

  /**
   * Set the approval status of one entity. Fields are left alone.
   */
  setStatus(id: string, status: ApprovalStatus): BookEntity {
    const entity = this.entities.get(id);
    if (!entity) {
      throw new EntityNotFoundError(id);
    }

    entity.status = status;
    entity.updatedAt = new Date().toISOString();
    this.statusTouched.add(id);
    this.touch(id);

    logger.info({ entityId: id, status }, 'Approval status changed');
    return structuredClone(entity);
  }

  isDirty(id: string): boolean {
    return this.dirty.has(id);
  }

  /**
   * Merge changed entities into the on-disk document. Saves run one at a
   * time. On failure the dirty set is kept so a retry writes everything.
   */
  save(): Promise<SaveResult> {
    const run = this.saveChain.then(() => this.performSave());
    // The next save waits for this one whether or not it succeeds
    this.saveChain = run.catch(() => undefined);
    return run;
  }

  /**
   * Read the document into memory. Unknown ids are added, clean entities
   * are replaced, and rescanned entities pick up their saved status unless
   * it was changed in this session.
   */
  async load(): Promise<LoadResult> {
    const document = await this.readDocument();
    let loaded = 0;
    let skipped = 0;
    let reseeded = 0;

    for (const [id, raw] of Object.entries(document)) {
      const parsed = EntityRecordSchema.safeParse(raw);
      if (!parsed.success) {
        skipped++;
        logger.warn({ entityId: id, issues: parsed.error.issues.length }, 'Skipping malformed entity record');
        continue;
      }

      const stored = fromRecord(id, parsed.data);
      const current = this.entities.get(id);

      if (!current || !this.dirty.has(id)) {
        this.entities.set(id, stored);
        loaded++;
      } else if (!this.statusTouched.has(id) && current.status !== stored.status) {
        current.status = stored.status;
        reseeded++;
      }
    }

    logger.info({ path: this.documentPath, loaded, skipped, reseeded }, 'Entity document loaded');
    return { path: this.documentPath, loaded, skipped, reseeded };
  }

  // ===========================================================================
  // Internals
  // ===========================================================================

  private touch(id: string): void {
    this.dirty.add(id);
    this.versions.set(id, (this.versions.get(id) ?? 0) + 1);
  }

  private async readDocument(): Promise<Record<string, unknown>> {
    let content: string;
    try {
      content = await readFile(this.documentPath, 'utf-8');
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        return {};
      }
      throw new PersistenceError(this.documentPath, error instanceof Error ? error.message : String(error));
    }

    let raw: unknown;
    try {
      raw = JSON.parse(content);
    } catch (error) {
      throw new PersistenceError(this.documentPath, `document is not valid JSON: ${error instanceof Error ? error.message : String(error)}`);
    }

    const parsed = DocumentSchema.safeParse(raw);
    if (!parsed.success) {
      throw new PersistenceError(this.documentPath, 'document is not an object keyed by entity id');
    }
    return parsed.data;
  }

  private async performSave(): Promise<SaveResult> {
    const ids = Array.from(this.dirty);
    const snapshot = new Map(ids.map((id) => [id, this.versions.get(id) ?? 0]));

    const document = await this.readDocument();
    for (const id of ids) {
      const entity = this.entities.get(id);
      if (entity) {
        document[id] = toRecord(entity);
      }
    }

    const tempPath = `${this.documentPath}.${process.pid}.${Date.now()}.tmp`;
    try {
      await mkdir(dirname(this.documentPath), { recursive: true });
      await writeFile(tempPath, JSON.stringify(document, null, 2), 'utf-8');
      await rename(tempPath, this.documentPath);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      logger.error({ path: this.documentPath, error: message }, 'Failed to write entity document');
      try {
        await rm(tempPath, { force: true });
      } catch (cleanupError) {
        logger.warn({ path: tempPath, error: cleanupError instanceof Error ? cleanupError.message : String(cleanupError) }, 'Failed to remove temp file');
      }
      throw new PersistenceError(this.documentPath, message);
    }

    // Entities changed while writing stay dirty for the next save
    for (const id of ids) {
      if (this.versions.get(id) === snapshot.get(id)) {
        this.dirty.delete(id);
      }
    }

    const result: SaveResult = { path: this.documentPath, saved: ids.length, total: Object.keys(document).length };
    logger.info({ ...result }, 'Entity document saved');
    return result;
  }
}

export default ApprovalStore;
