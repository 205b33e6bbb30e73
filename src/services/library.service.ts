/**
 * Library Service
 *
 * Programmatic boundary over the grouper, metadata reader, resolver and
 * approval store. One instance owns one store.
 */

import { getGroupingSettings, getResolverSettings, type GroupingSettings, type ResolverSettings } from './config.service.js';
import { readEmbeddedMetadata } from './embedded-metadata.service.js';
import { groupLibrary, type GroupingProgressCallback } from './grouper/index.js';
import { createServiceLogger } from './logger.service.js';
import { parallelMap } from './parallel.service.js';
import { CascadeResolver } from './resolver.service.js';
import { createAdapterRegistry } from './source-adapters/index.js';
import { ApprovalStore, type ListFilter, type LoadResult, type SaveResult } from './approval-store.service.js';
import {
  CANONICAL_FIELDS,
  hasValue,
  type ApprovalStatus,
  type BookCandidate,
  type BookEntity,
  type BookFields,
  type CanonicalField,
} from '../types/book.types.js';

const logger = createServiceLogger('library');

// =============================================================================
// Types
// =============================================================================

export interface LibraryOptions {
  store?: ApprovalStore;
  resolver?: CascadeResolver;
  groupingSettings?: GroupingSettings;
  resolverSettings?: ResolverSettings;
  /** Where extracted embedded covers are written */
  coversDir?: string;
}

export interface ScanOptions {
  /** Run a resolution pass over the scanned entities */
  resolve?: boolean;
  onProgress?: GroupingProgressCallback;
  shouldCancel?: () => boolean;
}

export interface ScanResult {
  rootPath: string;
  entityIds: string[];
  added: number;
  updated: number;
  unreadableDirectories: string[];
  /** Member files whose tags could not be read */
  extractionErrors: number;
  resolution?: ResolveAllResult;
  duration: number;
}

export interface ResolveAllOptions {
  /** Entities resolved at once (default: resolver settings) */
  concurrency?: number;
  /** Only resolve entities with this status */
  status?: ApprovalStatus;
  /** Restrict the batch to these ids */
  ids?: string[];
  shouldCancel?: () => boolean;
  onProgress?: (completed: number, total: number) => void;
}

export interface ResolveAllResult {
  total: number;
  resolved: number;
  failed: number;
  cancelled: number;
  /** Ids whose resolution threw, with the error */
  failures: Array<{ id: string; error: string }>;
  duration: number;
}

// =============================================================================
// Helpers
// =============================================================================

/**
 * Fold freshly read metadata into an entity from an earlier scan. A fresh
 * value wins unless the earlier one is more confident.
 */
function mergeFields(previous: BookFields, fresh: BookFields): BookFields {
  const merged: BookFields = {
    author: { ...previous.author },
    series: { ...previous.series },
    seriesIndex: { ...previous.seriesIndex },
    title: { ...previous.title },
  };
  const take = (field: CanonicalField): boolean =>
    hasValue(fresh[field]) && (!hasValue(previous[field]) || fresh[field].confidence >= previous[field].confidence);

  if (take('author')) merged.author = { ...fresh.author };
  if (take('series')) merged.series = { ...fresh.series };
  if (take('seriesIndex')) merged.seriesIndex = { ...fresh.seriesIndex };
  if (take('title')) merged.title = { ...fresh.title };
  return merged;
}

// =============================================================================
// Library
// =============================================================================

export class AudiobookLibrary {
  readonly store: ApprovalStore;
  private readonly resolver: CascadeResolver;
  private readonly groupingSettings: GroupingSettings;
  private readonly resolverSettings: ResolverSettings;
  private readonly coversDir?: string;

  constructor(options: LibraryOptions = {}) {
    this.resolverSettings = options.resolverSettings ?? getResolverSettings();
    this.groupingSettings = options.groupingSettings ?? getGroupingSettings();
    this.store = options.store ?? new ApprovalStore();
    this.resolver = options.resolver
      ?? CascadeResolver.fromRegistry(createAdapterRegistry({}, this.resolverSettings), this.resolverSettings);
    this.coversDir = options.coversDir;
  }

  /**
   * Group a directory tree into entities, read their embedded metadata and
   * add them to the store. Entities seen before keep their approval status.
   */
  async scan(rootPath: string, options: ScanOptions = {}): Promise<ScanResult> {
    const startTime = Date.now();
    const grouping = await groupLibrary(rootPath, {
      settings: this.groupingSettings,
      onProgress: options.onProgress,
      shouldCancel: options.shouldCancel,
    });

    let added = 0;
    let updated = 0;
    let extractionErrors = 0;

    const batch = await parallelMap(
      grouping.candidates,
      async (candidate) => {
        const metadata = await readEmbeddedMetadata(candidate, {
          coversDir: this.coversDir,
          concurrency: this.groupingSettings.extractionConcurrency,
        });
        extractionErrors += metadata.errors.length;

        if (this.store.has(candidate.id)) {
          this.upsertRescanned(candidate, metadata.fields, metadata.coverImagePath);
          updated++;
        } else {
          this.store.upsert(this.createEntity(candidate, metadata.fields, metadata.coverImagePath));
          added++;
        }
        return candidate.id;
      },
      { concurrency: this.resolverSettings.concurrency, shouldCancel: options.shouldCancel }
    );

    for (const failed of batch.results.filter((r) => !r.success && !r.cancelled)) {
      logger.error({ candidate: grouping.candidates[failed.index]?.rootPath, error: failed.error }, 'Failed to read candidate');
    }

    const entityIds = batch.results
      .map((r) => r.result)
      .filter((id): id is string => typeof id === 'string');

    const result: ScanResult = {
      rootPath: grouping.rootPath,
      entityIds,
      added,
      updated,
      unreadableDirectories: grouping.unreadableDirectories,
      extractionErrors,
      duration: 0,
    };

    if (options.resolve) {
      result.resolution = await this.resolveAll({ ids: entityIds, shouldCancel: options.shouldCancel });
    }
    result.duration = Date.now() - startTime;

    logger.info({
      rootPath: result.rootPath,
      candidates: grouping.candidates.length,
      added,
      updated,
      extractionErrors,
    }, 'Library scan complete');

    return result;
  }

  listEntities(filter: ListFilter = {}): BookEntity[] {
    return this.store.list(filter);
  }

  getEntity(id: string): BookEntity {
    return this.store.get(id);
  }

  /**
   * Run one cascade pass for an entity. Approval status is never changed.
   */
  async resolve(id: string): Promise<BookEntity> {
    const entity = this.store.get(id);
    if (!CANONICAL_FIELDS.some((f) => this.resolver.needsResolution(entity.fields[f]))) {
      logger.debug({ entityId: id }, 'Entity already resolved');
      return entity;
    }

    const outcome = await this.resolver.resolve(entity.candidate, entity.fields);

    // Status may have changed while adapters were running
    const latest = this.store.get(id);
    const resolved: BookEntity = {
      ...latest,
      fields: outcome.fields,
      audit: outcome.audit,
      updatedAt: new Date().toISOString(),
    };
    this.store.upsert(resolved);

    logger.debug({
      entityId: id,
      calls: outcome.adapterCalls,
      unresolved: CANONICAL_FIELDS.filter((f) => !hasValue(outcome.fields[f])),
    }, 'Entity resolved');

    return this.store.get(id);
  }

  /**
   * Resolve entities in a bounded pool. A failure in one entity never stops
   * the others; cancellation stops scheduling new ones.
   */
  async resolveAll(options: ResolveAllOptions = {}): Promise<ResolveAllResult> {
    const ids = options.ids
      ?? this.store.list(options.status ? { status: options.status } : {}).map((e) => e.id);

    const batch = await parallelMap(ids, (id) => this.resolve(id), {
      concurrency: options.concurrency ?? this.resolverSettings.concurrency,
      shouldCancel: options.shouldCancel,
      onProgress: options.onProgress ? (completed, total) => options.onProgress?.(completed, total) : undefined,
    });

    const failures = batch.results
      .filter((r) => !r.success && !r.cancelled)
      .map((r) => ({ id: ids[r.index] ?? '', error: r.error ?? 'unknown error' }));

    const result: ResolveAllResult = {
      total: batch.total,
      resolved: batch.successful,
      failed: batch.failed,
      cancelled: batch.cancelled,
      failures,
      duration: batch.duration,
    };

    logger.info({ ...result, failures: failures.length }, 'Batch resolution complete');
    return result;
  }

  setStatus(id: string, status: ApprovalStatus): BookEntity {
    return this.store.setStatus(id, status);
  }

  save(): Promise<SaveResult> {
    return this.store.save();
  }

  load(): Promise<LoadResult> {
    return this.store.load();
  }

  // ===========================================================================
  // Internals
  // ===========================================================================

  private createEntity(candidate: BookCandidate, fields: BookFields, coverImagePath: string | null): BookEntity {
    return {
      id: candidate.id,
      candidate,
      fields,
      coverImagePath,
      status: 'pending',
      audit: { unavailableSources: [], discarded: [], noMatch: [] },
      updatedAt: new Date().toISOString(),
    };
  }

  private upsertRescanned(candidate: BookCandidate, fields: BookFields, coverImagePath: string | null): void {
    const previous = this.store.get(candidate.id);
    this.store.upsert({
      ...previous,
      candidate,
      fields: mergeFields(previous.fields, fields),
      coverImagePath: coverImagePath ?? previous.coverImagePath,
      updatedAt: new Date().toISOString(),
    });
  }
}

export default AudiobookLibrary;
