/**
 * Resolver Service
 *
 * Cascade orchestrator. Fills each canonical field that is empty or below
 * the confidence threshold by asking source adapters in priority order.
 * Every adapter is called at most once per pass, with all fields still
 * missing at that point; the first adapter to supply a field fills it.
 */

import { getResolverSettings, type ResolverSettings } from './config.service.js';
import { resolverLogger as logger } from './logger.service.js';
import { withTimeout } from './parallel.service.js';
import { buildRawTextHints, SourceUnavailableError, type SourceAdapter } from './source-adapters/types.js';
import type { AdapterRegistry } from './source-adapters/registry.js';
import {
  CANONICAL_FIELDS,
  emptyAudit,
  hasValue,
  type AdapterSource,
  type BookCandidate,
  type BookFields,
  type CanonicalField,
  type FieldProposal,
  type FieldValue,
  type KnownFields,
  type ResolutionAudit,
} from '../types/book.types.js';

// =============================================================================
// Types
// =============================================================================

export interface ResolverOptions {
  /** Adapters in priority order (first = highest) */
  adapters: SourceAdapter[];
  /** Fields at or above this confidence are left alone; below it they are re-resolved */
  confidenceThreshold: number;
  /** Per-call timeout; 0 disables */
  adapterTimeoutMs: number;
}

export interface ResolutionOutcome {
  fields: BookFields;
  audit: ResolutionAudit;
  /** Adapters invoked during this pass, in call order */
  adapterCalls: AdapterSource[];
}

// =============================================================================
// Helpers
// =============================================================================

function cloneFields(fields: BookFields): BookFields {
  return {
    author: { ...fields.author },
    series: { ...fields.series },
    seriesIndex: { ...fields.seriesIndex },
    title: { ...fields.title },
  };
}

function isUsableProposal(proposal: FieldProposal): boolean {
  if (proposal.field === 'seriesIndex') {
    return Number.isInteger(proposal.value) && proposal.value >= 0;
  }
  return proposal.value.trim().length > 0;
}

/**
 * Write a chosen proposal into its slot
 */
function assign(fields: BookFields, proposal: FieldProposal, source: AdapterSource): void {
  switch (proposal.field) {
    case 'seriesIndex':
      fields.seriesIndex = { value: proposal.value, provenance: source, confidence: proposal.confidence };
      break;
    case 'author':
    case 'series':
    case 'title':
      fields[proposal.field] = { value: proposal.value.trim(), provenance: source, confidence: proposal.confidence };
      break;
  }
}

// =============================================================================
// Resolver
// =============================================================================

export class CascadeResolver {
  private readonly adapters: SourceAdapter[];
  private readonly confidenceThreshold: number;
  private readonly adapterTimeoutMs: number;

  constructor(options: ResolverOptions) {
    this.adapters = [...options.adapters];
    this.confidenceThreshold = options.confidenceThreshold;
    this.adapterTimeoutMs = options.adapterTimeoutMs;
  }

  /**
   * Resolver over a registry, ordered and filtered by resolver settings
   */
  static fromRegistry(registry: AdapterRegistry, settings: ResolverSettings = getResolverSettings()): CascadeResolver {
    return new CascadeResolver({
      adapters: registry.getByPriority(settings.sourcePriority, settings.enabledSources),
      confidenceThreshold: settings.confidenceThreshold,
      adapterTimeoutMs: settings.adapterTimeoutMs,
    });
  }

  getAdapterNames(): AdapterSource[] {
    return this.adapters.map((a) => a.name);
  }

  /**
   * Whether a field should be (re)resolved. A value exactly at the
   * threshold counts as resolved.
   */
  needsResolution(field: FieldValue<string | number | null>): boolean {
    return !hasValue(field) || field.confidence < this.confidenceThreshold;
  }

  /**
   * Run one cascade pass for a candidate. The input fields are not mutated.
   */
  async resolve(candidate: BookCandidate, current: BookFields): Promise<ResolutionOutcome> {
    const fields = cloneFields(current);
    const audit = emptyAudit();
    const adapterCalls: AdapterSource[] = [];

    const pending = CANONICAL_FIELDS.filter((f) => this.needsResolution(fields[f]));
    const filled = new Set<CanonicalField>();
    const hints = buildRawTextHints(candidate);

    if (pending.length === 0) {
      logger.debug({ entityId: candidate.id }, 'All fields resolved from metadata');
    }

    for (const adapter of this.adapters) {
      const missing = pending.filter((f) => !filled.has(f));
      if (missing.length === 0) break;

      const known = this.knownFields(fields, filled);
      let proposals: FieldProposal[];

      adapterCalls.push(adapter.name);
      try {
        proposals = await withTimeout(
          adapter.propose({ candidate, known, missing, hints }),
          this.adapterTimeoutMs,
          adapter.displayName
        );
      } catch (error) {
        const unavailable = error instanceof SourceUnavailableError
          ? error
          : new SourceUnavailableError(adapter.name, error instanceof Error ? error.message : String(error));

        audit.unavailableSources.push({ source: adapter.name, error: unavailable.message });
        logger.warn({
          entityId: candidate.id,
          source: adapter.name,
          error: unavailable.message,
        }, `Source unavailable, falling back: ${adapter.displayName}`);
        continue;
      }

      for (const field of missing) {
        const candidates = proposals.filter((p) => p.field === field && isUsableProposal(p));
        if (candidates.length === 0) continue;

        // Highest confidence wins; ties keep the earliest
        const best = candidates.reduce((a, b) => (b.confidence > a.confidence ? b : a));
        const existing = fields[field];

        // Never trade a prior value for a weaker guess
        const replaces = !hasValue(existing) || best.confidence >= existing.confidence;
        const losers = replaces ? candidates.filter((p) => p !== best) : candidates;

        for (const loser of losers) {
          audit.discarded.push({
            field,
            value: typeof loser.value === 'string' ? loser.value.trim() : loser.value,
            confidence: loser.confidence,
            source: adapter.name,
          });
        }

        if (replaces) {
          assign(fields, best, adapter.name);
          filled.add(field);
        }
      }
    }

    for (const field of pending) {
      if (!filled.has(field) && !hasValue(fields[field])) {
        audit.noMatch.push(field);
      }
    }
    audit.resolvedAt = new Date().toISOString();

    logger.debug({
      entityId: candidate.id,
      pending,
      filled: Array.from(filled),
      noMatch: audit.noMatch,
      calls: adapterCalls,
    }, 'Cascade pass complete');

    return { fields, audit, adapterCalls };
  }

  /**
   * Confident values plus anything filled earlier in this pass
   */
  private knownFields(fields: BookFields, filled: Set<CanonicalField>): KnownFields {
    const known: KnownFields = {};
    const usable = (f: CanonicalField) => hasValue(fields[f]) && (filled.has(f) || !this.needsResolution(fields[f]));

    if (usable('author')) known.author = fields.author.value;
    if (usable('series')) known.series = fields.series.value;
    if (usable('title')) known.title = fields.title.value;
    const index = fields.seriesIndex.value;
    if (index !== null && usable('seriesIndex')) known.seriesIndex = index;

    return known;
  }
}

export default CascadeResolver;
