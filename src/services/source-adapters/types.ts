/**
 * Source Adapter Types
 *
 * Common interface for metadata sources consulted by the cascade resolver,
 * plus the narrow client interfaces the adapters call out through.
 */

import { basename } from 'path';
import type {
  AdapterSource,
  BookCandidate,
  CanonicalField,
  FieldProposal,
  FolderHints,
  KnownFields,
} from '../../types/book.types.js';
import { stripExtension } from '../grouper/stem-analysis.js';
import { cleanName, parseLeadingOrdinal, parseSeriesFragment } from '../name-patterns.service.js';

// =============================================================================
// Core Types
// =============================================================================

/** File and folder names an adapter may mine */
export interface RawTextHints {
  /** Member file names without extensions, in member order */
  fileNames: string[];
  folderName: string;
  /** Shared file stem for file-group candidates */
  workName?: string;
  folderHints: FolderHints;
}

export interface AdapterRequest {
  candidate: BookCandidate;
  /** Values already resolved (including earlier in this cascade) */
  known: KnownFields;
  /** Fields still needing a value */
  missing: CanonicalField[];
  hints: RawTextHints;
}

/**
 * A metadata source. Adapters return an empty list on no-match and throw
 * SourceUnavailableError (or any error) on transport failure.
 */
export interface SourceAdapter {
  /** Provenance tag for values from this source */
  readonly name: AdapterSource;

  /** Human-readable display name */
  readonly displayName: string;

  propose(request: AdapterRequest): Promise<FieldProposal[]>;
}

/**
 * Raised when a source cannot be reached, times out or rejects credentials
 */
export class SourceUnavailableError extends Error {
  readonly source: AdapterSource;

  constructor(source: AdapterSource, message: string) {
    super(`${source} unavailable: ${message}`);
    this.name = 'SourceUnavailableError';
    this.source = source;
  }
}

// =============================================================================
// Client Interfaces
// =============================================================================

export interface CatalogQuery {
  title: string;
  author?: string;
  series?: string;
}

export interface CatalogRecord {
  title: string;
  authors: string[];
  series?: string;
  seriesIndex?: number | null;
}

export interface CatalogPage {
  records: CatalogRecord[];
  hasMore: boolean;
}

/** Bibliographic catalog search; pages are 1-based */
export interface CatalogClient {
  search(query: CatalogQuery, page: number): Promise<CatalogPage>;
}

export interface PromptMessage {
  system: string;
  user: string;
}

export interface LanguageModelClient {
  /** Returns the model's text reply */
  complete(prompt: PromptMessage): Promise<string>;
}

export interface WebSearchResult {
  title: string;
  snippet: string;
  url?: string;
}

export interface WebSearchClient {
  search(query: string): Promise<WebSearchResult[]>;
}

// =============================================================================
// Helpers
// =============================================================================

/**
 * Collect the raw text hints for a candidate
 */
export function buildRawTextHints(candidate: BookCandidate): RawTextHints {
  const hints: RawTextHints = {
    fileNames: candidate.files.map((f) => stripExtension(basename(f))),
    folderName: candidate.folderName,
    folderHints: { ...candidate.hints },
  };
  if (candidate.workName) hints.workName = candidate.workName;
  return hints;
}

/**
 * Keep only proposals for fields the request asked for
 */
export function onlyMissing(request: AdapterRequest, proposals: FieldProposal[]): FieldProposal[] {
  const wanted = new Set(request.missing);
  return proposals.filter((p) => wanted.has(p.field));
}

/**
 * Best available title to search with: a known title, else the work or
 * folder name with any ordinal prefix or series suffix removed.
 */
export function titleHint(request: AdapterRequest): string | undefined {
  if (request.known.title) return request.known.title;

  const raw = request.hints.workName ?? request.hints.folderName;
  const name = cleanName(raw);
  const withoutOrdinal = parseLeadingOrdinal(name)?.title ?? name;
  const fragment = parseSeriesFragment(withoutOrdinal);
  const title = fragment && fragment.remainder.length > 0 ? fragment.remainder : withoutOrdinal;

  return title.length > 0 ? title : undefined;
}

export function roundConfidence(value: number): number {
  return Math.round(Math.max(0, Math.min(1, value)) * 100) / 100;
}
