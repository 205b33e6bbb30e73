/**
 * Book Entity Types
 *
 * Shared domain types for grouping, resolution and approval.
 */

// =============================================================================
// Provenance & Fields
// =============================================================================

export type Provenance =
  | 'metadata'
  | 'catalog_api'
  | 'language_model'
  | 'web_search'
  | 'heuristic'
  | 'unresolved';

/** Provenance tags that an adapter can produce */
export type AdapterSource = Exclude<Provenance, 'metadata' | 'unresolved'>;

export type CanonicalField = 'author' | 'series' | 'seriesIndex' | 'title';

export const CANONICAL_FIELDS: readonly CanonicalField[] = ['author', 'series', 'seriesIndex', 'title'];

/** Value type carried by each canonical field */
export interface FieldValueTypes {
  author: string;
  series: string;
  seriesIndex: number | null;
  title: string;
}

export interface FieldValue<V> {
  value: V;
  provenance: Provenance;
  /** 0-1 */
  confidence: number;
}

export type BookFields = {
  [K in CanonicalField]: FieldValue<FieldValueTypes[K]>;
};

/** A single proposed value for one field */
export type FieldProposal = {
  [K in CanonicalField]: {
    field: K;
    value: NonNullable<FieldValueTypes[K]>;
    confidence: number;
  };
}[CanonicalField];

/** Known values passed to adapters as hints */
export type KnownFields = Partial<{ [K in CanonicalField]: NonNullable<FieldValueTypes[K]> }>;

// =============================================================================
// Grouping
// =============================================================================

export type FolderPattern = 'SingleFile' | 'ChapteredFolder' | 'MultiBookFolder' | 'AuthorFolder>Book';

export interface FolderHints {
  author?: string;
  series?: string;
  /** Confidence attached to folder-derived values */
  confidence: number;
}

export interface BookCandidate {
  /** Stable identifier derived from the candidate root path */
  id: string;
  pattern: FolderPattern;
  /** Directory for folder candidates, first member file for file groups */
  rootPath: string;
  /** Member audio files in natural order */
  files: string[];
  /** Non-audio files (images) from the same directory */
  auxiliaryFiles: string[];
  /** Name of the directory holding the members */
  folderName: string;
  /** Shared filename stem for file groups */
  workName?: string;
  hints: FolderHints;
  /** Grouping confidence (0-1) */
  confidence: number;
}

// =============================================================================
// Entities
// =============================================================================

export type ApprovalStatus = 'pending' | 'approved' | 'rejected';

export interface DiscardedProposal {
  field: CanonicalField;
  value: string | number;
  confidence: number;
  source: AdapterSource;
}

export interface ResolutionAudit {
  /** Adapters that failed or timed out during the last pass */
  unavailableSources: Array<{ source: AdapterSource; error: string }>;
  /** Lower-ranked candidates dropped in favour of the chosen value */
  discarded: DiscardedProposal[];
  /** Fields no source could fill */
  noMatch: CanonicalField[];
  resolvedAt?: string;
}

export interface BookEntity {
  id: string;
  candidate: BookCandidate;
  fields: BookFields;
  coverImagePath: string | null;
  status: ApprovalStatus;
  audit: ResolutionAudit;
  updatedAt: string;
}

// =============================================================================
// Helpers
// =============================================================================

export function unresolvedField<K extends CanonicalField>(field: K): FieldValue<FieldValueTypes[K]>;
export function unresolvedField(field: CanonicalField): FieldValue<string | number | null> {
  return {
    value: field === 'seriesIndex' ? null : '',
    provenance: 'unresolved',
    confidence: 0,
  };
}

export function emptyFields(): BookFields {
  return {
    author: unresolvedField('author'),
    series: unresolvedField('series'),
    seriesIndex: unresolvedField('seriesIndex'),
    title: unresolvedField('title'),
  };
}

export function emptyAudit(): ResolutionAudit {
  return { unavailableSources: [], discarded: [], noMatch: [] };
}

/** Whether a field holds a usable value */
export function hasValue(field: FieldValue<string | number | null>): boolean {
  if (field.provenance === 'unresolved') return false;
  if (field.value === null) return false;
  if (typeof field.value === 'string') return field.value.trim().length > 0;
  return true;
}

/** Collect non-empty field values as adapter hints */
export function toKnownFields(fields: BookFields): KnownFields {
  const known: KnownFields = {};
  if (hasValue(fields.author)) known.author = fields.author.value;
  if (hasValue(fields.series)) known.series = fields.series.value;
  if (fields.seriesIndex.value !== null && hasValue(fields.seriesIndex)) {
    known.seriesIndex = fields.seriesIndex.value;
  }
  if (hasValue(fields.title)) known.title = fields.title.value;
  return known;
}
