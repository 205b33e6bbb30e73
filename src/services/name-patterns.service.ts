/**
 * Name Patterns Service
 *
 * Structural (position-based) patterns for pulling series, index and title
 * out of file names, folder names and tag strings. Patterns match on shape
 * (ordinal, separator, parenthetical) and never on a fixed word list.
 */

// =============================================================================
// Types
// =============================================================================

export interface OrdinalTitle {
  index: number;
  title: string;
}

export interface SeriesDesignation {
  series: string;
  index: number | null;
}

export interface SeriesFragment extends SeriesDesignation {
  /** Text left over once the fragment is removed */
  remainder: string;
}

// =============================================================================
// Patterns
// =============================================================================

/** Optional leading word, an ordinal, a separator, then text: "Book 1 - Title", "03. Title" */
const LEADING_ORDINAL = /^(?:\p{L}+\.?\s*)?(\d{1,4})\s*[-–—:._)\]]\s*(.+)$/u;

/** "Series, <word> N" */
const COMMA_DESIGNATION = /^(.+?),\s*\p{L}+\.?\s*(\d{1,4})$/u;

/** "Series #N" */
const HASH_DESIGNATION = /^(.+?)\s*#\s*(\d{1,4})$/;

/** Trailing "(...)" or "[...]" group */
const TRAILING_GROUP = /^(.*?)\s*[([]([^()[\]]+)[)\]]\s*$/;

/**
 * Replace underscores and collapse whitespace
 */
export function cleanName(name: string): string {
  return name.replace(/_/g, ' ').replace(/\s+/g, ' ').trim();
}

/**
 * Parse "<ordinal><separator><text>".
 *
 *   parseLeadingOrdinal('Book 3-An Echo of Titans') -> { index: 3, title: 'An Echo of Titans' }
 */
export function parseLeadingOrdinal(text: string): OrdinalTitle | null {
  const match = cleanName(text).match(LEADING_ORDINAL);
  if (!match?.[1] || !match[2]) return null;

  const title = match[2].trim();
  if (!/\p{L}/u.test(title)) return null;

  return { index: parseInt(match[1], 10), title };
}

/**
 * Parse a whole string as a series designation ("Series, Book 2", "Series #2").
 */
export function parseSeriesDesignation(text: string): SeriesDesignation | null {
  const cleaned = cleanName(text);

  for (const pattern of [COMMA_DESIGNATION, HASH_DESIGNATION]) {
    const match = cleaned.match(pattern);
    if (match?.[1] && match[2]) {
      const series = match[1].replace(/[\s,\-:]+$/, '').trim();
      if (series.length > 0 && /\p{L}/u.test(series)) {
        return { series, index: parseInt(match[2], 10) };
      }
    }
  }

  return null;
}

/**
 * Find a series designation at the end of a string, either as a trailing
 * parenthetical ("Title (Series, Book 2)") or as the whole string.
 */
export function parseSeriesFragment(text: string): SeriesFragment | null {
  const cleaned = cleanName(text);

  const group = cleaned.match(TRAILING_GROUP);
  if (group?.[2]) {
    const designation = parseSeriesDesignation(group[2]);
    if (designation) {
      return { ...designation, remainder: (group[1] ?? '').trim() };
    }
  }

  const designation = parseSeriesDesignation(cleaned);
  if (designation) {
    return { ...designation, remainder: '' };
  }

  return null;
}

/**
 * Remove a repeated series name from the end of a title.
 *
 *   stripTrailingSeries('The Winds of War The Bladeborn Saga', 'The Bladeborn Saga') -> 'The Winds of War'
 */
export function stripTrailingSeries(title: string, series: string): string {
  const cleanedSeries = cleanName(series);
  if (cleanedSeries.length === 0) return title;

  const trimmed = cleanName(title);
  if (trimmed.length <= cleanedSeries.length) return trimmed;

  if (trimmed.toLowerCase().endsWith(cleanedSeries.toLowerCase())) {
    const head = trimmed.slice(0, trimmed.length - cleanedSeries.length);
    // Only strip on a word boundary
    if (/[\s\-–—:,(]$/.test(head)) {
      return head.replace(/[\s\-–—:,(]+$/, '').trim();
    }
  }

  return trimmed;
}

export const NamePatterns = {
  cleanName,
  parseLeadingOrdinal,
  parseSeriesDesignation,
  parseSeriesFragment,
  stripTrailingSeries,
};

export default NamePatterns;
