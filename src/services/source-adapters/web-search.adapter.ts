/**
 * Web Search Source Adapter
 *
 * Runs one search with the known hints and reads result titles and
 * snippets for "Title by Author", "Title (Series #N)" and
 * "Series, <word> N" shapes. Values are voted across results; confidence
 * stays below the catalog's.
 */

import { adapterLogger } from '../logger.service.js';
import { parseSeriesDesignation, parseSeriesFragment } from '../name-patterns.service.js';
import { normalizeTitlePunctuation, recaseAuthorName } from '../title-matcher.service.js';
import type { CanonicalField, FieldProposal } from '../../types/book.types.js';
import {
  onlyMissing,
  roundConfidence,
  SourceUnavailableError,
  titleHint,
  type AdapterRequest,
  type SourceAdapter,
  type WebSearchClient,
  type WebSearchResult,
} from './types.js';

const logger = adapterLogger.child({ adapter: 'web_search' });

// =============================================================================
// Result Parsing
// =============================================================================

export interface ParsedSearchResult {
  title?: string;
  author?: string;
  series?: string;
  seriesIndex?: number;
}

const BY_PATTERN = /^(.+?)\s+by\s+(\p{L}[\p{L}.'’\- ]*?)\s*(?:[|–—:(,]|-\s|$)/iu;
const PARENTHETICAL = /\(([^()]+)\)/g;
const SEGMENT_SEPARATOR = /\s[|–—-]\s/;

/**
 * Read book fields out of one search result
 */
export function parseSearchResult(result: WebSearchResult): ParsedSearchResult {
  const parsed: ParsedSearchResult = {};
  const title = result.title.trim();

  const byMatch = title.match(BY_PATTERN);
  if (byMatch?.[1] && byMatch[2]) {
    const fragment = parseSeriesFragment(byMatch[1]);
    const bookTitle = fragment && fragment.remainder.length > 0 ? fragment.remainder : byMatch[1];
    parsed.title = normalizeTitlePunctuation(bookTitle);
    parsed.author = recaseAuthorName(byMatch[2]);
    if (fragment) {
      parsed.series = fragment.series;
      if (fragment.index !== null) parsed.seriesIndex = fragment.index;
    }
  }

  if (!parsed.series) {
    for (const segment of title.split(SEGMENT_SEPARATOR)) {
      const designation = parseSeriesFragment(segment);
      if (designation) {
        parsed.series = designation.series;
        if (designation.index !== null) parsed.seriesIndex = designation.index;
        break;
      }
    }
  }

  if (!parsed.series) {
    for (const match of result.snippet.matchAll(PARENTHETICAL)) {
      const designation = match[1] ? parseSeriesDesignation(match[1]) : null;
      if (designation) {
        parsed.series = designation.series;
        if (designation.index !== null) parsed.seriesIndex = designation.index;
        break;
      }
    }
  }

  return parsed;
}

// =============================================================================
// Voting
// =============================================================================

interface Tally<V> {
  value: V;
  count: number;
}

function tally<V extends string | number>(values: Array<V | undefined>): Tally<V> | null {
  const counts = new Map<string, Tally<V>>();
  for (const value of values) {
    if (value === undefined) continue;
    const key = String(value).toLowerCase();
    const entry = counts.get(key);
    if (entry) {
      entry.count++;
    } else {
      counts.set(key, { value, count: 1 });
    }
  }

  let best: Tally<V> | null = null;
  for (const entry of counts.values()) {
    if (!best || entry.count > best.count) best = entry;
  }
  return best;
}

// =============================================================================
// Adapter
// =============================================================================

export interface WebSearchAdapterOptions {
  /** Confidence ceiling (default: 0.6) */
  maxConfidence?: number;
}

/**
 * Build the search query from known hints
 */
export function buildSearchQuery(request: AdapterRequest): string | null {
  const parts = [
    titleHint(request),
    request.known.author ?? request.hints.folderHints.author,
    request.known.series ?? request.hints.folderHints.series,
  ].filter((p): p is string => typeof p === 'string' && p.length > 0);

  return parts.length > 0 ? `${parts.join(' ')} audiobook` : null;
}

export function createWebSearchAdapter(
  client: WebSearchClient,
  options: WebSearchAdapterOptions = {}
): SourceAdapter {
  const maxConfidence = options.maxConfidence ?? 0.6;

  return {
    name: 'web_search',
    displayName: 'Web Search',

    async propose(request: AdapterRequest): Promise<FieldProposal[]> {
      const query = buildSearchQuery(request);
      if (!query) {
        return [];
      }

      let results: WebSearchResult[];
      try {
        results = await client.search(query);
      } catch (error) {
        throw new SourceUnavailableError('web_search', error instanceof Error ? error.message : String(error));
      }

      if (results.length === 0) {
        return [];
      }

      const parsed = results.map(parseSearchResult);
      const confidenceFor = (count: number) => roundConfidence(maxConfidence * (0.5 + 0.5 * (count / results.length)));
      const proposals: FieldProposal[] = [];

      const textFields: Array<Exclude<CanonicalField, 'seriesIndex'>> = ['title', 'author', 'series'];
      for (const field of textFields) {
        const winner = tally(parsed.map((p) => p[field]));
        if (winner && winner.value.length > 0) {
          proposals.push({ field, value: winner.value, confidence: confidenceFor(winner.count) });
        }
      }

      const index = tally(parsed.map((p) => p.seriesIndex));
      if (index) {
        proposals.push({ field: 'seriesIndex', value: index.value, confidence: confidenceFor(index.count) });
      }

      logger.debug({ entityId: request.candidate.id, results: results.length, proposals: proposals.length }, 'Web search parsed');

      return onlyMissing(request, proposals);
    },
  };
}

export default createWebSearchAdapter;
