/**
 * Catalog Source Adapter
 *
 * Looks a candidate up in a bibliographic catalog. Queries start with the
 * fullest hint set and narrow step by step until a record matches:
 *
 *   1. Author + Series + Title
 *   2. Author + Title
 *   3. Author + Title without subtitle or punctuation
 *   4. Title only
 *
 * Each step pages through results up to a configured limit. Responses are
 * cached and requests spaced by a per-source rate limiter.
 */

import { adapterLogger } from '../logger.service.js';
import { createCatalogResponseCache, type LRUCache } from '../lru-cache.service.js';
import { SourceRateLimiter } from '../rate-limit.service.js';
import {
  calculateSimilarity,
  normalizeTitlePunctuation,
  recaseAuthorName,
  stripSubtitleAndPunctuation,
} from '../title-matcher.service.js';
import type { FieldProposal } from '../../types/book.types.js';
import {
  onlyMissing,
  roundConfidence,
  SourceUnavailableError,
  titleHint,
  type AdapterRequest,
  type CatalogClient,
  type CatalogPage,
  type CatalogQuery,
  type CatalogRecord,
  type SourceAdapter,
} from './types.js';

const logger = adapterLogger.child({ adapter: 'catalog_api' });

// =============================================================================
// Types
// =============================================================================

export interface CatalogAdapterOptions {
  /** Pages fetched per query step (default: 2) */
  maxPages?: number;
  /** Minimum similarity for a record to count as a match (default: 0.6) */
  minMatchScore?: number;
  /** Highest confidence this adapter reports (default: 0.95) */
  maxConfidence?: number;
  rateLimiter?: SourceRateLimiter;
  cache?: LRUCache<CatalogPage>;
}

export interface CatalogMatch {
  record: CatalogRecord;
  score: number;
  query: CatalogQuery;
  /** Query step (1-based) that produced the match */
  step: number;
}

const CONFIDENCE_SCALE = 0.9;
const TITLE_WEIGHT = 0.7;
const AUTHOR_WEIGHT = 0.3;

// =============================================================================
// Query Ladder
// =============================================================================

function queryKey(query: CatalogQuery): string {
  return JSON.stringify([query.title.toLowerCase(), query.author?.toLowerCase() ?? '', query.series?.toLowerCase() ?? '']);
}

/**
 * Build the narrowing sequence of queries, dropping duplicates.
 */
export function buildQueryLadder(title: string, author?: string, series?: string): CatalogQuery[] {
  const stripped = stripSubtitleAndPunctuation(title);
  const steps: CatalogQuery[] = [
    { title, author, series },
    { title, author },
    { title: stripped, author },
    { title: stripped.length > 0 ? stripped : title },
  ];

  const seen = new Set<string>();
  const ladder: CatalogQuery[] = [];

  for (const step of steps) {
    const query: CatalogQuery = { title: step.title };
    if (step.author) query.author = step.author;
    if (step.series) query.series = step.series;
    if (query.title.length === 0) continue;

    const key = queryKey(query);
    if (seen.has(key)) continue;
    seen.add(key);
    ladder.push(query);
  }

  return ladder;
}

/**
 * Similarity between a query and a record (0-1)
 */
export function scoreRecord(query: CatalogQuery, record: CatalogRecord): number {
  const titleScore = calculateSimilarity(query.title, record.title);
  if (!query.author || record.authors.length === 0) {
    return titleScore;
  }

  const queryAuthor = query.author;
  const authorScore = Math.max(...record.authors.map((a) => calculateSimilarity(queryAuthor, recaseAuthorName(a))));
  return TITLE_WEIGHT * titleScore + AUTHOR_WEIGHT * authorScore;
}

// =============================================================================
// Adapter
// =============================================================================

export function createCatalogAdapter(client: CatalogClient, options: CatalogAdapterOptions = {}): SourceAdapter {
  const maxPages = Math.max(1, options.maxPages ?? 2);
  const minMatchScore = options.minMatchScore ?? 0.6;
  const maxConfidence = options.maxConfidence ?? 0.95;
  const rateLimiter = options.rateLimiter ?? SourceRateLimiter.fromLevel(5);
  const cache = options.cache ?? createCatalogResponseCache<CatalogPage>();

  async function fetchPage(query: CatalogQuery, page: number): Promise<CatalogPage> {
    const key = `${queryKey(query)}#${page}`;
    const cached = cache.get(key);
    if (cached) {
      return cached;
    }

    await rateLimiter.acquire();
    try {
      const result = await client.search(query, page);
      rateLimiter.record(true);
      cache.set(key, result);
      return result;
    } catch (error) {
      rateLimiter.record(false);
      const message = error instanceof Error ? error.message : String(error);
      adapterLogger.warn({ source: 'catalog_api', page, error: message, ...rateLimiter.getStats() }, 'Catalog request failed');
      throw new SourceUnavailableError('catalog_api', message);
    }
  }

  /**
   * Walk the ladder until a record clears the match threshold
   */
  async function findMatch(ladder: CatalogQuery[]): Promise<CatalogMatch | null> {
    for (const [i, query] of ladder.entries()) {
      let best: CatalogMatch | null = null;

      for (let page = 1; page <= maxPages; page++) {
        const result = await fetchPage(query, page);

        for (const record of result.records) {
          const score = scoreRecord(query, record);
          if (score >= minMatchScore && (!best || score > best.score)) {
            best = { record, score, query, step: i + 1 };
          }
        }

        if (!result.hasMore) break;
      }

      if (best) {
        return best;
      }

      logger.debug({ step: i + 1, query }, 'No catalog match, narrowing query');
    }

    return null;
  }

  return {
    name: 'catalog_api',
    displayName: 'Online Catalog',

    async propose(request: AdapterRequest): Promise<FieldProposal[]> {
      const title = titleHint(request);
      if (!title) {
        return [];
      }

      const author = request.known.author ?? request.hints.folderHints.author;
      const series = request.known.series ?? request.hints.folderHints.series;
      const ladder = buildQueryLadder(title, author, series);

      const match = await findMatch(ladder);
      if (!match) {
        logger.debug({ entityId: request.candidate.id, steps: ladder.length }, 'Catalog lookup found no match');
        return [];
      }

      const confidence = roundConfidence(Math.min(maxConfidence, CONFIDENCE_SCALE * match.score));
      const { record } = match;
      const proposals: FieldProposal[] = [];

      const recordTitle = normalizeTitlePunctuation(record.title);
      if (recordTitle.length > 0) {
        proposals.push({ field: 'title', value: recordTitle, confidence });
      }
      const firstAuthor = record.authors[0];
      if (firstAuthor && firstAuthor.trim().length > 0) {
        proposals.push({ field: 'author', value: recaseAuthorName(firstAuthor), confidence });
      }
      if (record.series && record.series.trim().length > 0) {
        proposals.push({ field: 'series', value: normalizeTitlePunctuation(record.series), confidence });
      }
      if (typeof record.seriesIndex === 'number' && Number.isInteger(record.seriesIndex)) {
        proposals.push({ field: 'seriesIndex', value: record.seriesIndex, confidence });
      }

      logger.debug({
        entityId: request.candidate.id,
        step: match.step,
        score: match.score,
      }, `Catalog match: ${recordTitle}`);

      return onlyMissing(request, proposals);
    },
  };
}

export default createCatalogAdapter;
