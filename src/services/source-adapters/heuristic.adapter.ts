/**
 * Heuristic Source Adapter
 *
 * Guesses fields from the position of tokens in file and folder names:
 * a leading ordinal gives the series index, a trailing series designation
 * gives series and index, folder hints give author and series. The lowest
 * confidence source in the cascade.
 */

import { cleanName, parseLeadingOrdinal, parseSeriesFragment, stripTrailingSeries } from '../name-patterns.service.js';
import type { FieldProposal } from '../../types/book.types.js';
import { onlyMissing, type AdapterRequest, type SourceAdapter } from './types.js';

const MAX_CONFIDENCE = 0.4;
const ORDINAL_INDEX_CONFIDENCE = 0.4;
const DESIGNATION_CONFIDENCE = 0.35;
const PARSED_TITLE_CONFIDENCE = 0.35;
const FALLBACK_TITLE_CONFIDENCE = 0.2;

/**
 * All structural guesses for a request, highest-signal first
 */
export function guessFields(request: AdapterRequest): FieldProposal[] {
  const { hints } = request;
  const source = cleanName(hints.workName ?? hints.folderName);
  const proposals: FieldProposal[] = [];

  const leading = parseLeadingOrdinal(source);
  if (leading) {
    proposals.push({ field: 'seriesIndex', value: leading.index, confidence: ORDINAL_INDEX_CONFIDENCE });
  }

  const afterOrdinal = leading?.title ?? source;
  const fragment = parseSeriesFragment(afterOrdinal);
  if (fragment) {
    proposals.push({ field: 'series', value: fragment.series, confidence: DESIGNATION_CONFIDENCE });
    if (fragment.index !== null) {
      proposals.push({ field: 'seriesIndex', value: fragment.index, confidence: DESIGNATION_CONFIDENCE });
    }
  }

  const hintConfidence = Math.min(hints.folderHints.confidence, MAX_CONFIDENCE);
  if (hints.folderHints.series) {
    proposals.push({ field: 'series', value: hints.folderHints.series, confidence: hintConfidence });
  }
  if (hints.folderHints.author) {
    proposals.push({ field: 'author', value: hints.folderHints.author, confidence: hintConfidence });
  }

  const series = request.known.series ?? fragment?.series ?? hints.folderHints.series;
  const parsedTitle = fragment ? fragment.remainder : leading?.title;

  if (parsedTitle && parsedTitle.length > 0) {
    const title = series ? stripTrailingSeries(parsedTitle, series) : parsedTitle;
    proposals.push({ field: 'title', value: title, confidence: PARSED_TITLE_CONFIDENCE });
  } else if (source.length > 0) {
    const title = series ? stripTrailingSeries(source, series) : source;
    proposals.push({ field: 'title', value: title, confidence: FALLBACK_TITLE_CONFIDENCE });
  }

  return proposals.filter((p) => typeof p.value !== 'string' || p.value.length > 0);
}

export function createHeuristicAdapter(): SourceAdapter {
  return {
    name: 'heuristic',
    displayName: 'Name Patterns',

    async propose(request: AdapterRequest): Promise<FieldProposal[]> {
      return onlyMissing(request, guessFields(request));
    },
  };
}

export default createHeuristicAdapter;
