/**
 * Shared request builders for adapter tests
 */

import type { BookCandidate, CanonicalField, FolderHints, KnownFields } from '../../../types/book.types.js';
import { buildRawTextHints, type AdapterRequest } from '../types.js';

export function makeCandidate(overrides: Partial<BookCandidate> = {}): BookCandidate {
  return {
    id: '0123456789abcdef',
    pattern: 'MultiBookFolder',
    rootPath: '/library/The Bladeborn Saga/02 - Ghost of the Shadowfort.mp3',
    files: ['/library/The Bladeborn Saga/02 - Ghost of the Shadowfort.mp3'],
    auxiliaryFiles: [],
    folderName: 'The Bladeborn Saga',
    workName: '02 - Ghost of the Shadowfort',
    hints: { series: 'The Bladeborn Saga', confidence: 0.3 },
    confidence: 0.75,
    ...overrides,
  };
}

export function makeRequest(
  candidate: BookCandidate = makeCandidate(),
  known: KnownFields = {},
  missing: CanonicalField[] = ['author', 'series', 'seriesIndex', 'title']
): AdapterRequest {
  return { candidate, known, missing, hints: buildRawTextHints(candidate) };
}

export function folderCandidate(folderName: string, hints: FolderHints = { confidence: 0.3 }): BookCandidate {
  return makeCandidate({
    pattern: 'ChapteredFolder',
    rootPath: `/library/${folderName}`,
    files: [`/library/${folderName}/Part 1.mp3`],
    folderName,
    workName: undefined,
    hints,
  });
}
