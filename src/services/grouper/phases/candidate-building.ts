/**
 * Candidate Building Phase
 *
 * Phase 3 of the grouper. Walks the discovered tree, classifies each
 * directory and turns the classification into BookCandidates, carrying
 * folder-derived Author/Series hints down from author folders.
 */

import { createHash } from 'crypto';
import { basename } from 'path';
import type { GroupingSettings } from '../../config.service.js';
import { createServiceLogger } from '../../logger.service.js';
import { stripExtension } from '../stem-analysis.js';
import { classifyDirectory } from './classification.js';
import { toRelativePath } from './discovery.js';
import type { BookCandidate, FolderHints, FolderPattern } from '../../../types/book.types.js';
import type { DirectoryNode, WorkGroup } from '../types.js';

const logger = createServiceLogger('grouper-candidates');

interface InheritedHints {
  author?: string;
  series?: string;
  /** Set for books directly below an author folder */
  underAuthorFolder: boolean;
}

const NO_HINTS: InheritedHints = { underAuthorFolder: false };

/**
 * Stable candidate id: sha-256 of the root-relative path, first 16 hex chars
 */
export function candidateId(relativePath: string): string {
  return createHash('sha256').update(relativePath).digest('hex').slice(0, 16);
}

/**
 * Build candidates for the whole tree. Every audio file lands in exactly
 * one candidate.
 */
export function buildCandidates(
  root: DirectoryNode,
  settings: GroupingSettings,
  shouldCancel?: () => boolean
): BookCandidate[] {
  const candidates: BookCandidate[] = [];
  const hintConfidence = settings.confidence.folderHint;

  function hintsFrom(author: string | undefined, series: string | undefined): FolderHints {
    const hints: FolderHints = { confidence: hintConfidence };
    if (author) hints.author = author;
    if (series) hints.series = series;
    return hints;
  }

  function fileGroupCandidate(
    node: DirectoryNode,
    group: WorkGroup,
    pattern: FolderPattern,
    hints: FolderHints,
    confidence: number
  ): BookCandidate {
    const first = group.files[0] ?? node.path;
    const workName = group.files.length === 1 ? stripExtension(basename(first)) : group.key;
    return {
      id: candidateId(toRelativePath(root.path, first)),
      pattern,
      rootPath: first,
      files: [...group.files],
      auxiliaryFiles: [...node.imageFiles],
      folderName: node.name,
      workName,
      hints,
      confidence,
    };
  }

  function visit(node: DirectoryNode, parent: DirectoryNode | null, inherited: InheritedHints): void {
    if (shouldCancel?.()) return;

    const classification = classifyDirectory(node, settings);

    switch (classification.kind) {
      case 'RootFiles':
        for (const group of classification.groups) {
          const pattern: FolderPattern = group.files.length === 1 ? 'SingleFile' : 'ChapteredFolder';
          candidates.push(fileGroupCandidate(node, group, pattern, hintsFrom(undefined, undefined), group.confidence));
        }
        break;

      case 'ChapteredFolder':
        candidates.push({
          id: candidateId(node.relativePath),
          pattern: inherited.underAuthorFolder ? 'AuthorFolder>Book' : 'ChapteredFolder',
          rootPath: node.path,
          files: classification.files,
          auxiliaryFiles: [...node.imageFiles],
          folderName: node.name,
          hints: hintsFrom(inherited.author, inherited.series),
          confidence: classification.confidence,
        });
        break;

      case 'MultiBookFolder': {
        const hints = hintsFrom(inherited.author, node.name);
        for (const group of classification.groups) {
          candidates.push(fileGroupCandidate(node, group, 'MultiBookFolder', hints, classification.confidence));
        }
        break;
      }

      case 'AuthorFolder': {
        // Author/Series/Book layout: the audio-free parent names the author
        const bookHints: InheritedHints =
          parent && !parent.isRoot && parent.audioFiles.length === 0
            ? { author: parent.name, series: node.name, underAuthorFolder: true }
            : { author: node.name, underAuthorFolder: true };

        logger.debug(
          { path: node.relativePath, books: classification.books.length, author: bookHints.author },
          'Author folder'
        );

        for (const book of classification.books) {
          visit(book, node, bookHints);
        }
        return;
      }

      case 'Container':
      case 'Empty':
        break;
    }

    for (const child of node.children) {
      visit(child, node, NO_HINTS);
    }
  }

  visit(root, null, NO_HINTS);
  return candidates;
}
