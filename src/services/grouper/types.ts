/**
 * Grouper Types
 *
 * Types for the three-phase grouping pass: discovery, classification and
 * candidate building.
 */

import type { BookCandidate } from '../../types/book.types.js';

export interface DirectoryNode {
  path: string;
  name: string;
  /** Path relative to the scan root with posix separators, '' for the root */
  relativePath: string;
  isRoot: boolean;
  /** Audio files directly in this directory, natural order */
  audioFiles: string[];
  /** Image files directly in this directory, natural order */
  imageFiles: string[];
  children: DirectoryNode[];
  /** Set when the directory could not be listed */
  readError?: string;
}

/** Files that share a work stem */
export interface WorkGroup {
  /** Stem of the first member with any trailing ordinal removed */
  key: string;
  files: string[];
}

/** A work group of loose root files with its chapter order applied */
export interface RootGroup extends WorkGroup {
  confidence: number;
}

/**
 * Result of classifying one directory. Produced by `classifyDirectory` only;
 * downstream code switches on `kind`.
 */
export type DirectoryClassification =
  | { kind: 'RootFiles'; groups: RootGroup[] }
  | { kind: 'ChapteredFolder'; files: string[]; confidence: number }
  | { kind: 'MultiBookFolder'; groups: WorkGroup[]; confidence: number }
  | { kind: 'AuthorFolder'; books: DirectoryNode[] }
  | { kind: 'Container' }
  | { kind: 'Empty' };

export type GroupingPhase = 'discovery' | 'complete';

export interface GroupingProgress {
  phase: GroupingPhase;
  current: number;
  total: number;
  message: string;
}

export type GroupingProgressCallback = (progress: GroupingProgress) => void;

export interface GroupingResult {
  rootPath: string;
  candidates: BookCandidate[];
  directoriesScanned: number;
  audioFiles: number;
  /** Directories that could not be read, relative to the root */
  unreadableDirectories: string[];
  duration: number;
}
