/**
 * Classification Phase
 *
 * Phase 2 of the grouper. Decides the folder pattern of a single directory
 * from the shape of its file names. This is the only place a
 * DirectoryClassification is produced.
 */

import { basename } from 'path';
import type { GroupingSettings } from '../../config.service.js';
import { analyzeChapterSequence, groupByWorkStem } from '../stem-analysis.js';
import { containsAudio } from './discovery.js';
import type { DirectoryClassification, DirectoryNode, RootGroup, WorkGroup } from '../types.js';

/**
 * Loose root files sharing a work stem are the parts of one book. They are
 * put in ordinal order when the names form a chapter sequence.
 */
function classifyRootGroup(group: WorkGroup, settings: GroupingSettings): RootGroup {
  const { confidence, maxOrdinalTokenLength } = settings;

  if (group.files.length === 1) {
    return { ...group, confidence: confidence.singleFile };
  }

  const analysis = analyzeChapterSequence(group.files.map((f) => basename(f)), maxOrdinalTokenLength);
  if (!analysis.chaptered) {
    return { ...group, confidence: confidence.fallbackChaptered };
  }

  return {
    key: group.key,
    files: analysis.order.flatMap((i) => group.files[i] ?? []),
    confidence: analysis.stem.length > 0 ? confidence.chaptered : confidence.numericChaptered,
  };
}

/**
 * Classify one directory.
 *
 * - Audio directly in the scan root: RootFiles (one book per work stem)
 * - One audio file, or a shared stem with distinct ordinals: ChapteredFolder
 * - Audio files forming two or more work groups: MultiBookFolder
 * - No audio, every audio-bearing child holds audio directly: AuthorFolder
 */
export function classifyDirectory(node: DirectoryNode, settings: GroupingSettings): DirectoryClassification {
  const { confidence, maxOrdinalTokenLength } = settings;

  if (node.audioFiles.length > 0) {
    if (node.isRoot) {
      const groups = groupByWorkStem(node.audioFiles, maxOrdinalTokenLength);
      return { kind: 'RootFiles', groups: groups.map((group) => classifyRootGroup(group, settings)) };
    }

    if (node.audioFiles.length === 1) {
      return { kind: 'ChapteredFolder', files: [...node.audioFiles], confidence: confidence.singleFileDirectory };
    }

    const analysis = analyzeChapterSequence(node.audioFiles.map((f) => basename(f)), maxOrdinalTokenLength);
    if (analysis.chaptered) {
      const files = analysis.order.flatMap((i) => node.audioFiles[i] ?? []);
      return {
        kind: 'ChapteredFolder',
        files,
        confidence: analysis.stem.length > 0 ? confidence.chaptered : confidence.numericChaptered,
      };
    }

    const groups = groupByWorkStem(node.audioFiles, maxOrdinalTokenLength);
    if (groups.length >= 2) {
      return { kind: 'MultiBookFolder', groups, confidence: confidence.multiBook };
    }

    return { kind: 'ChapteredFolder', files: [...node.audioFiles], confidence: confidence.fallbackChaptered };
  }

  const audioChildren = node.children.filter(containsAudio);
  if (audioChildren.length === 0) {
    return { kind: 'Empty' };
  }

  if (!node.isRoot && audioChildren.every((child) => child.audioFiles.length > 0)) {
    return { kind: 'AuthorFolder', books: audioChildren };
  }

  return { kind: 'Container' };
}
