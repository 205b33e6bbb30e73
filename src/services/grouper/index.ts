/**
 * Grouper
 *
 * Partitions an audiobook tree into book candidates:
 * discovery -> classification -> candidate building.
 */

import { stat } from 'fs/promises';
import { resolve } from 'path';
import { getGroupingSettings, type GroupingSettings } from '../config.service.js';
import { grouperLogger as logger } from '../logger.service.js';
import { discoverTree } from './phases/discovery.js';
import { buildCandidates } from './phases/candidate-building.js';
import type { GroupingProgressCallback, GroupingResult } from './types.js';

// Re-export types
export * from './types.js';
export { classifyDirectory } from './phases/classification.js';
export { candidateId } from './phases/candidate-building.js';

export class GroupingError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'GroupingError';
  }
}

export interface GroupOptions {
  /** Defaults to the configured grouping settings */
  settings?: GroupingSettings;
  onProgress?: GroupingProgressCallback;
  shouldCancel?: () => boolean;
}

/**
 * Group every audio file below a root directory into book candidates.
 * Throws GroupingError when the root is missing or not a directory.
 */
export async function groupLibrary(rootPath: string, options: GroupOptions = {}): Promise<GroupingResult> {
  const startTime = Date.now();
  const settings = options.settings ?? getGroupingSettings();
  const onProgress = options.onProgress ?? (() => {});
  const root = resolve(rootPath);

  try {
    const stats = await stat(root);
    if (!stats.isDirectory()) {
      throw new GroupingError(`Scan root is not a directory: ${root}`);
    }
  } catch (error) {
    if (error instanceof GroupingError) throw error;
    throw new GroupingError(`Scan root is not accessible: ${root}`);
  }

  logger.info({ rootPath: root }, 'Starting grouping');

  const discovery = await discoverTree(root, {
    audioExtensions: settings.audioExtensions,
    imageExtensions: settings.imageExtensions,
    onProgress,
    shouldCancel: options.shouldCancel,
  });

  const candidates = buildCandidates(discovery.root, settings, options.shouldCancel);

  onProgress({
    phase: 'complete',
    current: candidates.length,
    total: candidates.length,
    message: `Grouping complete: ${candidates.length} candidates`,
  });

  const result: GroupingResult = {
    rootPath: root,
    candidates,
    directoriesScanned: discovery.directoriesScanned,
    audioFiles: discovery.audioFiles,
    unreadableDirectories: discovery.unreadableDirectories,
    duration: Date.now() - startTime,
  };

  logger.info({
    rootPath: root,
    candidates: candidates.length,
    audioFiles: result.audioFiles,
    duration: result.duration,
  }, 'Grouping complete');

  return result;
}
