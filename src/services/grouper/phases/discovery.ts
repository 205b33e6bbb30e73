/**
 * Discovery Phase
 *
 * Phase 1 of the grouper. Walks the scan root and builds a directory tree of
 * audio and image files. Dot-files are skipped; unreadable directories are
 * logged and kept as empty nodes.
 */

import type { Dirent } from 'fs';
import { readdir } from 'fs/promises';
import { basename, extname, join, relative, sep } from 'path';
import { createServiceLogger } from '../../logger.service.js';
import { naturalCompare } from '../stem-analysis.js';
import type { DirectoryNode, GroupingProgressCallback } from '../types.js';

const logger = createServiceLogger('grouper-discovery');

export interface DiscoveryOptions {
  audioExtensions: string[];
  imageExtensions: string[];
  onProgress?: GroupingProgressCallback;
  shouldCancel?: () => boolean;
}

export interface DiscoveryResult {
  root: DirectoryNode;
  directoriesScanned: number;
  audioFiles: number;
  unreadableDirectories: string[];
}

/**
 * Convert a path under the root into a posix-style relative path
 */
export function toRelativePath(rootPath: string, fullPath: string): string {
  return relative(rootPath, fullPath).split(sep).join('/');
}

/**
 * Discover the directory tree below a scan root.
 */
export async function discoverTree(rootPath: string, options: DiscoveryOptions): Promise<DiscoveryResult> {
  const audioExtensions = new Set(options.audioExtensions.map((e) => e.toLowerCase()));
  const imageExtensions = new Set(options.imageExtensions.map((e) => e.toLowerCase()));
  const onProgress = options.onProgress ?? (() => {});

  let directoriesScanned = 0;
  let audioFiles = 0;
  const unreadableDirectories: string[] = [];

  async function scanDirectory(dirPath: string, isRoot: boolean): Promise<DirectoryNode> {
    const node: DirectoryNode = {
      path: dirPath,
      name: basename(dirPath),
      relativePath: isRoot ? '' : toRelativePath(rootPath, dirPath),
      isRoot,
      audioFiles: [],
      imageFiles: [],
      children: [],
    };

    if (options.shouldCancel?.()) return node;

    let entries: Dirent[];
    try {
      entries = await readdir(dirPath, { withFileTypes: true });
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      node.readError = message;
      unreadableDirectories.push(node.relativePath);
      logger.warn({ path: dirPath, error: message }, 'Failed to read directory');
      return node;
    }

    directoriesScanned++;
    const sorted = entries
      .filter((entry) => !entry.name.startsWith('.'))
      .sort((a, b) => naturalCompare(a.name, b.name));

    for (const entry of sorted) {
      const fullPath = join(dirPath, entry.name);

      if (entry.isDirectory()) {
        node.children.push(await scanDirectory(fullPath, false));
      } else if (entry.isFile()) {
        const ext = extname(entry.name).toLowerCase();
        if (audioExtensions.has(ext)) {
          node.audioFiles.push(fullPath);
          audioFiles++;
        } else if (imageExtensions.has(ext)) {
          node.imageFiles.push(fullPath);
        }
      }
    }

    if (directoriesScanned % 50 === 0) {
      onProgress({
        phase: 'discovery',
        current: directoriesScanned,
        total: 0, // Unknown until complete
        message: `Discovering files: ${audioFiles} audio files in ${directoriesScanned} directories`,
      });
    }

    return node;
  }

  const root = await scanDirectory(rootPath, true);

  onProgress({
    phase: 'discovery',
    current: directoriesScanned,
    total: directoriesScanned,
    message: `Discovery complete: ${audioFiles} audio files in ${directoriesScanned} directories`,
  });

  return { root, directoriesScanned, audioFiles, unreadableDirectories };
}

/**
 * Whether any audio file exists at or below a node
 */
export function containsAudio(node: DirectoryNode): boolean {
  return node.audioFiles.length > 0 || node.children.some(containsAudio);
}
