/**
 * Embedded Metadata Service Tests
 *
 * music-metadata is mocked; each test registers the tags a file "contains".
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, rm } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import type { ICommonTagsResult } from 'music-metadata';
import type { BookCandidate } from '../../types/book.types.js';

const { tagsByFile } = vi.hoisted(() => ({
  tagsByFile: new Map<string, Record<string, unknown>>(),
}));

vi.mock('music-metadata', () => ({
  parseFile: vi.fn(async (filePath: string) => {
    const common = tagsByFile.get(filePath);
    if (!common) {
      throw new Error('Unsupported container');
    }
    return { common: { track: { no: null, of: null }, disk: { no: null, of: null }, movementIndex: {}, ...common } };
  }),
}));

import {
  aggregateTags,
  extractFileTags,
  ExtractionError,
  majorityVote,
  readEmbeddedMetadata,
  selectLooseCover,
} from '../embedded-metadata.service.js';

function common(tags: Partial<ICommonTagsResult>): ICommonTagsResult {
  return {
    track: { no: null, of: null },
    disk: { no: null, of: null },
    movementIndex: { no: null, of: null },
    ...tags,
  };
}

function candidate(overrides: Partial<BookCandidate> = {}): BookCandidate {
  return {
    id: 'abcdef0123456789',
    pattern: 'ChapteredFolder',
    rootPath: '/library/Book Folder',
    files: ['/library/Book Folder/Part 1.mp3', '/library/Book Folder/Part 2.mp3'],
    auxiliaryFiles: [],
    folderName: 'Book Folder',
    hints: { confidence: 0.3 },
    confidence: 0.9,
    ...overrides,
  };
}

describe('Embedded Metadata Service', () => {
  let coversDir: string;

  beforeEach(async () => {
    tagsByFile.clear();
    coversDir = await mkdtemp(join(tmpdir(), 'covers-test-'));
  });

  afterEach(async () => {
    await rm(coversDir, { recursive: true, force: true });
  });

  describe('extractFileTags', () => {
    it('should prefer album artist over artist', () => {
      const tags = extractFileTags('/a.mp3', common({ albumartist: 'Album Artist', artist: 'Track Artist' }));

      expect(tags.author).toBe('Album Artist');
    });

    it('should read series and index from the album tag', () => {
      const tags = extractFileTags('/a.m4b', common({ album: 'The Bladeborn Saga, Book 2' }));

      expect(tags.series).toBe('The Bladeborn Saga');
      expect(tags.seriesIndex).toBe(2);
      expect(tags.seriesFromAlbum).toBe(true);
    });

    it('should prefer movement tags over the album', () => {
      const tags = extractFileTags('/a.m4b', common({
        album: 'Other Name, Book 9',
        movementName: 'Star Series',
        movementIndex: { no: 3, of: 5 },
      }));

      expect(tags.series).toBe('Star Series');
      expect(tags.seriesIndex).toBe(3);
      expect(tags.seriesFromAlbum).toBe(false);
    });

    it('should keep the first embedded picture', () => {
      const data = new Uint8Array([1, 2, 3]);
      const tags = extractFileTags('/a.m4b', common({ picture: [{ format: 'image/png', data }] }));

      expect(tags.picture).toEqual({ format: 'image/png', data });
    });
  });

  describe('majorityVote', () => {
    it('should pick the most common value and report its share', () => {
      expect(majorityVote(['A', 'a', 'B', undefined], 4)).toEqual({ value: 'A', share: 0.5 });
    });

    it('should break ties by first appearance', () => {
      expect(majorityVote(['B', 'A'], 2)).toEqual({ value: 'B', share: 0.5 });
    });

    it('should return null when nothing was tagged', () => {
      expect(majorityVote([undefined, undefined], 2)).toBeNull();
    });
  });

  describe('aggregateTags', () => {
    it('should scale confidence with agreement', () => {
      const fields = aggregateTags(candidate({ files: ['/1', '/2', '/3'] }), [
        { filePath: '/1', author: 'Ann Writer', seriesFromAlbum: false },
        { filePath: '/2', author: 'Ann Writer', seriesFromAlbum: false },
        { filePath: '/3', author: 'Someone Else', seriesFromAlbum: false },
      ]);

      expect(fields.author).toEqual({ value: 'Ann Writer', provenance: 'metadata', confidence: 0.83 });
    });

    it('should use the shared album as the title of a folder book', () => {
      const fields = aggregateTags(candidate(), [
        { filePath: '/1', album: 'The Long Road', title: 'Chapter 1', seriesFromAlbum: false },
        { filePath: '/2', album: 'The Long Road', title: 'Chapter 2', seriesFromAlbum: false },
      ]);

      expect(fields.title).toEqual({ value: 'The Long Road', provenance: 'metadata', confidence: 0.9 });
    });

    it('should fall back to the folder name for an untagged folder book', () => {
      const fields = aggregateTags(candidate({ folderName: 'The_Long_Road' }), [
        { filePath: '/1', seriesFromAlbum: false },
      ]);

      expect(fields.title).toEqual({ value: 'The Long Road', provenance: 'heuristic', confidence: 0.35 });
      expect(fields.author.provenance).toBe('unresolved');
    });

    it('should use the title tag for a single file', () => {
      const fields = aggregateTags(candidate({ pattern: 'SingleFile', files: ['/1'] }), [
        { filePath: '/1', title: 'The Shadowfort', album: 'The Bladeborn Saga, Book 2', series: 'The Bladeborn Saga', seriesIndex: 2, seriesFromAlbum: true },
      ]);

      expect(fields.title).toEqual({ value: 'The Shadowfort', provenance: 'metadata', confidence: 0.9 });
      expect(fields.seriesIndex).toEqual({ value: 2, provenance: 'metadata', confidence: 0.95 });
      expect(fields.series.value).toBe('The Bladeborn Saga');
      expect(fields.series.confidence).toBeCloseTo(0.85, 1);
    });

    it('should leave fields unresolved when no file could be read', () => {
      const fields = aggregateTags(candidate({ pattern: 'SingleFile' }), []);

      expect(fields.title).toEqual({ value: '', provenance: 'unresolved', confidence: 0 });
    });
  });

  describe('selectLooseCover', () => {
    it('should prefer an image named like a cover', () => {
      const cover = selectLooseCover(candidate({
        auxiliaryFiles: ['/library/Book Folder/back.jpg', '/library/Book Folder/Cover.jpg'],
      }));

      expect(cover).toBe('/library/Book Folder/Cover.jpg');
    });

    it('should prefer an image named after the folder', () => {
      const cover = selectLooseCover(candidate({
        auxiliaryFiles: ['/library/Book Folder/art.png', '/library/Book Folder/Book Folder.png'],
      }));

      expect(cover).toBe('/library/Book Folder/Book Folder.png');
    });

    it('should fall back to the first image by name', () => {
      const cover = selectLooseCover(candidate({
        auxiliaryFiles: ['/library/Book Folder/z.jpg', '/library/Book Folder/a.jpg'],
      }));

      expect(cover).toBe('/library/Book Folder/a.jpg');
    });

    it('should return null without images', () => {
      expect(selectLooseCover(candidate())).toBeNull();
    });
  });

  describe('readEmbeddedMetadata', () => {
    it('should skip unreadable files and continue with the rest', async () => {
      const book = candidate({
        files: ['/library/Book Folder/Part 1.mp3', '/library/Book Folder/Part 2.mp3', '/library/Book Folder/Part 3.mp3'],
      });
      tagsByFile.set('/library/Book Folder/Part 1.mp3', { album: 'The Long Road', artist: 'Ann Writer' });
      tagsByFile.set('/library/Book Folder/Part 3.mp3', { album: 'The Long Road', artist: 'Ann Writer' });

      const result = await readEmbeddedMetadata(book, { coversDir, concurrency: 2 });

      expect(result.filesRead).toBe(2);
      expect(result.errors).toHaveLength(1);
      expect(result.errors[0]).toBeInstanceOf(ExtractionError);
      expect(result.errors[0]?.filePath).toBe('/library/Book Folder/Part 2.mp3');
      expect(result.errors[0]?.message).toBe('Failed to read Part 2.mp3: Unsupported container');
      expect(result.fields.author).toEqual({ value: 'Ann Writer', provenance: 'metadata', confidence: 0.95 });
      expect(result.fields.title.value).toBe('The Long Road');
    });

    it('should extract embedded art into the covers directory', async () => {
      const book = candidate({ files: ['/library/Book Folder/Part 1.mp3'] });
      tagsByFile.set('/library/Book Folder/Part 1.mp3', {
        picture: [{ format: 'image/jpeg', data: new Uint8Array([9, 8, 7]) }],
      });

      const result = await readEmbeddedMetadata(book, { coversDir, concurrency: 1 });

      expect(result.embeddedCover).toBe(true);
      expect(result.coverImagePath).toBe(join(coversDir, 'abcdef0123456789.jpg'));
      const written = await readFile(join(coversDir, 'abcdef0123456789.jpg'));
      expect(Array.from(written)).toEqual([9, 8, 7]);
    });

    it('should use a loose image when nothing is embedded', async () => {
      const book = candidate({
        files: ['/library/Book Folder/Part 1.mp3'],
        auxiliaryFiles: ['/library/Book Folder/folder.jpg'],
      });
      tagsByFile.set('/library/Book Folder/Part 1.mp3', { album: 'The Long Road' });

      const result = await readEmbeddedMetadata(book, { coversDir, concurrency: 1 });

      expect(result.embeddedCover).toBe(false);
      expect(result.coverImagePath).toBe('/library/Book Folder/folder.jpg');
    });
  });
});
