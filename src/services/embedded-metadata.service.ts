/**
 * Embedded Metadata Service
 *
 * Reads container tags and cover art from a candidate's audio files and
 * aggregates them into provenance-tagged fields. Member files are parsed
 * through a bounded pool; an unreadable file is reported and skipped.
 */

import { mkdir, writeFile } from 'fs/promises';
import { basename, join } from 'path';
import { parseFile, type ICommonTagsResult } from 'music-metadata';
import { getCoversDir } from './app-paths.service.js';
import { getGroupingSettings } from './config.service.js';
import { metadataLogger as logger } from './logger.service.js';
import { cleanName, parseSeriesDesignation } from './name-patterns.service.js';
import { parallelMap } from './parallel.service.js';
import { naturalCompare, stripExtension } from './grouper/stem-analysis.js';
import {
  emptyFields,
  type BookCandidate,
  type BookFields,
  type FieldValue,
} from '../types/book.types.js';

// =============================================================================
// Types
// =============================================================================

/**
 * Raised for one member file whose container could not be parsed
 */
export class ExtractionError extends Error {
  readonly filePath: string;

  constructor(filePath: string, message: string) {
    super(`Failed to read ${basename(filePath)}: ${message}`);
    this.name = 'ExtractionError';
    this.filePath = filePath;
  }
}

export interface EmbeddedPicture {
  format: string;
  data: Uint8Array;
}

/** Tags read from one member file */
export interface FileTags {
  filePath: string;
  title?: string;
  album?: string;
  author?: string;
  series?: string;
  seriesIndex?: number;
  /** Series and index were parsed out of the album tag */
  seriesFromAlbum: boolean;
  picture?: EmbeddedPicture;
}

export interface EmbeddedMetadataResult {
  fields: BookFields;
  coverImagePath: string | null;
  /** Whether the cover came from embedded art */
  embeddedCover: boolean;
  filesRead: number;
  errors: ExtractionError[];
}

export interface EmbeddedMetadataOptions {
  /** Where extracted cover art is written (default: app cover cache) */
  coversDir?: string;
  /** Files parsed concurrently (default: grouping.extractionConcurrency) */
  concurrency?: number;
}

// Confidence model
const BASE_CONFIDENCE = 0.6;
const AGREEMENT_WEIGHT = 0.35;
const ALBUM_SERIES_FACTOR = 0.9;
const TAG_TITLE_CONFIDENCE = 0.9;
const COMMON_TITLE_CONFIDENCE = 0.85;
const FOLDER_TITLE_CONFIDENCE = 0.35;

const IMAGE_EXTENSIONS: Record<string, string> = {
  'image/jpeg': 'jpg',
  'image/jpg': 'jpg',
  'image/png': 'png',
  'image/webp': 'webp',
  'image/gif': 'gif',
};

// =============================================================================
// Tag Reading
// =============================================================================

function nonEmpty(value: unknown): string | undefined {
  if (typeof value === 'string') {
    const trimmed = value.trim();
    return trimmed.length > 0 ? trimmed : undefined;
  }
  if (Array.isArray(value)) {
    return nonEmpty(value.find((v) => typeof v === 'string' && v.trim().length > 0));
  }
  return undefined;
}

function positiveInteger(value: unknown): number | undefined {
  if (typeof value === 'number' && Number.isInteger(value) && value > 0) return value;
  if (value !== null && typeof value === 'object' && 'no' in value) {
    return positiveInteger(value.no);
  }
  return undefined;
}

/**
 * Pull the book-level tags out of a parsed common tag block.
 * Movement and grouping tags vary in shape between formats, so they are
 * read as unknown and narrowed.
 */
export function extractFileTags(filePath: string, common: ICommonTagsResult): FileTags {
  const raw = new Map<string, unknown>(Object.entries(common));

  const tags: FileTags = {
    filePath,
    title: nonEmpty(common.title),
    album: nonEmpty(common.album),
    author: nonEmpty(common.albumartist) ?? nonEmpty(common.artist) ?? nonEmpty(common.composer),
    seriesFromAlbum: false,
  };

  const series = nonEmpty(raw.get('movementName')) ?? nonEmpty(raw.get('grouping'));
  const index = positiveInteger(raw.get('movementIndex'));
  if (series) tags.series = series;
  if (index !== undefined) tags.seriesIndex = index;

  if (tags.album && (!tags.series || tags.seriesIndex === undefined)) {
    const designation = parseSeriesDesignation(tags.album);
    if (designation) {
      tags.seriesFromAlbum = !tags.series;
      tags.series = tags.series ?? designation.series;
      if (tags.seriesIndex === undefined && designation.index !== null) {
        tags.seriesIndex = designation.index;
      }
    }
  }

  const picture = common.picture?.[0];
  if (picture && picture.data.length > 0) {
    tags.picture = { format: picture.format, data: picture.data };
  }

  return tags;
}

/**
 * Read the tags of one file. Throws ExtractionError on unsupported or
 * corrupt containers.
 */
export async function readFileTags(filePath: string): Promise<FileTags> {
  try {
    const metadata = await parseFile(filePath, { duration: false });
    return extractFileTags(filePath, metadata.common);
  } catch (error) {
    throw new ExtractionError(filePath, error instanceof Error ? error.message : String(error));
  }
}

// =============================================================================
// Aggregation
// =============================================================================

interface Vote<T> {
  value: T;
  share: number;
}

/**
 * Majority vote over defined values. Ties go to the value seen first.
 * Share is the fraction of all readable files agreeing.
 */
export function majorityVote<T extends string | number>(
  values: Array<T | undefined>,
  readable: number,
  keyOf: (value: T) => string | number = (v) => (typeof v === 'string' ? v.toLowerCase() : v)
): Vote<T> | null {
  const counts = new Map<string | number, { value: T; count: number }>();

  for (const value of values) {
    if (value === undefined) continue;
    const key = keyOf(value);
    const entry = counts.get(key);
    if (entry) {
      entry.count++;
    } else {
      counts.set(key, { value, count: 1 });
    }
  }

  let best: { value: T; count: number } | null = null;
  for (const entry of counts.values()) {
    if (!best || entry.count > best.count) best = entry;
  }

  if (!best || readable === 0) return null;
  return { value: best.value, share: best.count / readable };
}

function voteConfidence(share: number): number {
  return Math.round((BASE_CONFIDENCE + AGREEMENT_WEIGHT * share) * 100) / 100;
}

function metadataValue<V>(value: V, confidence: number): FieldValue<V> {
  return { value, provenance: 'metadata', confidence };
}

/** Value shared by every readable member, compared case-insensitively */
function commonValue(values: Array<string | undefined>): string | undefined {
  const first = values[0];
  if (!first) return undefined;
  return values.every((v) => v !== undefined && v.toLowerCase() === first.toLowerCase()) ? first : undefined;
}

/**
 * Aggregate per-file tags into the four canonical fields.
 */
export function aggregateTags(candidate: BookCandidate, tags: FileTags[]): BookFields {
  const fields = emptyFields();
  const readable = tags.length;
  const isDirectory = candidate.pattern === 'ChapteredFolder' || candidate.pattern === 'AuthorFolder>Book';

  const author = majorityVote(tags.map((t) => t.author), readable);
  if (author) {
    fields.author = metadataValue(author.value, voteConfidence(author.share));
  }

  const series = majorityVote(tags.map((t) => t.series), readable);
  if (series) {
    const fromAlbum = tags.some((t) => t.seriesFromAlbum && t.series?.toLowerCase() === series.value.toLowerCase());
    const confidence = voteConfidence(series.share) * (fromAlbum ? ALBUM_SERIES_FACTOR : 1);
    fields.series = metadataValue(series.value, Math.round(confidence * 100) / 100);
  }

  const seriesIndex = majorityVote(tags.map((t) => t.seriesIndex), readable);
  if (seriesIndex) {
    fields.seriesIndex = metadataValue<number | null>(seriesIndex.value, voteConfidence(seriesIndex.share));
  }

  // An album that parsed as "Series, N" names the series, not the book
  const albums = tags.map((t) => (t.seriesFromAlbum ? undefined : t.album));
  const titles = tags.map((t) => t.title);

  const [primary, secondary] = isDirectory ? [albums, titles] : [titles, albums];
  const primaryTitle = readable > 0 ? commonValue(primary) : undefined;
  const secondaryTitle = readable > 0 ? commonValue(secondary) : undefined;

  if (primaryTitle) {
    fields.title = metadataValue(primaryTitle, TAG_TITLE_CONFIDENCE);
  } else if (secondaryTitle) {
    fields.title = metadataValue(secondaryTitle, COMMON_TITLE_CONFIDENCE);
  } else if (isDirectory) {
    fields.title = {
      value: cleanName(candidate.folderName),
      provenance: 'heuristic',
      confidence: FOLDER_TITLE_CONFIDENCE,
    };
  }

  return fields;
}

// =============================================================================
// Cover Selection
// =============================================================================

function pictureExtension(format: string): string {
  const normalized = format.toLowerCase();
  return IMAGE_EXTENSIONS[normalized] ?? (/^[a-z]{3,4}$/.test(normalized) ? normalized : 'jpg');
}

/**
 * Pick a loose image: one whose name implies a cover or matches the folder
 * or work name, else the first by name.
 */
export function selectLooseCover(candidate: BookCandidate): string | null {
  const images = [...candidate.auxiliaryFiles].sort((a, b) => naturalCompare(basename(a), basename(b)));
  if (images.length === 0) return null;

  const names = [candidate.folderName, candidate.workName]
    .filter((n): n is string => typeof n === 'string')
    .map((n) => cleanName(n).toLowerCase());

  const preferred = images.find((image) => {
    const stem = cleanName(stripExtension(basename(image))).toLowerCase();
    return /cover|folder/.test(stem) || names.includes(stem);
  });

  return preferred ?? images[0] ?? null;
}

async function writeEmbeddedCover(entityId: string, picture: EmbeddedPicture, coversDir: string): Promise<string | null> {
  const target = join(coversDir, `${entityId}.${pictureExtension(picture.format)}`);
  try {
    await mkdir(coversDir, { recursive: true });
    await writeFile(target, picture.data);
    return target;
  } catch (error) {
    logger.warn({ entityId, target, error: error instanceof Error ? error.message : String(error) }, 'Failed to write embedded cover');
    return null;
  }
}

// =============================================================================
// Public API
// =============================================================================

/**
 * Read every member of a candidate and aggregate the results.
 */
export async function readEmbeddedMetadata(
  candidate: BookCandidate,
  options: EmbeddedMetadataOptions = {}
): Promise<EmbeddedMetadataResult> {
  const concurrency = options.concurrency ?? getGroupingSettings().extractionConcurrency;
  const coversDir = options.coversDir ?? getCoversDir();

  // Extraction failures come back as values so the per-file error survives the pool
  const batch = await parallelMap(
    candidate.files,
    async (file): Promise<FileTags | ExtractionError> => {
      try {
        return await readFileTags(file);
      } catch (error) {
        if (error instanceof ExtractionError) return error;
        throw error;
      }
    },
    { concurrency }
  );

  const tags: FileTags[] = [];
  const errors: ExtractionError[] = [];
  batch.results.forEach((result, i) => {
    if (result.result instanceof ExtractionError) {
      errors.push(result.result);
    } else if (result.success && result.result) {
      tags.push(result.result);
    } else {
      const file = candidate.files[i] ?? candidate.rootPath;
      errors.push(new ExtractionError(file, result.error ?? 'unknown error'));
    }
  });

  if (errors.length > 0) {
    logger.warn({
      entityId: candidate.id,
      failed: errors.length,
      total: candidate.files.length,
    }, `${errors.length} of ${candidate.files.length} files could not be read`);
  }

  const fields = aggregateTags(candidate, tags);

  let coverImagePath: string | null = null;
  let embeddedCover = false;
  const picture = tags.find((t) => t.picture)?.picture;
  if (picture) {
    coverImagePath = await writeEmbeddedCover(candidate.id, picture, coversDir);
    embeddedCover = coverImagePath !== null;
  }
  if (!coverImagePath) {
    coverImagePath = selectLooseCover(candidate);
  }

  logger.debug({
    entityId: candidate.id,
    filesRead: tags.length,
    cover: coverImagePath,
  }, 'Embedded metadata read');

  return { fields, coverImagePath, embeddedCover, filesRead: tags.length, errors };
}

export const EmbeddedMetadata = {
  readFileTags,
  extractFileTags,
  aggregateTags,
  majorityVote,
  selectLooseCover,
  readEmbeddedMetadata,
};

export default EmbeddedMetadata;
