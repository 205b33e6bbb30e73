/**
 * Stem Analysis
 *
 * Structural comparison of sibling file names: natural ordering, shared
 * stem detection and ordinal token parsing. Nothing here looks at the
 * meaning of words, only at their position and character class.
 */

import { basename, extname } from 'path';
import type { WorkGroup } from './types.js';

// =============================================================================
// Types
// =============================================================================

export type OrdinalKind = 'numeric' | 'roman' | 'alpha';

export type ChapterAnalysis =
  | {
      chaptered: true;
      /** Shared text around the ordinal, separators trimmed */
      stem: string;
      kind: OrdinalKind;
      /** Indexes into the input, ordered by ordinal value */
      order: number[];
    }
  | { chaptered: false; reason: string };

type CharClass = 'digit' | 'letter' | 'other';

// =============================================================================
// Ordering
// =============================================================================

/**
 * Numeric-aware, case-insensitive comparison ("2" sorts before "10")
 */
export function naturalCompare(a: string, b: string): number {
  return a.localeCompare(b, undefined, { numeric: true, sensitivity: 'base' });
}

export function stripExtension(filename: string): string {
  const ext = extname(filename);
  return ext.length > 0 ? filename.slice(0, -ext.length) : filename;
}

// =============================================================================
// Ordinal Tokens
// =============================================================================

const SEPARATORS = /^[\s._\-–—#()[\]]+|[\s._\-–—#()[\]]+$/g;
const ROMAN = /^m{0,3}(cm|cd|d?c{0,3})(xc|xl|l?x{0,3})(ix|iv|v?i{0,3})$/i;
const ROMAN_VALUES: Record<string, number> = { i: 1, v: 5, x: 10, l: 50, c: 100, d: 500, m: 1000 };

function trimSeparators(value: string): string {
  return value.replace(SEPARATORS, '');
}

function romanValue(token: string): number {
  const chars = token.toLowerCase().split('');
  let total = 0;
  chars.forEach((char, i) => {
    const value = ROMAN_VALUES[char] ?? 0;
    const next = ROMAN_VALUES[chars[i + 1] ?? ''] ?? 0;
    total += value < next ? -value : value;
  });
  return total;
}

/** Bijective base-26: a=1, z=26, aa=27 */
function alphaValue(token: string): number {
  return token
    .toLowerCase()
    .split('')
    .reduce((total, char) => total * 26 + (char.charCodeAt(0) - 96), 0);
}

/**
 * Decide which ordinal system a set of tokens belongs to.
 * All tokens must share one system.
 */
export function detectOrdinalKind(tokens: string[], maxAlphaLength: number): OrdinalKind | null {
  if (tokens.length === 0) return null;
  if (tokens.every((t) => /^\d+$/.test(t))) return 'numeric';
  if (tokens.every((t) => t.length > 0 && ROMAN.test(t))) return 'roman';
  const alpha = new RegExp(`^[a-z]{1,${Math.max(1, maxAlphaLength)}}$`, 'i');
  if (tokens.every((t) => alpha.test(t))) return 'alpha';
  return null;
}

export function ordinalValue(token: string, kind: OrdinalKind): number {
  switch (kind) {
    case 'numeric':
      return parseInt(token, 10);
    case 'roman':
      return romanValue(token);
    case 'alpha':
      return alphaValue(token);
  }
}

// =============================================================================
// Shared Stem Detection
// =============================================================================

function charClass(char: string | undefined): CharClass {
  if (char === undefined) return 'other';
  if (/\d/.test(char)) return 'digit';
  if (/\p{L}/u.test(char)) return 'letter';
  return 'other';
}

function commonPrefixLength(values: string[]): number {
  const first = values[0] ?? '';
  let length = 0;
  while (length < first.length && values.every((v) => v.charAt(length).toLowerCase() === first.charAt(length).toLowerCase())) {
    length++;
  }
  return length;
}

function commonSuffixLength(values: string[]): number {
  const first = values[0] ?? '';
  let length = 0;
  const at = (v: string, n: number) => v.charAt(v.length - 1 - n).toLowerCase();
  while (length < first.length && values.every((v) => length < v.length && at(v, length) === at(first, length))) {
    length++;
  }
  return length;
}

/**
 * Analyze whether sibling names are numbered parts of one work.
 *
 * The names' shared prefix and suffix are found, then backed off so they do
 * not cut through a token ("Book 0|1" backs off to "Book |01"). What remains
 * of each name must be a single ordinal token, all of one system and all
 * distinct. An empty stem is accepted only for numeric tokens.
 */
export function analyzeChapterSequence(names: string[], maxAlphaLength: number): ChapterAnalysis {
  if (names.length < 2) {
    return { chaptered: false, reason: 'fewer than two names' };
  }

  const stems = names.map(stripExtension);

  let prefix = commonPrefixLength(stems);
  while (
    prefix > 0 &&
    charClass(stems[0]?.charAt(prefix - 1)) !== 'other' &&
    stems.some((s) => prefix < s.length && charClass(s.charAt(prefix)) === charClass(s.charAt(prefix - 1)))
  ) {
    prefix--;
  }

  const rests = stems.map((s) => s.slice(prefix));
  let suffix = commonSuffixLength(rests);
  while (
    suffix > 0 &&
    charClass(rests[0]?.charAt((rests[0]?.length ?? 0) - suffix)) !== 'other' &&
    rests.some((r) => {
      const boundary = r.length - suffix;
      return boundary > 0 && charClass(r.charAt(boundary - 1)) === charClass(r.charAt(boundary));
    })
  ) {
    suffix--;
  }

  const tokens = rests.map((r) => trimSeparators(r.slice(0, r.length - suffix)));
  if (tokens.some((t) => t.length === 0)) {
    return { chaptered: false, reason: 'names do not differ by a token' };
  }

  const kind = detectOrdinalKind(tokens, maxAlphaLength);
  if (!kind) {
    return { chaptered: false, reason: 'distinguishing text is not an ordinal' };
  }

  const first = stems[0] ?? '';
  const stem = trimSeparators(`${first.slice(0, prefix)} ${first.slice(first.length - suffix)}`)
    .replace(/\s+/g, ' ');

  if (stem.length === 0 && kind !== 'numeric') {
    return { chaptered: false, reason: 'no shared stem' };
  }

  const values = tokens.map((t) => ordinalValue(t, kind));
  const order = values.map((_, i) => i).sort((a, b) => (values[a] ?? 0) - (values[b] ?? 0));
  for (let i = 1; i < order.length; i++) {
    if ((values[order[i] ?? 0] ?? 0) <= (values[order[i - 1] ?? 0] ?? 0)) {
      return { chaptered: false, reason: 'ordinals repeat' };
    }
  }

  return { chaptered: true, stem, kind, order };
}

// =============================================================================
// Work Keys
// =============================================================================

/**
 * Reduce a file name to the stem of the work it belongs to by removing a
 * trailing ordinal. The stem keeps at least one letter.
 *
 *   workStem('Title One Part 2.mp3', 2) -> 'Title One Part'
 */
export function workStem(filename: string, maxAlphaLength: number): string {
  const stem = trimSeparators(stripExtension(filename)).replace(/\s+/g, ' ');

  const numeric = stem.match(/^(.*\p{L}.*?)[\s._\-–—#([]*\d+[)\]]?$/u);
  if (numeric?.[1]) {
    return trimSeparators(numeric[1]);
  }

  const lettered = stem.match(/^(.*\p{L}.*?)[\s._\-–—#([]+(\p{L}+)[)\]]?$/u);
  if (lettered?.[1] && lettered[2]) {
    const token = lettered[2];
    if (ROMAN.test(token) || token.length <= maxAlphaLength) {
      return trimSeparators(lettered[1]);
    }
  }

  return stem;
}

/**
 * Group files by work stem (case-insensitive), preserving first-appearance
 * order. Each group is labelled with the stem of its first member.
 */
export function groupByWorkStem(files: string[], maxAlphaLength: number): WorkGroup[] {
  const groups = new Map<string, WorkGroup>();

  for (const file of files) {
    const stem = workStem(basename(file), maxAlphaLength);
    const existing = groups.get(stem.toLowerCase());
    if (existing) {
      existing.files.push(file);
    } else {
      groups.set(stem.toLowerCase(), { key: stem, files: [file] });
    }
  }

  return Array.from(groups.values());
}
