/**
 * Title Matcher Service
 *
 * String similarity and normalization for comparing proposed book
 * metadata against the hints it was looked up with.
 */

// =============================================================================
// String Similarity Functions
// =============================================================================

/**
 * Calculate Levenshtein distance between two strings.
 */
export function levenshteinDistance(a: string, b: string): number {
  const previous: number[] = Array.from({ length: a.length + 1 }, (_, j) => j);

  for (let i = 1; i <= b.length; i++) {
    const current: number[] = [i];
    for (let j = 1; j <= a.length; j++) {
      const substitution = (previous[j - 1] ?? 0) + (b.charAt(i - 1) === a.charAt(j - 1) ? 0 : 1);
      const insertion = (current[j - 1] ?? 0) + 1;
      const deletion = (previous[j] ?? 0) + 1;
      current[j] = Math.min(substitution, insertion, deletion);
    }
    previous.splice(0, previous.length, ...current);
  }

  return previous[a.length] ?? 0;
}

/**
 * Normalize a name for comparison.
 * Strips accents, punctuation, a leading article and extra whitespace.
 */
export function normalizeForComparison(name: string): string {
  return name
    .normalize('NFKD')
    .replace(/[\u0300-\u036f]/g, '')
    .toLowerCase()
    .replace(/^the\s+/, '')
    .replace(/[^\p{L}\p{N}\s]/gu, ' ')
    .replace(/\s+/g, ' ')
    .trim();
}

/**
 * Calculate similarity between two titles or names (0-1).
 */
export function calculateSimilarity(name1: string, name2: string): number {
  const norm1 = normalizeForComparison(name1);
  const norm2 = normalizeForComparison(name2);

  if (norm1 === norm2) return norm1.length > 0 ? 1.0 : 0.0;
  if (norm1.length === 0 || norm2.length === 0) return 0.0;

  // Check for containment (partial match)
  if (norm1.includes(norm2) || norm2.includes(norm1)) {
    const lengthRatio = Math.min(norm1.length, norm2.length) / Math.max(norm1.length, norm2.length);
    return 0.7 + 0.3 * lengthRatio;
  }

  // Token-based matching for multi-word titles
  const tokens1 = norm1.split(' ');
  const tokens2 = norm2.split(' ');
  const matchingTokens = tokens1.filter((t) => tokens2.includes(t)).length;
  const tokenScore = matchingTokens / Math.max(tokens1.length, tokens2.length);

  const distance = levenshteinDistance(norm1, norm2);
  const maxLength = Math.max(norm1.length, norm2.length);
  const levenshteinScore = 1 - distance / maxLength;

  return Math.max(tokenScore, levenshteinScore);
}

// =============================================================================
// Normalization
// =============================================================================

/**
 * Re-case an author name as "First Last".
 *
 * Examples:
 *   - SANDERSON, BRANDON -> Brandon Sanderson
 *   - j.r.r. tolkien -> J.R.R. Tolkien
 *   - Ursula K. Le Guin -> Ursula K. Le Guin (mixed case is kept)
 */
export function recaseAuthorName(name: string): string {
  let result = name.replace(/\s+/g, ' ').trim();

  const inverted = result.match(/^([^,]+),\s*([^,]+)$/);
  if (inverted?.[1] && inverted[2]) {
    result = `${inverted[2].trim()} ${inverted[1].trim()}`;
  }

  const letters = result.replace(/[^\p{L}]/gu, '');
  const singleCase = letters === letters.toUpperCase() || letters === letters.toLowerCase();
  if (!singleCase) {
    return result;
  }

  return result
    .toLowerCase()
    .replace(/(^|[\s.\-'\u2019])(\p{L})/gu, (_, boundary: string, letter: string) => boundary + letter.toUpperCase());
}

/**
 * Normalize title punctuation: straight quotes, spaced dashes, no underscores
 * and no trailing separators.
 */
export function normalizeTitlePunctuation(title: string): string {
  return title
    .replace(/[\u2018\u2019]/g, "'")
    .replace(/[\u201c\u201d]/g, '"')
    .replace(/_/g, ' ')
    .replace(/\s*[–—]\s*/g, ' - ')
    .replace(/\s+([:;,!?])/g, '$1')
    .replace(/\s+/g, ' ')
    .replace(/[\s\-:;,]+$/, '')
    .replace(/^[\s\-:;,]+/, '')
    .trim();
}

/**
 * Drop a subtitle (text after a colon or spaced dash) and all punctuation.
 */
export function stripSubtitleAndPunctuation(title: string): string {
  const head = title.split(/:|\s[-–—]\s/)[0] ?? title;
  return head
    .replace(/[^\p{L}\p{N}\s']/gu, ' ')
    .replace(/\s+/g, ' ')
    .trim();
}

export const TitleMatcher = {
  levenshteinDistance,
  normalizeForComparison,
  calculateSimilarity,
  recaseAuthorName,
  normalizeTitlePunctuation,
  stripSubtitleAndPunctuation,
};

export default TitleMatcher;
