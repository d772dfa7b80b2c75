/**
 * Text helpers shared by ranking and the engine.
 *
 * @module agent-orchestrator/utils/text
 */

const STOP_WORDS = new Set([
  'a', 'an', 'and', 'are', 'as', 'at', 'be', 'by', 'for', 'from', 'i', 'in',
  'into', 'is', 'it', 'me', 'my', 'of', 'on', 'or', 'our', 'please', 'that',
  'the', 'this', 'to', 'want', 'with', 'would', 'you', 'your',
]);

/**
 * Split text into lowercase word tokens, dropping stop words.
 *
 * @example
 * ```typescript
 * tokenize('Translate my lecture audio'); // ['translate', 'lecture', 'audio']
 * ```
 */
export function tokenize(text: string): string[] {
  return text
    .toLowerCase()
    .split(/[^\p{L}\p{N}]+/u)
    .filter((token) => token.length > 0 && !STOP_WORDS.has(token));
}

/**
 * Convert a display name to a filesystem-safe slug.
 *
 * @example
 * ```typescript
 * slugify('Speech Translator'); // 'speech-translator'
 * ```
 */
export function slugify(name: string): string {
  const slug = name
    .toLowerCase()
    .normalize('NFKD')
    .replace(/[\u0300-\u036f]/g, '')
    .replace(/[^a-z0-9]+/g, '-')
    .replace(/^-+|-+$/g, '');
  return slug || 'entry';
}

/**
 * Compare two strings by UTF-16 code units, independent of locale.
 */
export function compareNames(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}
