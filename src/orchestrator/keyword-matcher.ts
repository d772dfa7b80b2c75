/**
 * Keyword Matcher
 *
 * Token-overlap ranking used when semantic search is unavailable.
 * Each distinct query token scores 3 for a keyword hit, 2 for a name
 * hit, 1 for a category hit and 1 for a description hit.
 *
 * @module agent-orchestrator/orchestrator/keyword-matcher
 */

import type { Catalog } from '../catalog/catalog.js';
import type { CatalogEntry } from '../catalog/types.js';
import { tokenize } from '../utils/text.js';

export const KEYWORD_WEIGHTS = {
  keyword: 3,
  name: 2,
  category: 1,
  description: 1,
} as const;

export interface KeywordMatch {
  entry: CatalogEntry;
  score: number;
}

function tokenSet(...texts: readonly string[]): Set<string> {
  return new Set(texts.flatMap((text) => tokenize(text)));
}

/**
 * Keyword score of one entry for a set of query tokens
 */
export function scoreEntry(entry: CatalogEntry, queryTokens: ReadonlySet<string>): number {
  const { name, description, keywords, category } = entry.descriptor;
  const keywordTokens = tokenSet(...keywords);
  const nameTokens = tokenSet(name);
  const categoryTokens = tokenSet(category);
  const descriptionTokens = tokenSet(description);

  let score = 0;
  for (const token of queryTokens) {
    if (keywordTokens.has(token)) score += KEYWORD_WEIGHTS.keyword;
    if (nameTokens.has(token)) score += KEYWORD_WEIGHTS.name;
    if (categoryTokens.has(token)) score += KEYWORD_WEIGHTS.category;
    if (descriptionTokens.has(token)) score += KEYWORD_WEIGHTS.description;
  }
  return score;
}

/**
 * Entries sharing at least one token with the intent, best first. Ties
 * keep catalog order.
 *
 * @example
 * ```typescript
 * rankByKeywords(catalog, 'summarize my notes', 3);
 * // [{ entry: <Summarization>, score: 4 }, ...]
 * ```
 */
export function rankByKeywords(catalog: Catalog, intent: string, topK: number): KeywordMatch[] {
  const queryTokens = new Set(tokenize(intent));
  if (queryTokens.size === 0 || topK <= 0) {
    return [];
  }

  return catalog
    .entries()
    .map((entry, position) => ({ entry, score: scoreEntry(entry, queryTokens), position }))
    .filter((match) => match.score > 0)
    .sort((a, b) => b.score - a.score || a.position - b.position)
    .slice(0, Math.floor(topK))
    .map(({ entry, score }) => ({ entry, score }));
}
