/**
 * Deck Report Module - Token Map
 */

import {
  formatCount,
  formatPercentage,
  formatPercentageLabel,
  formatRfc3339,
} from './format.js';

import type { AggregateStats, TokenMap } from './types.js';

export interface TokenInput {
  stats: AggregateStats;
  /** Rendered card fragments, in deck order */
  fragments: readonly string[];
  generatedAt: Date;
}

/**
 * Builds the substitution values for the report template.
 */
export function buildTokenMap(input: TokenInput): TokenMap {
  const { stats, fragments, generatedAt } = input;

  return new Map([
    ['n_cards', formatCount(stats.total)],
    ['n_learned', formatCount(stats.learned)],
    ['n_learning', formatCount(stats.byState.learning)],
    ['n_new', formatCount(stats.byState.new)],
    ['learned_percentage_pretty', formatPercentage(stats.learnedPercentage)],
    ['learned_percentage_label', formatPercentageLabel(stats.learnedPercentage)],
    ['cards', fragments.join('')],
    ['now', formatRfc3339(generatedAt)],
  ]);
}
