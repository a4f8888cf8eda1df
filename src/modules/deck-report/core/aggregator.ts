/**
 * Deck Report Module - Aggregator
 */

import type { AggregateStats, Card, LearningState } from './types.js';

/**
 * Computes deck statistics. Only `review` cards count as learned.
 *
 * For an empty deck the percentage is `null`; no division takes place and
 * callers render it as "N/A".
 */
export function aggregateCards(cards: Iterable<Card>): AggregateStats {
  const byState: Record<LearningState, number> = { new: 0, learning: 0, review: 0 };
  let total = 0;

  for (const card of cards) {
    byState[card.state] += 1;
    total += 1;
  }

  const learned = byState.review;

  return {
    total,
    learned,
    learnedPercentage: total === 0 ? null : (learned / total) * 100,
    byState,
  };
}
