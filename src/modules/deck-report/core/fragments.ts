/**
 * Deck Report Module - Fragment Renderer
 *
 * Field contents are inserted as-is: no HTML escaping, and the term is not
 * percent-encoded in the lookup link. Templates that need escaping must
 * receive pre-escaped note fields.
 */

import { getCardFace } from './extractor.js';

import type { Card, FragmentOptions } from './types.js';

/**
 * Renders one card as a linked tile with a hover block.
 */
export function renderCardFragment(card: Card, options: FragmentOptions): string {
  const { term, annotation, translation } = getCardFace(card);

  return (
    `<a href='${options.lookupUrlBase}${term}' class='card-link'>` +
    `<div class='card card-${card.state}'>${term}` +
    `<div class='card-hover'>` +
    `<div class='card-meaning'>${annotation}; ${translation}</div>\n` +
    `reviews: ${String(card.reps)}<br/>\n` +
    `lapses: ${String(card.lapses)}<br/>\n` +
    `</div></div></a>\n`
  );
}

/**
 * Renders every card, keeping input order.
 */
export function renderCardFragments(cards: readonly Card[], options: FragmentOptions): string[] {
  return cards.map((card) => renderCardFragment(card, options));
}
