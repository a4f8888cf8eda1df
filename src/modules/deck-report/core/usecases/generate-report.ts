/**
 * Generate Deck Report Use Case
 *
 * Reads a deck's cards, computes statistics, renders the template and writes
 * the report. The first error aborts the run before anything is written.
 */

import { ok, err, type Result } from 'neverthrow';

import { aggregateCards } from '../aggregator.js';
import { extractCard } from '../extractor.js';
import { renderCardFragments } from '../fragments.js';
import { findUnresolvedPlaceholders, renderTemplate } from '../template.js';
import { buildTokenMap } from '../tokens.js';

import type { DataAccessError, DeckReportError, ExtractionError } from '../errors.js';
import type { CardSource, Clock, ReportWriter, TemplateStore } from '../ports.js';
import type { Card, ReportSummary } from '../types.js';
import type { Logger } from 'pino';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export interface GenerateDeckReportDeps {
  cardSource: CardSource;
  templateStore: TemplateStore;
  reportWriter: ReportWriter;
  clock: Clock;
  logger: Logger;
}

export interface GenerateDeckReportInput {
  deckId: string;
  templatePath: string;
  outputPath: string;
  lookupUrlBase: string;
}

// ─────────────────────────────────────────────────────────────────────────────
// Helpers
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Pulls every row of the deck and converts it, stopping at the first failure.
 */
export async function loadDeckCards(
  cardSource: CardSource,
  deckId: string
): Promise<Result<Card[], DataAccessError | ExtractionError>> {
  const cards: Card[] = [];

  for await (const rowResult of cardSource.streamCards(deckId)) {
    if (rowResult.isErr()) {
      return err(rowResult.error);
    }

    const cardResult = extractCard(rowResult.value);
    if (cardResult.isErr()) {
      return err(cardResult.error);
    }

    cards.push(cardResult.value);
  }

  return ok(cards);
}

// ─────────────────────────────────────────────────────────────────────────────
// Use Case
// ─────────────────────────────────────────────────────────────────────────────

export async function generateDeckReport(
  deps: GenerateDeckReportDeps,
  input: GenerateDeckReportInput
): Promise<Result<ReportSummary, DeckReportError>> {
  const { cardSource, templateStore, reportWriter, clock } = deps;
  const log = deps.logger.child({ module: 'generate-deck-report', deckId: input.deckId });

  const cardsResult = await loadDeckCards(cardSource, input.deckId);
  if (cardsResult.isErr()) {
    log.error({ err: cardsResult.error }, 'Failed to load deck cards');
    return err(cardsResult.error);
  }

  const cards = cardsResult.value;
  const stats = aggregateCards(cards);
  log.debug({ total: stats.total, learned: stats.learned }, 'Aggregated deck statistics');

  const fragments = renderCardFragments(cards, { lookupUrlBase: input.lookupUrlBase });
  const tokens = buildTokenMap({ stats, fragments, generatedAt: clock.now() });

  const templateResult = await templateStore.readTemplate(input.templatePath);
  if (templateResult.isErr()) {
    log.error({ err: templateResult.error }, 'Failed to read template');
    return err(templateResult.error);
  }

  const template = templateResult.value;
  const unresolvedPlaceholders = findUnresolvedPlaceholders(template, tokens);
  if (unresolvedPlaceholders.length > 0) {
    log.warn({ placeholders: unresolvedPlaceholders }, 'Template has placeholders with no token');
  }

  const writeResult = await reportWriter.writeReport(
    input.outputPath,
    renderTemplate(template, tokens)
  );
  if (writeResult.isErr()) {
    log.error({ err: writeResult.error }, 'Failed to write report');
    return err(writeResult.error);
  }

  log.info({ outputPath: input.outputPath, cards: stats.total }, 'Report written');

  return ok({
    stats,
    outputPath: input.outputPath,
    unresolvedPlaceholders,
  });
}
