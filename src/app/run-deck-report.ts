/**
 * Deck report composition root
 * Wires the collection database, filesystem adapters and clock into the use case
 */

import { err, type Result } from 'neverthrow';

import {
  createCollectionClient,
  withCollectionClient,
  type CollectionDbClient,
} from '../infra/database/client.js';
import {
  createDataAccessError,
  generateDeckReport,
  makeCardSourceRepo,
  makeFsReportWriter,
  makeFsTemplateStore,
  type Clock,
  type DeckReportError,
  type ReportSummary,
} from '../modules/deck-report/index.js';

import type { AppConfig } from '../infra/config/index.js';
import type { Logger } from 'pino';

export interface RunDeckReportDeps {
  logger: Logger;
  clock: Clock;
}

export const systemClock: Clock = {
  now: () => new Date(),
};

/**
 * Opens the collection read-only, generates the report and closes the
 * collection again, whatever the outcome.
 */
export const runDeckReport = async (
  config: AppConfig['report'],
  deps: RunDeckReportDeps
): Promise<Result<ReportSummary, DeckReportError>> => {
  const { logger, clock } = deps;

  let client: CollectionDbClient;
  try {
    client = createCollectionClient(config.collectionPath);
  } catch (error) {
    logger.error({ err: error, path: config.collectionPath }, 'Failed to open collection');
    return err(
      createDataAccessError(`Failed to open collection at ${config.collectionPath}`, error)
    );
  }

  return withCollectionClient(client, (db) =>
    generateDeckReport(
      {
        cardSource: makeCardSourceRepo({ db, logger }),
        templateStore: makeFsTemplateStore(),
        reportWriter: makeFsReportWriter({ logger }),
        clock,
        logger,
      },
      {
        deckId: config.deckId,
        templatePath: config.templatePath,
        outputPath: config.outputPath,
        lookupUrlBase: config.lookupUrlBase,
      }
    )
  );
};
