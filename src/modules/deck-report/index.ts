/**
 * Deck Report Module - Public API
 *
 * Exports for generating a deck's HTML progress report.
 */

// ─────────────────────────────────────────────────────────────────────────────
// Core Types
// ─────────────────────────────────────────────────────────────────────────────

export type {
  RawCardRow,
  LearningState,
  Card,
  CardFields,
  CardFace,
  AggregateStats,
  TokenMap,
  FragmentOptions,
  ReportSummary,
} from './core/types.js';

export { FIELD_SEPARATOR, MIN_CARD_FIELDS } from './core/types.js';

// ─────────────────────────────────────────────────────────────────────────────
// Core Errors
// ─────────────────────────────────────────────────────────────────────────────

export type {
  DeckReportError,
  ExtractionError,
  DataAccessError,
  InvalidStateCodeError,
  MalformedRecordError,
  TemplateIOError,
  OutputIOError,
} from './core/errors.js';

export {
  createDataAccessError,
  createInvalidStateCodeError,
  createMalformedRecordError,
  createTemplateIOError,
  createOutputIOError,
  getExitCodeForError,
  DECK_REPORT_ERROR_EXIT_CODE,
} from './core/errors.js';

// ─────────────────────────────────────────────────────────────────────────────
// Core Ports
// ─────────────────────────────────────────────────────────────────────────────

export type { CardSource, TemplateStore, ReportWriter, Clock } from './core/ports.js';

// ─────────────────────────────────────────────────────────────────────────────
// Core Logic (Pure Functions)
// ─────────────────────────────────────────────────────────────────────────────

export {
  classifyStateCode,
  splitFields,
  joinFields,
  extractCard,
  getCardFace,
} from './core/extractor.js';

export { aggregateCards } from './core/aggregator.js';

export { renderCardFragment, renderCardFragments } from './core/fragments.js';

export { renderTemplate, findUnresolvedPlaceholders } from './core/template.js';

export { buildTokenMap, type TokenInput } from './core/tokens.js';

export {
  PERCENTAGE_UNAVAILABLE,
  formatCount,
  formatPercentage,
  formatRfc3339,
  formatSummaryLine,
} from './core/format.js';

// ─────────────────────────────────────────────────────────────────────────────
// Use Cases
// ─────────────────────────────────────────────────────────────────────────────

export {
  generateDeckReport,
  loadDeckCards,
  type GenerateDeckReportDeps,
  type GenerateDeckReportInput,
} from './core/usecases/generate-report.js';

// ─────────────────────────────────────────────────────────────────────────────
// Shell
// ─────────────────────────────────────────────────────────────────────────────

export { makeCardSourceRepo, type CardSourceRepoOptions } from './shell/repo/card-source-repo.js';

export {
  makeFsTemplateStore,
  makeFsReportWriter,
  type FsReportWriterOptions,
} from './shell/files/fs-report-files.js';
