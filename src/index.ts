/**
 * Library entry point
 */

export * from './modules/deck-report/index.js';

export { runDeckReport, systemClock, type RunDeckReportDeps } from './app/run-deck-report.js';
export {
  runCli,
  consoleOutput,
  EXIT_USAGE,
  type CliOutput,
  type RunCliDeps,
} from './app/run-cli.js';

export {
  parseEnv,
  createConfig,
  parseCliArgs,
  type AppConfig,
  type CliArgs,
  type Env,
} from './infra/config/index.js';

export { createLogger, type Logger, type LoggerConfig, type LogLevel } from './infra/logger/index.js';

export {
  createCollectionClient,
  withCollectionClient,
  type CollectionDbClient,
  type CollectionDatabase,
} from './infra/database/client.js';
