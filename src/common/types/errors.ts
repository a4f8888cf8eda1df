/**
 * Base error types for the application
 * All domain errors should extend these base types
 */

/**
 * Base interface for all application errors
 */
export interface AppError {
  readonly type: string;
  readonly message: string;
  readonly cause?: unknown;
}

/**
 * Configuration errors (missing or invalid flags and environment variables)
 */
export interface ConfigError extends AppError {
  readonly type: 'ConfigError';
  readonly field?: string;
}

export const createConfigError = (message: string, field?: string): ConfigError => ({
  type: 'ConfigError',
  message,
  ...(field !== undefined && { field }),
});
