/**
 * Deck Report Module - Formatting
 */

import { Decimal } from 'decimal.js';

import type { AggregateStats } from './types.js';

/** Rendered in place of the percentage of an empty deck */
export const PERCENTAGE_UNAVAILABLE = 'N/A';

const countFormatter = new Intl.NumberFormat('en-US', {
  style: 'decimal',
  maximumFractionDigits: 0,
});

/**
 * Formats a count with en-US thousands separators (1,234).
 */
export const formatCount = (value: number): string => countFormatter.format(value);

/**
 * Formats a percentage to two decimal places. Exact ties go to the even
 * digit (1/32 of a deck is 3.12).
 */
export const formatPercentage = (value: number | null): string => {
  if (value === null) {
    return PERCENTAGE_UNAVAILABLE;
  }
  return new Decimal(value).toFixed(2, Decimal.ROUND_HALF_EVEN);
};

/**
 * Percentage with its sign, `50.00%`, or `N/A` for an empty deck.
 */
export const formatPercentageLabel = (value: number | null): string =>
  value === null ? PERCENTAGE_UNAVAILABLE : `${formatPercentage(value)}%`;

const pad = (value: number, width = 2): string => String(value).padStart(width, '0');

/**
 * RFC 3339 timestamp in local time with its UTC offset,
 * e.g. 2024-01-15T10:30:00.123+02:00.
 */
export function formatRfc3339(date: Date): string {
  const offsetMinutes = -date.getTimezoneOffset();
  const sign = offsetMinutes >= 0 ? '+' : '-';
  const absOffset = Math.abs(offsetMinutes);

  const datePart = `${pad(date.getFullYear(), 4)}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
  const timePart = `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}.${pad(date.getMilliseconds(), 3)}`;
  const offsetPart = `${sign}${pad(Math.floor(absOffset / 60))}:${pad(absOffset % 60)}`;

  return `${datePart}T${timePart}${offsetPart}`;
}

/**
 * Console line, e.g. `learned 1/2 (50.00%)` or `learned 0/0 (N/A)`.
 */
export function formatSummaryLine(stats: AggregateStats): string {
  const percentage = formatPercentageLabel(stats.learnedPercentage);

  return `learned ${String(stats.learned)}/${String(stats.total)} (${percentage})`;
}
