import { err, ok, type Result } from 'neverthrow';

import { createInvalidInputError, type InvalidInputError } from './errors.js';

/**
 * A calendar month. Ordered by `periodIndex`.
 */
export interface Period {
  readonly year: number;
  /** 1-12 */
  readonly month: number;
}

/**
 * A calendar quarter. Ordered by `quarterIndex`.
 */
export interface Quarter {
  readonly year: number;
  /** 1-4 */
  readonly quarter: number;
}

const PERIOD_REGEX = /^(\d{4})-(\d{2})(?:-\d{2})?$/;

/**
 * Parses a YYYY-MM label. A trailing day (YYYY-MM-DD) is accepted and dropped.
 *
 * @param label - The period label
 * @param field - Field name reported in the error
 */
export function parsePeriod(label: string, field = 'period'): Result<Period, InvalidInputError> {
  const match = PERIOD_REGEX.exec(label);
  const yearStr = match?.[1];
  const monthStr = match?.[2];

  if (yearStr === undefined || monthStr === undefined) {
    return err(createInvalidInputError(field, `Invalid period '${label}': expected YYYY-MM`, label));
  }

  const year = Number.parseInt(yearStr, 10);
  const month = Number.parseInt(monthStr, 10);

  if (month < 1 || month > 12) {
    return err(
      createInvalidInputError(field, `Invalid period '${label}': month must be 01-12`, label)
    );
  }

  return ok({ year, month });
}

const formatYear = (year: number): string => String(year).padStart(4, '0');

/** Years are zero-padded to four digits so labels sort in period order. */
export const formatPeriod = (period: Period): string =>
  `${formatYear(period.year)}-${String(period.month).padStart(2, '0')}`;

/** Months since year 0; consecutive months have consecutive indexes. */
export const periodIndex = (period: Period): number => period.year * 12 + (period.month - 1);

export const periodFromIndex = (index: number): Period => ({
  year: Math.floor(index / 12),
  month: (((index % 12) + 12) % 12) + 1,
});

/**
 * Moves a period by a number of months, crossing year boundaries.
 * shiftPeriod(2024-01, -1) is 2023-12; shiftPeriod(2024-01, -12) is 2023-01.
 */
export const shiftPeriod = (period: Period, months: number): Period =>
  periodFromIndex(periodIndex(period) + months);

// ─────────────────────────────────────────────────────────────────────────────
// Quarters
// ─────────────────────────────────────────────────────────────────────────────

export const toQuarter = (period: Period): Quarter => ({
  year: period.year,
  quarter: Math.floor((period.month - 1) / 3) + 1,
});

export const quarterIndex = (quarter: Quarter): number => quarter.year * 4 + (quarter.quarter - 1);

export const quarterFromIndex = (index: number): Quarter => ({
  year: Math.floor(index / 4),
  quarter: (((index % 4) + 4) % 4) + 1,
});

/** Q1 2024 is preceded by Q4 2023. */
export const previousQuarter = (quarter: Quarter): Quarter =>
  quarterFromIndex(quarterIndex(quarter) - 1);

export const formatQuarter = (quarter: Quarter): string =>
  `${formatYear(quarter.year)}-Q${String(quarter.quarter)}`;
