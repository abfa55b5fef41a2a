/**
 * Registration Insights Use Cases
 *
 * Dataset-level figures for the dashboard header, the filter pickers,
 * leaderboards and trend panels.
 */

import { summarizeRegistrations, listDimensions } from '../summary.js';
import { topPerformers, type TopPerformers, type TopPerformersOptions } from '../top-performers.js';
import { analyzeTrend, type TrendAnalysis } from '../trend.js';
import { runWithRecords, type RegistrationUseCaseDeps } from './run-with-records.js';

import type { RegistrationAnalyticsError } from '../errors.js';
import type { RegistrationDimensions, RegistrationSummary } from '../summary.js';
import type { FilterSpec } from '../types.js';
import type { Result } from 'neverthrow';

export interface FilteredInput {
  filter?: FilterSpec;
}

export interface GetTopPerformersInput extends FilteredInput {
  options?: TopPerformersOptions;
}

export const getSummary = (
  deps: RegistrationUseCaseDeps,
  input: FilteredInput
): Promise<Result<RegistrationSummary, RegistrationAnalyticsError>> =>
  runWithRecords(deps, 'summary', (records) => summarizeRegistrations(records, input.filter));

export const getDimensions = (
  deps: RegistrationUseCaseDeps
): Promise<Result<RegistrationDimensions, RegistrationAnalyticsError>> =>
  runWithRecords(deps, 'dimensions', (records) => listDimensions(records));

export const getTopPerformers = (
  deps: RegistrationUseCaseDeps,
  input: GetTopPerformersInput
): Promise<Result<TopPerformers, RegistrationAnalyticsError>> =>
  runWithRecords(deps, 'top-performers', (records) =>
    topPerformers(records, input.filter, input.options)
  );

export const getTrend = (
  deps: RegistrationUseCaseDeps,
  input: FilteredInput
): Promise<Result<TrendAnalysis, RegistrationAnalyticsError>> =>
  runWithRecords(deps, 'trend', (records) => analyzeTrend(records, input.filter));
