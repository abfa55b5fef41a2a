/**
 * Export Registration Series Use Case
 *
 * Renders any derived series as CSV for download.
 */

import {
  GROWTH_COLUMNS,
  MARKET_SHARE_COLUMNS,
  aggregateColumns,
  toCsv,
} from '../export.js';
import {
  DEFAULT_GROWTH_DIMENSIONS,
  getAggregatedSeries,
  getGrowthSeries,
  getMarketShare,
} from './get-registration-series.js';

import type { RegistrationAnalyticsError } from '../errors.js';
import type { DimensionField, FilterSpec } from '../types.js';
import type { RegistrationUseCaseDeps } from './run-with-records.js';
import type { Result } from 'neverthrow';

export type ExportableSeries = 'aggregate' | 'yoy' | 'qoq' | 'market-share';

export interface ExportRegistrationSeriesInput {
  series: ExportableSeries;
  filter?: FilterSpec;
  /** Dimensions kept besides the period; ignored for market share */
  dimensions?: readonly DimensionField[];
}

export const exportRegistrationSeries = async (
  deps: RegistrationUseCaseDeps,
  input: ExportRegistrationSeriesInput
): Promise<Result<string, RegistrationAnalyticsError>> => {
  const dimensions = input.dimensions ?? DEFAULT_GROWTH_DIMENSIONS;
  const filter = input.filter ?? {};

  switch (input.series) {
    case 'aggregate': {
      const groupBy = ['period', ...dimensions] as const;
      const result = await getAggregatedSeries(deps, { filter, groupBy });
      return result.map((rows) => toCsv(rows, aggregateColumns(groupBy)));
    }
    case 'yoy':
    case 'qoq': {
      const result = await getGrowthSeries(deps, { kind: input.series, filter, dimensions });
      return result.map((rows) => toCsv(rows, GROWTH_COLUMNS));
    }
    case 'market-share': {
      const result = await getMarketShare(deps, { filter });
      return result.map((rows) => toCsv(rows, MARKET_SHARE_COLUMNS));
    }
  }
};
