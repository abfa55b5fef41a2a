import { describe, expect, it } from 'vitest';

import { aggregate } from '@/modules/registrations/core/aggregate.js';
import { quarterOverQuarter, yearOverYear } from '@/modules/registrations/core/growth.js';

import { makeMonthlyRecords, makeRecord } from '../../fixtures/builders.js';

import type { AggregatedPoint, RegistrationRecord } from '@/modules/registrations/core/types.js';

const missingBaseline = { status: 'not_computable', reason: 'missing_baseline' } as const;

const monthlySeries = (records: RegistrationRecord[]): AggregatedPoint[] =>
  aggregate(records, {}, ['period'])._unsafeUnwrap();

describe('yearOverYear', () => {
  it('compares each month with the same month a year earlier', () => {
    const series = aggregate(
      [
        makeRecord({ period: '2023-01', category: '2W', manufacturer: 'Hero', count: 100 }),
        makeRecord({ period: '2023-02', category: '2W', manufacturer: 'Hero', count: 150 }),
        makeRecord({ period: '2024-01', category: '2W', manufacturer: 'Hero', count: 120 }),
      ],
      {},
      ['period', 'category', 'manufacturer']
    )._unsafeUnwrap();

    const result = yearOverYear(series);

    expect(result._unsafeUnwrap()).toEqual([
      { period: '2023-01', category: '2W', manufacturer: 'Hero', total: 100, growth: missingBaseline },
      { period: '2023-02', category: '2W', manufacturer: 'Hero', total: 150, growth: missingBaseline },
      {
        period: '2024-01',
        category: '2W',
        manufacturer: 'Hero',
        total: 120,
        baselineTotal: 100,
        growth: { status: 'computed', value: 20 },
      },
    ]);
  });

  it('marks every point not computable when only one year is present', () => {
    const points = yearOverYear(monthlySeries(makeMonthlyRecords(2023, 2023)))._unsafeUnwrap();

    expect(points).toHaveLength(12);
    for (const point of points) {
      expect(point.growth).toEqual(missingBaseline);
      expect(point.baselineTotal).toBeUndefined();
    }
  });

  it('reports a zero baseline as not computable and keeps the period', () => {
    const points = yearOverYear(
      monthlySeries([
        makeRecord({ period: '2023-01', count: 0 }),
        makeRecord({ period: '2024-01', count: 50 }),
      ])
    )._unsafeUnwrap();

    expect(points[1]).toEqual({
      period: '2024-01',
      total: 50,
      baselineTotal: 0,
      growth: { status: 'not_computable', reason: 'zero_baseline' },
    });
  });

  it('reports a decline as negative growth', () => {
    const points = yearOverYear(
      monthlySeries([
        makeRecord({ period: '2023-03', count: 200 }),
        makeRecord({ period: '2024-03', count: 150 }),
      ])
    )._unsafeUnwrap();

    expect(points[1]?.growth).toEqual({ status: 'computed', value: -25 });
  });

  it('compares each grouping key only with itself', () => {
    const series = aggregate(
      [
        makeRecord({ period: '2023-06', manufacturer: 'Acme', count: 100 }),
        makeRecord({ period: '2024-06', manufacturer: 'Acme', count: 110 }),
        makeRecord({ period: '2024-06', manufacturer: 'Zenith', count: 40 }),
      ],
      {},
      ['period', 'manufacturer']
    )._unsafeUnwrap();

    const points = yearOverYear(series)._unsafeUnwrap();

    expect(points.map((point) => [point.period, point.manufacturer, point.growth])).toEqual([
      ['2023-06', 'Acme', missingBaseline],
      ['2024-06', 'Acme', { status: 'computed', value: expect.closeTo(10, 9) }],
      ['2024-06', 'Zenith', missingBaseline],
    ]);
  });

  it('sums points that share a period and grouping key', () => {
    const points = yearOverYear([
      { period: '2023-01', total: 10 },
      { period: '2023-01', total: 5 },
      { period: '2024-01', total: 30 },
    ])._unsafeUnwrap();

    expect(points).toEqual([
      { period: '2023-01', total: 15, growth: missingBaseline },
      { period: '2024-01', total: 30, baselineTotal: 15, growth: { status: 'computed', value: 100 } },
    ]);
  });

  it('rejects points without a period', () => {
    const error = yearOverYear([{ category: '4W', total: 5 }])._unsafeUnwrapErr();

    expect(error.field).toBe('series[0].period');
    expect(error.message).toBe('Growth series points must carry a period');
  });

  it('rejects points with an unparseable period', () => {
    const error = yearOverYear([
      { period: '2024-01', total: 1 },
      { period: 'Jan 2024', total: 1 },
    ])._unsafeUnwrapErr();

    expect(error.field).toBe('series[1].period');
  });

  it('returns an empty series for empty input', () => {
    expect(yearOverYear([])._unsafeUnwrap()).toEqual([]);
  });

  it('accepts aggregated series spanning years below 1000', () => {
    const series = monthlySeries([
      makeRecord({ period: '1000-12', count: 150 }),
      makeRecord({ period: '0999-12', count: 100 }),
    ]);

    expect(series.map((point) => point.period)).toEqual(['0999-12', '1000-12']);
    expect(yearOverYear(series)._unsafeUnwrap()).toEqual([
      { period: '0999-12', total: 100, growth: missingBaseline },
      { period: '1000-12', total: 150, baselineTotal: 100, growth: { status: 'computed', value: 50 } },
    ]);
    expect(quarterOverQuarter(series)._unsafeUnwrap().map((point) => point.period)).toEqual([
      '0999-Q4',
      '1000-Q4',
    ]);
  });
});

describe('quarterOverQuarter', () => {
  it('sums months into quarters before comparing', () => {
    const series = aggregate(
      [
        makeRecord({ period: '2023-01', category: '2W', manufacturer: 'Hero', count: 100 }),
        makeRecord({ period: '2023-02', category: '2W', manufacturer: 'Hero', count: 150 }),
        makeRecord({ period: '2024-01', category: '2W', manufacturer: 'Hero', count: 120 }),
      ],
      {},
      ['period', 'category', 'manufacturer']
    )._unsafeUnwrap();

    const points = quarterOverQuarter(series)._unsafeUnwrap();

    // 2023-Q1 has no 2022-Q4 and 2024-Q1 has no 2023-Q4 to compare with
    expect(points).toEqual([
      { period: '2023-Q1', category: '2W', manufacturer: 'Hero', total: 250, growth: missingBaseline },
      { period: '2024-Q1', category: '2W', manufacturer: 'Hero', total: 120, growth: missingBaseline },
    ]);
  });

  it('compares Q1 with Q4 of the previous year', () => {
    const points = quarterOverQuarter(
      monthlySeries([
        makeRecord({ period: '2023-12', count: 100 }),
        makeRecord({ period: '2024-01', count: 150 }),
      ])
    )._unsafeUnwrap();

    expect(points).toEqual([
      { period: '2023-Q4', total: 100, growth: missingBaseline },
      { period: '2024-Q1', total: 150, baselineTotal: 100, growth: { status: 'computed', value: 50 } },
    ]);
  });

  it('follows the growth formula over eight consecutive quarters', () => {
    // Quarter k (0-based) has 10 * (k + 1) registrations per month
    const records = makeMonthlyRecords(2022, 2023).map((record, position) => ({
      ...record,
      count: 10 * (Math.floor(position / 3) + 1),
    }));

    const points = quarterOverQuarter(monthlySeries(records))._unsafeUnwrap();
    const totals = points.map((point) => point.total);

    expect(points.map((point) => point.period)).toEqual([
      '2022-Q1',
      '2022-Q2',
      '2022-Q3',
      '2022-Q4',
      '2023-Q1',
      '2023-Q2',
      '2023-Q3',
      '2023-Q4',
    ]);
    expect(totals).toEqual([30, 60, 90, 120, 150, 180, 210, 240]);
    expect(points[0]?.growth).toEqual(missingBaseline);

    for (let k = 1; k < points.length; k++) {
      const current = totals[k] ?? 0;
      const previous = totals[k - 1] ?? 0;
      const growth = points[k]?.growth;

      expect(growth?.status).toBe('computed');
      if (growth?.status === 'computed') {
        expect(growth.value).toBeCloseTo(((current - previous) / previous) * 100, 9);
      }
    }
  });

  it('leaves a gap quarter not computable', () => {
    const points = quarterOverQuarter(
      monthlySeries([
        makeRecord({ period: '2023-01', count: 10 }),
        makeRecord({ period: '2023-07', count: 20 }),
      ])
    )._unsafeUnwrap();

    expect(points.map((point) => [point.period, point.growth])).toEqual([
      ['2023-Q1', missingBaseline],
      ['2023-Q3', missingBaseline],
    ]);
  });
});
