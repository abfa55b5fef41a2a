import { describe, expect, it } from 'vitest';

import {
  SUMMARY_TOP_STATES,
  listDimensions,
  summarizeRegistrations,
} from '@/modules/registrations/core/summary.js';

import { makeRecord, makeSampleRecords } from '../../fixtures/builders.js';

describe('summarizeRegistrations', () => {
  it('summarizes the whole dataset', () => {
    const summary = summarizeRegistrations(makeSampleRecords())._unsafeUnwrap();

    expect(summary.totalRecords).toBe(9);
    expect(summary.totalRegistrations).toBe(700);
    expect(summary.uniqueManufacturers).toBe(4);
    expect(summary.uniqueStates).toBe(2);
    expect(summary.dateRange).toEqual({ from: '2023-01', to: '2024-01' });
    expect(summary.averageMonthlyRegistrations).toEqual({ status: 'computed', value: 350 });
    expect(summary.latestMonthRegistrations).toBe(350);
  });

  it('breaks totals down by category', () => {
    const summary = summarizeRegistrations(makeSampleRecords())._unsafeUnwrap();

    expect(summary.byCategory.map(({ category, total, records }) => [category, total, records])).toEqual([
      ['2W', 400, 3],
      ['4W', 300, 6],
    ]);
    expect(summary.byCategory[0]?.average).toBeCloseTo(133.333333, 5);
    expect(summary.byCategory[1]?.average).toBe(50);
  });

  it('applies the filter before summarizing', () => {
    const summary = summarizeRegistrations(makeSampleRecords(), { states: ['KA'] })._unsafeUnwrap();

    expect(summary.totalRecords).toBe(5);
    expect(summary.totalRegistrations).toBe(380);
    expect(summary.uniqueStates).toBe(1);
    expect(summary.averageMonthlyRegistrations).toEqual({ status: 'computed', value: 190 });
    expect(summary.latestMonthRegistrations).toBe(270);
  });

  it('ranks states by total over the whole range', () => {
    const summary = summarizeRegistrations(makeSampleRecords())._unsafeUnwrap();

    expect(summary.byState).toEqual([
      { state: 'KA', total: 380 },
      { state: 'MH', total: 320 },
    ]);
  });

  it('keeps the ten largest states, ties broken by name', () => {
    const states = ['S01', 'S02', 'S03', 'S04', 'S05', 'S06', 'S07', 'S08', 'S09', 'S10', 'S11'];
    const summary = summarizeRegistrations([
      ...states.map((state, i) => makeRecord({ state, count: 100 - i })),
      makeRecord({ state: 'AA', count: 91 }),
    ])._unsafeUnwrap();

    expect(summary.byState).toHaveLength(SUMMARY_TOP_STATES);
    expect(summary.byState.map((entry) => entry.state)).toEqual([
      'S01',
      'S02',
      'S03',
      'S04',
      'S05',
      'S06',
      'S07',
      'S08',
      'S09',
      'AA',
    ]);
    expect(summary.byState.at(-1)).toEqual({ state: 'AA', total: 91 });
  });

  it('counts a manufacturer once per category it sells in', () => {
    const summary = summarizeRegistrations([
      makeRecord({ category: '2W', manufacturer: 'Honda' }),
      makeRecord({ category: '4W', manufacturer: 'Honda' }),
      makeRecord({ category: '4W', manufacturer: 'Honda', state: 'MH' }),
    ])._unsafeUnwrap();

    expect(summary.uniqueManufacturers).toBe(2);
  });

  it('reports averages as not computable for an empty selection', () => {
    const summary = summarizeRegistrations([])._unsafeUnwrap();

    expect(summary).toEqual({
      totalRecords: 0,
      totalRegistrations: 0,
      uniqueManufacturers: 0,
      uniqueStates: 0,
      averageMonthlyRegistrations: { status: 'not_computable', reason: 'insufficient_data' },
      byCategory: [],
      byState: [],
    });
  });

  it('propagates invalid filters', () => {
    const result = summarizeRegistrations(makeSampleRecords(), {
      dateFrom: '2024-02',
      dateTo: '2024-01',
    });

    expect(result._unsafeUnwrapErr().field).toBe('filter.dateFrom');
  });
});

describe('listDimensions', () => {
  it('lists sorted filter values, manufacturers per category', () => {
    const dimensions = listDimensions(makeSampleRecords())._unsafeUnwrap();

    expect(dimensions).toEqual({
      categories: ['2W', '4W'],
      manufacturers: [
        { category: '2W', name: 'Two Wheeler', manufacturers: ['Bolt', 'Spark'] },
        { category: '4W', name: 'Four Wheeler', manufacturers: ['Acme', 'Zenith'] },
      ],
      states: ['KA', 'MH'],
      periodRange: { from: '2023-01', to: '2024-01' },
    });
  });

  it('returns empty lists and no range for an empty dataset', () => {
    expect(listDimensions([])._unsafeUnwrap()).toEqual({
      categories: [],
      manufacturers: [],
      states: [],
    });
  });
});
