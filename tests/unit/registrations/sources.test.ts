import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

import { afterAll, beforeAll, describe, expect, it } from 'vitest';

import {
  makeCsvFileRegistrationSource,
  makeFileRegistrationSource,
  makeJsonFileRegistrationSource,
} from '@/modules/registrations/shell/source/file-sources.js';
import { makeInMemoryRegistrationSource } from '@/modules/registrations/shell/source/in-memory-source.js';

import { makeRecord } from '../../fixtures/builders.js';

describe('file registration sources', () => {
  let dir: string;

  const writeFixture = async (name: string, contents: string): Promise<string> => {
    const filePath = path.join(dir, name);
    await fs.writeFile(filePath, contents, 'utf8');
    return filePath;
  };

  beforeAll(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'registrations-'));
  });

  afterAll(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  describe('JSON', () => {
    it('loads an array of records', async () => {
      const records = [makeRecord(), makeRecord({ period: '2024-02', count: 7 })];
      const filePath = await writeFixture('valid.json', JSON.stringify(records));

      const result = await makeJsonFileRegistrationSource({ filePath }).loadRecords();

      expect(result._unsafeUnwrap()).toEqual(records);
    });

    it('reports a missing file as a read error', async () => {
      const filePath = path.join(dir, 'missing.json');

      const error = (await makeJsonFileRegistrationSource({ filePath }).loadRecords())._unsafeUnwrapErr();

      expect(error.type).toBe('SourceReadError');
      expect(error.message.startsWith(`Failed to read registrations file at ${filePath}`)).toBe(true);
    });

    it('reports malformed JSON as a read error', async () => {
      const filePath = await writeFixture('broken.json', '[{"period": ');

      const error = (await makeJsonFileRegistrationSource({ filePath }).loadRecords())._unsafeUnwrapErr();

      expect(error.type).toBe('SourceReadError');
      expect(error.message.startsWith(`Failed to parse JSON at ${filePath}`)).toBe(true);
    });

    it('rejects records that do not match the schema', async () => {
      const filePath = await writeFixture(
        'bad-category.json',
        JSON.stringify([{ period: '2024-01', category: '5W', manufacturer: 'Acme', state: 'KA', count: 1 }])
      );

      const error = (await makeJsonFileRegistrationSource({ filePath }).loadRecords())._unsafeUnwrapErr();

      expect(error.type).toBe('InvalidInputError');
      if (error.type === 'InvalidInputError') {
        expect(error.field).toBe('records/0/category');
      }
    });
  });

  describe('CSV', () => {
    it('accepts the collector export column names', async () => {
      const filePath = await writeFixture(
        'export.csv',
        'date,vehicle_category,manufacturer,state_code,registrations\n2024-01,4W,Acme,KA,12\n'
      );

      const result = await makeCsvFileRegistrationSource({ filePath }).loadRecords();

      expect(result._unsafeUnwrap()).toEqual([
        { period: '2024-01', category: '4W', manufacturer: 'Acme', state: 'KA', count: 12 },
      ]);
    });

    it('strips a byte order mark, blank lines and padding', async () => {
      const filePath = await writeFixture(
        'padded.csv',
        '\uFEFFperiod,category,manufacturer,state,count\n\n 2024-02 , 2W , Bolt , MH , 5 \n'
      );

      const result = await makeCsvFileRegistrationSource({ filePath }).loadRecords();

      expect(result._unsafeUnwrap()).toEqual([
        { period: '2024-02', category: '2W', manufacturer: 'Bolt', state: 'MH', count: 5 },
      ]);
    });

    it('rejects a row whose count is not a whole number', async () => {
      const filePath = await writeFixture(
        'bad-count.csv',
        'period,category,manufacturer,state,count\n2024-01,4W,Acme,KA,12.5\n'
      );

      const error = (await makeCsvFileRegistrationSource({ filePath }).loadRecords())._unsafeUnwrapErr();

      expect(error.type).toBe('InvalidInputError');
      if (error.type === 'InvalidInputError') {
        expect(error.field).toBe('rows[0].count');
        expect(error.value).toBe('12.5');
      }
    });

    it('rejects a file without a required column', async () => {
      const filePath = await writeFixture(
        'no-state.csv',
        'period,category,manufacturer,count\n2024-01,4W,Acme,12\n'
      );

      const error = (await makeCsvFileRegistrationSource({ filePath }).loadRecords())._unsafeUnwrapErr();

      expect(error.type).toBe('InvalidInputError');
      if (error.type === 'InvalidInputError') {
        expect(error.field).toBe('rows[0]');
      }
    });

    it('rejects an unknown category', async () => {
      const filePath = await writeFixture(
        'bad-category.csv',
        'period,category,manufacturer,state,count\n2024-01,4W,Acme,KA,1\n2024-01,XL,Acme,KA,1\n'
      );

      const error = (await makeCsvFileRegistrationSource({ filePath }).loadRecords())._unsafeUnwrapErr();

      expect(error.type).toBe('InvalidInputError');
      if (error.type === 'InvalidInputError') {
        expect(error.field).toBe('rows[1]/category');
      }
    });

    it('reports rows with the wrong number of fields as a read error', async () => {
      const filePath = await writeFixture(
        'ragged.csv',
        'period,category,manufacturer,state,count\n2024-01,4W\n'
      );

      const error = (await makeCsvFileRegistrationSource({ filePath }).loadRecords())._unsafeUnwrapErr();

      expect(error.type).toBe('SourceReadError');
      expect(error.message.startsWith(`Failed to parse CSV at ${filePath}`)).toBe(true);
    });
  });

  describe('makeFileRegistrationSource', () => {
    it('reads CSV for a .csv extension regardless of case', async () => {
      const filePath = await writeFixture(
        'UPPER.CSV',
        'period,category,manufacturer,state,count\n2024-01,3W,Piaggio,TN,9\n'
      );

      const result = await makeFileRegistrationSource({ filePath }).loadRecords();

      expect(result._unsafeUnwrap()).toEqual([
        { period: '2024-01', category: '3W', manufacturer: 'Piaggio', state: 'TN', count: 9 },
      ]);
    });

    it('reads JSON for any other extension', async () => {
      const filePath = await writeFixture('records.data', JSON.stringify([makeRecord()]));

      const result = await makeFileRegistrationSource({ filePath }).loadRecords();

      expect(result._unsafeUnwrap()).toEqual([makeRecord()]);
    });
  });
});

describe('makeInMemoryRegistrationSource', () => {
  it('serves a frozen snapshot unaffected by later changes to the input', async () => {
    const records = [makeRecord({ count: 1 })];
    const source = makeInMemoryRegistrationSource(records);

    records.push(makeRecord({ count: 2 }));
    const loaded = (await source.loadRecords())._unsafeUnwrap();

    expect(loaded).toEqual([makeRecord({ count: 1 })]);
    expect(Object.isFrozen(loaded)).toBe(true);
    expect(Object.isFrozen(loaded[0])).toBe(true);
  });
});
