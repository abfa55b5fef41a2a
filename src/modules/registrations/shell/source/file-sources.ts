/**
 * File-backed registration sources.
 *
 * JSON files hold an array of records. CSV files carry a header row; the
 * collector export column names (date, vehicle_category, state_code,
 * registrations) are accepted next to the record field names.
 * Files are read on every call.
 */

import fs from 'node:fs/promises';

import { Type } from '@sinclair/typebox';
import { TypeCompiler } from '@sinclair/typebox/compiler';
import { parse as parseCsv } from 'csv-parse/sync';
import { err, ok, type Result } from 'neverthrow';

import {
  createInvalidInputError,
  createSourceReadError,
  type RegistrationAnalyticsError,
} from '../../core/errors.js';
import { RegistrationRecordSchema, type RegistrationRecord } from '../../core/types.js';

import type { RegistrationSource } from '../../core/ports.js';
import type { ValueError } from '@sinclair/typebox/errors';

const recordValidator = TypeCompiler.Compile(RegistrationRecordSchema);
const recordsValidator = TypeCompiler.Compile(Type.Array(RegistrationRecordSchema));

const csvRowsValidator = TypeCompiler.Compile(
  Type.Array(Type.Record(Type.String(), Type.String()))
);

/** Accepted header names per record field, in lookup order */
const CSV_COLUMN_ALIASES: Record<keyof RegistrationRecord, readonly string[]> = {
  period: ['period', 'date'],
  category: ['category', 'vehicle_category'],
  manufacturer: ['manufacturer'],
  state: ['state', 'state_code'],
  count: ['count', 'registrations'],
};

export interface FileRegistrationSourceOptions {
  filePath: string;
}

const describeError = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

const firstSchemaError = (errors: Iterable<ValueError>): ValueError | undefined => {
  for (const error of errors) return error;
  return undefined;
};

const readFileContents = async (
  filePath: string
): Promise<Result<string, RegistrationAnalyticsError>> => {
  try {
    return ok(await fs.readFile(filePath, 'utf8'));
  } catch (error) {
    return err(
      createSourceReadError(
        `Failed to read registrations file at ${filePath}: ${describeError(error)}`,
        error
      )
    );
  }
};

// ─────────────────────────────────────────────────────────────────────────────
// JSON
// ─────────────────────────────────────────────────────────────────────────────

export const parseJsonRecords = (
  contents: string,
  filePath: string
): Result<RegistrationRecord[], RegistrationAnalyticsError> => {
  let parsed: unknown;
  try {
    parsed = JSON.parse(contents);
  } catch (error) {
    return err(
      createSourceReadError(`Failed to parse JSON at ${filePath}: ${describeError(error)}`, error)
    );
  }

  if (!recordsValidator.Check(parsed)) {
    const first = firstSchemaError(recordsValidator.Errors(parsed));
    return err(
      createInvalidInputError(
        `records${first?.path ?? ''}`,
        `Invalid registration record in ${filePath}: ${first?.message ?? 'schema mismatch'}`,
        first?.value
      )
    );
  }

  return ok(parsed);
};

export const makeJsonFileRegistrationSource = (
  options: FileRegistrationSourceOptions
): RegistrationSource => ({
  loadRecords: async () => {
    const contents = await readFileContents(options.filePath);
    if (contents.isErr()) return err(contents.error);
    return parseJsonRecords(contents.value, options.filePath);
  },
});

// ─────────────────────────────────────────────────────────────────────────────
// CSV
// ─────────────────────────────────────────────────────────────────────────────

const pickColumn = (
  row: Record<string, string>,
  field: keyof RegistrationRecord
): string | undefined => {
  for (const alias of CSV_COLUMN_ALIASES[field]) {
    const value = row[alias];
    if (value !== undefined) return value;
  }
  return undefined;
};

const COUNT_REGEX = /^\d+$/;

export const parseCsvRecords = (
  contents: string,
  filePath: string
): Result<RegistrationRecord[], RegistrationAnalyticsError> => {
  let rows: unknown;
  try {
    rows = parseCsv(contents, {
      bom: true,
      columns: true,
      skip_empty_lines: true,
      trim: true,
    });
  } catch (error) {
    return err(
      createSourceReadError(`Failed to parse CSV at ${filePath}: ${describeError(error)}`, error)
    );
  }

  if (!csvRowsValidator.Check(rows)) {
    return err(createSourceReadError(`Unexpected CSV layout in ${filePath}`));
  }

  const records: RegistrationRecord[] = [];

  for (const [position, row] of rows.entries()) {
    const field = `rows[${String(position)}]`;
    const period = pickColumn(row, 'period');
    const category = pickColumn(row, 'category');
    const manufacturer = pickColumn(row, 'manufacturer');
    const state = pickColumn(row, 'state');
    const count = pickColumn(row, 'count');

    if (
      period === undefined ||
      category === undefined ||
      manufacturer === undefined ||
      state === undefined ||
      count === undefined
    ) {
      return err(
        createInvalidInputError(
          field,
          `CSV row is missing a required column in ${filePath}: expected period, category, manufacturer, state and count`
        )
      );
    }

    if (!COUNT_REGEX.test(count)) {
      return err(
        createInvalidInputError(
          `${field}.count`,
          'Registration count must be a non-negative integer',
          count
        )
      );
    }

    const candidate = {
      period,
      category,
      manufacturer,
      state,
      count: Number.parseInt(count, 10),
    };

    if (!recordValidator.Check(candidate)) {
      const first = firstSchemaError(recordValidator.Errors(candidate));
      return err(
        createInvalidInputError(
          `${field}${first?.path ?? ''}`,
          `Invalid registration row in ${filePath}: ${first?.message ?? 'schema mismatch'}`,
          first?.value
        )
      );
    }

    records.push(candidate);
  }

  return ok(records);
};

export const makeCsvFileRegistrationSource = (
  options: FileRegistrationSourceOptions
): RegistrationSource => ({
  loadRecords: async () => {
    const contents = await readFileContents(options.filePath);
    if (contents.isErr()) return err(contents.error);
    return parseCsvRecords(contents.value, options.filePath);
  },
});

/**
 * Picks the CSV or JSON reader from the file extension.
 */
export const makeFileRegistrationSource = (
  options: FileRegistrationSourceOptions
): RegistrationSource =>
  options.filePath.toLowerCase().endsWith('.csv')
    ? makeCsvFileRegistrationSource(options)
    : makeJsonFileRegistrationSource(options);
