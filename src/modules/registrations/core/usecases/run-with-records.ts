import { err, ok, type Result } from 'neverthrow';

import type { InvalidInputError, RegistrationAnalyticsError } from '../errors.js';
import type { RegistrationSource } from '../ports.js';
import type { RegistrationRecord } from '../types.js';
import type { BaseLogger } from 'pino';

/**
 * Dependencies shared by the registration analytics use cases.
 */
export interface RegistrationUseCaseDeps {
  source: RegistrationSource;
  logger: BaseLogger;
}

/**
 * Loads the record set from the source and runs a pure computation over it.
 * Nothing is cached between calls; each call sees the source's current records.
 *
 * @param deps - Record source and logger
 * @param operation - Name used in log lines
 * @param compute - Engine function applied to the loaded records
 */
export const runWithRecords = async <T>(
  deps: RegistrationUseCaseDeps,
  operation: string,
  compute: (records: readonly RegistrationRecord[]) => Result<T, InvalidInputError>
): Promise<Result<T, RegistrationAnalyticsError>> => {
  const { source, logger } = deps;

  const loaded = await source.loadRecords();
  if (loaded.isErr()) {
    logger.warn({ err: loaded.error, operation }, 'Failed to load registration records');
    return err(loaded.error);
  }

  const records = loaded.value;
  const result = compute(records);

  if (result.isErr()) {
    logger.debug(
      { operation, field: result.error.field, message: result.error.message },
      'Rejected registration analytics input'
    );
    return err(result.error);
  }

  logger.debug({ operation, records: records.length }, 'Computed registration analytics');
  return ok(result.value);
};
