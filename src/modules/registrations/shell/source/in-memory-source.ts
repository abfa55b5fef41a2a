import { ok } from 'neverthrow';

import type { RegistrationSource } from '../../core/ports.js';
import type { RegistrationRecord } from '../../core/types.js';

/**
 * Serves a frozen copy of the given records.
 */
export const makeInMemoryRegistrationSource = (
  records: readonly RegistrationRecord[]
): RegistrationSource => {
  const snapshot = Object.freeze(records.map((record) => Object.freeze({ ...record })));

  return {
    loadRecords: () => Promise.resolve(ok(snapshot)),
  };
};
