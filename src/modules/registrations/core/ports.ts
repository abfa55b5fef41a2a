/**
 * Registrations Module - Ports (Interfaces)
 *
 * The analytics engine never loads data itself; it is handed a record set
 * by a source implementing this port.
 */

import type { RegistrationAnalyticsError } from './errors.js';
import type { RegistrationRecord } from './types.js';
import type { Result } from 'neverthrow';

/**
 * Supplies the raw registration records for one analytics call.
 * Records returned are treated as read-only.
 */
export interface RegistrationSource {
  loadRecords(): Promise<Result<readonly RegistrationRecord[], RegistrationAnalyticsError>>;
}
