/**
 * Type definitions for ledger backend services
 * @module types
 */

/**
 * Code reported for failures that are not ledger rule violations, such as
 * a storage write that did not go through
 */
export const INTERNAL_ERROR_CODE = 500

/**
 * Outcome of a service operation. Rule violations and storage failures are
 * reported here rather than thrown.
 */
export type OperationResult<T> =
  | { success: true, value: T }
  | { success: false, code: number, error: string }

// Re-export storage types
export type {
  SnapshotRecord,
  LedgerEventRecord,
  SequencedEvent,
  LedgerEventQuery,
  LedgerStorage
} from './storage/types.js'
export { eventAccounts } from './storage/types.js'
