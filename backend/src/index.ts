/**
 * @gridmint/backend - MongoDB-backed ledger service
 *
 * @packageDocumentation
 */

export { default as createLedgerService, openFromEnvironment } from './LedgerServiceFactory.js'
export type { LedgerPorts } from './LedgerServiceFactory.js'
export { LedgerService } from './LedgerService.js'
export type { LedgerServiceOptions, TokenInfo } from './LedgerService.js'
export { DeferredSettlementRail } from './DeferredSettlementRail.js'
export type { FeeTransfer } from './DeferredSettlementRail.js'
export { LedgerStorageManager } from './storage/LedgerStorageManager.js'
export { loadLedgerEnv } from './config.js'
export type { LedgerEnv } from './config.js'
export { INTERNAL_ERROR_CODE, eventAccounts } from './types.js'
export type {
  OperationResult,
  SnapshotRecord,
  LedgerEventRecord,
  SequencedEvent,
  LedgerEventQuery,
  LedgerStorage
} from './types.js'
