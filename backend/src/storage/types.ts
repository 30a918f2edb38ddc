import type { LedgerEvent, LedgerEventType, LedgerSnapshot, Principal } from '@gridmint/core'

/**
 * Persisted ledger state for one ledger
 */
export interface SnapshotRecord {
  ledgerId: string
  snapshot: LedgerSnapshot
  /** Sequence number of the last event folded into this snapshot */
  sequence: number
  updatedAt: Date
}

/**
 * One emitted event, numbered per ledger
 */
export interface LedgerEventRecord {
  ledgerId: string
  sequence: number
  type: LedgerEventType
  /** Every account the event touched, for lookups by account */
  accounts: Principal[]
  event: LedgerEvent
  createdAt: Date
}

export interface SequencedEvent {
  sequence: number
  event: LedgerEvent
}

/**
 * Query parameters for event lookups
 */
export interface LedgerEventQuery {
  type?: LedgerEventType
  account?: Principal
  limit?: number
  skip?: number
  sortOrder?: 'asc' | 'desc'
}

/**
 * What the LedgerService needs from storage
 */
export interface LedgerStorage {
  loadSnapshot(ledgerId: string): Promise<{ snapshot: LedgerSnapshot, sequence: number } | null>
  /**
   * Persist a snapshot and the events that produced it. Events numbered
   * above `sequence - events.length` that a failed earlier write left
   * behind are replaced.
   */
  saveSnapshot(ledgerId: string, snapshot: LedgerSnapshot, sequence: number, events: SequencedEvent[]): Promise<void>
  findEvents(ledgerId: string, query?: LedgerEventQuery): Promise<LedgerEventRecord[]>
}

/**
 * Accounts an event touches
 */
export function eventAccounts(event: LedgerEvent): Principal[] {
  switch (event.type) {
    case 'mint':
      return [event.minter]
    case 'burn':
      return [event.burner]
    case 'transfer':
      return [event.from, event.to]
  }
}
