import { Collection, Db, Filter } from 'mongodb'
import type { LedgerSnapshot } from '@gridmint/core'
import { eventAccounts } from './types.js'
import type { LedgerEventQuery, LedgerEventRecord, LedgerStorage, SequencedEvent, SnapshotRecord } from './types.js'

/**
 * Storage manager for ledger snapshots and events using MongoDB.
 */
export class LedgerStorageManager implements LedgerStorage {
  private readonly snapshots: Collection<SnapshotRecord>
  private readonly events: Collection<LedgerEventRecord>

  /**
   * @param db A connected MongoDB database handle.
   */
  constructor (private readonly db: Db) {
    this.snapshots = db.collection<SnapshotRecord>('ledgerSnapshots')
    this.events = db.collection<LedgerEventRecord>('ledgerEvents')

    // One snapshot per ledger
    this.snapshots
      .createIndex({ ledgerId: 1 }, { unique: true })
      .catch(console.error)

    // Sequence numbers are unique within a ledger
    this.events
      .createIndex({ ledgerId: 1, sequence: 1 }, { unique: true })
      .catch(console.error)

    // Lookups by account
    this.events
      .createIndex({ ledgerId: 1, accounts: 1 })
      .catch(console.error)
  }

  /**
   * Load the latest snapshot of a ledger, or null for a new ledger.
   */
  async loadSnapshot (ledgerId: string): Promise<{ snapshot: LedgerSnapshot, sequence: number } | null> {
    const record = await this.snapshots.findOne({ ledgerId })
    if (record === null) {
      return null
    }
    return { snapshot: record.snapshot, sequence: record.sequence }
  }

  /**
   * Write events first and the snapshot last, so a snapshot never points
   * past events that were not stored.
   */
  async saveSnapshot (
    ledgerId: string,
    snapshot: LedgerSnapshot,
    sequence: number,
    events: SequencedEvent[]
  ): Promise<void> {
    const baseSequence = sequence - events.length
    await this.events.deleteMany({ ledgerId, sequence: { $gt: baseSequence } })

    if (events.length > 0) {
      const createdAt = new Date()
      await this.events.insertMany(events.map((entry) => ({
        ledgerId,
        sequence: entry.sequence,
        type: entry.event.type,
        accounts: eventAccounts(entry.event),
        event: entry.event,
        createdAt
      })))
    }

    await this.snapshots.replaceOne(
      { ledgerId },
      { ledgerId, snapshot, sequence, updatedAt: new Date() },
      { upsert: true }
    )
  }

  /**
   * Find events of a ledger with optional type and account filters.
   */
  async findEvents (ledgerId: string, query: LedgerEventQuery = {}): Promise<LedgerEventRecord[]> {
    const filter: Filter<LedgerEventRecord> = { ledgerId }

    if (query.type) {
      filter.type = query.type
    }

    if (query.account) {
      filter.accounts = query.account
    }

    const sortDirection = (query.sortOrder ?? 'asc') === 'desc' ? -1 : 1

    return await this.events
      .find(filter, { projection: { _id: 0 } })
      .sort({ sequence: sortDirection })
      .skip(query.skip ?? 0)
      .limit(query.limit ?? 50)
      .toArray()
  }
}
