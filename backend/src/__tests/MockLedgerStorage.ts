import type { LedgerSnapshot } from '@gridmint/core'
import { eventAccounts } from '../storage/types.js'
import type { LedgerEventQuery, LedgerEventRecord, LedgerStorage, SequencedEvent } from '../storage/types.js'

/**
 * In-memory stand-in for the MongoDB storage manager
 */
export class MockLedgerStorage implements LedgerStorage {
  snapshots: Map<string, { snapshot: LedgerSnapshot, sequence: number }> = new Map()
  events: LedgerEventRecord[] = []
  saves = 0
  failNextSave?: Error

  async loadSnapshot(ledgerId: string): Promise<{ snapshot: LedgerSnapshot, sequence: number } | null> {
    const stored = this.snapshots.get(ledgerId)
    return stored === undefined ? null : structuredClone(stored)
  }

  async saveSnapshot(ledgerId: string, snapshot: LedgerSnapshot, sequence: number, events: SequencedEvent[]): Promise<void> {
    if (this.failNextSave !== undefined) {
      const error = this.failNextSave
      this.failNextSave = undefined
      throw error
    }
    const base = sequence - events.length
    this.events = this.events.filter(r => r.ledgerId !== ledgerId || r.sequence <= base)
    for (const entry of events) {
      this.events.push({
        ledgerId,
        sequence: entry.sequence,
        type: entry.event.type,
        accounts: eventAccounts(entry.event),
        event: structuredClone(entry.event),
        createdAt: new Date()
      })
    }
    this.snapshots.set(ledgerId, structuredClone({ snapshot, sequence }))
    this.saves++
  }

  async findEvents(ledgerId: string, query: LedgerEventQuery = {}): Promise<LedgerEventRecord[]> {
    const { type, account, limit = 50, skip = 0, sortOrder = 'asc' } = query
    const results = this.events
      .filter(r => r.ledgerId === ledgerId)
      .filter(r => type === undefined || r.type === type)
      .filter(r => account === undefined || r.accounts.includes(account))
      .sort((a, b) => sortOrder === 'desc' ? b.sequence - a.sequence : a.sequence - b.sequence)
    return results.slice(skip, skip + limit)
  }
}
