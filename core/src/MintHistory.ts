import { MINT_HISTORY_CAPACITY } from './constants.js'
import { ValidationError } from './errors.js'
import type { HistoryOverflowPolicy, Principal, ProofId } from './types.js'

/**
 * Append-only, per-account list of proof ids consumed by mints.
 *
 * Each account holds at most `capacity` entries. When a list is full the
 * overflow policy decides between rejecting the append and evicting the
 * oldest entry. Restored lists longer than `capacity` are trimmed only
 * under 'drop-oldest'; under 'reject' they are refused.
 */
export class MintHistory {
  private histories: Map<Principal, ProofId[]>

  constructor(
    private readonly capacity: number = MINT_HISTORY_CAPACITY,
    private readonly overflow: HistoryOverflowPolicy = 'reject',
    histories: Iterable<[Principal, ProofId[]]> = []
  ) {
    if (!Number.isSafeInteger(capacity) || capacity < 1) {
      throw new ValidationError(`History capacity must be a positive integer, got ${capacity}`)
    }
    this.histories = new Map()
    for (const [account, proofIds] of histories) {
      if (proofIds.length > capacity && overflow === 'reject') {
        throw new ValidationError(`Mint history for ${account} holds ${proofIds.length} entries, capacity is ${capacity}`)
      }
      this.histories.set(account, proofIds.slice(-capacity))
    }
  }

  get(account: Principal): ProofId[] {
    return [...(this.histories.get(account) ?? [])]
  }

  /**
   * Whether append() would succeed for this account
   */
  canAppend(account: Principal): boolean {
    if (this.overflow === 'drop-oldest') return true
    return (this.histories.get(account)?.length ?? 0) < this.capacity
  }

  /**
   * @throws ValidationError when the list is full under the 'reject' policy
   */
  append(account: Principal, proofId: ProofId): void {
    if (!this.canAppend(account)) {
      throw new ValidationError(`Mint history for ${account} is full (${this.capacity} entries)`)
    }
    const next = [...(this.histories.get(account) ?? []), proofId]
    this.histories.set(account, next.length > this.capacity ? next.slice(next.length - this.capacity) : next)
  }

  entries(): Array<[Principal, ProofId[]]> {
    return Array.from(this.histories.entries())
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
      .map(([account, proofIds]) => [account, [...proofIds]])
  }
}
