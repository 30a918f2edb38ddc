import type { Principal, SettlementRail } from '@gridmint/core'

export interface FeeTransfer {
  amount: number
  from: Principal
  to: Principal
}

/**
 * Settlement rail that only records what the Minter asks it to move.
 *
 * LedgerService hands this to its Minter and replays the recorded
 * transfers on the real rail once the new state is stored.
 */
export class DeferredSettlementRail implements SettlementRail {
  private queued: FeeTransfer[] = []

  transfer(amount: number, from: Principal, to: Principal): void {
    this.queued.push({ amount, from, to })
  }

  /**
   * Remove and return every recorded transfer
   */
  take(): FeeTransfer[] {
    const queued = this.queued
    this.queued = []
    return queued
  }
}
