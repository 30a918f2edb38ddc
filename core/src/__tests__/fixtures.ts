import { Minter } from '../Minter.js'
import { ManualHeightClock } from '../clocks.js'
import { InMemoryProducerRegistry } from '../ProducerRegistry.js'
import type { HistoryOverflowPolicy, LedgerSnapshot, Principal, Proof, ProofId, ProofStore, SettlementRail } from '../types.js'

export const OWNER = 'owner-1'
export const PRODUCER = 'producer-1'
export const OTHER_PRODUCER = 'producer-2'
export const RECIPIENT = 'recipient-1'
export const ATTESTER = 'attester-1'
export const REGISTRY = 'registry-1'

/**
 * Map-backed proof store for tests
 */
export class MockProofStore implements ProofStore {
  proofs: Map<ProofId, Proof> = new Map()

  add(id: ProofId, excessOutput: number, attestedAt: number, producerId: Principal): void {
    this.proofs.set(id, { excessOutput, attestedAt, producerId })
  }

  getProof(id: ProofId): Proof | undefined {
    return this.proofs.get(id)
  }
}

/**
 * Settlement rail that records every fee movement
 */
export class MockSettlementRail implements SettlementRail {
  transfers: Array<{ amount: number, from: Principal, to: Principal }> = []
  failWith?: Error

  transfer(amount: number, from: Principal, to: Principal): void {
    if (this.failWith) throw this.failWith
    this.transfers.push({ amount, from, to })
  }
}

export interface TestLedger {
  minter: Minter
  proofs: MockProofStore
  producers: InMemoryProducerRegistry
  settlement: MockSettlementRail
  clock: ManualHeightClock
}

export function createTestLedger(options: {
  historyCapacity?: number
  historyOverflow?: HistoryOverflowPolicy
  snapshot?: LedgerSnapshot
} = {}): TestLedger {
  const proofs = new MockProofStore()
  const producers = new InMemoryProducerRegistry([PRODUCER])
  const settlement = new MockSettlementRail()
  const clock = new ManualHeightClock()
  const minter = new Minter({
    owner: OWNER,
    attester: ATTESTER,
    registry: REGISTRY,
    proofStores: new Map([[ATTESTER, proofs]]),
    registries: new Map([[REGISTRY, producers]]),
    settlement,
    clock,
    historyCapacity: options.historyCapacity,
    historyOverflow: options.historyOverflow
  }, options.snapshot)
  return { minter, proofs, producers, settlement, clock }
}

/**
 * Sum of every balance in a snapshot
 */
export function sumBalances(snapshot: LedgerSnapshot): number {
  return snapshot.balances.reduce((sum, [, balance]) => sum + balance, 0)
}
