import type { MintRecord, Proof, ProofId } from './types.js'

/**
 * Tracks how much has been issued against each proof.
 *
 * Records are created on the first mint against a proof and only ever
 * grow afterwards.
 */
export class MintRegistry {
  private records: Map<ProofId, MintRecord>

  constructor(records: Iterable<[ProofId, MintRecord]> = []) {
    this.records = new Map()
    for (const [proofId, record] of records) {
      this.records.set(proofId, { ...record })
    }
  }

  get(proofId: ProofId): MintRecord | undefined {
    const record = this.records.get(proofId)
    return record ? { ...record } : undefined
  }

  has(proofId: ProofId): boolean {
    return this.records.has(proofId)
  }

  cumulativeMinted(proofId: ProofId): number {
    return this.records.get(proofId)?.cumulativeMinted ?? 0
  }

  /**
   * Units that can still be issued against a proof, never negative.
   */
  remainingCapacity(proofId: ProofId, proof: Proof): number {
    return Math.max(0, proof.excessOutput - this.cumulativeMinted(proofId))
  }

  record(proofId: ProofId, net: number, height: number): MintRecord {
    const next: MintRecord = {
      cumulativeMinted: this.cumulativeMinted(proofId) + net,
      lastMintHeight: height
    }
    this.records.set(proofId, next)
    return { ...next }
  }

  entries(): Array<[ProofId, MintRecord]> {
    return Array.from(this.records.entries())
      .sort(([a], [b]) => a - b)
      .map(([proofId, record]) => [proofId, { ...record }])
  }
}
