import {
  Minter,
  TransferError,
  formatMinterError,
  isMinterError,
  log,
  logWithTimestamp
} from '@gridmint/core'
import type {
  LedgerConfig,
  LedgerEvent,
  LedgerSnapshot,
  MintRecord,
  MinterConfig,
  Principal,
  ProofId,
  SettlementRail
} from '@gridmint/core'
import { DeferredSettlementRail } from './DeferredSettlementRail.js'
import { INTERNAL_ERROR_CODE } from './types.js'
import type { OperationResult } from './types.js'
import type { LedgerEventQuery, LedgerEventRecord, LedgerStorage, SequencedEvent } from './storage/types.js'

export interface LedgerServiceOptions {
  /** Key the ledger's snapshot and events are stored under */
  ledgerId: string
  minterConfig: MinterConfig
}

export interface TokenInfo {
  name: string
  symbol: string
  decimals: number
  tokenUri: string | null
}

/**
 * Persistent front for a Minter.
 *
 * Mutations run one at a time in call order. Each successful mutation is
 * written to storage as a new snapshot together with the events it
 * emitted; when the write fails the Minter is rebuilt from the last stored
 * snapshot and the caller gets a failed result.
 *
 * Issuance fees move on the configured settlement rail only after the
 * write succeeds. If the rail then fails, the stored snapshot is put back
 * and the mint reports a TransferError.
 *
 * @public
 */
export class LedgerService {
  private queue: Promise<void> = Promise.resolve()
  private pending: LedgerEvent[] = []
  private unsubscribe: () => void

  private constructor(
    private readonly storage: LedgerStorage,
    private readonly ledgerId: string,
    private readonly minterConfig: MinterConfig,
    private readonly settlement: SettlementRail,
    private readonly fees: DeferredSettlementRail,
    private minter: Minter,
    private lastSnapshot: LedgerSnapshot,
    private sequence: number
  ) {
    this.unsubscribe = this.attach(minter)
  }

  /**
   * Load the ledger from storage, or create and store an empty one.
   *
   * @throws Error when the stored snapshot breaks a ledger invariant
   */
  static async open(storage: LedgerStorage, options: LedgerServiceOptions): Promise<LedgerService> {
    const { ledgerId } = options
    const settlement = options.minterConfig.settlement
    const fees = new DeferredSettlementRail()
    const minterConfig: MinterConfig = { ...options.minterConfig, settlement: fees }

    const stored = await storage.loadSnapshot(ledgerId)
    if (stored !== null) {
      const minter = Minter.restore(stored.snapshot, minterConfig)
      logWithTimestamp('LedgerService', `Restored ledger ${ledgerId} at sequence ${stored.sequence}`)
      return new LedgerService(storage, ledgerId, minterConfig, settlement, fees, minter, stored.snapshot, stored.sequence)
    }

    const minter = new Minter(minterConfig)
    const snapshot = minter.snapshot()
    await storage.saveSnapshot(ledgerId, snapshot, 0, [])
    logWithTimestamp('LedgerService', `Created ledger ${ledgerId}`)
    return new LedgerService(storage, ledgerId, minterConfig, settlement, fees, minter, snapshot, 0)
  }

  // ---------------------------------------------------------------------------
  // Mutations
  // ---------------------------------------------------------------------------

  async mint(amount: number, proofId: ProofId, caller: Principal): Promise<OperationResult<number>> {
    return await this.run(`mint ${amount} against proof ${proofId}`, (minter) => minter.mint(amount, proofId, caller))
  }

  async burn(amount: number, caller: Principal): Promise<OperationResult<number>> {
    return await this.run(`burn ${amount}`, (minter) => minter.burn(amount, caller))
  }

  async transfer(amount: number, sender: Principal, recipient: Principal, caller: Principal): Promise<OperationResult<boolean>> {
    return await this.run(`transfer ${amount}`, (minter) => minter.transfer(amount, sender, recipient, caller))
  }

  async pause(caller: Principal): Promise<OperationResult<boolean>> {
    return await this.run('pause', (minter) => minter.pause(caller))
  }

  async unpause(caller: Principal): Promise<OperationResult<boolean>> {
    return await this.run('unpause', (minter) => minter.unpause(caller))
  }

  async setFeeRecipient(recipient: Principal, caller: Principal): Promise<OperationResult<boolean>> {
    return await this.run('setFeeRecipient', (minter) => minter.setFeeRecipient(recipient, caller))
  }

  async setAttester(attester: Principal, caller: Principal): Promise<OperationResult<boolean>> {
    return await this.run('setAttester', (minter) => minter.setAttester(attester, caller))
  }

  async setRegistry(registry: Principal, caller: Principal): Promise<OperationResult<boolean>> {
    return await this.run('setRegistry', (minter) => minter.setRegistry(registry, caller))
  }

  async transferOwnership(newOwner: Principal, caller: Principal): Promise<OperationResult<boolean>> {
    return await this.run('transferOwnership', (minter) => minter.transferOwnership(newOwner, caller))
  }

  // ---------------------------------------------------------------------------
  // Reads
  // ---------------------------------------------------------------------------

  getBalance(account: Principal): number {
    return this.minter.getBalance(account)
  }

  getTotalSupply(): number {
    return this.minter.getTotalSupply()
  }

  getTotalMinted(): number {
    return this.minter.getTotalMinted()
  }

  getTokenInfo(): TokenInfo {
    return {
      name: this.minter.getName(),
      symbol: this.minter.getSymbol(),
      decimals: this.minter.getDecimals(),
      tokenUri: this.minter.getTokenUri()
    }
  }

  getMintableAmount(proofId: ProofId): OperationResult<number> {
    try {
      return { success: true, value: this.minter.getMintableAmount(proofId) }
    } catch (error) {
      return this.failure('getMintableAmount', error)
    }
  }

  isProofMinted(proofId: ProofId): boolean {
    return this.minter.isProofMinted(proofId)
  }

  getMintRecord(proofId: ProofId): MintRecord | undefined {
    return this.minter.getMintRecord(proofId)
  }

  getMintHistory(account: Principal): ProofId[] {
    return this.minter.getMintHistory(account)
  }

  isPaused(): boolean {
    return this.minter.isPaused()
  }

  getOwner(): Principal {
    return this.minter.getOwner()
  }

  getConfig(): LedgerConfig {
    return this.minter.getConfig()
  }

  /**
   * Sequence number of the last stored event
   */
  getSequence(): number {
    return this.sequence
  }

  async findEvents(query: LedgerEventQuery = {}): Promise<LedgerEventRecord[]> {
    return await this.storage.findEvents(this.ledgerId, query)
  }

  /**
   * Wait for queued operations and stop collecting events
   */
  async close(): Promise<void> {
    await this.queue
    this.unsubscribe()
  }

  // ---------------------------------------------------------------------------
  // Private Methods
  // ---------------------------------------------------------------------------

  private attach(minter: Minter): () => void {
    return minter.subscribe((event) => {
      this.pending.push(event)
    })
  }

  private async run<T>(label: string, operation: (minter: Minter) => T): Promise<OperationResult<T>> {
    const result = this.queue.then(async () => await this.execute(label, operation))
    this.queue = result.then(() => undefined)
    return await result
  }

  private async execute<T>(label: string, operation: (minter: Minter) => T): Promise<OperationResult<T>> {
    this.pending = []
    this.fees.take()
    let value: T
    try {
      value = operation(this.minter)
    } catch (error) {
      this.pending = []
      this.fees.take()
      return this.failure(label, error)
    }

    const events: SequencedEvent[] = this.pending.map((event, index) => ({
      sequence: this.sequence + index + 1,
      event
    }))
    this.pending = []
    const snapshot = this.minter.snapshot()
    const sequence = this.sequence + events.length
    const fees = this.fees.take()

    try {
      await this.storage.saveSnapshot(this.ledgerId, snapshot, sequence, events)
    } catch (error) {
      log.error(`[LedgerService] Failed to persist ${label}, rolling back:`, error)
      this.rollback()
      return { success: false, code: INTERNAL_ERROR_CODE, error: formatMinterError(error) }
    }

    try {
      for (const fee of fees) {
        this.settlement.transfer(fee.amount, fee.from, fee.to)
      }
    } catch (error) {
      log.error(`[LedgerService] Fee settlement for ${label} failed, reverting:`, error)
      return await this.revert(label, new TransferError(`Fee settlement failed: ${formatMinterError(error)}`))
    }

    this.lastSnapshot = snapshot
    this.sequence = sequence
    logWithTimestamp('LedgerService', `${label} stored at sequence ${sequence}`)
    return { success: true, value }
  }

  /**
   * Undo a stored mutation whose fee could not be settled. If the stored
   * snapshot cannot be put back, the next successful write replaces it.
   */
  private async revert(label: string, cause: TransferError): Promise<{ success: false, code: number, error: string }> {
    this.rollback()
    try {
      await this.storage.saveSnapshot(this.ledgerId, this.lastSnapshot, this.sequence, [])
    } catch (error) {
      log.error(`[LedgerService] Failed to revert ${label}:`, error)
      return { success: false, code: INTERNAL_ERROR_CODE, error: formatMinterError(error) }
    }
    return this.failure(label, cause)
  }

  private rollback(): void {
    this.unsubscribe()
    this.minter = new Minter(this.minterConfig, this.lastSnapshot)
    this.unsubscribe = this.attach(this.minter)
  }

  private failure(label: string, error: unknown): { success: false, code: number, error: string } {
    if (isMinterError(error)) {
      logWithTimestamp('LedgerService', `${label} rejected: ${error.message}`)
      return { success: false, code: error.code, error: formatMinterError(error) }
    }
    log.error(`[LedgerService] ${label} failed:`, error)
    return { success: false, code: INTERNAL_ERROR_CODE, error: formatMinterError(error) }
  }
}
