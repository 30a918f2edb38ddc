/**
 * Minter - proof-gated issuance ledger
 *
 * Orchestrates every balance-affecting operation:
 * - Minting against attested proofs, with a fee skimmed at issuance
 * - Burning and transferring balances
 * - Owner-gated administration (pause, addresses, ownership)
 * - Read accessors over balances, supply and mint records
 *
 * Each operation validates everything first and only then writes, so a
 * thrown MinterError always means nothing changed.
 */

import {
  EXPIRY,
  MAX_PER_PROOF,
  MAX_SUPPLY,
  MINT_HISTORY_CAPACITY,
  TOKEN_DECIMALS,
  TOKEN_NAME,
  TOKEN_SYMBOL,
  TOKEN_URI
} from './constants.js'
import { ConfigStore } from './ConfigStore.js'
import {
  AuthorizationError,
  ERROR_CODES,
  ProofError,
  StateError,
  SupplyError,
  TransferError,
  ValidationError,
  formatMinterError
} from './errors.js'
import { checkInvariants } from './invariants.js'
import { Ledger } from './Ledger.js'
import { log, logWithTimestamp } from './logging.js'
import { MintHistory } from './MintHistory.js'
import { MintRegistry } from './MintRegistry.js'
import type {
  LedgerConfig,
  LedgerEvent,
  LedgerEventListener,
  LedgerSnapshot,
  MintRecord,
  MinterConfig,
  Principal,
  Proof,
  ProofId,
  ResolvedMinterConfig
} from './types.js'
import { splitFee, validateAmount } from './utils.js'

/**
 * Minter
 *
 * @example
 * ```typescript
 * const minter = new Minter({
 *   owner,
 *   attester: attesterKey,
 *   registry: 'registry-1',
 *   proofStores: new Map([[attesterKey, proofStore]]),
 *   registries: new Map([['registry-1', producers]]),
 *   settlement,
 *   clock: new ManualHeightClock()
 * })
 *
 * // Producer mints against proof #1
 * const net = minter.mint(1000, 1, producer) // 990 after the 1% fee
 *
 * minter.transfer(100, producer, buyer, producer)
 * minter.getBalance(buyer) // 100
 * ```
 */
export class Minter {
  private config: ResolvedMinterConfig
  private configStore: ConfigStore
  private ledger: Ledger
  private mintRegistry: MintRegistry
  private history: MintHistory
  private totalMinted: number
  private listeners: Set<LedgerEventListener> = new Set()

  constructor(config: MinterConfig, snapshot?: LedgerSnapshot) {
    this.config = this.resolveConfig(config)
    this.configStore = snapshot !== undefined
      ? new ConfigStore(snapshot.config)
      : ConfigStore.initial(this.config.owner, this.config.attester, this.config.registry, this.config.feeRecipient)
    this.ledger = new Ledger(snapshot?.balances, snapshot?.totalSupply)
    this.mintRegistry = new MintRegistry(snapshot?.mintRecords)
    this.history = new MintHistory(this.config.historyCapacity, this.config.historyOverflow, snapshot?.histories)
    this.totalMinted = snapshot?.totalMinted ?? 0
  }

  /**
   * Rebuild a Minter from persisted state.
   *
   * The snapshot's configuration record replaces the owner, attester,
   * registry and fee recipient given in `config`.
   *
   * @throws Error listing every invariant the snapshot breaks
   */
  static restore(snapshot: LedgerSnapshot, config: MinterConfig): Minter {
    const store = config.proofStores.get(snapshot.config.attester)
    // Under drop-oldest, long histories are trimmed on load instead
    const historyCapacity = (config.historyOverflow ?? 'reject') === 'reject'
      ? config.historyCapacity ?? MINT_HISTORY_CAPACITY
      : undefined
    const violations = checkInvariants(
      snapshot,
      store !== undefined ? (id) => store.getProof(id) : undefined,
      historyCapacity
    )
    if (violations.length > 0) {
      throw new Error(`Cannot restore ledger: ${violations.map(v => `[${v.invariant}] ${v.message}`).join('; ')}`)
    }
    return new Minter(config, snapshot)
  }

  // ---------------------------------------------------------------------------
  // Events
  // ---------------------------------------------------------------------------

  /**
   * Subscribe to mint, burn and transfer events.
   *
   * Listeners run after the operation has committed.
   *
   * @returns A function that removes the listener
   */
  subscribe(listener: LedgerEventListener): () => void {
    this.listeners.add(listener)
    return () => {
      this.listeners.delete(listener)
    }
  }

  // ---------------------------------------------------------------------------
  // Issuance
  // ---------------------------------------------------------------------------

  /**
   * Mint tokens against an attested proof.
   *
   * Checks run in a fixed order and the first failure aborts:
   * 1. the ledger is not paused (StateError)
   * 2. the caller is a registered producer (AuthorizationError)
   * 3. the proof exists (ProofError)
   * 4. fee and net are derived from `amount`
   * 5. the proof belongs to the caller, net is in (0, MAX_PER_PROOF], the
   *    proof is at most EXPIRY blocks old and has capacity for net (ProofError)
   * 6. issuance stays within MAX_SUPPLY (SupplyError)
   * 7. the caller's mint history has room (ValidationError)
   * 8. the fee settles on the rail (TransferError)
   *
   * @param amount - Gross amount; the fee is taken out of it
   * @param proofId - Proof backing the issuance
   * @param caller - Producer minting
   * @returns The net amount credited to the caller
   */
  mint(amount: number, proofId: ProofId, caller: Principal): number {
    const config = this.configStore.get()
    if (config.paused) {
      throw new StateError('Minting is paused')
    }

    const registry = this.config.registries.get(config.registry)
    if (registry === undefined || !registry.isRegistered(caller)) {
      throw new AuthorizationError(`${caller} is not a registered producer`, ERROR_CODES.NOT_REGISTERED)
    }

    const proof = this.lookupProof(proofId, config)
    if (proof === undefined) {
      throw new ProofError(`Proof ${proofId} not found`, ERROR_CODES.INVALID_PROOF_ID)
    }

    validateAmount(amount)
    const { fee, net } = splitFee(amount)
    const height = this.config.clock.currentHeight()

    const shortfall = this.proofShortfall(proofId, proof, net, height, caller)
    if (shortfall !== undefined) {
      throw new ProofError(`insufficient proof: ${shortfall}`)
    }

    if (this.totalMinted + net > MAX_SUPPLY) {
      throw new SupplyError(`Minting ${net} would exceed max supply ${MAX_SUPPLY}`)
    }

    if (!this.history.canAppend(caller)) {
      throw new ValidationError(`Mint history for ${caller} is full`)
    }

    if (fee > 0) {
      try {
        this.config.settlement.transfer(fee, caller, config.feeRecipient)
      } catch (error) {
        throw new TransferError(`Fee settlement failed: ${formatMinterError(error)}`)
      }
    }

    // Commit
    this.ledger.credit(caller, net)
    this.totalMinted += net
    this.mintRegistry.record(proofId, net, height)
    this.history.append(caller, proofId)

    logWithTimestamp('Minter', `minted ${net} (fee ${fee}) against proof ${proofId} for ${caller}`)
    this.emit({ type: 'mint', net, fee, proofId, minter: caller, height })
    return net
  }

  /**
   * Destroy tokens held by the caller. Proof capacity is not restored.
   *
   * @returns The amount burned
   */
  burn(amount: number, caller: Principal): number {
    this.requireNotPaused()
    validateAmount(amount)
    this.ledger.burn(caller, amount)

    logWithTimestamp('Minter', `burned ${amount} from ${caller}`)
    this.emit({ type: 'burn', amount, burner: caller })
    return amount
  }

  /**
   * Move tokens from the caller to a recipient. There are no allowances:
   * the caller must be the sender.
   */
  transfer(amount: number, sender: Principal, recipient: Principal, caller: Principal): boolean {
    this.requireNotPaused()
    if (caller !== sender) {
      throw new AuthorizationError(`${caller} cannot transfer on behalf of ${sender}`)
    }
    this.ledger.transfer(amount, sender, recipient)

    logWithTimestamp('Minter', `transferred ${amount} from ${sender} to ${recipient}`)
    this.emit({ type: 'transfer', amount, from: sender, to: recipient })
    return true
  }

  // ---------------------------------------------------------------------------
  // Administration
  // ---------------------------------------------------------------------------

  pause(caller: Principal): boolean {
    return this.configStore.pause(caller)
  }

  unpause(caller: Principal): boolean {
    return this.configStore.unpause(caller)
  }

  setFeeRecipient(recipient: Principal, caller: Principal): boolean {
    return this.configStore.setFeeRecipient(recipient, caller)
  }

  setAttester(attester: Principal, caller: Principal): boolean {
    return this.configStore.setAttester(attester, caller)
  }

  setRegistry(registry: Principal, caller: Principal): boolean {
    return this.configStore.setRegistry(registry, caller)
  }

  transferOwnership(newOwner: Principal, caller: Principal): boolean {
    return this.configStore.transferOwnership(newOwner, caller)
  }

  // ---------------------------------------------------------------------------
  // Read Accessors
  // ---------------------------------------------------------------------------

  getBalance(account: Principal): number {
    return this.ledger.getBalance(account)
  }

  getTotalSupply(): number {
    return this.ledger.getTotalSupply()
  }

  /** Cumulative issuance; burns do not reduce it */
  getTotalMinted(): number {
    return this.totalMinted
  }

  getName(): string {
    return TOKEN_NAME
  }

  getSymbol(): string {
    return TOKEN_SYMBOL
  }

  getDecimals(): number {
    return TOKEN_DECIMALS
  }

  getTokenUri(): string | null {
    return TOKEN_URI
  }

  /**
   * Units that can still be minted against a proof.
   *
   * @throws ProofError when the proof does not exist
   */
  getMintableAmount(proofId: ProofId): number {
    const proof = this.lookupProof(proofId, this.configStore.get())
    if (proof === undefined) {
      throw new ProofError(`Proof ${proofId} not found`, ERROR_CODES.INVALID_PROOF_ID)
    }
    return this.mintRegistry.remainingCapacity(proofId, proof)
  }

  isProofMinted(proofId: ProofId): boolean {
    return this.mintRegistry.has(proofId)
  }

  getMintRecord(proofId: ProofId): MintRecord | undefined {
    return this.mintRegistry.get(proofId)
  }

  getMintHistory(account: Principal): ProofId[] {
    return this.history.get(account)
  }

  isPaused(): boolean {
    return this.configStore.isPaused()
  }

  getOwner(): Principal {
    return this.configStore.getOwner()
  }

  getConfig(): LedgerConfig {
    return this.configStore.get()
  }

  /**
   * Copy of all persisted state
   */
  snapshot(): LedgerSnapshot {
    return {
      config: { ...this.configStore.get() },
      balances: this.ledger.entries(),
      totalSupply: this.ledger.getTotalSupply(),
      totalMinted: this.totalMinted,
      mintRecords: this.mintRegistry.entries(),
      histories: this.history.entries()
    }
  }

  // ---------------------------------------------------------------------------
  // Private Methods
  // ---------------------------------------------------------------------------

  private resolveConfig(config: MinterConfig): ResolvedMinterConfig {
    const historyCapacity = config.historyCapacity ?? MINT_HISTORY_CAPACITY
    if (!Number.isSafeInteger(historyCapacity) || historyCapacity < 1) {
      throw new ValidationError(`History capacity must be a positive integer, got ${historyCapacity}`)
    }
    return {
      ...config,
      feeRecipient: config.feeRecipient ?? config.owner,
      historyCapacity,
      historyOverflow: config.historyOverflow ?? 'reject'
    }
  }

  private lookupProof(proofId: ProofId, config: LedgerConfig): Proof | undefined {
    return this.config.proofStores.get(config.attester)?.getProof(proofId)
  }

  /**
   * Why a proof cannot back `net` more units, or undefined when it can.
   */
  private proofShortfall(
    proofId: ProofId,
    proof: Proof,
    net: number,
    height: number,
    caller: Principal
  ): string | undefined {
    if (proof.producerId !== caller) {
      return `proof ${proofId} belongs to another producer`
    }
    if (net <= 0) {
      return 'net amount after fee is zero'
    }
    if (net > MAX_PER_PROOF) {
      return `net amount ${net} exceeds per-proof limit ${MAX_PER_PROOF}`
    }
    if (height - proof.attestedAt > EXPIRY) {
      return `proof ${proofId} expired at height ${proof.attestedAt + EXPIRY}`
    }
    const remaining = this.mintRegistry.remainingCapacity(proofId, proof)
    if (remaining < net) {
      return `proof ${proofId} has ${remaining} remaining, ${net} requested`
    }
    return undefined
  }

  private requireNotPaused(): void {
    if (this.configStore.isPaused()) {
      throw new StateError()
    }
  }

  private emit(event: LedgerEvent): void {
    for (const listener of this.listeners) {
      try {
        listener(event)
      } catch (error) {
        log.error('[Minter] event listener failed:', error)
      }
    }
  }
}
