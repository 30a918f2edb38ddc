/**
 * Ledger Type Definitions
 *
 * Types shared by the issuance state machine, its ports and its hosts.
 */

import type { PubKeyHex } from '@bsv/sdk'

// ---------------------------------------------------------------------------
// Identity
// ---------------------------------------------------------------------------

/**
 * An account, attester or registry address.
 *
 * Keys produced with @bsv/sdk are compressed public-key hex, but any
 * non-empty string identifies a principal.
 */
export type Principal = PubKeyHex | string

/** Identifier of an attested claim */
export type ProofId = number

// ---------------------------------------------------------------------------
// Proofs and Mint Records
// ---------------------------------------------------------------------------

/**
 * An attested claim of physical output.
 */
export interface Proof {
  /** Attested excess output, in token base units */
  excessOutput: number
  /** Block height at which the claim was attested */
  attestedAt: number
  /** Producer entitled to mint against this claim */
  producerId: Principal
}

/**
 * Cumulative issuance against one proof
 */
export interface MintRecord {
  cumulativeMinted: number
  lastMintHeight: number
}

// ---------------------------------------------------------------------------
// External Ports
// ---------------------------------------------------------------------------

/**
 * Source of attested claims. Reads are synchronous and side-effect free.
 */
export interface ProofStore {
  getProof(id: ProofId): Proof | undefined
}

/**
 * Membership check for producers allowed to mint.
 */
export interface ProducerRegistry {
  isRegistered(principal: Principal): boolean
}

/**
 * Rail used to move the issuance fee. Throwing aborts the mint.
 */
export interface SettlementRail {
  transfer(amount: number, from: Principal, to: Principal): void
}

/**
 * Source of the current block height
 */
export interface HeightClock {
  currentHeight(): number
}

/** Lookup of a port by the address held in configuration */
export type ServiceDirectory<T> = ReadonlyMap<Principal, T>

// ---------------------------------------------------------------------------
// Configuration
// ---------------------------------------------------------------------------

/**
 * Versioned administrative configuration.
 *
 * Replaced wholesale by each owner-gated command; never mutated in place.
 */
export interface LedgerConfig {
  readonly owner: Principal
  readonly paused: boolean
  readonly attester: Principal
  readonly registry: Principal
  readonly feeRecipient: Principal
  readonly version: number
}

/**
 * What happens when an account's mint history is full
 *
 * - reject: the mint fails with a ValidationError
 * - drop-oldest: the oldest entry is evicted
 */
export type HistoryOverflowPolicy = 'reject' | 'drop-oldest'

/**
 * Minter construction options
 */
export interface MinterConfig {
  /** Initial owner; also the default fee recipient */
  owner: Principal
  /** Address of the trusted attester whose proof store is consulted */
  attester: Principal
  /** Address of the producer registry that is consulted */
  registry: Principal
  /** Fee recipient (default: owner) */
  feeRecipient?: Principal
  /** Proof stores keyed by attester address */
  proofStores: ServiceDirectory<ProofStore>
  /** Producer registries keyed by registry address */
  registries: ServiceDirectory<ProducerRegistry>
  /** Rail used to settle issuance fees */
  settlement: SettlementRail
  /** Block height source */
  clock: HeightClock
  /** Per-account history capacity (default: MINT_HISTORY_CAPACITY) */
  historyCapacity?: number
  /** History overflow behavior (default: 'reject') */
  historyOverflow?: HistoryOverflowPolicy
}

/**
 * MinterConfig with defaults applied
 */
export interface ResolvedMinterConfig extends Required<MinterConfig> {}

// ---------------------------------------------------------------------------
// Events
// ---------------------------------------------------------------------------

export interface MintEvent {
  type: 'mint'
  net: number
  fee: number
  proofId: ProofId
  minter: Principal
  height: number
}

export interface BurnEvent {
  type: 'burn'
  amount: number
  burner: Principal
}

export interface TransferEvent {
  type: 'transfer'
  amount: number
  from: Principal
  to: Principal
}

export type LedgerEvent = MintEvent | BurnEvent | TransferEvent

export type LedgerEventType = LedgerEvent['type']

export type LedgerEventListener = (event: LedgerEvent) => void

// ---------------------------------------------------------------------------
// Snapshots
// ---------------------------------------------------------------------------

/**
 * Plain, JSON-compatible copy of all persisted ledger state
 */
export interface LedgerSnapshot {
  config: LedgerConfig
  balances: Array<[Principal, number]>
  totalSupply: number
  totalMinted: number
  mintRecords: Array<[ProofId, MintRecord]>
  histories: Array<[Principal, ProofId[]]>
}

/**
 * A broken invariant found in a snapshot
 */
export interface InvariantViolation {
  invariant: 'proof-capacity' | 'supply-cap' | 'supply-balance' | 'history-capacity' | 'shape'
  message: string
}
