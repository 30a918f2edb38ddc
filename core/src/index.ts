/**
 * @gridmint/core - proof-gated issuance ledger
 *
 * A deterministic state machine that turns attested claims of a producer's
 * excess output into a bounded, transferable token balance.
 *
 * This library provides:
 * - Minting against attested proofs, capped per proof and in total
 * - A percentage issuance fee moved over a pluggable settlement rail
 * - Burns and transfers
 * - Owner-gated administration
 * - Signed proof admission using @bsv/sdk keys
 *
 * @example
 * ```typescript
 * import { Minter, AttestedProofStore, InMemoryProducerRegistry, ManualHeightClock, signProof } from '@gridmint/core'
 *
 * const proofs = new AttestedProofStore(attesterPubKey)
 * proofs.submit(signProof(1, { excessOutput: 1000, attestedAt: 0, producerId: producer }, attesterKey))
 *
 * const minter = new Minter({
 *   owner,
 *   attester: attesterPubKey,
 *   registry: 'registry-1',
 *   proofStores: new Map([[attesterPubKey, proofs]]),
 *   registries: new Map([['registry-1', new InMemoryProducerRegistry([producer])]]),
 *   settlement,
 *   clock: new ManualHeightClock()
 * })
 *
 * minter.mint(1000, 1, producer) // 990
 * ```
 *
 * @packageDocumentation
 */

// Main class
export { Minter } from './Minter.js'

// Components
export { Ledger } from './Ledger.js'
export { MintRegistry } from './MintRegistry.js'
export { MintHistory } from './MintHistory.js'
export { ConfigStore } from './ConfigStore.js'
export { InMemoryProducerRegistry } from './ProducerRegistry.js'
export { ManualHeightClock, IntervalHeightClock } from './clocks.js'
export { checkInvariants } from './invariants.js'

// Attestation
export {
  AttestedProofStore,
  PROOF_MESSAGE_PREFIX,
  proofMessage,
  proofDigest,
  signProof,
  verifyProofSignature,
  validateProof
} from './ProofAttestation.js'
export type { SignedProof } from './ProofAttestation.js'

// Errors
export {
  ERROR_CODES,
  MinterError,
  AuthorizationError,
  ValidationError,
  ProofError,
  SupplyError,
  StateError,
  TransferError,
  isMinterError,
  formatMinterError
} from './errors.js'
export type { ErrorCode, MinterErrorKind } from './errors.js'

// Logging
export { log, logWithTimestamp, configureLogging } from './logging.js'

// Utilities
export { splitFee, validateAmount, validatePrincipal } from './utils.js'

// Types
export type {
  Principal,
  ProofId,
  Proof,
  MintRecord,
  ProofStore,
  ProducerRegistry,
  SettlementRail,
  HeightClock,
  ServiceDirectory,
  LedgerConfig,
  HistoryOverflowPolicy,
  MinterConfig,
  ResolvedMinterConfig,
  MintEvent,
  BurnEvent,
  TransferEvent,
  LedgerEvent,
  LedgerEventType,
  LedgerEventListener,
  LedgerSnapshot,
  InvariantViolation
} from './types.js'

// Constants
export {
  TOKEN_NAME,
  TOKEN_SYMBOL,
  TOKEN_DECIMALS,
  TOKEN_URI,
  FEE_BPS,
  BPS_DENOMINATOR,
  MAX_SUPPLY,
  MAX_PER_PROOF,
  EXPIRY,
  MINT_HISTORY_CAPACITY,
  MIN_TOKEN_AMOUNT,
  MAX_TOKEN_AMOUNT,
  DEFAULT_BLOCK_INTERVAL_MS
} from './constants.js'
