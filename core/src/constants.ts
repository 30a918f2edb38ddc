/**
 * Ledger Constants
 *
 * Fixed parameters of the issuance ledger. Amounts are in base units
 * (see TOKEN_DECIMALS); heights are block counts.
 */

// ---------------------------------------------------------------------------
// Token Metadata
// ---------------------------------------------------------------------------

export const TOKEN_NAME = 'ExcessEnergyToken'

export const TOKEN_SYMBOL = 'EET'

export const TOKEN_DECIMALS = 6

export const TOKEN_URI = 'https://example.com/eet-metadata.json'

// ---------------------------------------------------------------------------
// Issuance Limits
// ---------------------------------------------------------------------------

/** Issuance fee in basis points (100 = 1%) */
export const FEE_BPS = 100

/** Basis-point denominator */
export const BPS_DENOMINATOR = 10000

/** Hard cap on cumulative issuance */
export const MAX_SUPPLY = 1_000_000_000_000

/** Largest net amount a single mint may issue */
export const MAX_PER_PROOF = 1_000_000

/**
 * Number of blocks after attestation during which a proof can back a mint.
 *
 * At ten-minute blocks this is one day.
 */
export const EXPIRY = 144

// ---------------------------------------------------------------------------
// Mint History
// ---------------------------------------------------------------------------

/** Per-account limit on recorded proof ids */
export const MINT_HISTORY_CAPACITY = 100

// ---------------------------------------------------------------------------
// Validation Constants
// ---------------------------------------------------------------------------

/** Maximum allowed amount argument */
export const MAX_TOKEN_AMOUNT = Number.MAX_SAFE_INTEGER

/** Minimum allowed amount argument */
export const MIN_TOKEN_AMOUNT = 1

/** Default block interval used by IntervalHeightClock */
export const DEFAULT_BLOCK_INTERVAL_MS = 10 * 60 * 1000
