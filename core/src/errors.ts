/**
 * Error taxonomy for ledger operations.
 *
 * Every rejected operation throws one of these. Codes are stable and are
 * what the hosting layer reports to callers.
 */

export const ERROR_CODES = {
  NOT_REGISTERED: 200,
  INSUFFICIENT_PROOF: 201,
  INVALID_AMOUNT: 202,
  NOT_AUTHORIZED: 204,
  SUPPLY_EXCEEDED: 205,
  PAUSED: 206,
  INVALID_PROOF_ID: 207,
  BURN_FAILED: 208,
  TRANSFER_FAILED: 209,
  INVALID_RECIPIENT: 211,
  ZERO_AMOUNT: 212
} as const

export type ErrorCode = (typeof ERROR_CODES)[keyof typeof ERROR_CODES]

export type MinterErrorKind =
  | 'AuthorizationError'
  | 'ValidationError'
  | 'ProofError'
  | 'SupplyError'
  | 'StateError'
  | 'TransferError'

/**
 * Base class for all rejected-operation outcomes.
 */
export abstract class MinterError extends Error {
  abstract readonly kind: MinterErrorKind
  readonly code: ErrorCode

  constructor(message: string, code: ErrorCode) {
    super(message)
    this.code = code
    this.name = new.target.name
  }
}

/** Missing role or ownership */
export class AuthorizationError extends MinterError {
  readonly kind = 'AuthorizationError'

  constructor(message = 'not authorized', code: ErrorCode = ERROR_CODES.NOT_AUTHORIZED) {
    super(message, code)
  }
}

/** Malformed, zero or out-of-range argument */
export class ValidationError extends MinterError {
  readonly kind = 'ValidationError'

  constructor(message = 'invalid amount', code: ErrorCode = ERROR_CODES.INVALID_AMOUNT) {
    super(message, code)
  }
}

/** Missing, expired or exhausted claim */
export class ProofError extends MinterError {
  readonly kind = 'ProofError'

  constructor(message = 'insufficient proof', code: ErrorCode = ERROR_CODES.INSUFFICIENT_PROOF) {
    super(message, code)
  }
}

/** Issuance would pass the supply cap */
export class SupplyError extends MinterError {
  readonly kind = 'SupplyError'

  constructor(message = 'max supply exceeded') {
    super(message, ERROR_CODES.SUPPLY_EXCEEDED)
  }
}

/** Operation blocked by the pause flag */
export class StateError extends MinterError {
  readonly kind = 'StateError'

  constructor(message = 'ledger is paused') {
    super(message, ERROR_CODES.PAUSED)
  }
}

/** Insufficient balance, or the fee could not be settled */
export class TransferError extends MinterError {
  readonly kind = 'TransferError'

  constructor(message = 'insufficient balance', code: ErrorCode = ERROR_CODES.TRANSFER_FAILED) {
    super(message, code)
  }
}

export function isMinterError(error: unknown): error is MinterError {
  return error instanceof MinterError
}

/**
 * Turn any thrown value into a short message for display.
 */
export const formatMinterError = (error: unknown, fallback: string = 'Something went wrong!'): string => {
  if (isMinterError(error)) {
    return `${error.kind} (${error.code}): ${error.message}`
  }
  const rawMessage = error instanceof Error ? error.message : String(error ?? '')
  if (!rawMessage) return fallback

  const lower = rawMessage.toLowerCase()
  if (lower.includes('timeout')) {
    return 'Request timed out. Please try again.'
  }
  if (lower.includes('econnrefused') || lower.includes('network')) {
    return 'Storage is unreachable. Please try again.'
  }

  return rawMessage.length < 120 && !rawMessage.includes('{') ? rawMessage : fallback
}
