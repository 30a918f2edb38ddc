/**
 * Utility functions for the issuance ledger
 */

import { BPS_DENOMINATOR, FEE_BPS, MAX_TOKEN_AMOUNT, MIN_TOKEN_AMOUNT } from './constants.js'
import { ERROR_CODES, ValidationError } from './errors.js'
import type { Principal } from './types.js'

/**
 * Split a gross amount into fee and net.
 *
 * Computes floor(amount * feeBps / 10000) without forming the product, so
 * the result is exact for every safe integer.
 *
 * @param amount - Gross amount (non-negative safe integer)
 * @param feeBps - Fee rate in basis points
 */
export function splitFee(amount: number, feeBps: number = FEE_BPS): { fee: number, net: number } {
  const whole = Math.floor(amount / BPS_DENOMINATOR)
  const remainder = amount % BPS_DENOMINATOR
  const fee = whole * feeBps + Math.floor((remainder * feeBps) / BPS_DENOMINATOR)
  return { fee, net: amount - fee }
}

/**
 * Check that an amount argument is a positive safe integer.
 *
 * @throws ValidationError (ZERO_AMOUNT for 0 or less, INVALID_AMOUNT otherwise)
 */
export function validateAmount(amount: number): void {
  if (!Number.isFinite(amount) || !Number.isInteger(amount)) {
    throw new ValidationError('Amount must be an integer', ERROR_CODES.INVALID_AMOUNT)
  }
  if (amount < MIN_TOKEN_AMOUNT) {
    throw new ValidationError(`Amount must be at least ${MIN_TOKEN_AMOUNT}`, ERROR_CODES.ZERO_AMOUNT)
  }
  if (amount > MAX_TOKEN_AMOUNT) {
    throw new ValidationError(`Amount must not exceed ${MAX_TOKEN_AMOUNT}`, ERROR_CODES.INVALID_AMOUNT)
  }
}

/**
 * Check that an address argument is a non-empty string.
 */
export function validatePrincipal(principal: Principal, label: string = 'address'): void {
  if (typeof principal !== 'string' || principal.trim().length === 0) {
    throw new ValidationError(`Invalid ${label}`, ERROR_CODES.INVALID_RECIPIENT)
  }
}

/**
 * Check that a proof id is a non-negative safe integer.
 */
export function isValidProofId(proofId: number): boolean {
  return Number.isSafeInteger(proofId) && proofId >= 0
}

export function isNonNegativeSafeInteger(value: unknown): value is number {
  return typeof value === 'number' && Number.isSafeInteger(value) && value >= 0
}
