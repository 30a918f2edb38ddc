/**
 * Ledger - account balances and the total-supply counter.
 *
 * The ledger does not check roles or the pause flag; the Minter does that
 * before calling in. Every method here validates before it writes, so a
 * thrown error always leaves balances untouched.
 */

import { ERROR_CODES, TransferError, ValidationError } from './errors.js'
import type { Principal } from './types.js'
import { validateAmount, validatePrincipal } from './utils.js'

export class Ledger {
  private balances: Map<Principal, number>
  private supply: number

  constructor(balances: Iterable<[Principal, number]> = [], totalSupply: number = 0) {
    this.balances = new Map()
    for (const [account, amount] of balances) {
      if (amount > 0) {
        this.balances.set(account, amount)
      }
    }
    this.supply = totalSupply
  }

  getBalance(account: Principal): number {
    return this.balances.get(account) ?? 0
  }

  getTotalSupply(): number {
    return this.supply
  }

  /**
   * Create new units in an account.
   */
  credit(account: Principal, amount: number): void {
    this.balances.set(account, this.getBalance(account) + amount)
    this.supply += amount
  }

  /**
   * Destroy units held by an account.
   *
   * @throws TransferError when the balance is short
   */
  burn(account: Principal, amount: number): void {
    validateAmount(amount)
    const balance = this.getBalance(account)
    if (balance < amount) {
      throw new TransferError(`Insufficient balance to burn ${amount}`, ERROR_CODES.BURN_FAILED)
    }
    this.setBalance(account, balance - amount)
    this.supply -= amount
  }

  /**
   * Move units between two accounts. Supply is unchanged.
   *
   * @throws ValidationError for a bad amount or a self-transfer
   * @throws TransferError when the sender's balance is short
   */
  transfer(amount: number, sender: Principal, recipient: Principal): void {
    validateAmount(amount)
    validatePrincipal(recipient, 'recipient')
    if (recipient === sender) {
      throw new ValidationError('Cannot transfer to self', ERROR_CODES.INVALID_RECIPIENT)
    }
    const senderBalance = this.getBalance(sender)
    if (senderBalance < amount) {
      throw new TransferError(`Insufficient balance to transfer ${amount}`)
    }
    this.setBalance(sender, senderBalance - amount)
    this.setBalance(recipient, this.getBalance(recipient) + amount)
  }

  /**
   * Non-zero balances, ordered by account
   */
  entries(): Array<[Principal, number]> {
    return Array.from(this.balances.entries()).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
  }

  private setBalance(account: Principal, amount: number): void {
    if (amount === 0) {
      this.balances.delete(account)
    } else {
      this.balances.set(account, amount)
    }
  }
}
