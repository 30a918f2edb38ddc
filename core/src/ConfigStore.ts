/**
 * ConfigStore - owner-gated administrative configuration.
 *
 * Holds a single immutable LedgerConfig record. Every command checks the
 * caller against the current owner and, on success, swaps in a new record
 * with one field changed and the version bumped.
 */

import { AuthorizationError, ValidationError, ERROR_CODES } from './errors.js'
import type { LedgerConfig, Principal } from './types.js'
import { validatePrincipal } from './utils.js'

export class ConfigStore {
  private current: LedgerConfig

  constructor(initial: LedgerConfig) {
    this.current = Object.freeze({ ...initial })
  }

  /**
   * Create the first configuration record for a new ledger.
   */
  static initial(owner: Principal, attester: Principal, registry: Principal, feeRecipient: Principal = owner): ConfigStore {
    validatePrincipal(owner, 'owner')
    validatePrincipal(attester, 'attester')
    validatePrincipal(registry, 'registry')
    validatePrincipal(feeRecipient, 'fee recipient')
    return new ConfigStore({
      owner,
      paused: false,
      attester,
      registry,
      feeRecipient,
      version: 0
    })
  }

  get(): LedgerConfig {
    return this.current
  }

  isPaused(): boolean {
    return this.current.paused
  }

  getOwner(): Principal {
    return this.current.owner
  }

  pause(caller: Principal): boolean {
    this.requireOwner(caller)
    this.write({ paused: true })
    return true
  }

  unpause(caller: Principal): boolean {
    this.requireOwner(caller)
    this.write({ paused: false })
    return true
  }

  setFeeRecipient(recipient: Principal, caller: Principal): boolean {
    this.requireOwner(caller)
    validatePrincipal(recipient, 'fee recipient')
    this.write({ feeRecipient: recipient })
    return true
  }

  setAttester(attester: Principal, caller: Principal): boolean {
    this.requireOwner(caller)
    validatePrincipal(attester, 'attester')
    this.write({ attester })
    return true
  }

  setRegistry(registry: Principal, caller: Principal): boolean {
    this.requireOwner(caller)
    validatePrincipal(registry, 'registry')
    this.write({ registry })
    return true
  }

  transferOwnership(newOwner: Principal, caller: Principal): boolean {
    this.requireOwner(caller)
    validatePrincipal(newOwner, 'owner')
    if (newOwner === caller) {
      throw new ValidationError('New owner must differ from the current owner', ERROR_CODES.INVALID_RECIPIENT)
    }
    this.write({ owner: newOwner })
    return true
  }

  private requireOwner(caller: Principal): void {
    if (caller !== this.current.owner) {
      throw new AuthorizationError(`${caller} is not the owner`)
    }
  }

  private write(change: Partial<Omit<LedgerConfig, 'version'>>): void {
    this.current = Object.freeze({
      ...this.current,
      ...change,
      version: this.current.version + 1
    })
  }
}
