/**
 * Minter Tests
 *
 * Covers the issuance flow end to end:
 * - Minting, fee skimming and proof capacity
 * - Burns and transfers
 * - Pause gating and owner-gated administration
 * - Events, history overflow and snapshots
 */

import { Minter } from '../Minter.js'
import { configureLogging } from '../logging.js'
import { EXPIRY, MAX_SUPPLY, TOKEN_DECIMALS, TOKEN_NAME, TOKEN_SYMBOL, TOKEN_URI } from '../constants.js'
import {
  AuthorizationError,
  ERROR_CODES,
  ProofError,
  StateError,
  SupplyError,
  TransferError,
  ValidationError
} from '../errors.js'
import type { LedgerEvent, LedgerSnapshot } from '../types.js'
import {
  ATTESTER,
  OTHER_PRODUCER,
  OWNER,
  PRODUCER,
  RECIPIENT,
  REGISTRY,
  createTestLedger,
  sumBalances
} from './fixtures.js'
import type { TestLedger } from './fixtures.js'

function captureError(fn: () => unknown): unknown {
  try {
    fn()
  } catch (error) {
    return error
  }
  throw new Error('Expected operation to throw')
}

describe('Minter', () => {
  let t: TestLedger

  beforeAll(() => {
    configureLogging({ default: false, Minter: false })
  })

  beforeEach(() => {
    t = createTestLedger()
  })

  describe('metadata', () => {
    it('should expose token metadata', () => {
      expect(t.minter.getName()).toBe(TOKEN_NAME)
      expect(t.minter.getSymbol()).toBe(TOKEN_SYMBOL)
      expect(t.minter.getDecimals()).toBe(TOKEN_DECIMALS)
      expect(t.minter.getTokenUri()).toBe(TOKEN_URI)
    })

    it('should start empty', () => {
      expect(t.minter.getBalance(PRODUCER)).toBe(0)
      expect(t.minter.getTotalSupply()).toBe(0)
      expect(t.minter.getTotalMinted()).toBe(0)
      expect(t.minter.isPaused()).toBe(false)
      expect(t.minter.getOwner()).toBe(OWNER)
      expect(t.minter.getMintHistory(PRODUCER)).toEqual([])
    })
  })

  describe('mint', () => {
    it('should mint net of the 1% fee and record the proof', () => {
      t.proofs.add(1, 1000, 0, PRODUCER)

      const net = t.minter.mint(1000, 1, PRODUCER)

      expect(net).toBe(990)
      expect(t.minter.getBalance(PRODUCER)).toBe(990)
      expect(t.minter.getTotalSupply()).toBe(990)
      expect(t.minter.getTotalMinted()).toBe(990)
      expect(t.minter.getMintRecord(1)).toEqual({ cumulativeMinted: 990, lastMintHeight: 0 })
      expect(t.minter.isProofMinted(1)).toBe(true)
      expect(t.minter.getMintableAmount(1)).toBe(10)
      expect(t.minter.getMintHistory(PRODUCER)).toEqual([1])
      expect(t.settlement.transfers).toEqual([{ amount: 10, from: PRODUCER, to: OWNER }])
    })

    it('should reject a second mint that exceeds remaining capacity', () => {
      t.proofs.add(1, 1000, 0, PRODUCER)
      t.minter.mint(1000, 1, PRODUCER)
      t.clock.set(1)
      const before = t.minter.snapshot()

      const error = captureError(() => t.minter.mint(50, 1, PRODUCER))

      expect(error).toBeInstanceOf(ProofError)
      expect(error).toMatchObject({ code: ERROR_CODES.INSUFFICIENT_PROOF })
      expect(t.minter.snapshot()).toEqual(before)
      expect(t.settlement.transfers).toHaveLength(1)
    })

    it('should accumulate capacity across repeated mints against one proof', () => {
      t.proofs.add(1, 1000, 0, PRODUCER)

      expect(t.minter.mint(500, 1, PRODUCER)).toBe(495)
      expect(t.minter.mint(500, 1, PRODUCER)).toBe(495)
      expect(t.minter.getMintableAmount(1)).toBe(10)

      // 20 carries no fee, and only 10 remain
      expect(() => t.minter.mint(20, 1, PRODUCER)).toThrow(ProofError)

      expect(t.minter.mint(10, 1, PRODUCER)).toBe(10)
      expect(t.minter.getMintableAmount(1)).toBe(0)
      expect(t.minter.getMintRecord(1)).toEqual({ cumulativeMinted: 1000, lastMintHeight: 0 })
      expect(t.minter.getMintHistory(PRODUCER)).toEqual([1, 1, 1])
    })

    it('should reject a mint larger than the proof', () => {
      t.proofs.add(1, 1000, 0, PRODUCER)

      const error = captureError(() => t.minter.mint(2000, 1, PRODUCER))

      expect(error).toBeInstanceOf(ProofError)
      expect(t.minter.getBalance(PRODUCER)).toBe(0)
      expect(t.minter.isProofMinted(1)).toBe(false)
    })

    it('should reject an unregistered producer', () => {
      t.proofs.add(1, 1000, 0, PRODUCER)
      t.producers.deregister(PRODUCER)

      const error = captureError(() => t.minter.mint(1000, 1, PRODUCER))

      expect(error).toBeInstanceOf(AuthorizationError)
      expect(error).toMatchObject({ code: ERROR_CODES.NOT_REGISTERED })
    })

    it('should reject a nonexistent proof without changing state', () => {
      const before = t.minter.snapshot()

      const error = captureError(() => t.minter.mint(1000, 999, PRODUCER))

      expect(error).toBeInstanceOf(ProofError)
      expect(error).toMatchObject({ code: ERROR_CODES.INVALID_PROOF_ID })
      expect(t.minter.snapshot()).toEqual(before)
      expect(t.settlement.transfers).toEqual([])
    })

    it('should reject a proof attested for another producer', () => {
      t.producers.register(OTHER_PRODUCER)
      t.proofs.add(1, 1000, 0, PRODUCER)

      const error = captureError(() => t.minter.mint(1000, 1, OTHER_PRODUCER))

      expect(error).toBeInstanceOf(ProofError)
      expect(error).toMatchObject({ code: ERROR_CODES.INSUFFICIENT_PROOF })
    })

    it('should accept a proof exactly EXPIRY blocks old', () => {
      t.proofs.add(1, 1000, 0, PRODUCER)
      t.clock.set(EXPIRY)

      expect(t.minter.mint(1000, 1, PRODUCER)).toBe(990)
      expect(t.minter.getMintRecord(1)).toEqual({ cumulativeMinted: 990, lastMintHeight: EXPIRY })
    })

    it('should reject a proof EXPIRY + 1 blocks old', () => {
      t.proofs.add(1, 1000, 0, PRODUCER)
      t.clock.set(EXPIRY + 1)

      expect(() => t.minter.mint(1000, 1, PRODUCER)).toThrow(ProofError)
      expect(t.minter.getMintableAmount(1)).toBe(1000)
    })

    it('should never mint zero tokens', () => {
      t.proofs.add(1, 1000, 0, PRODUCER)

      const error = captureError(() => t.minter.mint(0, 1, PRODUCER))

      expect(error).toBeInstanceOf(ValidationError)
      expect(error).toMatchObject({ code: ERROR_CODES.ZERO_AMOUNT })
      expect(t.minter.getTotalSupply()).toBe(0)
      expect(t.minter.isProofMinted(1)).toBe(false)
    })

    it('should reject a malformed amount', () => {
      t.proofs.add(1, 1000, 0, PRODUCER)

      expect(() => t.minter.mint(1.5, 1, PRODUCER)).toThrow(ValidationError)
      expect(() => t.minter.mint(-10, 1, PRODUCER)).toThrow(ValidationError)
    })

    it('should enforce the per-proof limit on net amount', () => {
      t.proofs.add(1, 2_000_000, 0, PRODUCER)

      // fee 10101, net exactly 1,000,000
      expect(t.minter.mint(1_010_101, 1, PRODUCER)).toBe(1_000_000)

      t.proofs.add(2, 2_000_000, 0, PRODUCER)
      // fee 10200, net 1,009,800
      expect(() => t.minter.mint(1_020_000, 2, PRODUCER)).toThrow(ProofError)
    })

    it('should enforce the max supply against cumulative issuance', () => {
      const snapshot: LedgerSnapshot = {
        config: { owner: OWNER, paused: false, attester: ATTESTER, registry: REGISTRY, feeRecipient: OWNER, version: 0 },
        balances: [],
        totalSupply: 0,
        totalMinted: MAX_SUPPLY - 5,
        mintRecords: [],
        histories: []
      }
      t = createTestLedger({ snapshot })
      t.proofs.add(1, 1000, 0, PRODUCER)

      const error = captureError(() => t.minter.mint(10, 1, PRODUCER))
      expect(error).toBeInstanceOf(SupplyError)
      expect(error).toMatchObject({ code: ERROR_CODES.SUPPLY_EXCEEDED })

      expect(t.minter.mint(5, 1, PRODUCER)).toBe(5)
      expect(t.minter.getTotalMinted()).toBe(MAX_SUPPLY)
    })

    it('should skip settlement when the fee rounds to zero', () => {
      t.proofs.add(1, 1000, 0, PRODUCER)

      expect(t.minter.mint(99, 1, PRODUCER)).toBe(99)
      expect(t.settlement.transfers).toEqual([])
    })

    it('should abort when the fee cannot be settled', () => {
      t.proofs.add(1, 1000, 0, PRODUCER)
      t.settlement.failWith = new Error('rail offline')
      const before = t.minter.snapshot()

      const error = captureError(() => t.minter.mint(1000, 1, PRODUCER))

      expect(error).toBeInstanceOf(TransferError)
      expect(error).toMatchObject({ message: 'Fee settlement failed: rail offline' })
      expect(t.minter.snapshot()).toEqual(before)
    })
  })

  describe('burn', () => {
    beforeEach(() => {
      t.proofs.add(1, 1000, 0, PRODUCER)
      t.minter.mint(1000, 1, PRODUCER)
    })

    it('should burn from the caller and reduce supply', () => {
      expect(t.minter.burn(500, PRODUCER)).toBe(500)
      expect(t.minter.getBalance(PRODUCER)).toBe(490)
      expect(t.minter.getTotalSupply()).toBe(490)
      expect(t.minter.getTotalMinted()).toBe(990)
    })

    it('should not free proof capacity', () => {
      t.minter.burn(990, PRODUCER)

      expect(t.minter.getMintableAmount(1)).toBe(10)
      expect(t.minter.getMintRecord(1)).toEqual({ cumulativeMinted: 990, lastMintHeight: 0 })
    })

    it('should reject a zero amount', () => {
      const error = captureError(() => t.minter.burn(0, PRODUCER))

      expect(error).toBeInstanceOf(ValidationError)
      expect(error).toMatchObject({ code: ERROR_CODES.ZERO_AMOUNT })
    })

    it('should reject burning more than the balance', () => {
      const error = captureError(() => t.minter.burn(1000, PRODUCER))

      expect(error).toBeInstanceOf(TransferError)
      expect(error).toMatchObject({ code: ERROR_CODES.BURN_FAILED })
      expect(t.minter.getBalance(PRODUCER)).toBe(990)
    })
  })

  describe('transfer', () => {
    beforeEach(() => {
      t.proofs.add(1, 1000, 0, PRODUCER)
      t.minter.mint(1000, 1, PRODUCER)
    })

    it('should move tokens between accounts', () => {
      expect(t.minter.transfer(500, PRODUCER, RECIPIENT, PRODUCER)).toBe(true)
      expect(t.minter.getBalance(PRODUCER)).toBe(490)
      expect(t.minter.getBalance(RECIPIENT)).toBe(500)
      expect(t.minter.getTotalSupply()).toBe(990)
    })

    it('should reject a caller that is not the sender', () => {
      expect(() => t.minter.transfer(500, PRODUCER, RECIPIENT, RECIPIENT)).toThrow(AuthorizationError)
    })

    it('should reject a transfer to self', () => {
      const error = captureError(() => t.minter.transfer(500, PRODUCER, PRODUCER, PRODUCER))

      expect(error).toBeInstanceOf(ValidationError)
      expect(error).toMatchObject({ code: ERROR_CODES.INVALID_RECIPIENT })
    })

    it('should reject a zero amount', () => {
      expect(() => t.minter.transfer(0, PRODUCER, RECIPIENT, PRODUCER)).toThrow(ValidationError)
    })

    it('should reject a transfer exceeding the balance', () => {
      const error = captureError(() => t.minter.transfer(1000, PRODUCER, RECIPIENT, PRODUCER))

      expect(error).toBeInstanceOf(TransferError)
      expect(error).toMatchObject({ code: ERROR_CODES.TRANSFER_FAILED })
      expect(t.minter.getBalance(RECIPIENT)).toBe(0)
    })
  })

  describe('pause', () => {
    beforeEach(() => {
      t.proofs.add(1, 1000, 0, PRODUCER)
      t.proofs.add(2, 1000, 0, PRODUCER)
      t.minter.mint(1000, 1, PRODUCER)
    })

    it('should block every balance-changing operation while paused', () => {
      expect(t.minter.pause(OWNER)).toBe(true)
      expect(t.minter.isPaused()).toBe(true)

      const mintError = captureError(() => t.minter.mint(1000, 2, PRODUCER))
      expect(mintError).toBeInstanceOf(StateError)
      expect(mintError).toMatchObject({ code: ERROR_CODES.PAUSED })
      expect(() => t.minter.burn(10, PRODUCER)).toThrow(StateError)
      expect(() => t.minter.transfer(10, PRODUCER, RECIPIENT, PRODUCER)).toThrow(StateError)
      expect(t.minter.getBalance(PRODUCER)).toBe(990)
    })

    it('should restore minting after unpause', () => {
      t.minter.pause(OWNER)
      expect(t.minter.unpause(OWNER)).toBe(true)

      expect(t.minter.mint(1000, 2, PRODUCER)).toBe(990)
      expect(t.minter.getBalance(PRODUCER)).toBe(1980)
    })

    it('should reject pause and unpause by a non-owner', () => {
      expect(() => t.minter.pause(PRODUCER)).toThrow(AuthorizationError)
      t.minter.pause(OWNER)
      expect(() => t.minter.unpause(PRODUCER)).toThrow(AuthorizationError)
      expect(t.minter.isPaused()).toBe(true)
    })
  })

  describe('administration', () => {
    it('should transfer ownership and require the new owner afterwards', () => {
      expect(t.minter.transferOwnership('owner-2', OWNER)).toBe(true)
      expect(t.minter.getOwner()).toBe('owner-2')

      expect(() => t.minter.pause(OWNER)).toThrow(AuthorizationError)
      expect(t.minter.pause('owner-2')).toBe(true)
    })

    it('should reject ownership transfer to self', () => {
      const error = captureError(() => t.minter.transferOwnership(OWNER, OWNER))

      expect(error).toBeInstanceOf(ValidationError)
      expect(t.minter.getOwner()).toBe(OWNER)
    })

    it('should reject ownership transfer by a non-owner', () => {
      expect(() => t.minter.transferOwnership('owner-2', PRODUCER)).toThrow(AuthorizationError)
      expect(t.minter.getOwner()).toBe(OWNER)
    })

    it('should send later fees to a new fee recipient', () => {
      t.proofs.add(1, 1000, 0, PRODUCER)
      expect(t.minter.setFeeRecipient('treasury-1', OWNER)).toBe(true)

      t.minter.mint(1000, 1, PRODUCER)

      expect(t.settlement.transfers).toEqual([{ amount: 10, from: PRODUCER, to: 'treasury-1' }])
    })

    it('should consult the proof store of the configured attester', () => {
      t.proofs.add(1, 1000, 0, PRODUCER)
      expect(t.minter.setAttester('attester-2', OWNER)).toBe(true)

      const error = captureError(() => t.minter.mint(1000, 1, PRODUCER))
      expect(error).toMatchObject({ code: ERROR_CODES.INVALID_PROOF_ID })
      expect(() => t.minter.getMintableAmount(1)).toThrow(ProofError)
      expect(t.minter.getConfig().attester).toBe('attester-2')
    })

    it('should consult the producer registry at the configured address', () => {
      t.proofs.add(1, 1000, 0, PRODUCER)
      expect(t.minter.setRegistry('registry-2', OWNER)).toBe(true)

      const error = captureError(() => t.minter.mint(1000, 1, PRODUCER))
      expect(error).toBeInstanceOf(AuthorizationError)
      expect(error).toMatchObject({ code: ERROR_CODES.NOT_REGISTERED })
    })

    it('should reject every setter for a non-owner', () => {
      expect(() => t.minter.setFeeRecipient('x', PRODUCER)).toThrow(AuthorizationError)
      expect(() => t.minter.setAttester('x', PRODUCER)).toThrow(AuthorizationError)
      expect(() => t.minter.setRegistry('x', PRODUCER)).toThrow(AuthorizationError)
      expect(t.minter.getConfig().version).toBe(0)
    })
  })

  describe('events', () => {
    it('should emit mint, transfer and burn events in order', () => {
      const events: LedgerEvent[] = []
      t.minter.subscribe(event => events.push(event))
      t.proofs.add(1, 1000, 0, PRODUCER)

      t.minter.mint(1000, 1, PRODUCER)
      t.minter.transfer(100, PRODUCER, RECIPIENT, PRODUCER)
      t.minter.burn(50, RECIPIENT)

      expect(events).toEqual([
        { type: 'mint', net: 990, fee: 10, proofId: 1, minter: PRODUCER, height: 0 },
        { type: 'transfer', amount: 100, from: PRODUCER, to: RECIPIENT },
        { type: 'burn', amount: 50, burner: RECIPIENT }
      ])
    })

    it('should not emit for a rejected operation', () => {
      const listener = jest.fn()
      t.minter.subscribe(listener)

      expect(() => t.minter.burn(10, PRODUCER)).toThrow(TransferError)
      expect(listener).not.toHaveBeenCalled()
    })

    it('should stop delivering after unsubscribe', () => {
      const listener = jest.fn()
      const unsubscribe = t.minter.subscribe(listener)
      t.proofs.add(1, 1000, 0, PRODUCER)

      unsubscribe()
      t.minter.mint(1000, 1, PRODUCER)

      expect(listener).not.toHaveBeenCalled()
    })

    it('should commit even when a listener throws', () => {
      const errorSpy = jest.spyOn(console, 'error').mockImplementation(() => {})
      t.minter.subscribe(() => {
        throw new Error('listener broke')
      })
      t.proofs.add(1, 1000, 0, PRODUCER)

      expect(t.minter.mint(1000, 1, PRODUCER)).toBe(990)
      expect(errorSpy).toHaveBeenCalledTimes(1)
      errorSpy.mockRestore()
    })
  })

  describe('mint history', () => {
    it('should reject a mint once a full history uses the reject policy', () => {
      t = createTestLedger({ historyCapacity: 2, historyOverflow: 'reject' })
      t.proofs.add(1, 100, 0, PRODUCER)
      t.proofs.add(2, 100, 0, PRODUCER)
      t.proofs.add(3, 100, 0, PRODUCER)
      t.minter.mint(10, 1, PRODUCER)
      t.minter.mint(10, 2, PRODUCER)

      expect(() => t.minter.mint(10, 3, PRODUCER)).toThrow(ValidationError)
      expect(t.minter.isProofMinted(3)).toBe(false)
      expect(t.minter.getBalance(PRODUCER)).toBe(20)
    })

    it('should evict the oldest entry with the drop-oldest policy', () => {
      t = createTestLedger({ historyCapacity: 2, historyOverflow: 'drop-oldest' })
      t.proofs.add(1, 100, 0, PRODUCER)
      t.proofs.add(2, 100, 0, PRODUCER)
      t.proofs.add(3, 100, 0, PRODUCER)
      t.minter.mint(10, 1, PRODUCER)
      t.minter.mint(10, 2, PRODUCER)
      t.minter.mint(10, 3, PRODUCER)

      expect(t.minter.getMintHistory(PRODUCER)).toEqual([2, 3])
      expect(t.minter.isProofMinted(1)).toBe(true)
    })
  })

  describe('invariants', () => {
    it('should keep the sum of balances equal to total supply', () => {
      t.producers.register(OTHER_PRODUCER)
      t.proofs.add(1, 5000, 0, PRODUCER)
      t.proofs.add(2, 5000, 0, OTHER_PRODUCER)

      const steps: Array<() => unknown> = [
        () => t.minter.mint(3000, 1, PRODUCER),
        () => t.minter.mint(2000, 2, OTHER_PRODUCER),
        () => t.minter.transfer(700, PRODUCER, RECIPIENT, PRODUCER),
        () => t.minter.burn(300, OTHER_PRODUCER),
        () => t.minter.transfer(700, RECIPIENT, OTHER_PRODUCER, RECIPIENT),
        () => t.minter.mint(2000, 1, PRODUCER)
      ]
      for (const step of steps) {
        step()
        const snapshot = t.minter.snapshot()
        expect(sumBalances(snapshot)).toBe(snapshot.totalSupply)
      }

      // 2970 + 1980 - 300 + 1980
      expect(t.minter.getTotalSupply()).toBe(6630)
      expect(t.minter.getMintableAmount(1)).toBe(50)
    })
  })

  describe('snapshot', () => {
    it('should restore a ledger that reads the same', () => {
      t.proofs.add(1, 1000, 0, PRODUCER)
      t.minter.mint(1000, 1, PRODUCER)
      t.minter.transfer(90, PRODUCER, RECIPIENT, PRODUCER)
      t.minter.setFeeRecipient('treasury-1', OWNER)
      const snapshot = t.minter.snapshot()

      const restored = Minter.restore(JSON.parse(JSON.stringify(snapshot)), {
        owner: 'ignored',
        attester: 'ignored',
        registry: 'ignored',
        proofStores: new Map([[ATTESTER, t.proofs]]),
        registries: new Map([[REGISTRY, t.producers]]),
        settlement: t.settlement,
        clock: t.clock
      })

      expect(restored.snapshot()).toEqual(snapshot)
      expect(restored.getBalance(PRODUCER)).toBe(900)
      expect(restored.getBalance(RECIPIENT)).toBe(90)
      expect(restored.getOwner()).toBe(OWNER)
      expect(restored.getConfig().feeRecipient).toBe('treasury-1')
      expect(restored.getMintableAmount(1)).toBe(10)
    })

    it('should refuse a snapshot whose balances do not add up', () => {
      t.proofs.add(1, 1000, 0, PRODUCER)
      t.minter.mint(1000, 1, PRODUCER)
      const snapshot = { ...t.minter.snapshot(), totalSupply: 1000 }

      expect(() => Minter.restore(snapshot, {
        owner: OWNER,
        attester: ATTESTER,
        registry: REGISTRY,
        proofStores: new Map([[ATTESTER, t.proofs]]),
        registries: new Map([[REGISTRY, t.producers]]),
        settlement: t.settlement,
        clock: t.clock
      })).toThrow('Cannot restore ledger: [supply-balance] sum of balances 990 does not equal total supply 1000')
    })

    describe('with a smaller history capacity', () => {
      let snapshot: LedgerSnapshot

      beforeEach(() => {
        t.proofs.add(1, 100, 0, PRODUCER)
        t.proofs.add(2, 100, 0, PRODUCER)
        t.proofs.add(3, 100, 0, PRODUCER)
        t.minter.mint(10, 1, PRODUCER)
        t.minter.mint(10, 2, PRODUCER)
        t.minter.mint(10, 3, PRODUCER)
        snapshot = t.minter.snapshot()
      })

      const restoreWith = (historyOverflow: 'reject' | 'drop-oldest'): Minter => Minter.restore(snapshot, {
        owner: OWNER,
        attester: ATTESTER,
        registry: REGISTRY,
        proofStores: new Map([[ATTESTER, t.proofs]]),
        registries: new Map([[REGISTRY, t.producers]]),
        settlement: t.settlement,
        clock: t.clock,
        historyCapacity: 2,
        historyOverflow
      })

      it('should refuse the snapshot under the reject policy', () => {
        expect(() => restoreWith('reject')).toThrow(
          'Cannot restore ledger: [history-capacity] mint history of producer-1 holds 3 entries, capacity is 2'
        )
      })

      it('should keep the newest entries under the drop-oldest policy', () => {
        expect(restoreWith('drop-oldest').getMintHistory(PRODUCER)).toEqual([2, 3])
      })
    })
  })
})
