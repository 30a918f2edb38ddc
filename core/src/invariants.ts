import { MAX_SUPPLY } from './constants.js'
import type { InvariantViolation, LedgerSnapshot, Proof, ProofId } from './types.js'
import { isNonNegativeSafeInteger } from './utils.js'

/**
 * Check a snapshot against the ledger's invariants.
 *
 * Proof capacity can only be checked when a proof lookup is supplied, and
 * history length only when a capacity is. Returns every violation found;
 * an empty list means the snapshot is sound.
 */
export function checkInvariants(
  snapshot: LedgerSnapshot,
  lookupProof?: (id: ProofId) => Proof | undefined,
  historyCapacity?: number
): InvariantViolation[] {
  const violations: InvariantViolation[] = []

  if (!isNonNegativeSafeInteger(snapshot.totalSupply)) {
    violations.push({ invariant: 'shape', message: `totalSupply is not a non-negative integer: ${snapshot.totalSupply}` })
  }
  if (!isNonNegativeSafeInteger(snapshot.totalMinted)) {
    violations.push({ invariant: 'shape', message: `totalMinted is not a non-negative integer: ${snapshot.totalMinted}` })
  }

  let balanceSum = 0
  const seen = new Set<string>()
  for (const [account, balance] of snapshot.balances) {
    if (seen.has(account)) {
      violations.push({ invariant: 'shape', message: `duplicate balance entry for ${account}` })
    }
    seen.add(account)
    if (!isNonNegativeSafeInteger(balance)) {
      violations.push({ invariant: 'shape', message: `balance of ${account} is not a non-negative integer: ${balance}` })
      continue
    }
    balanceSum += balance
  }

  if (balanceSum !== snapshot.totalSupply) {
    violations.push({
      invariant: 'supply-balance',
      message: `sum of balances ${balanceSum} does not equal total supply ${snapshot.totalSupply}`
    })
  }
  if (snapshot.totalMinted > MAX_SUPPLY) {
    violations.push({ invariant: 'supply-cap', message: `total minted ${snapshot.totalMinted} exceeds ${MAX_SUPPLY}` })
  }
  if (snapshot.totalSupply > snapshot.totalMinted) {
    violations.push({
      invariant: 'supply-cap',
      message: `total supply ${snapshot.totalSupply} exceeds total minted ${snapshot.totalMinted}`
    })
  }

  for (const [proofId, record] of snapshot.mintRecords) {
    if (!isNonNegativeSafeInteger(record.cumulativeMinted) || !isNonNegativeSafeInteger(record.lastMintHeight)) {
      violations.push({ invariant: 'shape', message: `mint record ${proofId} is malformed` })
      continue
    }
    if (lookupProof === undefined) continue
    const proof = lookupProof(proofId)
    if (proof === undefined) {
      violations.push({ invariant: 'proof-capacity', message: `mint record ${proofId} has no proof` })
    } else if (record.cumulativeMinted > proof.excessOutput) {
      violations.push({
        invariant: 'proof-capacity',
        message: `proof ${proofId} minted ${record.cumulativeMinted} of ${proof.excessOutput}`
      })
    }
  }

  if (historyCapacity !== undefined) {
    for (const [account, proofIds] of snapshot.histories) {
      if (proofIds.length > historyCapacity) {
        violations.push({
          invariant: 'history-capacity',
          message: `mint history of ${account} holds ${proofIds.length} entries, capacity is ${historyCapacity}`
        })
      }
    }
  }

  return violations
}
