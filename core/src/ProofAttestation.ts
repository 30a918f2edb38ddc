/**
 * ProofAttestation - signed proofs and the store that admits them.
 *
 * An attester signs a canonical message describing one proof with its
 * private key. AttestedProofStore only admits proofs whose signature
 * verifies against the attester's public key, and never lets an admitted
 * proof change afterwards.
 */

import { Hash, PrivateKey, PublicKey, Signature, Utils } from '@bsv/sdk'
import type { PubKeyHex } from '@bsv/sdk'

import { ERROR_CODES, ProofError, ValidationError } from './errors.js'
import type { Proof, ProofId, ProofStore } from './types.js'
import { isNonNegativeSafeInteger, isValidProofId } from './utils.js'

/** Prefix that domain-separates proof signatures from other messages */
export const PROOF_MESSAGE_PREFIX = 'gridmint-proof:v1'

/**
 * A proof together with the attester's DER-encoded signature
 */
export interface SignedProof {
  proofId: ProofId
  proof: Proof
  /** DER signature, hex */
  signature: string
}

/**
 * Build the canonical message an attester signs for a proof.
 */
export function proofMessage(proofId: ProofId, proof: Proof): number[] {
  const text = [
    PROOF_MESSAGE_PREFIX,
    String(proofId),
    String(proof.excessOutput),
    String(proof.attestedAt),
    proof.producerId
  ].join('|')
  return Utils.toArray(text, 'utf8')
}

/**
 * SHA-256 of the canonical message, hex
 */
export function proofDigest(proofId: ProofId, proof: Proof): string {
  return Utils.toHex(Hash.sha256(proofMessage(proofId, proof)))
}

/**
 * Sign a proof as the attester.
 */
export function signProof(proofId: ProofId, proof: Proof, attesterKey: PrivateKey): SignedProof {
  const signature = attesterKey.sign(proofMessage(proofId, proof))
  const der = signature.toDER('hex')
  return {
    proofId,
    proof: { ...proof },
    signature: typeof der === 'string' ? der : Utils.toHex(der)
  }
}

/**
 * Check a signed proof against an attester public key.
 *
 * Returns false (never throws) for malformed keys or signatures.
 */
export function verifyProofSignature(signed: SignedProof, attester: PubKeyHex): boolean {
  try {
    const publicKey = PublicKey.fromString(attester)
    const signature = Signature.fromDER(signed.signature, 'hex')
    return publicKey.verify(proofMessage(signed.proofId, signed.proof), signature)
  } catch {
    return false
  }
}

/**
 * Check that a proof's fields are in range.
 *
 * @throws ValidationError naming the first bad field
 */
export function validateProof(proofId: ProofId, proof: Proof): void {
  if (!isValidProofId(proofId)) {
    throw new ValidationError(`Invalid proof id: ${proofId}`, ERROR_CODES.INVALID_PROOF_ID)
  }
  if (!isNonNegativeSafeInteger(proof.excessOutput)) {
    throw new ValidationError(`Invalid excess output: ${proof.excessOutput}`)
  }
  if (!isNonNegativeSafeInteger(proof.attestedAt)) {
    throw new ValidationError(`Invalid attestation height: ${proof.attestedAt}`)
  }
  if (typeof proof.producerId !== 'string' || proof.producerId.length === 0) {
    throw new ValidationError('Proof has no producer')
  }
}

/**
 * In-process ProofStore fed by one attester's signed proofs.
 *
 * @example
 * ```typescript
 * const attesterKey = PrivateKey.fromRandom()
 * const store = new AttestedProofStore(attesterKey.toPublicKey().toString())
 *
 * store.submit(signProof(1, { excessOutput: 1000, attestedAt: 0, producerId }, attesterKey))
 * store.getProof(1) // { excessOutput: 1000, attestedAt: 0, producerId }
 * ```
 */
export class AttestedProofStore implements ProofStore {
  private proofs: Map<ProofId, SignedProof> = new Map()

  constructor(readonly attester: PubKeyHex) {
    // Fail early on a key that can never verify
    PublicKey.fromString(attester)
  }

  /**
   * Admit a signed proof.
   *
   * @throws ValidationError for out-of-range fields
   * @throws ProofError for a bad signature or an id that is already attested
   */
  submit(signed: SignedProof): void {
    validateProof(signed.proofId, signed.proof)
    if (!verifyProofSignature(signed, this.attester)) {
      throw new ProofError(`Proof ${signed.proofId} is not signed by the attester`, ERROR_CODES.INVALID_PROOF_ID)
    }
    if (this.proofs.has(signed.proofId)) {
      throw new ProofError(`Proof ${signed.proofId} is already attested`, ERROR_CODES.INVALID_PROOF_ID)
    }
    this.proofs.set(signed.proofId, {
      proofId: signed.proofId,
      proof: { ...signed.proof },
      signature: signed.signature
    })
  }

  getProof(id: ProofId): Proof | undefined {
    const signed = this.proofs.get(id)
    return signed ? { ...signed.proof } : undefined
  }

  /**
   * The admitted signed proof, for audit
   */
  getAttestation(id: ProofId): SignedProof | undefined {
    const signed = this.proofs.get(id)
    return signed ? { ...signed, proof: { ...signed.proof } } : undefined
  }

  get size(): number {
    return this.proofs.size
  }
}
