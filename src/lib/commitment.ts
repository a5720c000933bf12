/**
 * Impact Escrow Protocol — Commitment Scheme
 *
 * Hiding/binding commitments used for donor anonymity and for proof data.
 * A commitment is keccak256 over the ABI encoding of
 *
 *   (payload kind, 32-byte nonce, identity, payload bytes)
 *
 * Donations commit to the amount, proofs commit to the raw proof bytes.
 * Only the hash ever reaches contract storage.
 */

import { randomBytes } from 'node:crypto'
import {
  type Address,
  type Hex,
  bytesToHex,
  encodeAbiParameters,
  isHex,
  keccak256,
  parseAbiParameters,
  size,
  toHex,
} from 'viem'

export interface CommitmentSecret {
  nonce: Hex                        // 32 random bytes, kept by the committer
  identity: Address                 // Donor or submitter identity
}

export type CommitmentPayload =
  | { kind: 'donation'; amount: bigint }
  | { kind: 'proof'; data: Hex }

const COMMITMENT_PARAMS = parseAbiParameters(
  'string kind, bytes32 nonce, address identity, bytes payload',
)

export function createNonce(): Hex {
  return bytesToHex(randomBytes(32))
}

function encodePayload(payload: CommitmentPayload): Hex {
  if (payload.kind === 'donation') {
    if (payload.amount <= 0n) {
      throw new Error(`Donation commitment amount must be positive, got ${payload.amount}`)
    }
    return toHex(payload.amount, { size: 32 })
  }
  if (!isHex(payload.data)) {
    throw new Error('Proof commitment payload must be hex-encoded bytes')
  }
  return payload.data
}

export function commit(secret: CommitmentSecret, payload: CommitmentPayload): Hex {
  if (!isHex(secret.nonce) || size(secret.nonce) !== 32) {
    throw new Error('Commitment nonce must be 32 bytes')
  }

  return keccak256(
    encodeAbiParameters(COMMITMENT_PARAMS, [
      payload.kind,
      secret.nonce,
      secret.identity,
      encodePayload(payload),
    ]),
  )
}

/**
 * Recompute the commitment for `secret` and `payload` and compare.
 * Malformed secrets open nothing.
 */
export function verifyCommitment(
  commitment: Hex,
  secret: CommitmentSecret,
  payload: CommitmentPayload,
): boolean {
  let recomputed: Hex
  try {
    recomputed = commit(secret, payload)
  } catch {
    return false
  }
  return recomputed.toLowerCase() === commitment.toLowerCase()
}

/** Convenience for donors: fresh nonce plus the resulting commitment */
export function commitDonation(identity: Address, amount: bigint): {
  secret: CommitmentSecret
  commitment: Hex
} {
  const secret: CommitmentSecret = { nonce: createNonce(), identity }
  return { secret, commitment: commit(secret, { kind: 'donation', amount }) }
}

/** Convenience for implementers: commitment over raw proof bytes */
export function commitProof(submitter: Address, data: Hex, salt: Hex = createNonce()): {
  salt: Hex
  commitment: Hex
} {
  return {
    salt,
    commitment: commit({ nonce: salt, identity: submitter }, { kind: 'proof', data }),
  }
}

export function isBytes32(value: string): value is Hex {
  return isHex(value) && size(value) === 32
}
