/**
 * Oracle attestations as EIP-712 typed data.
 *
 * The oracle signs (projectId, submissionId, proofCommitment, verdict,
 * timestamp) under the protocol's domain; the contract recovers the signer
 * and checks it against the authorized oracle set. Binding the submission id
 * keeps an attestation from being replayed against a later resubmission of
 * the same proof.
 */

import {
  type Address,
  type Hex,
  type LocalAccount,
  type TypedDataDomain,
  recoverTypedDataAddress,
} from 'viem'
import type { AttestationMessage, SignedAttestation } from '../types/proof'

export interface AttestationDomain {
  name: string
  version: string
  chainId: number
  verifyingContract: Address
}

export const ATTESTATION_TYPES = {
  Attestation: [
    { name: 'projectId', type: 'uint256' },
    { name: 'submissionId', type: 'uint256' },
    { name: 'proofCommitment', type: 'bytes32' },
    { name: 'verdict', type: 'uint8' },
    { name: 'timestamp', type: 'uint64' },
  ],
} as const

export const DEFAULT_DOMAIN_NAME = 'ImpactEscrowProtocol'
export const DEFAULT_DOMAIN_VERSION = '1'

function toTypedDataDomain(domain: AttestationDomain): TypedDataDomain {
  return {
    name: domain.name,
    version: domain.version,
    chainId: domain.chainId,
    verifyingContract: domain.verifyingContract,
  }
}

function toTypedMessage(message: AttestationMessage) {
  return {
    projectId: BigInt(message.projectId),
    submissionId: BigInt(message.submissionId),
    proofCommitment: message.proofCommitment,
    verdict: message.verdict,
    timestamp: BigInt(message.timestamp),
  }
}

export async function signAttestation(
  account: LocalAccount,
  domain: AttestationDomain,
  message: AttestationMessage,
): Promise<SignedAttestation> {
  const signature: Hex = await account.signTypedData({
    domain: toTypedDataDomain(domain),
    types: ATTESTATION_TYPES,
    primaryType: 'Attestation',
    message: toTypedMessage(message),
  })
  return { ...message, signature }
}

/** Throws on a malformed signature; callers map that to an authorization failure */
export async function recoverAttestationSigner(
  domain: AttestationDomain,
  attestation: SignedAttestation,
): Promise<Address> {
  return recoverTypedDataAddress({
    domain: toTypedDataDomain(domain),
    types: ATTESTATION_TYPES,
    primaryType: 'Attestation',
    message: toTypedMessage(attestation),
    signature: attestation.signature,
  })
}
