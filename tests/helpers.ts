import { type Address, type Hex, type LocalAccount, keccak256, toHex } from 'viem'
import { generatePrivateKey, privateKeyToAccount } from 'viem/accounts'
import { LedgerHost } from '../src/contract/host'
import { AssetLedger } from '../src/contract/asset-ledger'
import { ImpactEscrowProtocol } from '../src/contract/protocol'
import { protocolConfigSchema } from '../src/lib/config'
import { hashProofSchema } from '../src/lib/proof-schema'
import { commitDonation, commitProof, type CommitmentSecret } from '../src/lib/commitment'
import { signAttestation } from '../src/lib/attestation'
import { Role } from '../src/types/access'
import type { Donation, Project } from '../src/types/project'
import type { ProofSchema, ProofSubmission, Verdict } from '../src/types/proof'

// Digit-only addresses are already in checksum form
export const ADMIN: Address = '0x1000000000000000000000000000000000000001'
export const MANAGER: Address = '0x1000000000000000000000000000000000000002'
export const IMPLEMENTER: Address = '0x1000000000000000000000000000000000000003'
export const DONOR_A: Address = '0x1000000000000000000000000000000000000004'
export const DONOR_B: Address = '0x1000000000000000000000000000000000000005'
export const STRANGER: Address = '0x1000000000000000000000000000000000000006'
export const TREASURY: Address = '0x1000000000000000000000000000000000000007'
export const AUDITOR: Address = '0x1000000000000000000000000000000000000008'
export const ESCROW: Address = '0x9000000000000000000000000000000000000009'

export const START = 1_700_000_000
export const DAY = 86_400
export const CHAIN_ID = 31337

export const RAW_PROOF: Hex = toHex('borehole 7 commissioned')
export const DIGEST_SCHEMA: ProofSchema = { type: 'digest-match', version: 1, expectedDigest: keccak256(RAW_PROOF) }

export interface Fixture {
  host: LedgerHost
  asset: AssetLedger
  protocol: ImpactEscrowProtocol
  oracle: LocalAccount
}

export function newAccount(): LocalAccount {
  return privateKeyToAccount(generatePrivateKey())
}

/** Fresh ledger with the escrow initialized, a project manager and one oracle */
export function createFixture(): Fixture {
  const host = new LedgerHost({ timestamp: START })
  const asset = new AssetLedger(host)
  const protocol = new ImpactEscrowProtocol(host, {
    config: protocolConfigSchema.parse({ address: ESCROW, chainId: CHAIN_ID }),
  })
  const oracle = newAccount()

  protocol.init(ADMIN)
  protocol.grantRole(ADMIN, MANAGER, Role.PROJECT_MANAGER)
  protocol.grantRole(ADMIN, oracle.address, Role.ORACLE)
  return { host, asset, protocol, oracle }
}

export function registerProject(
  { host, protocol }: Fixture,
  options: { target?: bigint; deadlineIn?: number; schema?: ProofSchema } = {},
): Project {
  return protocol.registerProject(MANAGER, {
    target: options.target ?? 1_000n,
    deadline: host.now() + (options.deadlineIn ?? 30 * DAY),
    proofSchemaHash: hashProofSchema(options.schema ?? DIGEST_SCHEMA),
    implementer: IMPLEMENTER,
  })
}

export function donate(
  { asset, protocol }: Fixture,
  donor: Address,
  projectId: number,
  amount: bigint,
): { donation: Donation; secret: CommitmentSecret } {
  asset.mint(donor, amount)
  const { secret, commitment } = commitDonation(donor, amount)
  return { donation: protocol.deposit(donor, projectId, amount, commitment), secret }
}

export function submit(
  { protocol }: Fixture,
  projectId: number,
  data: Hex = RAW_PROOF,
): { submission: ProofSubmission; salt: Hex } {
  const { salt, commitment } = commitProof(IMPLEMENTER, data)
  return { submission: protocol.submitProof(IMPLEMENTER, projectId, commitment), salt }
}

export async function attest(
  { host, protocol }: Fixture,
  signer: LocalAccount,
  submission: ProofSubmission,
  verdict: Verdict,
) {
  const attestation = await signAttestation(signer, protocol.domain, {
    projectId: submission.projectId,
    submissionId: submission.id,
    proofCommitment: submission.commitment,
    verdict,
    timestamp: host.now(),
  })
  return protocol.applyVerification(signer.address, attestation)
}
