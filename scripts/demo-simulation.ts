/**
 * End-to-End Demo Simulation
 *
 * Runs the full Impact Escrow Protocol lifecycle against an in-process ledger:
 *
 *   1. Initialize roles (super admin, project manager, oracle) and the fee
 *   2. Register a project committed to a digest-match proof schema
 *   3. Two donors deposit under commitments → project becomes Active
 *   4. Implementer commits to the raw proof and submits the commitment
 *   5. Oracle picks the raw proof off the intake queue, verifies, attests
 *      → escrow released to the implementer
 *   6. A second project misses its target and deadline → donors refund
 *      by revealing their commitment secrets
 *
 * Usage:
 *   npm run demo
 *
 * Uses config/oracle.config.json when present; a throwaway oracle key is
 * generated unless ORACLE_PRIVATE_KEY or config/secrets.json provides one.
 */

import { type Hex, keccak256, toHex } from 'viem'
import { generatePrivateKey, privateKeyToAccount } from 'viem/accounts'
import { Role } from '../src/types/access'
import { PROJECT_STATUS_LABELS } from '../src/types/project'
import type { ProofSchema } from '../src/types/proof'
import { commitDonation, commitProof } from '../src/lib/commitment'
import { hashProofSchema } from '../src/lib/proof-schema'
import { ProofIntakeQueue } from '../src/workflows/intake-queue'
import { LocalChainGateway, ProofOracle } from '../src/workflows/proof-oracle'
import { banner, bootstrapRoles, getLocalNetwork, info, printNetworkBanner, short, step } from './lib/network'

const DAY = 86_400

async function main() {
  const network = getLocalNetwork({
    ORACLE_PRIVATE_KEY: generatePrivateKey(),
    CHAIN_ID: '31337',
    ...process.env,
  })
  const { host, asset, protocol } = network
  printNetworkBanner(network, 'E2E Demo Simulation')

  const admin = privateKeyToAccount(generatePrivateKey())
  const manager = privateKeyToAccount(generatePrivateKey())
  const implementer = privateKeyToAccount(generatePrivateKey())
  const treasury = privateKeyToAccount(generatePrivateKey())
  const donor1 = privateKeyToAccount(generatePrivateKey())
  const donor2 = privateKeyToAccount(generatePrivateKey())

  info('Super admin', admin.address)
  info('Project manager', manager.address)
  info('Implementer', implementer.address)
  info('Donor 1', donor1.address)
  info('Donor 2', donor2.address)

  // =========================================================================
  // Step 1: Roles + fee
  // =========================================================================

  step(1, 'Initializing access control...')

  bootstrapRoles(network, admin.address)
  protocol.grantRole(admin.address, manager.address, Role.PROJECT_MANAGER)
  protocol.setProtocolFee(admin.address, 250, treasury.address)

  info('Oracle set', protocol.authorizedOracles().map(short).join(', '))
  info('Oracle set version', protocol.oracleSetVersion())
  info('Protocol fee', '2.5%')

  // =========================================================================
  // Step 2: Register project
  // =========================================================================

  step(2, 'Registering project with a digest-match proof schema...')

  const rawProof: Hex = toHex('Well #7 drilled and commissioned; flow test 1200 L/h')
  const schema: ProofSchema = { type: 'digest-match', version: 1, expectedDigest: keccak256(rawProof) }

  const project = protocol.registerProject(manager.address, {
    target: 1_000n,
    deadline: host.now() + 30 * DAY,
    proofSchemaHash: hashProofSchema(schema),
    implementer: implementer.address,
  })
  info('Project ID', project.id)
  info('Target', `${project.target}`)
  info('Schema hash', `${project.proofSchemaHash.slice(0, 18)}...`)

  // =========================================================================
  // Step 3: Donations
  // =========================================================================

  step(3, 'Donors deposit under commitments...')

  asset.mint(donor1.address, 600n)
  asset.mint(donor2.address, 400n)

  const gift1 = commitDonation(donor1.address, 600n)
  const gift2 = commitDonation(donor2.address, 400n)
  protocol.deposit(donor1.address, project.id, 600n, gift1.commitment)
  protocol.deposit(donor2.address, project.id, 400n, gift2.commitment)

  const funded = protocol.getProject(project.id)
  info('Funded', `${funded.funded} / ${funded.target}`)
  info('Status', PROJECT_STATUS_LABELS[funded.status])

  // =========================================================================
  // Step 4: Proof commitment
  // =========================================================================

  step(4, 'Implementer submits the proof commitment...')

  const proof = commitProof(implementer.address, rawProof)
  const submission = protocol.submitProof(implementer.address, project.id, proof.commitment)
  info('Submission', `#${submission.id}`)
  info('Status', PROJECT_STATUS_LABELS[protocol.getProject(project.id).status])

  // =========================================================================
  // Step 5: Oracle verification
  // =========================================================================

  step(5, 'Oracle verifies the raw proof and attests...')

  const queue = new ProofIntakeQueue()
  const oracle = new ProofOracle({
    account: network.oracle,
    domain: protocol.domain,
    gateway: new LocalChainGateway(protocol, network.oracle.address),
    queue,
    retry: network.config.retry,
  })

  queue.enqueue({
    projectId: project.id,
    submissionId: submission.id,
    schema,
    payload: { data: rawProof, salt: proof.salt, submitter: implementer.address },
    receivedAt: host.now(),
  })
  const [outcome] = await oracle.drain()

  info('Oracle outcome', outcome ? `${outcome.status}: ${outcome.reason}` : 'none')
  info('Status', PROJECT_STATUS_LABELS[protocol.getProject(project.id).status])
  info('Implementer balance', asset.balanceOf(implementer.address))
  info('Treasury balance', asset.balanceOf(treasury.address))
  info('Escrow remaining', protocol.escrowBalance(project.id))

  // =========================================================================
  // Step 6: Expiry + refunds
  // =========================================================================

  step(6, 'Second project misses its deadline; donors refund...')

  const stalled = protocol.registerProject(manager.address, {
    target: 5_000n,
    deadline: host.now() + 7 * DAY,
    proofSchemaHash: hashProofSchema(schema),
    implementer: implementer.address,
  })

  asset.mint(donor1.address, 300n)
  const gift3 = commitDonation(donor1.address, 300n)
  const stalledDonation = protocol.deposit(donor1.address, stalled.id, 300n, gift3.commitment)

  host.advance(8 * DAY)
  const status = protocol.checkExpiry(stalled.id)
  info('Status', PROJECT_STATUS_LABELS[status])

  const before = asset.balanceOf(donor1.address)
  const refunded = protocol.refund(stalled.id, stalledDonation.id, gift3.secret)
  info('Refunded', refunded)
  info('Donor 1 balance', `${before} → ${asset.balanceOf(donor1.address)}`)

  // =========================================================================
  // Summary
  // =========================================================================

  banner('Demo Simulation Complete!')
  console.log(`
  Lifecycle demonstrated:
    ✓ Role-gated project registration (ProjectManager)
    ✓ Donations recorded as commitments, never as donor addresses
    ✓ Proof committed on-chain, raw proof verified off-chain
    ✓ EIP-712 oracle attestation released the escrow (fee to treasury)
    ✓ Expired project refunded by revealing the commitment secret

  Events emitted: ${host.events().length}
`)
}

main().catch((err: unknown) => {
  console.error('\nSimulation failed:', err instanceof Error ? err.message : err)
  process.exit(1)
})
