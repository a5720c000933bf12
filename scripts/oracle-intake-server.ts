/**
 * Impact Escrow Protocol — Oracle Intake Server
 *
 * Accepts raw proofs over HTTP and runs the proof oracle's polling loop
 * against a local in-process ledger. The same server exposes the ledger's
 * contract operations so projects can be registered, funded and given proof
 * commitments before their raw proofs arrive.
 *
 * Usage:
 *   npm run oracle
 *
 * Requires an oracle key: ORACLE_PRIVATE_KEY or config/secrets.json.
 */

import { createServer } from 'node:http'
import { generatePrivateKey, privateKeyToAccount } from 'viem/accounts'
import { ProofIntakeQueue } from '../src/workflows/intake-queue'
import { type IntakeResponse, INTAKE_ENDPOINTS, handleIntakeRequest } from '../src/workflows/intake-http'
import { LEDGER_ENDPOINTS, handleLedgerRequest } from '../src/workflows/ledger-http'
import { LocalChainGateway, ProofOracle } from '../src/workflows/proof-oracle'
import { defaultValidators } from '../src/lib/proof-validators'
import { bootstrapRoles, getLocalNetwork, info, printNetworkBanner } from './lib/network'

const network = getLocalNetwork()
const { config, protocol, asset } = network

// Any registrar can use this address as `caller` on the ledger routes
const admin = privateKeyToAccount(generatePrivateKey()).address
bootstrapRoles(network, admin)

const queue = new ProofIntakeQueue()
const oracle = new ProofOracle({
  account: network.oracle,
  domain: protocol.domain,
  gateway: new LocalChainGateway(protocol, network.oracle.address),
  queue,
  validators: defaultValidators({ timeoutMs: config.evidenceFetchTimeoutMs }),
  retry: config.retry,
  pollIntervalMs: config.pollIntervalMs,
})

const intake = {
  queue,
  now: () => network.host.now(),
  followUps: () => oracle.pendingFollowUps(),
  retryFollowUps: () => oracle.retryFollowUps(),
}
const ledger = { protocol, asset }

// ---------------------------------------------------------------------------
// Server Start
// ---------------------------------------------------------------------------

const server = createServer((req, res) => {
  const chunks: Buffer[] = []
  req.on('data', (chunk: Buffer) => chunks.push(chunk))
  req.on('end', () => {
    const path = new URL(req.url ?? '/', 'http://localhost').pathname
    const method = req.method ?? 'GET'
    console.log(`${method} ${path}`)

    let response: IntakeResponse
    try {
      const body = Buffer.concat(chunks).toString('utf-8')
      response = handleLedgerRequest(ledger, method, path, body) ?? handleIntakeRequest(intake, method, path, body)
    } catch (err) {
      console.error('[IEP-Oracle] Intake handler failed:', err)
      response = { status: 500, body: { error: 'Internal error' } }
    }
    res.writeHead(response.status, { 'content-type': 'application/json' })
    res.end(JSON.stringify(response.body))
  })
})

server.listen(config.intakePort, () => {
  printNetworkBanner(network, 'Oracle Intake Server')
  info('Super admin', admin)
  console.log(`\nListening on http://localhost:${config.intakePort}`)
  console.log(`\nEndpoints:`)
  for (const endpoint of [...INTAKE_ENDPOINTS, ...LEDGER_ENDPOINTS, '/health']) {
    console.log(`  http://localhost:${config.intakePort}${endpoint}`)
  }
  console.log(`Press Ctrl+C to stop.\n`)
  oracle.start()
})

process.on('SIGINT', () => {
  oracle.stop()
  server.close(() => process.exit(0))
})
