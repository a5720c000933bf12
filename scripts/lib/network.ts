/**
 * Shared local network setup for scripts.
 *
 * Boots an in-process ledger with the escrow contract deployed at the
 * configured address, plus helpers for the console banners the scripts print.
 *
 * Config resolution (see src/lib/config.ts):
 *   config/oracle.config.json < environment < config/secrets.json
 */

import { dirname, join } from 'node:path'
import { fileURLToPath } from 'node:url'
import type { Address, LocalAccount } from 'viem'
import { privateKeyToAccount } from 'viem/accounts'
import { LedgerHost } from '../../src/contract/host'
import { AssetLedger } from '../../src/contract/asset-ledger'
import { ImpactEscrowProtocol } from '../../src/contract/protocol'
import { type OracleConfig, loadOracleConfig } from '../../src/lib/config'
import { Role } from '../../src/types/access'

// ---------------------------------------------------------------------------
// Paths
// ---------------------------------------------------------------------------

const scriptsDir = dirname(dirname(fileURLToPath(import.meta.url)))

export const CONFIG_DIR = join(scriptsDir, '..', 'config')
export const ORACLE_CONFIG_PATH = join(CONFIG_DIR, 'oracle.config.json')
export const SECRETS_PATH = join(CONFIG_DIR, 'secrets.json')

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface LocalNetwork {
  config: OracleConfig
  host: LedgerHost
  asset: AssetLedger
  protocol: ImpactEscrowProtocol
  oracle: LocalAccount
}

// ---------------------------------------------------------------------------
// getLocalNetwork — single entry point for all scripts
// ---------------------------------------------------------------------------

export function getLocalNetwork(env: NodeJS.ProcessEnv = process.env): LocalNetwork {
  const config = loadOracleConfig({
    configPath: ORACLE_CONFIG_PATH,
    secretsPath: SECRETS_PATH,
    env,
  })

  const host = new LedgerHost()
  const protocol = new ImpactEscrowProtocol(host, {
    config: config.protocol,
    log: (message) => console.log(message),
  })

  return {
    config,
    host,
    asset: new AssetLedger(host),
    protocol,
    oracle: privateKeyToAccount(config.oraclePrivateKey),
  }
}

/**
 * Initialize access control on a fresh ledger: `admin` becomes super admin
 * and the network's oracle key joins the oracle set.
 */
export function bootstrapRoles(network: LocalNetwork, admin: Address): void {
  network.protocol.init(admin)
  network.protocol.grantRole(admin, network.oracle.address, Role.ORACLE)
}

// ---------------------------------------------------------------------------
// Console helpers
// ---------------------------------------------------------------------------

export function printNetworkBanner(network: LocalNetwork, scriptName: string) {
  console.log('='.repeat(60))
  console.log(`Impact Escrow Protocol — ${scriptName}`)
  console.log('='.repeat(60))
  console.log(`\nNetwork:   in-process ledger (chain ${network.config.protocol.chainId})`)
  console.log(`Escrow:    ${network.protocol.address}`)
  console.log(`Oracle:    ${network.oracle.address}`)
}

export function banner(text: string) {
  console.log(`\n${'='.repeat(60)}`)
  console.log(`  ${text}`)
  console.log('='.repeat(60))
}

export function step(n: number, text: string) {
  console.log(`\n  [Step ${n}] ${text}`)
}

export function info(label: string, value: string | number | bigint) {
  console.log(`    ${label.padEnd(22)} ${value}`)
}

export function short(address: Address): string {
  return `${address.slice(0, 10)}...`
}
