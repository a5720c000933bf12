import { afterEach, beforeEach, describe, it, expect } from 'vitest'
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import type { Hex } from 'viem'
import { OracleConfigError, loadOracleConfig, protocolConfigSchema } from '../src/lib/config'
import { ESCROW } from './helpers'

const TEST_KEY: Hex = `0x${'01'.repeat(32)}`
const OTHER_KEY: Hex = `0x${'02'.repeat(32)}`

let dir: string

beforeEach(() => {
  dir = mkdtempSync(join(tmpdir(), 'iep-config-'))
})

afterEach(() => {
  rmSync(dir, { recursive: true, force: true })
})

function writeJson(name: string, value: unknown): string {
  const path = join(dir, name)
  writeFileSync(path, JSON.stringify(value))
  return path
}

describe('protocolConfigSchema', () => {
  it('fills the EIP-712 domain defaults', () => {
    expect(protocolConfigSchema.parse({ address: ESCROW, chainId: 1 })).toEqual({
      address: ESCROW,
      chainId: 1,
      domainName: 'ImpactEscrowProtocol',
      domainVersion: '1',
    })
  })
})

describe('loadOracleConfig', () => {
  it('builds a full config from the environment alone', () => {
    const config = loadOracleConfig({
      env: { ORACLE_PRIVATE_KEY: TEST_KEY, ESCROW_ADDRESS: ESCROW, CHAIN_ID: '31337' },
    })

    expect(config).toEqual({
      oraclePrivateKey: TEST_KEY,
      pollIntervalMs: 5_000,
      retry: { maxAttempts: 3, backoffMs: 500 },
      evidenceFetchTimeoutMs: 10_000,
      intakePort: 3001,
      protocol: { address: ESCROW, chainId: 31337, domainName: 'ImpactEscrowProtocol', domainVersion: '1' },
    })
  })

  it('layers file < environment < secrets', () => {
    const configPath = writeJson('oracle.config.json', {
      pollIntervalMs: 2_000,
      retry: { backoffMs: 50 },
      protocol: { address: ESCROW, chainId: 1 },
    })
    const secretsPath = writeJson('secrets.json', { oraclePrivateKey: TEST_KEY })

    const config = loadOracleConfig({
      configPath,
      secretsPath,
      env: { ORACLE_PRIVATE_KEY: OTHER_KEY, ORACLE_MAX_ATTEMPTS: '5', CHAIN_ID: '31337' },
    })

    expect(config.oraclePrivateKey).toBe(TEST_KEY)
    expect(config.pollIntervalMs).toBe(2_000)
    expect(config.retry).toEqual({ maxAttempts: 5, backoffMs: 50 })
    expect(config.protocol.chainId).toBe(31337)
  })

  it('treats missing files as empty', () => {
    const config = loadOracleConfig({
      configPath: join(dir, 'absent.json'),
      secretsPath: join(dir, 'also-absent.json'),
      env: { ORACLE_PRIVATE_KEY: TEST_KEY, ESCROW_ADDRESS: ESCROW, CHAIN_ID: '1' },
    })
    expect(config.protocol.address).toBe(ESCROW)
  })

  it('lists every invalid field', () => {
    expect(() => loadOracleConfig({ env: { ESCROW_ADDRESS: ESCROW, CHAIN_ID: '1' } })).toThrow(
      new OracleConfigError('Invalid oracle configuration:\n  oraclePrivateKey: expected 32-byte hex'),
    )
  })

  it('reports a malformed contract address by path', () => {
    const configPath = writeJson('oracle.config.json', { protocol: { address: '0x1234', chainId: 1 } })
    expect(() => loadOracleConfig({ configPath, env: { ORACLE_PRIVATE_KEY: TEST_KEY } })).toThrow(
      'protocol.address: expected an EVM address',
    )
  })

  it('rejects non-numeric environment values', () => {
    expect(() => loadOracleConfig({ env: { CHAIN_ID: 'mainnet' } })).toThrow(
      new OracleConfigError('CHAIN_ID must be a number, got "mainnet"'),
    )
  })

  it('rejects a config file that is not an object', () => {
    const configPath = writeJson('oracle.config.json', [1, 2])
    expect(() => loadOracleConfig({ configPath, env: {} })).toThrow(`${configPath} must contain a JSON object`)
  })
})
