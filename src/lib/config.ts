/**
 * Configuration schemas for the contract deployment and the proof oracle.
 *
 * Oracle settings are layered: config file < environment < config/secrets.json.
 * The oracle key is only ever read from the environment or secrets.json.
 */

import { readFileSync } from 'node:fs'
import { z } from 'zod'
import { addressSchema, bytes32Schema } from './proof-schema'
import { DEFAULT_DOMAIN_NAME, DEFAULT_DOMAIN_VERSION } from './attestation'

// =============================================================================
// Contract deployment
// =============================================================================

export const protocolConfigSchema = z.object({
  address: addressSchema.describe('Escrow contract address; also the EIP-712 verifying contract'),
  chainId: z.number().int().positive().describe('Chain id bound into attestation signatures'),
  domainName: z.string().min(1).default(DEFAULT_DOMAIN_NAME).describe('EIP-712 domain name'),
  domainVersion: z.string().min(1).default(DEFAULT_DOMAIN_VERSION).describe('EIP-712 domain version'),
})

export type ProtocolConfig = z.infer<typeof protocolConfigSchema>

// =============================================================================
// Proof oracle
// =============================================================================

export const oracleConfigSchema = z.object({
  oraclePrivateKey: bytes32Schema.describe('Hex-encoded secp256k1 key the oracle signs attestations with'),
  pollIntervalMs: z.number().int().positive().default(5_000).describe('Intake queue polling interval'),
  retry: z
    .object({
      maxAttempts: z.number().int().positive().default(3).describe('Attempts per proof before leaving it Pending'),
      backoffMs: z.number().int().nonnegative().default(500).describe('Initial backoff, doubled per attempt'),
    })
    .default({}),
  evidenceFetchTimeoutMs: z.number().int().positive().default(10_000).describe('Timeout for evidence downloads'),
  intakePort: z.number().int().positive().default(3001).describe('Port of the HTTP intake server'),
  protocol: protocolConfigSchema,
})

export type OracleConfig = z.infer<typeof oracleConfigSchema>

export class OracleConfigError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'OracleConfigError'
  }
}

type JsonObject = Record<string, unknown>

function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function readJsonFile(path: string | undefined): JsonObject {
  if (!path) return {}
  let raw: string
  try {
    raw = readFileSync(path, 'utf-8')
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') return {}
    throw err
  }
  const parsed: unknown = JSON.parse(raw)
  if (!isJsonObject(parsed)) {
    throw new OracleConfigError(`${path} must contain a JSON object`)
  }
  return parsed
}

function envNumber(env: NodeJS.ProcessEnv, key: string): number | undefined {
  const value = env[key]
  if (value === undefined || value === '') return undefined
  const parsed = Number(value)
  if (!Number.isFinite(parsed)) {
    throw new OracleConfigError(`${key} must be a number, got "${value}"`)
  }
  return parsed
}

function fromEnv(env: NodeJS.ProcessEnv): JsonObject {
  const out: JsonObject = {}
  const protocol: JsonObject = {}

  if (env.ORACLE_PRIVATE_KEY) out.oraclePrivateKey = env.ORACLE_PRIVATE_KEY
  const poll = envNumber(env, 'ORACLE_POLL_INTERVAL_MS')
  if (poll !== undefined) out.pollIntervalMs = poll
  const port = envNumber(env, 'ORACLE_INTAKE_PORT')
  if (port !== undefined) out.intakePort = port
  const maxAttempts = envNumber(env, 'ORACLE_MAX_ATTEMPTS')
  if (maxAttempts !== undefined) out.retry = { maxAttempts }

  if (env.ESCROW_ADDRESS) protocol.address = env.ESCROW_ADDRESS
  const chainId = envNumber(env, 'CHAIN_ID')
  if (chainId !== undefined) protocol.chainId = chainId
  if (Object.keys(protocol).length > 0) out.protocol = protocol

  return out
}

function merge(base: JsonObject, override: JsonObject): JsonObject {
  const out: JsonObject = { ...base }
  for (const [key, value] of Object.entries(override)) {
    const existing = out[key]
    out[key] = isJsonObject(existing) && isJsonObject(value) ? merge(existing, value) : value
  }
  return out
}

export interface LoadOracleConfigOptions {
  configPath?: string
  secretsPath?: string
  env?: NodeJS.ProcessEnv
}

export function loadOracleConfig(options: LoadOracleConfigOptions = {}): OracleConfig {
  const layered = merge(
    merge(readJsonFile(options.configPath), fromEnv(options.env ?? process.env)),
    readJsonFile(options.secretsPath),
  )

  const result = oracleConfigSchema.safeParse(layered)
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    throw new OracleConfigError(`Invalid oracle configuration:\n  ${issues.join('\n  ')}`)
  }
  return result.data
}
