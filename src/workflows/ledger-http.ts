/**
 * HTTP routing for the local ledger the intake server runs against.
 *
 * Lets implementers and donors drive the in-process contract while the oracle
 * serves proofs. `caller` in a body is the identity the call is made as; the
 * local ledger does not authenticate it.
 *
 * Endpoints:
 *   POST /api/v1/ledger/faucet                  — Mint test asset to an account
 *   POST /api/v1/ledger/time                    — Advance the ledger clock
 *   POST /api/v1/ledger/projects                — Register a project
 *   GET  /api/v1/ledger/projects/:id            — Project with donations and submissions
 *   POST /api/v1/ledger/projects/:id/donations  — Deposit under a donor commitment
 *   POST /api/v1/ledger/projects/:id/proofs     — Submit a proof commitment
 *   POST /api/v1/ledger/projects/:id/expiry     — Run the deadline check
 *   POST /api/v1/ledger/projects/:id/refunds    — Refund a donation by revealing its secret
 *
 * Amounts travel as decimal strings.
 */

import { z } from 'zod'
import type { ImpactEscrowProtocol } from '../contract/protocol'
import type { AssetLedger } from '../contract/asset-ledger'
import { type ProtocolErrorCode, isProtocolError } from '../contract/errors'
import { PROJECT_STATUS_LABELS } from '../types/project'
import { addressSchema, bytes32Schema, hashProofSchema, proofSchemaSchema } from '../lib/proof-schema'
import type { IntakeResponse } from './intake-http'

export interface LedgerContext {
  protocol: ImpactEscrowProtocol
  asset: AssetLedger
}

export const LEDGER_ENDPOINTS = [
  '/api/v1/ledger/faucet',
  '/api/v1/ledger/time',
  '/api/v1/ledger/projects',
  '/api/v1/ledger/projects/:id',
] as const

const amountSchema = z
  .string()
  .regex(/^[0-9]+$/, 'expected a decimal integer string')
  .transform((value) => BigInt(value))

const faucetSchema = z.object({ to: addressSchema, amount: amountSchema })
const timeSchema = z.object({ advance: z.number().int().nonnegative() })
const registerSchema = z.object({
  caller: addressSchema,
  target: amountSchema,
  deadline: z.number().int().positive(),
  schema: proofSchemaSchema,
  implementer: addressSchema.optional(),
})
const depositSchema = z.object({ caller: addressSchema, amount: amountSchema, commitment: bytes32Schema })
const proofSchema = z.object({ caller: addressSchema, commitment: bytes32Schema })
const refundSchema = z.object({
  donationId: z.number().int().positive(),
  secret: z.object({ nonce: bytes32Schema, identity: addressSchema }),
})

const ERROR_STATUS: Record<ProtocolErrorCode, number> = {
  InvalidParameters: 400,
  InvalidAmount: 400,
  Unauthorized: 403,
  UnauthorizedOracle: 403,
  ProjectNotFound: 404,
  DonationNotFound: 404,
  SubmissionNotFound: 404,
  InvalidState: 409,
  AlreadySettled: 409,
  InsufficientBalance: 409,
  AlreadyInitialized: 409,
  NotInitialized: 409,
}

class BadRequest extends Error {
  constructor(readonly issues: string[]) {
    super(issues.join('; '))
    this.name = 'BadRequest'
  }
}

/** Rows carry bigints, which JSON cannot */
function plain(row: object): Record<string, unknown> {
  return Object.fromEntries(
    Object.entries(row).map(([key, value]) => [key, typeof value === 'bigint' ? value.toString() : value]),
  )
}

function parseBody<S extends z.ZodTypeAny>(schema: S, rawBody: string): z.output<S> {
  let body: unknown
  try {
    body = JSON.parse(rawBody)
  } catch {
    throw new BadRequest(['Request body is not valid JSON'])
  }
  const result = schema.safeParse(body)
  if (!result.success) {
    throw new BadRequest(result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`))
  }
  return result.data
}

function route(context: LedgerContext, method: string, path: string, rawBody: string): IntakeResponse | null {
  const { protocol, asset } = context

  if (method === 'POST' && path === '/api/v1/ledger/faucet') {
    const { to, amount } = parseBody(faucetSchema, rawBody)
    return { status: 200, body: { account: to, balance: asset.mint(to, amount).toString() } }
  }

  if (method === 'POST' && path === '/api/v1/ledger/time') {
    const { advance } = parseBody(timeSchema, rawBody)
    return { status: 200, body: { now: protocol.host.advance(advance) } }
  }

  if (method === 'POST' && path === '/api/v1/ledger/projects') {
    const body = parseBody(registerSchema, rawBody)
    const project = protocol.registerProject(body.caller, {
      target: body.target,
      deadline: body.deadline,
      proofSchemaHash: hashProofSchema(body.schema),
      implementer: body.implementer,
    })
    return { status: 201, body: { project: plain(project) } }
  }

  const match = /^\/api\/v1\/ledger\/projects\/([1-9][0-9]*)(?:\/(donations|proofs|expiry|refunds))?$/.exec(path)
  if (!match) return null
  const projectId = Number(match[1])
  const action = match[2]

  if (method === 'GET' && action === undefined) {
    const project = protocol.getProject(projectId)
    return {
      status: 200,
      body: {
        project: { ...plain(project), statusLabel: PROJECT_STATUS_LABELS[project.status] },
        donations: protocol.listDonations(projectId).map(plain),
        submissions: protocol.listSubmissions(projectId).map(plain),
      },
    }
  }
  if (method !== 'POST') return null

  switch (action) {
    case 'donations': {
      const { caller, amount, commitment } = parseBody(depositSchema, rawBody)
      return { status: 201, body: { donation: plain(protocol.deposit(caller, projectId, amount, commitment)) } }
    }
    case 'proofs': {
      const { caller, commitment } = parseBody(proofSchema, rawBody)
      return { status: 201, body: { submission: plain(protocol.submitProof(caller, projectId, commitment)) } }
    }
    case 'expiry': {
      const status = protocol.checkExpiry(projectId)
      return { status: 200, body: { projectId, status, statusLabel: PROJECT_STATUS_LABELS[status] } }
    }
    case 'refunds': {
      const { donationId, secret } = parseBody(refundSchema, rawBody)
      const refunded = protocol.refund(projectId, donationId, secret)
      return { status: 200, body: { projectId, donationId, refunded: refunded.toString() } }
    }
    default:
      return null
  }
}

/** Returns null for paths outside the ledger routes */
export function handleLedgerRequest(
  context: LedgerContext,
  method: string,
  path: string,
  rawBody: string,
): IntakeResponse | null {
  try {
    return route(context, method, path, rawBody)
  } catch (err) {
    if (err instanceof BadRequest) {
      return { status: 400, body: { error: 'Invalid ledger request', issues: err.issues } }
    }
    if (isProtocolError(err)) {
      return { status: ERROR_STATUS[err.code], body: { error: err.code, message: err.message } }
    }
    throw err
  }
}
