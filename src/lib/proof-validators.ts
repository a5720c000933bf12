/**
 * Impact Escrow Protocol — Proof Validators
 *
 * Domain-specific checks the oracle runs after the structural (schema hash
 * and commitment) checks pass. One validator per proof-schema type; the
 * oracle dispatches on `schema.type`.
 *
 * A validator returns a verdict for anything it can judge. It throws
 * `TransientOracleError` only for I/O failures worth retrying; any other
 * exception is treated by the oracle as a Rejected verdict.
 */

import { z } from 'zod'
import { type Hex, hexToString, isHex, keccak256, verifyMessage } from 'viem'
import {
  type DigestMatchSchema,
  type EvidenceDocumentSchema,
  type ProofPayload,
  type ProofSchema,
  type ProofSchemaType,
  type SignedStatementSchema,
  type Verdict,
  VerificationResult,
} from '../types/proof'

export interface ValidationOutcome {
  verdict: Verdict
  reason: string
}

export interface ProofValidator<S extends ProofSchema> {
  readonly type: S['type']
  validate(schema: S, payload: ProofPayload): Promise<ValidationOutcome>
}

type SchemaOf<T extends ProofSchemaType> = Extract<ProofSchema, { type: T }>

export type ValidatorSet = { [T in ProofSchemaType]: ProofValidator<SchemaOf<T>> }

export class TransientOracleError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, { cause })
    this.name = 'TransientOracleError'
  }
}

const verified = (reason: string): ValidationOutcome => ({ verdict: VerificationResult.VERIFIED, reason })
const rejected = (reason: string): ValidationOutcome => ({ verdict: VerificationResult.REJECTED, reason })

// =============================================================================
// digest-match — the proof bytes hash to a digest fixed at registration
// =============================================================================

export class DigestMatchValidator implements ProofValidator<DigestMatchSchema> {
  readonly type = 'digest-match' as const

  async validate(schema: DigestMatchSchema, payload: ProofPayload): Promise<ValidationOutcome> {
    const digest = keccak256(payload.data)
    return digest.toLowerCase() === schema.expectedDigest.toLowerCase()
      ? verified('proof digest matches')
      : rejected(`proof digest ${digest} does not match ${schema.expectedDigest}`)
  }
}

// =============================================================================
// signed-statement — the proof is a statement signed by a named attester
// =============================================================================

export class SignedStatementValidator implements ProofValidator<SignedStatementSchema> {
  readonly type = 'signed-statement' as const

  async validate(schema: SignedStatementSchema, payload: ProofPayload): Promise<ValidationOutcome> {
    if (!payload.signature) {
      return rejected('statement is unsigned')
    }

    const valid = await verifyMessage({
      address: schema.attester,
      message: { raw: payload.data },
      signature: payload.signature,
    })
    return valid
      ? verified(`statement signed by ${schema.attester}`)
      : rejected(`statement signature does not belong to ${schema.attester}`)
  }
}

// =============================================================================
// evidence-document — a JSON report, optionally pointing at a remote artifact
// =============================================================================

const evidenceDocumentSchema = z
  .object({
    evidenceUrl: z.string().url().optional(),
    evidenceDigest: z.string().optional(),
  })
  .passthrough()

export type Fetcher = (url: string, init: { signal: AbortSignal }) => Promise<Response>

export interface EvidenceDocumentValidatorOptions {
  fetcher?: Fetcher
  timeoutMs?: number
}

export class EvidenceDocumentValidator implements ProofValidator<EvidenceDocumentSchema> {
  readonly type = 'evidence-document' as const
  private readonly fetcher: Fetcher
  private readonly timeoutMs: number

  constructor(options: EvidenceDocumentValidatorOptions = {}) {
    this.fetcher = options.fetcher ?? ((url, init) => fetch(url, init))
    this.timeoutMs = options.timeoutMs ?? 10_000
  }

  async validate(schema: EvidenceDocumentSchema, payload: ProofPayload): Promise<ValidationOutcome> {
    let raw: unknown
    try {
      raw = JSON.parse(hexToString(payload.data))
    } catch {
      return rejected('proof is not a JSON document')
    }

    const parsed = evidenceDocumentSchema.safeParse(raw)
    if (!parsed.success) {
      return rejected(`malformed evidence document: ${parsed.error.issues[0]?.message ?? 'unknown issue'}`)
    }
    const document = parsed.data

    const missing = schema.requiredFields.filter((field) => {
      const value: unknown = document[field]
      return value === undefined || value === null || value === ''
    })
    if (missing.length > 0) {
      return rejected(`missing required fields: ${missing.join(', ')}`)
    }

    if (!schema.requireEvidenceUrl) {
      return verified('evidence document complete')
    }
    if (!document.evidenceUrl || !document.evidenceDigest || !isHex(document.evidenceDigest)) {
      return rejected('evidence document lacks evidenceUrl/evidenceDigest')
    }

    const digest = await this.fetchDigest(document.evidenceUrl)
    return digest.toLowerCase() === document.evidenceDigest.toLowerCase()
      ? verified(`evidence at ${document.evidenceUrl} matches its digest`)
      : rejected(`evidence at ${document.evidenceUrl} hashes to ${digest}`)
  }

  private async fetchDigest(url: string): Promise<Hex> {
    let response: Response
    try {
      response = await this.fetcher(url, { signal: AbortSignal.timeout(this.timeoutMs) })
    } catch (err) {
      throw new TransientOracleError(`evidence fetch failed for ${url}`, err)
    }

    if (response.status >= 500 || response.status === 429) {
      throw new TransientOracleError(`evidence host answered HTTP ${response.status} for ${url}`)
    }
    if (!response.ok) {
      throw new Error(`evidence host answered HTTP ${response.status} for ${url}`)
    }

    const body = new Uint8Array(await response.arrayBuffer())
    return keccak256(body)
  }
}

// =============================================================================
// Dispatch
// =============================================================================

export function defaultValidators(options: EvidenceDocumentValidatorOptions = {}): ValidatorSet {
  return {
    'digest-match': new DigestMatchValidator(),
    'signed-statement': new SignedStatementValidator(),
    'evidence-document': new EvidenceDocumentValidator(options),
  }
}

export function runValidator(
  validators: ValidatorSet,
  schema: ProofSchema,
  payload: ProofPayload,
): Promise<ValidationOutcome> {
  switch (schema.type) {
    case 'digest-match':
      return validators['digest-match'].validate(schema, payload)
    case 'signed-statement':
      return validators['signed-statement'].validate(schema, payload)
    case 'evidence-document':
      return validators['evidence-document'].validate(schema, payload)
  }
}
