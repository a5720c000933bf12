import { describe, it, expect, vi } from 'vitest'
import { type Hex, keccak256, toHex } from 'viem'
import {
  DigestMatchValidator,
  EvidenceDocumentValidator,
  type Fetcher,
  SignedStatementValidator,
  TransientOracleError,
  defaultValidators,
  runValidator,
} from '../src/lib/proof-validators'
import { type EvidenceDocumentSchema, type ProofPayload, VerificationResult } from '../src/types/proof'
import { IMPLEMENTER, newAccount } from './helpers'

const SALT: Hex = `0x${'42'.repeat(32)}`
const EVIDENCE_URL = 'https://evidence.test/well-7.jpg'

function payload(data: Hex, signature?: Hex): ProofPayload {
  return { data, salt: SALT, submitter: IMPLEMENTER, signature }
}

function documentPayload(document: Record<string, unknown>): ProofPayload {
  return payload(toHex(JSON.stringify(document)))
}

describe('DigestMatchValidator', () => {
  const validator = new DigestMatchValidator()
  const data = toHex('site survey 2026-03')

  it('verifies bytes hashing to the expected digest', async () => {
    const outcome = await validator.validate({ type: 'digest-match', version: 1, expectedDigest: keccak256(data) }, payload(data))
    expect(outcome).toEqual({ verdict: VerificationResult.VERIFIED, reason: 'proof digest matches' })
  })

  it('rejects anything else', async () => {
    const expected = keccak256(toHex('other'))
    const outcome = await validator.validate({ type: 'digest-match', version: 1, expectedDigest: expected }, payload(data))
    expect(outcome).toEqual({
      verdict: VerificationResult.REJECTED,
      reason: `proof digest ${keccak256(data)} does not match ${expected}`,
    })
  })
})

describe('SignedStatementValidator', () => {
  const validator = new SignedStatementValidator()
  const statement = toHex('Inspector confirms 40 homes connected')

  it('verifies a statement signed by the attester', async () => {
    const attester = newAccount()
    const signature = await attester.signMessage({ message: { raw: statement } })
    const outcome = await validator.validate(
      { type: 'signed-statement', version: 1, attester: attester.address },
      payload(statement, signature),
    )
    expect(outcome).toEqual({ verdict: VerificationResult.VERIFIED, reason: `statement signed by ${attester.address}` })
  })

  it('rejects a statement signed by someone else', async () => {
    const attester = newAccount()
    const impostor = newAccount()
    const signature = await impostor.signMessage({ message: { raw: statement } })
    const outcome = await validator.validate(
      { type: 'signed-statement', version: 1, attester: attester.address },
      payload(statement, signature),
    )
    expect(outcome).toEqual({
      verdict: VerificationResult.REJECTED,
      reason: `statement signature does not belong to ${attester.address}`,
    })
  })

  it('rejects an unsigned statement', async () => {
    const outcome = await validator.validate(
      { type: 'signed-statement', version: 1, attester: newAccount().address },
      payload(statement),
    )
    expect(outcome).toEqual({ verdict: VerificationResult.REJECTED, reason: 'statement is unsigned' })
  })
})

describe('EvidenceDocumentValidator', () => {
  const inlineSchema: EvidenceDocumentSchema = {
    type: 'evidence-document',
    version: 1,
    requiredFields: ['site', 'completedAt'],
    requireEvidenceUrl: false,
  }
  const remoteSchema: EvidenceDocumentSchema = { ...inlineSchema, requireEvidenceUrl: true }
  const artifactDigest = keccak256(toHex('photo-bytes'))

  it('accepts a complete inline document', async () => {
    const validator = new EvidenceDocumentValidator()
    const outcome = await validator.validate(inlineSchema, documentPayload({ site: 'Well 7', completedAt: '2026-03-01' }))
    expect(outcome).toEqual({ verdict: VerificationResult.VERIFIED, reason: 'evidence document complete' })
  })

  it('lists missing or empty required fields', async () => {
    const validator = new EvidenceDocumentValidator()
    const outcome = await validator.validate(inlineSchema, documentPayload({ site: '', notes: 'pending' }))
    expect(outcome).toEqual({ verdict: VerificationResult.REJECTED, reason: 'missing required fields: site, completedAt' })
  })

  it('rejects bytes that are not JSON', async () => {
    const validator = new EvidenceDocumentValidator()
    const outcome = await validator.validate(inlineSchema, payload(toHex('not json')))
    expect(outcome).toEqual({ verdict: VerificationResult.REJECTED, reason: 'proof is not a JSON document' })
  })

  it('fetches the remote artifact and compares its digest', async () => {
    const fetcher = vi.fn<Fetcher>(async () => new Response('photo-bytes'))
    const validator = new EvidenceDocumentValidator({ fetcher })
    const outcome = await validator.validate(
      remoteSchema,
      documentPayload({ site: 'Well 7', completedAt: '2026-03-01', evidenceUrl: EVIDENCE_URL, evidenceDigest: artifactDigest }),
    )

    expect(outcome).toEqual({
      verdict: VerificationResult.VERIFIED,
      reason: `evidence at ${EVIDENCE_URL} matches its digest`,
    })
    expect(fetcher).toHaveBeenCalledTimes(1)
    expect(fetcher.mock.calls[0]?.[0]).toBe(EVIDENCE_URL)
  })

  it('rejects an artifact whose digest differs', async () => {
    const validator = new EvidenceDocumentValidator({ fetcher: async () => new Response('tampered') })
    const outcome = await validator.validate(
      remoteSchema,
      documentPayload({ site: 'Well 7', completedAt: '2026-03-01', evidenceUrl: EVIDENCE_URL, evidenceDigest: artifactDigest }),
    )
    expect(outcome).toEqual({
      verdict: VerificationResult.REJECTED,
      reason: `evidence at ${EVIDENCE_URL} hashes to ${keccak256(toHex('tampered'))}`,
    })
  })

  it('rejects a document without the remote pointer', async () => {
    const fetcher = vi.fn<Fetcher>(async () => new Response('photo-bytes'))
    const validator = new EvidenceDocumentValidator({ fetcher })
    const outcome = await validator.validate(remoteSchema, documentPayload({ site: 'Well 7', completedAt: '2026-03-01' }))
    expect(outcome).toEqual({
      verdict: VerificationResult.REJECTED,
      reason: 'evidence document lacks evidenceUrl/evidenceDigest',
    })
    expect(fetcher).not.toHaveBeenCalled()
  })

  it('treats network failures and 5xx/429 answers as transient', async () => {
    const document = documentPayload({
      site: 'Well 7',
      completedAt: '2026-03-01',
      evidenceUrl: EVIDENCE_URL,
      evidenceDigest: artifactDigest,
    })

    const offline = new EvidenceDocumentValidator({
      fetcher: async () => {
        throw new TypeError('fetch failed')
      },
    })
    await expect(offline.validate(remoteSchema, document)).rejects.toThrow(
      new TransientOracleError(`evidence fetch failed for ${EVIDENCE_URL}`),
    )

    const busy = new EvidenceDocumentValidator({ fetcher: async () => new Response('', { status: 503 }) })
    await expect(busy.validate(remoteSchema, document)).rejects.toBeInstanceOf(TransientOracleError)

    const limited = new EvidenceDocumentValidator({ fetcher: async () => new Response('', { status: 429 }) })
    await expect(limited.validate(remoteSchema, document)).rejects.toBeInstanceOf(TransientOracleError)
  })

  it('treats client errors as permanent', async () => {
    const validator = new EvidenceDocumentValidator({ fetcher: async () => new Response('', { status: 404 }) })
    const error = await validator
      .validate(
        remoteSchema,
        documentPayload({ site: 'Well 7', completedAt: '2026-03-01', evidenceUrl: EVIDENCE_URL, evidenceDigest: artifactDigest }),
      )
      .catch((err: unknown) => err)

    expect(error).toBeInstanceOf(Error)
    expect(error).not.toBeInstanceOf(TransientOracleError)
    expect(error).toHaveProperty('message', `evidence host answered HTTP 404 for ${EVIDENCE_URL}`)
  })
})

describe('runValidator', () => {
  it('dispatches on the schema type', async () => {
    const data = toHex('ledger export')
    const validators = defaultValidators()
    const digestSpy = vi.spyOn(validators['digest-match'], 'validate')

    const outcome = await runValidator(
      validators,
      { type: 'digest-match', version: 1, expectedDigest: keccak256(data) },
      payload(data),
    )
    expect(outcome.verdict).toBe(VerificationResult.VERIFIED)
    expect(digestSpy).toHaveBeenCalledTimes(1)
  })
})
