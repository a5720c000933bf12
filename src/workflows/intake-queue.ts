/**
 * Out-of-band intake for raw proofs.
 *
 * Implementers hand the oracle their raw proof (never stored on-chain) plus
 * the schema descriptor their project committed to. Requests are parsed at
 * the boundary and queued; the oracle drains the queue on its own schedule.
 */

import { z } from 'zod'
import type { ProofRequest } from '../types/proof'
import { addressSchema, bytes32Schema, hexSchema, proofSchemaSchema } from '../lib/proof-schema'

export const proofRequestSchema = z.object({
  projectId: z.number().int().positive(),
  submissionId: z.number().int().positive(),
  schema: proofSchemaSchema,
  payload: z.object({
    data: hexSchema,
    salt: bytes32Schema,
    submitter: addressSchema,
    signature: hexSchema.optional(),
  }),
})

export type ProofRequestInput = z.input<typeof proofRequestSchema>

export class IntakeValidationError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid proof request: ${issues.join('; ')}`)
    this.name = 'IntakeValidationError'
  }
}

export function parseProofRequest(body: unknown, receivedAt: number): ProofRequest {
  const result = proofRequestSchema.safeParse(body)
  if (!result.success) {
    throw new IntakeValidationError(
      result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`),
    )
  }
  return { ...result.data, receivedAt }
}

export class ProofIntakeQueue {
  private readonly items: ProofRequest[] = []

  enqueue(request: ProofRequest): number {
    this.items.push(request)
    return this.items.length
  }

  dequeue(): ProofRequest | undefined {
    return this.items.shift()
  }

  get size(): number {
    return this.items.length
  }
}
