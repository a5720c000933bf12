/**
 * Proof schema descriptors.
 *
 * A project stores only `hashProofSchema(schema)`. The oracle receives the full
 * descriptor with each proof and checks it against the stored hash before
 * picking a validator by `schema.type`.
 */

import { z } from 'zod'
import { type Hex, getAddress, isAddress, isHex, keccak256, size, toHex } from 'viem'
import type { ProofSchema } from '../types/proof'

export const hexSchema = z.custom<Hex>(
  (v) => typeof v === 'string' && isHex(v),
  'expected 0x-prefixed hex',
)
export const bytes32Schema = z.custom<Hex>(
  (v) => typeof v === 'string' && isHex(v) && size(v) === 32,
  'expected 32-byte hex',
)
export const addressSchema = z
  .string()
  .refine((v) => isAddress(v), 'expected an EVM address')
  .transform((v) => getAddress(v))

export const proofSchemaSchema: z.ZodType<ProofSchema, z.ZodTypeDef, unknown> = z.discriminatedUnion('type', [
  z.object({
    type: z.literal('digest-match'),
    version: z.number().int().positive(),
    expectedDigest: bytes32Schema,
  }),
  z.object({
    type: z.literal('signed-statement'),
    version: z.number().int().positive(),
    attester: addressSchema,
  }),
  z.object({
    type: z.literal('evidence-document'),
    version: z.number().int().positive(),
    requiredFields: z.array(z.string().min(1)),
    requireEvidenceUrl: z.boolean(),
  }),
])

type Canonical = string | number | boolean | null | Canonical[] | { [key: string]: Canonical }

function canonicalize(value: unknown): Canonical {
  if (value === null || typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
    return value
  }
  if (Array.isArray(value)) {
    return value.map(canonicalize)
  }
  if (typeof value === 'object') {
    const out: { [key: string]: Canonical } = {}
    for (const key of Object.keys(value).sort()) {
      const entry: unknown = Reflect.get(value, key)
      if (entry !== undefined) out[key] = canonicalize(entry)
    }
    return out
  }
  throw new Error(`Unsupported value in proof schema: ${typeof value}`)
}

/** Deterministic JSON: keys sorted at every level, addresses checksummed by the schema parser */
export function canonicalSchemaJson(schema: ProofSchema): string {
  return JSON.stringify(canonicalize(schema))
}

export function hashProofSchema(schema: ProofSchema): Hex {
  return keccak256(toHex(canonicalSchemaJson(schema)))
}
