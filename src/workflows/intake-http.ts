/**
 * HTTP routing for the proof intake boundary.
 *
 * Endpoints:
 *   POST /api/v1/proofs      — Queue a raw proof for verification
 *   GET  /api/v1/follow-ups  — Proofs left Pending after retries ran out
 *   POST /api/v1/follow-ups/retry — Re-queue those proofs
 *   GET  /health             — Server health check
 */

import type { ProofRequest } from '../types/proof'
import { IntakeValidationError, type ProofIntakeQueue, parseProofRequest } from './intake-queue'

export interface IntakeResponse {
  status: number
  body: Record<string, unknown>
}

export interface IntakeContext {
  queue: ProofIntakeQueue
  now: () => number
  followUps: () => ProofRequest[]
  retryFollowUps: () => number
}

export const INTAKE_ENDPOINTS = ['/api/v1/proofs', '/api/v1/follow-ups', '/api/v1/follow-ups/retry'] as const

function json(status: number, body: Record<string, unknown>): IntakeResponse {
  return { status, body }
}

/** `rawBody` is the unparsed request body; only POST reads it */
export function handleIntakeRequest(
  context: IntakeContext,
  method: string,
  path: string,
  rawBody: string,
): IntakeResponse {
  if (path === '/health') {
    return json(200, {
      status: 'ok',
      service: 'impact-escrow-proof-intake',
      queued: context.queue.size,
      endpoints: [...INTAKE_ENDPOINTS],
    })
  }

  if (path === '/api/v1/proofs' && method === 'POST') {
    let body: unknown
    try {
      body = JSON.parse(rawBody)
    } catch {
      return json(400, { error: 'Request body is not valid JSON' })
    }

    try {
      const request = parseProofRequest(body, context.now())
      const position = context.queue.enqueue(request)
      return json(202, { queued: true, position, projectId: request.projectId, submissionId: request.submissionId })
    } catch (err) {
      if (err instanceof IntakeValidationError) {
        return json(400, { error: 'Invalid proof request', issues: err.issues })
      }
      throw err
    }
  }

  if (path === '/api/v1/follow-ups' && method === 'GET') {
    return json(200, {
      followUps: context.followUps().map((request) => ({
        projectId: request.projectId,
        submissionId: request.submissionId,
        receivedAt: request.receivedAt,
      })),
    })
  }

  if (path === '/api/v1/follow-ups/retry' && method === 'POST') {
    return json(202, { requeued: context.retryFollowUps(), queued: context.queue.size })
  }

  return json(404, { error: 'Not found', path, availableEndpoints: '/health' })
}
