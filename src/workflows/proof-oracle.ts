/**
 * ============================================================================
 * Impact Escrow Protocol — Proof Oracle
 * ============================================================================
 *
 * Off-chain verifier: turns a raw proof received out of band into a signed,
 * on-chain-checkable attestation.
 *
 * Pipeline (per intake request):
 *   Intake queue (HTTP / message boundary)
 *     → Read the proof submission + project from chain (gateway)
 *     → Skip anything already resolved or superseded (idempotency)
 *     → Recompute the proof commitment and compare
 *     → Structural check: schema descriptor hash == project.proofSchemaHash
 *     → Domain validation via the validator for schema.type
 *     → Sign (projectId, submissionId, commitment, verdict, timestamp)
 *     → Submit attestation → contract applies verdict and settles
 *
 * Validation failures become Rejected verdicts. Transient I/O failures are
 * retried with exponential backoff; when retries run out the request is left
 * for manual follow-up and the submission stays Pending on-chain, where the
 * expiry check eventually catches it.
 */

import type { Address, LocalAccount } from 'viem'
import type { Project } from '../types/project'
import {
  type ProofRequest,
  type ProofSubmission,
  type SignedAttestation,
  type Verdict,
  VerificationResult,
} from '../types/proof'
import { ProjectStatus, PROJECT_STATUS_LABELS } from '../types/project'
import { commit } from '../lib/commitment'
import { hashProofSchema } from '../lib/proof-schema'
import { type AttestationDomain, signAttestation } from '../lib/attestation'
import {
  type ValidationOutcome,
  type ValidatorSet,
  TransientOracleError,
  defaultValidators,
  runValidator,
} from '../lib/proof-validators'
import type { ImpactEscrowProtocol } from '../contract/protocol'
import { isProtocolError } from '../contract/errors'
import type { ProofIntakeQueue } from './intake-queue'

// =============================================================================
// Chain access
// =============================================================================

export interface OracleChainGateway {
  now(): Promise<number>
  getProject(projectId: number): Promise<Project>
  getSubmission(projectId: number, submissionId: number): Promise<ProofSubmission>
  submitAttestation(attestation: SignedAttestation): Promise<void>
}

/** Gateway onto an in-process contract; the oracle relays its own attestations */
export class LocalChainGateway implements OracleChainGateway {
  constructor(
    private readonly protocol: ImpactEscrowProtocol,
    private readonly relayer: Address,
  ) {}

  async now(): Promise<number> {
    return this.protocol.host.now()
  }

  async getProject(projectId: number): Promise<Project> {
    return this.protocol.getProject(projectId)
  }

  async getSubmission(projectId: number, submissionId: number): Promise<ProofSubmission> {
    return this.protocol.getSubmission(projectId, submissionId)
  }

  async submitAttestation(attestation: SignedAttestation): Promise<void> {
    await this.protocol.applyVerification(this.relayer, attestation)
  }
}

// =============================================================================
// Oracle
// =============================================================================

export interface RetryPolicy {
  maxAttempts: number
  backoffMs: number
}

export interface ProofOracleOptions {
  account: LocalAccount
  domain: AttestationDomain
  gateway: OracleChainGateway
  queue: ProofIntakeQueue
  validators?: ValidatorSet
  retry?: RetryPolicy
  pollIntervalMs?: number
  log?: (message: string) => void
  sleep?: (ms: number) => Promise<void>
}

export type ProcessOutcome =
  | { status: 'attested'; verdict: Verdict; reason: string; attestation: SignedAttestation }
  | { status: 'skipped'; reason: string }
  | { status: 'pending'; reason: string }
  | { status: 'failed'; reason: string }

const DEFAULT_RETRY: RetryPolicy = { maxAttempts: 3, backoffMs: 500 }

const wait = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms))

function describe(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}

function requestKey(request: Pick<ProofRequest, 'projectId' | 'submissionId'>): string {
  return `${request.projectId}:${request.submissionId}`
}

export class ProofOracle {
  private readonly account: LocalAccount
  private readonly domain: AttestationDomain
  private readonly gateway: OracleChainGateway
  private readonly queue: ProofIntakeQueue
  private readonly validators: ValidatorSet
  private readonly retry: RetryPolicy
  private readonly pollIntervalMs: number
  private readonly log: (message: string) => void
  private readonly sleep: (ms: number) => Promise<void>

  private readonly inFlight = new Set<string>()
  private readonly followUps = new Map<string, ProofRequest>()
  private timer: ReturnType<typeof setInterval> | null = null
  private draining = false

  constructor(options: ProofOracleOptions) {
    this.account = options.account
    this.domain = options.domain
    this.gateway = options.gateway
    this.queue = options.queue
    this.validators = options.validators ?? defaultValidators()
    this.retry = options.retry ?? DEFAULT_RETRY
    this.pollIntervalMs = options.pollIntervalMs ?? 5_000
    this.log = options.log ?? ((message) => console.log(message))
    this.sleep = options.sleep ?? wait
  }

  get address(): Address {
    return this.account.address
  }

  /** Requests whose transient failures outlasted the retry policy */
  pendingFollowUps(): ProofRequest[] {
    return [...this.followUps.values()]
  }

  /**
   * Put every follow-up back on the intake queue. Each stays listed until a
   * later run resolves it; returns how many were queued.
   */
  retryFollowUps(): number {
    const requests = this.pendingFollowUps()
    for (const request of requests) this.queue.enqueue(request)
    if (requests.length > 0) {
      this.log(`[IEP-Oracle] Re-queued ${requests.length} follow-up(s)`)
    }
    return requests.length
  }

  // ---------------------------------------------------------------------------
  // Queue driving
  // ---------------------------------------------------------------------------

  async processNext(): Promise<ProcessOutcome | null> {
    const request = this.queue.dequeue()
    return request ? this.process(request) : null
  }

  async drain(): Promise<ProcessOutcome[]> {
    const outcomes: ProcessOutcome[] = []
    let outcome = await this.processNext()
    while (outcome) {
      outcomes.push(outcome)
      outcome = await this.processNext()
    }
    return outcomes
  }

  start(): void {
    if (this.timer) return
    this.log(`[IEP-Oracle] Polling intake queue every ${this.pollIntervalMs}ms as ${this.address}`)
    this.timer = setInterval(() => {
      void this.tick()
    }, this.pollIntervalMs)
  }

  stop(): void {
    if (!this.timer) return
    clearInterval(this.timer)
    this.timer = null
    this.log('[IEP-Oracle] Stopped')
  }

  private async tick(): Promise<void> {
    if (this.draining || this.queue.size === 0) return
    this.draining = true
    try {
      await this.drain()
    } catch (err) {
      this.log(`[IEP-Oracle] Drain aborted: ${describe(err)}`)
    } finally {
      this.draining = false
    }
  }

  // ---------------------------------------------------------------------------
  // Single request
  // ---------------------------------------------------------------------------

  async process(request: ProofRequest): Promise<ProcessOutcome> {
    const key = requestKey(request)
    if (this.inFlight.has(key)) {
      return { status: 'skipped', reason: `submission ${key} is already being processed` }
    }

    this.inFlight.add(key)
    try {
      const outcome = await this.run(request)
      if (outcome.status === 'pending') {
        this.followUps.set(key, request)
      } else {
        this.followUps.delete(key)
      }
      return outcome
    } finally {
      this.inFlight.delete(key)
    }
  }

  private async run(request: ProofRequest): Promise<ProcessOutcome> {
    const { projectId, submissionId } = request
    this.log(`[IEP-Oracle] Processing project ${projectId}, submission #${submissionId}`)

    try {
      // -----------------------------------------------------------------------
      // Step 1: Read on-chain state
      // -----------------------------------------------------------------------
      const submission = await this.withRetry('read submission', () =>
        this.gateway.getSubmission(projectId, submissionId),
      )
      if (submission.result !== VerificationResult.PENDING) {
        return this.skip(`submission #${submissionId} is already resolved`)
      }

      const project = await this.withRetry('read project', () => this.gateway.getProject(projectId))
      if (project.activeSubmissionId !== submissionId) {
        return this.skip(`submission #${submissionId} is superseded by #${project.activeSubmissionId}`)
      }
      if (project.status !== ProjectStatus.PROOF_SUBMITTED) {
        return this.skip(`project ${projectId} is ${PROJECT_STATUS_LABELS[project.status]}`)
      }

      // -----------------------------------------------------------------------
      // Step 2: Structural checks + domain validation
      // -----------------------------------------------------------------------
      const outcome = await this.evaluate(request, project, submission)
      this.log(
        `[IEP-Oracle] Verdict for ${projectId}#${submissionId}: ` +
        `${outcome.verdict === VerificationResult.VERIFIED ? 'Verified' : 'Rejected'} (${outcome.reason})`,
      )

      // -----------------------------------------------------------------------
      // Step 3: Sign and submit the attestation
      // -----------------------------------------------------------------------
      const timestamp = await this.withRetry('read ledger time', () => this.gateway.now())
      const attestation = await signAttestation(this.account, this.domain, {
        projectId,
        submissionId,
        proofCommitment: submission.commitment,
        verdict: outcome.verdict,
        timestamp,
      })

      try {
        await this.withRetry('submit attestation', () => this.gateway.submitAttestation(attestation))
      } catch (err) {
        if (isProtocolError(err, 'AlreadySettled')) {
          return this.skip(`submission #${submissionId} was attested by an earlier run`)
        }
        throw err
      }

      this.log(`[IEP-Oracle] Attestation accepted for ${projectId}#${submissionId}`)
      return { status: 'attested', verdict: outcome.verdict, reason: outcome.reason, attestation }
    } catch (err) {
      if (err instanceof TransientOracleError) {
        this.log(`[IEP-Oracle] Giving up on ${projectId}#${submissionId} for now: ${describe(err)}`)
        return { status: 'pending', reason: describe(err) }
      }
      if (isProtocolError(err)) {
        this.log(`[IEP-Oracle] Chain refused ${projectId}#${submissionId}: ${err.message}`)
        return { status: 'failed', reason: err.message }
      }
      throw err
    }
  }

  private async evaluate(
    request: ProofRequest,
    project: Project,
    submission: ProofSubmission,
  ): Promise<ValidationOutcome> {
    const { payload, schema } = request

    const commitment = commit({ nonce: payload.salt, identity: payload.submitter }, { kind: 'proof', data: payload.data })
    if (commitment.toLowerCase() !== submission.commitment.toLowerCase()) {
      return { verdict: VerificationResult.REJECTED, reason: 'proof does not open the submitted commitment' }
    }

    const schemaHash = hashProofSchema(schema)
    if (schemaHash.toLowerCase() !== project.proofSchemaHash.toLowerCase()) {
      return { verdict: VerificationResult.REJECTED, reason: `schema hash ${schemaHash} is not the project's` }
    }

    try {
      return await this.withRetry(`validate ${schema.type}`, () => runValidator(this.validators, schema, payload))
    } catch (err) {
      if (err instanceof TransientOracleError) throw err
      return { verdict: VerificationResult.REJECTED, reason: `validator error: ${describe(err)}` }
    }
  }

  private skip(reason: string): ProcessOutcome {
    this.log(`[IEP-Oracle] Skipped: ${reason}`)
    return { status: 'skipped', reason }
  }

  private async withRetry<T>(label: string, fn: () => Promise<T>): Promise<T> {
    for (let attempt = 1; ; attempt++) {
      try {
        return await fn()
      } catch (err) {
        if (!(err instanceof TransientOracleError) || attempt >= this.retry.maxAttempts) throw err
        const delay = this.retry.backoffMs * 2 ** (attempt - 1)
        this.log(`[IEP-Oracle] ${label} failed (attempt ${attempt}/${this.retry.maxAttempts}), retrying in ${delay}ms`)
        await this.sleep(delay)
      }
    }
  }
}
