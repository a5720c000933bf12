import { describe, it, expect } from 'vitest'
import { hashProofSchema } from '../src/lib/proof-schema'
import { ProjectStatus } from '../src/types/project'
import { VerificationResult } from '../src/types/proof'
import {
  DAY,
  DIGEST_SCHEMA,
  DONOR_A,
  IMPLEMENTER,
  MANAGER,
  START,
  STRANGER,
  attest,
  createFixture,
  donate,
  registerProject,
  submit,
} from './helpers'

describe('registerProject', () => {
  it('stores a Funding project and emits ProjectRegistered', () => {
    const fixture = createFixture()
    const project = registerProject(fixture)

    expect(project).toEqual({
      id: 1,
      creator: MANAGER,
      implementer: IMPLEMENTER,
      target: 1_000n,
      funded: 0n,
      deadline: START + 30 * DAY,
      proofSchemaHash: hashProofSchema(DIGEST_SCHEMA),
      status: ProjectStatus.FUNDING,
      activeSubmissionId: null,
      donationCount: 0,
      settled: false,
      createdAt: START,
    })
    expect(fixture.protocol.getProject(1)).toEqual(project)

    const [event] = fixture.host.eventsOfType('ProjectRegistered')
    expect(event).toMatchObject({ projectId: 1, creator: MANAGER, implementer: IMPLEMENTER, target: 1_000n })
  })

  it('defaults the implementer to the creator', () => {
    const { protocol } = createFixture()
    const project = protocol.registerProject(MANAGER, {
      target: 5n,
      deadline: START + DAY,
      proofSchemaHash: hashProofSchema(DIGEST_SCHEMA),
    })
    expect(project.implementer).toBe(MANAGER)
  })

  it('validates target, deadline and schema hash', () => {
    const { protocol } = createFixture()
    const valid = { target: 5n, deadline: START + DAY, proofSchemaHash: hashProofSchema(DIGEST_SCHEMA) }

    expect(() => protocol.registerProject(MANAGER, { ...valid, target: 0n })).toThrow(
      'InvalidParameters: target must be positive, got 0',
    )
    expect(() => protocol.registerProject(MANAGER, { ...valid, deadline: START })).toThrow(
      `InvalidParameters: deadline ${START} must be after ledger time ${START}`,
    )
    expect(() => protocol.registerProject(MANAGER, { ...valid, deadline: START + 0.5 })).toThrow('InvalidParameters')
    expect(() => protocol.registerProject(MANAGER, { ...valid, proofSchemaHash: '0x1234' })).toThrow(
      'InvalidParameters: proof schema hash must be 32 bytes',
    )
  })

  it('does not consume an id on failure', () => {
    const fixture = createFixture()
    expect(() => registerProject(fixture, { target: 0n })).toThrow()
    expect(registerProject(fixture).id).toBe(1)
    expect(registerProject(fixture).id).toBe(2)
    expect(fixture.protocol.listProjects().map((project) => project.id)).toEqual([1, 2])
  })

  it('reports unknown projects', () => {
    const { protocol } = createFixture()
    expect(() => protocol.getProject(99)).toThrow('ProjectNotFound: project 99 does not exist')
  })
})

describe('funding threshold', () => {
  it('stays Funding below target and turns Active exactly at target', () => {
    const fixture = createFixture()
    const project = registerProject(fixture)

    donate(fixture, DONOR_A, project.id, 999n)
    expect(fixture.protocol.getProject(project.id).status).toBe(ProjectStatus.FUNDING)

    donate(fixture, DONOR_A, project.id, 1n)
    expect(fixture.protocol.getProject(project.id)).toMatchObject({ funded: 1_000n, status: ProjectStatus.ACTIVE })
  })
})

describe('submitProof', () => {
  function activeProject() {
    const fixture = createFixture()
    const project = registerProject(fixture)
    donate(fixture, DONOR_A, project.id, 1_000n)
    return { fixture, project }
  }

  it('requires an Active project', () => {
    const fixture = createFixture()
    registerProject(fixture)
    expect(() => submit(fixture, 1)).toThrow('InvalidState: cannot submit proof for project 1 while Funding')
  })

  it('is reserved to the implementer', () => {
    const { fixture } = activeProject()
    expect(() => fixture.protocol.submitProof(STRANGER, 1, `0x${'01'.repeat(32)}`)).toThrow(
      `Unauthorized: only the implementer ${IMPLEMENTER} may submit proof`,
    )
  })

  it('requires a 32-byte commitment', () => {
    const { fixture } = activeProject()
    expect(() => fixture.protocol.submitProof(IMPLEMENTER, 1, '0x12')).toThrow(
      'InvalidParameters: proof commitment must be 32 bytes',
    )
  })

  it('records a pending submission and moves to ProofSubmitted', () => {
    const { fixture } = activeProject()
    fixture.host.advance(60)
    const { submission } = submit(fixture, 1)

    expect(submission).toMatchObject({
      projectId: 1,
      id: 1,
      submitter: IMPLEMENTER,
      timestamp: START + 60,
      result: VerificationResult.PENDING,
      resolvedAt: null,
    })
    expect(fixture.protocol.getProject(1)).toMatchObject({
      status: ProjectStatus.PROOF_SUBMITTED,
      activeSubmissionId: 1,
    })
    expect(fixture.host.eventsOfType('ProofSubmitted').map((event) => event.commitment)).toEqual([submission.commitment])
  })

  it('refuses a second submission while one is pending', () => {
    const { fixture } = activeProject()
    submit(fixture, 1)
    expect(() => submit(fixture, 1)).toThrow('InvalidState: cannot submit proof for project 1 while ProofSubmitted')
  })

  it('numbers resubmissions after a rejection', async () => {
    const { fixture } = activeProject()
    const first = submit(fixture, 1)
    await attest(fixture, fixture.oracle, first.submission, VerificationResult.REJECTED)
    expect(fixture.protocol.getProject(1).status).toBe(ProjectStatus.ACTIVE)

    const second = submit(fixture, 1)
    expect(second.submission.id).toBe(2)
    expect(fixture.protocol.listSubmissions(1).map((s) => s.result)).toEqual([
      VerificationResult.REJECTED,
      VerificationResult.PENDING,
    ])
  })
})

describe('checkExpiry', () => {
  it('leaves a project alone up to and including its deadline', () => {
    const fixture = createFixture()
    const project = registerProject(fixture, { deadlineIn: DAY })
    fixture.host.setTimestamp(project.deadline)

    expect(fixture.protocol.checkExpiry(project.id)).toBe(ProjectStatus.FUNDING)
    expect(fixture.host.eventsOfType('ProjectExpired')).toEqual([])
  })

  it('expires a Funding project past its deadline, once', () => {
    const fixture = createFixture()
    const project = registerProject(fixture, { deadlineIn: DAY })
    fixture.host.setTimestamp(project.deadline + 1)

    expect(fixture.protocol.checkExpiry(project.id)).toBe(ProjectStatus.EXPIRED)
    expect(fixture.protocol.checkExpiry(project.id)).toBe(ProjectStatus.EXPIRED)
    expect(fixture.host.eventsOfType('ProjectExpired').map(({ projectId, deadline }) => ({ projectId, deadline }))).toEqual([
      { projectId: project.id, deadline: project.deadline },
    ])
  })

  it('expires Active and ProofSubmitted projects too', () => {
    const fixture = createFixture()
    const active = registerProject(fixture, { deadlineIn: DAY })
    donate(fixture, DONOR_A, active.id, 1_000n)
    const pending = registerProject(fixture, { deadlineIn: DAY })
    donate(fixture, DONOR_A, pending.id, 1_000n)
    submit(fixture, pending.id)

    fixture.host.advance(2 * DAY)
    expect(fixture.protocol.checkExpiry(active.id)).toBe(ProjectStatus.EXPIRED)
    expect(fixture.protocol.checkExpiry(pending.id)).toBe(ProjectStatus.EXPIRED)
  })

  it('never touches a Completed project', async () => {
    const fixture = createFixture()
    const project = registerProject(fixture, { deadlineIn: DAY })
    donate(fixture, DONOR_A, project.id, 1_000n)
    const { submission } = submit(fixture, project.id)
    await attest(fixture, fixture.oracle, submission, VerificationResult.VERIFIED)

    fixture.host.advance(2 * DAY)
    expect(fixture.protocol.checkExpiry(project.id)).toBe(ProjectStatus.COMPLETED)
  })
})
