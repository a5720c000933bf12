/**
 * Contract error taxonomy. Every failure aborts the enclosing transaction;
 * the host rolls storage back, so callers only ever see the thrown error.
 */

export type ProtocolErrorCode =
  | 'InvalidParameters'
  | 'InvalidState'
  | 'InvalidAmount'
  | 'Unauthorized'
  | 'UnauthorizedOracle'
  | 'AlreadySettled'
  | 'ProjectNotFound'
  | 'DonationNotFound'
  | 'SubmissionNotFound'
  | 'InsufficientBalance'
  | 'AlreadyInitialized'
  | 'NotInitialized'

export class ProtocolError extends Error {
  readonly code: ProtocolErrorCode

  constructor(code: ProtocolErrorCode, message: string) {
    super(`${code}: ${message}`)
    this.name = 'ProtocolError'
    this.code = code
  }
}

export function isProtocolError(err: unknown, code?: ProtocolErrorCode): err is ProtocolError {
  return err instanceof ProtocolError && (code === undefined || err.code === code)
}

export function fail(code: ProtocolErrorCode, message: string): never {
  throw new ProtocolError(code, message)
}
