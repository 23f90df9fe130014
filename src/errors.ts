export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E }

export function ok<T>(value: T): { ok: true; value: T } {
  return { ok: true, value }
}

export function fail<E>(error: E): { ok: false; error: E } {
  return { ok: false, error }
}

export class LanSendError extends Error {
  readonly code: string

  constructor(code: string, message: string) {
    super(message)
    this.name = new.target.name
    this.code = code
  }
}

export type NegotiationErrorKind = 'rejected' | 'unreachable' | 'protocol' | 'identity-mismatch' | 'cancelled'

export class NegotiationError extends LanSendError {
  readonly kind: NegotiationErrorKind
  readonly status: number | undefined

  constructor(kind: NegotiationErrorKind, message: string, status?: number) {
    super(`negotiation-${kind}`, message)
    this.kind = kind
    this.status = status
  }
}

/** Replayed, forged or already-consumed upload credentials. */
export class TokenInvalidError extends LanSendError {
  constructor(message = 'Invalid token') {
    super('token-invalid', message)
  }
}

export class AlreadyCompletedError extends LanSendError {
  constructor(message = 'File already received') {
    super('already-completed', message)
  }
}

export class TransferIOError extends LanSendError {
  constructor(message: string) {
    super('transfer-io', message)
  }
}

export class CancelledError extends LanSendError {
  constructor(message = 'Cancelled') {
    super('cancelled', message)
  }
}

export class SizeMismatchError extends LanSendError {
  readonly exceeded: boolean

  constructor(message: string, exceeded: boolean) {
    super('size-mismatch', message)
    this.exceeded = exceeded
  }
}

export class IdentityMismatchError extends LanSendError {
  constructor(message: string) {
    super('identity-mismatch', message)
  }
}
