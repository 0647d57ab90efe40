/**
 * Error taxonomy for the client core.
 * Only FatalAuthError is allowed to leave the core; the rest are contained
 * by the component that detects them.
 */

export class ParleyError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'ParleyError'
  }
}

/**
 * Network or timeout failure talking to the backend. Retried with backoff.
 */
export class TransientBackendError extends ParleyError {
  constructor(
    message: string,
    public readonly originalError?: unknown
  ) {
    super(message)
    this.name = 'TransientBackendError'
  }
}

/**
 * Navigation points at a conversation the store no longer has.
 */
export class StaleReference extends ParleyError {
  constructor(public readonly conversationId: string) {
    super(`Conversation ${conversationId} is no longer available`)
    this.name = 'StaleReference'
  }
}

/**
 * Push event the store cannot interpret. Dropped by the reconciler.
 */
export class MalformedEvent extends ParleyError {
  constructor(
    message: string,
    public readonly raw: unknown
  ) {
    super(message)
    this.name = 'MalformedEvent'
  }
}

/**
 * Session is no longer valid. Surfaced to the session layer; the core
 * freezes its view and stops issuing requests.
 */
export class FatalAuthError extends ParleyError {
  constructor(message: string) {
    super(message)
    this.name = 'FatalAuthError'
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error'
}
