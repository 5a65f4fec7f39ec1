export class ChatEngineError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'ChatEngineError'
  }
}

export class UnknownRoleError extends ChatEngineError {
  readonly roleId: string

  constructor(roleId: string) {
    super(`Unknown role: ${roleId}`)
    this.name = 'UnknownRoleError'
    this.roleId = roleId
  }
}

// Connection refused, non-2xx status, or an in-process engine with no model loaded.
export class BackendUnavailableError extends ChatEngineError {
  readonly status?: number
  readonly body?: unknown

  constructor(message: string, options: { status?: number; body?: unknown; cause?: unknown } = {}) {
    super(message, { cause: options.cause })
    this.name = 'BackendUnavailableError'
    this.status = options.status
    this.body = options.body
  }
}

export class BackendProtocolError extends ChatEngineError {
  readonly record?: string

  constructor(message: string, options: { record?: string; cause?: unknown } = {}) {
    super(message, { cause: options.cause })
    this.name = 'BackendProtocolError'
    this.record = options.record
  }
}

export class CancelledError extends ChatEngineError {
  constructor(message = 'Request cancelled') {
    super(message)
    this.name = 'CancelledError'
  }
}

export const isAbortError = (err: unknown): boolean =>
  err instanceof CancelledError || (err instanceof Error && err.name === 'AbortError')

export const errorMessage = (err: unknown): string => (err instanceof Error ? err.message : String(err))
