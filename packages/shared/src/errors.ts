/**
 * Error taxonomy shared by the backend and the coordination layer
 */

export type BackendErrorReason = 'spawn' | 'exit' | 'parse' | 'timeout'

export class BackendError extends Error {
  readonly reason: BackendErrorReason
  readonly exitCode?: number

  constructor(reason: BackendErrorReason, message: string, options: { exitCode?: number; cause?: unknown } = {}) {
    super(message, { cause: options.cause })
    this.name = 'BackendError'
    this.reason = reason
    if (options.exitCode !== undefined) {
      this.exitCode = options.exitCode
    }
  }
}

export type RejectionReason = 'duplicate' | 'no-selection' | 'not-applicable'

export class CommandRejected extends Error {
  readonly reason: RejectionReason

  constructor(reason: RejectionReason, message: string) {
    super(message)
    this.name = 'CommandRejected'
    this.reason = reason
  }
}

export function toErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message
  if (typeof error === 'string') return error
  return String(error)
}
