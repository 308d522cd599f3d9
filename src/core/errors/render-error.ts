export type RenderErrorCode = 'io' | 'unsupported'

export class RenderError extends Error {
  constructor(
    message: string,
    public readonly code: RenderErrorCode,
    options?: ErrorOptions
  ) {
    super(message, options)
    this.name = 'RenderError'
  }
}

/**
 * The output sink rejected a write. Bytes written before the failure stay written.
 */
export class RenderIoError extends RenderError {
  constructor(cause: unknown, action: string = 'write rendered ledger') {
    const detail = cause instanceof Error ? `: ${cause.message}` : ''
    super(`Failed to ${action}${detail}`, 'io', { cause })
    this.name = 'RenderIoError'
  }
}

export class UnsupportedDirectiveError extends RenderError {
  constructor(public readonly reason?: string) {
    super(
      reason ? `Cannot render unsupported directive (${reason})` : 'Cannot render unsupported directive',
      'unsupported'
    )
    this.name = 'UnsupportedDirectiveError'
  }
}
