export class InvalidArgumentError extends Error {
  static readonly CODE = "A001"
  readonly code: typeof InvalidArgumentError.CODE = InvalidArgumentError.CODE
  override readonly name = "InvalidArgumentError"

  constructor(
    message: string,
    readonly argument: string
  ) {
    super(message)
  }
}

export class IllegalStateError extends Error {
  static readonly CODE = "S001"
  readonly code: typeof IllegalStateError.CODE = IllegalStateError.CODE
  override readonly name = "IllegalStateError"

  constructor(
    message: string,
    readonly contextId?: string
  ) {
    super(message)
  }
}

export class HandlerFailureError extends Error {
  static readonly CODE = "H001"
  readonly code: typeof HandlerFailureError.CODE = HandlerFailureError.CODE
  override readonly name = "HandlerFailureError"

  constructor(
    readonly contextId: string,
    readonly error: unknown,
    cause: unknown,
    /** Response observers that also failed while the context responded. */
    readonly observerErrors: readonly unknown[] = []
  ) {
    const causeMsg = cause instanceof Error ? cause.message : String(cause)
    super(`Exception handler failed for context ${contextId}: ${causeMsg}`, { cause })
  }
}
