export class BasketeerError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = new.target.name
  }
}

/** Token endpoint rejected a grant, or answered 200 without usable token data. */
export class AuthError extends BasketeerError {
  constructor(
    message: string,
    readonly status: number,
    readonly body: string
  ) {
    super(message)
  }
}

export class InvalidGrantRequestError extends BasketeerError {}

/**
 * The callback listener could not bind its port. Not a failure of the flow:
 * the orchestrator falls back to manual code entry when it sees this.
 */
export class ListenerUnavailableError extends BasketeerError {
  constructor(
    readonly port: number,
    cause: unknown
  ) {
    super(`Callback listener unavailable on port ${port}`, { cause })
  }
}

export class NoCodeObtainedError extends BasketeerError {
  constructor(readonly providerId: string) {
    super('No authorization code received.')
  }
}

export class TransportError extends BasketeerError {
  constructor(method: string, url: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause)
    super(`${method} ${url} failed: ${reason}`, { cause })
  }
}

export class ResourceError extends BasketeerError {
  constructor(
    message: string,
    readonly status: number,
    readonly body: string
  ) {
    super(message)
  }
}

export class ProductSearchError extends ResourceError {}
export class StoreError extends ResourceError {}
export class CartError extends ResourceError {}
export class TaskListError extends ResourceError {}

/** User-facing abort of a wizard step (missing input, invalid selection). */
export class SetupError extends BasketeerError {}

export class ConfigError extends BasketeerError {}
