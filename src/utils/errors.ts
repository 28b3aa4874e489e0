/**
 * Error types and formatting helpers.
 */

export class ConfigError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'ConfigError'
  }
}

/**
 * Non-2xx response from the Hub.
 */
export class HubRequestError extends Error {
  readonly status: number
  readonly statusText: string
  readonly url: string

  constructor(status: number, statusText: string, url: string) {
    super(`HTTP ${status}${statusText ? ` ${statusText}` : ''} (${url})`)
    this.name = 'HubRequestError'
    this.status = status
    this.statusText = statusText
    this.url = url
  }
}

export class RequestTimeoutError extends Error {
  readonly timeoutMs: number

  constructor(url: string, timeoutMs: number, options?: { cause?: unknown }) {
    super(`Request timed out after ${timeoutMs} ms (${url})`, options)
    this.name = 'RequestTimeoutError'
    this.timeoutMs = timeoutMs
  }
}

/**
 * 2xx response whose body is not the expected list shape.
 */
export class HubResponseError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'HubResponseError'
  }
}

export class SearchError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'SearchError'
  }
}

export class ExportError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'ExportError'
  }
}

function isKnownError(err: Error): boolean {
  return (
    err instanceof ConfigError ||
    err instanceof HubRequestError ||
    err instanceof RequestTimeoutError ||
    err instanceof HubResponseError ||
    err instanceof SearchError ||
    err instanceof ExportError
  )
}

/**
 * Known errors print as their message; anything else keeps its stack.
 */
export function formatError(err: unknown): string {
  if (err instanceof Error) {
    if (isKnownError(err)) return err.message
    const stack = err.stack || String(err)
    return stack
  }
  return String(err)
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}
