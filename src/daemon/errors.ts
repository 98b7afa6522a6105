/**
 * Error taxonomy surfaced by the HTTP API.
 *
 * Every class carries its HTTP status and a machine-readable code; the
 * server's error handler turns them into `{ success: false, error, message }`.
 */

export class HubError extends Error {
  readonly statusCode: number
  readonly code: string

  constructor(statusCode: number, code: string, message: string) {
    super(message)
    this.name = 'HubError'
    this.statusCode = statusCode
    this.code = code
  }

  /** Extra fields merged into the JSON error body. */
  extra(): Record<string, unknown> {
    return {}
  }

  toBody(): Record<string, unknown> {
    return { success: false, error: this.code, message: this.message, ...this.extra() }
  }
}

export class ValidationError extends HubError {
  readonly field: string
  constructor(field: string, message: string) {
    super(400, 'validation_failed', message)
    this.name = 'ValidationError'
    this.field = field
  }

  extra(): Record<string, unknown> {
    return { field: this.field }
  }
}

export class UnsupportedFormatError extends HubError {
  readonly format: string
  constructor(format: string, supported: readonly string[]) {
    super(400, 'unsupported_format', `Unsupported export format '${format}'; supported: ${supported.join(', ')}`)
    this.name = 'UnsupportedFormatError'
    this.format = format
  }
}

export class SessionNotFoundError extends HubError {
  readonly instanceId: string
  constructor(instanceId: string) {
    super(404, 'instance_not_found', `Automation instance not found: ${instanceId}`)
    this.name = 'SessionNotFoundError'
    this.instanceId = instanceId
  }
}

export class SessionConflictError extends HubError {
  readonly instanceId: string
  constructor(instanceId: string) {
    super(409, 'instance_exists', `Automation instance already exists: ${instanceId}`)
    this.name = 'SessionConflictError'
    this.instanceId = instanceId
  }
}

export class TestsRunningError extends HubError {
  constructor(suite: string) {
    super(409, 'tests_running', `A test run is already in progress (${suite})`)
    this.name = 'TestsRunningError'
  }
}

export class DriverError extends HubError {
  readonly action: string
  constructor(action: string, message: string, options?: { cause?: unknown }) {
    super(500, 'driver_error', message)
    this.name = 'DriverError'
    this.action = action
    if (options && 'cause' in options) this.cause = options.cause
  }

  extra(): Record<string, unknown> {
    return { action: this.action }
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}
