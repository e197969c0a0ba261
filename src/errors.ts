export type ErrorKind =
  | 'ParseError'
  | 'TemplateError'
  | 'ConfigError'
  | 'FilesystemError'
  | 'EncodeError'
  | 'TimedOut'
  | 'Cancelled'

/**
 * Base class of every error this package raises on purpose. `kind` lets
 * callers switch on the failure without `instanceof` chains.
 */
export abstract class CueSplitError extends Error {
  abstract readonly kind: ErrorKind

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = new.target.name
  }
}

/**
 * A structural problem in a cuesheet. `line` is 1-based.
 */
export class ParseError extends CueSplitError {
  readonly kind = 'ParseError'

  constructor(
    readonly line: number,
    readonly reason: string,
    readonly text = ''
  ) {
    super(text ? `line ${line}: ${reason}\n> ${text}` : `line ${line}: ${reason}`)
  }
}

export class TemplateError extends CueSplitError {
  readonly kind = 'TemplateError'
}

export class ConfigError extends CueSplitError {
  readonly kind = 'ConfigError'
}

export class FilesystemError extends CueSplitError {
  readonly kind = 'FilesystemError'

  constructor(
    message: string,
    readonly path: string,
    options?: { cause?: unknown }
  ) {
    super(message, options)
  }
}

/**
 * The encoder could not be started or exited unsuccessfully. `stderrTail`
 * holds the last lines it wrote to stderr.
 */
export class EncodeError extends CueSplitError {
  readonly kind = 'EncodeError'

  constructor(
    message: string,
    readonly exitCode: number | null,
    readonly stderrTail = '',
    options?: { cause?: unknown }
  ) {
    super(message, options)
  }
}

export class TimedOutError extends CueSplitError {
  readonly kind = 'TimedOut'

  constructor(readonly timeoutMs: number) {
    super(`encoder did not finish within ${timeoutMs} ms`)
  }
}

export class CancelledError extends CueSplitError {
  readonly kind = 'Cancelled'

  constructor(message = 'cancelled') {
    super(message)
  }
}

/** Errors that end a single job without affecting its siblings. */
export type JobError =
  | FilesystemError
  | EncodeError
  | TimedOutError
  | CancelledError

export function isJobError(error: unknown): error is JobError {
  return (
    error instanceof FilesystemError ||
    error instanceof EncodeError ||
    error instanceof TimedOutError ||
    error instanceof CancelledError
  )
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}
