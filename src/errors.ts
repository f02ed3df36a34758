import {quote} from './core/utils.js'

export class PodrunError extends Error {
  constructor(
    readonly code: string,
    message: string,
    options?: {cause?: unknown}
  ) {
    super(message, options)
    this.name = 'PodrunError'
  }

  get transient(): boolean {
    return false
  }
}

// -- Mount errors ------------------------------------------------------------

export class MountError extends PodrunError {
  constructor(code: string, message: string, options?: {cause?: unknown}) {
    super(code, message, options)
    this.name = 'MountError'
  }
}

export class PathResolutionError extends MountError {
  constructor(readonly path: string, options?: {cause?: unknown}) {
    super('PATH_NOT_FOUND', `Input path not found: "${path}"`, options)
    this.name = 'PathResolutionError'
  }
}

export class UnsupportedPathError extends MountError {
  constructor(readonly path: string, reason: string, options?: {cause?: unknown}) {
    super('UNSUPPORTED_PATH', `Unsupported path "${path}": ${reason}`, options)
    this.name = 'UnsupportedPathError'
  }
}

// -- Engine errors -----------------------------------------------------------

export class EngineError extends PodrunError {
  constructor(code: string, message: string, options?: {cause?: unknown}) {
    super(code, message, options)
    this.name = 'EngineError'
  }
}

export class ExecutableNotFoundError extends EngineError {
  constructor(readonly executable: string, options?: {cause?: unknown}) {
    super('EXECUTABLE_NOT_FOUND', `Container engine not found or not executable: "${executable}"`, options)
    this.name = 'ExecutableNotFoundError'
  }

  override get transient(): boolean {
    return true
  }
}

export type ContainerFailure = {
  exitCode: number;
  commandArgs: string[];
  engineArgs: string[];
  stdout: string;
  stderr: string;
}

export class ContainerExecutionError extends EngineError {
  readonly exitCode: number
  readonly commandArgs: string[]
  readonly engineArgs: string[]
  readonly stdout: string
  readonly stderr: string

  constructor(failure: ContainerFailure, options?: {cause?: unknown}) {
    super(
      'CONTAINER_FAILED',
      `Command failed with exit code ${failure.exitCode}: ${quote(failure.commandArgs)}\n- Engine args: ${quote(failure.engineArgs)}`,
      options
    )
    this.name = 'ContainerExecutionError'
    this.exitCode = failure.exitCode
    this.commandArgs = failure.commandArgs
    this.engineArgs = failure.engineArgs
    this.stdout = failure.stdout
    this.stderr = failure.stderr
  }
}

export class ContainerTimeoutError extends EngineError {
  constructor(readonly timeoutMs: number, readonly engineArgs: string[], options?: {cause?: unknown}) {
    super('CONTAINER_TIMEOUT', `Container exceeded timeout of ${timeoutMs}ms`, options)
    this.name = 'ContainerTimeoutError'
  }
}

export class ContainerCancelledError extends EngineError {
  constructor(readonly engineArgs: string[], options?: {cause?: unknown}) {
    super('CONTAINER_CANCELLED', 'Container run was cancelled', options)
    this.name = 'ContainerCancelledError'
  }
}

// -- Output errors -----------------------------------------------------------

export class OutputError extends PodrunError {
  constructor(code: string, message: string, options?: {cause?: unknown}) {
    super(code, message, options)
    this.name = 'OutputError'
  }
}

export class MissingOutputError extends OutputError {
  constructor(readonly template: string, readonly hostPath: string, options?: {cause?: unknown}) {
    super('MISSING_OUTPUT', `Declared output "${template}" was not produced (expected at "${hostPath}")`, options)
    this.name = 'MissingOutputError'
  }
}

// -- Config errors -----------------------------------------------------------

export class ConfigError extends PodrunError {
  constructor(code: string, message: string, options?: {cause?: unknown}) {
    super(code, message, options)
    this.name = 'ConfigError'
  }
}

export class InvalidConfigError extends ConfigError {
  constructor(message: string, options?: {cause?: unknown}) {
    super('INVALID_CONFIG', message, options)
    this.name = 'InvalidConfigError'
  }
}

export class InvalidRequestError extends ConfigError {
  constructor(message: string, options?: {cause?: unknown}) {
    super('INVALID_REQUEST', message, options)
    this.name = 'InvalidRequestError'
  }
}
