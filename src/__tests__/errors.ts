import test from 'ava'
import {
  PodrunError,
  MountError,
  PathResolutionError,
  UnsupportedPathError,
  EngineError,
  ExecutableNotFoundError,
  ContainerExecutionError,
  ContainerTimeoutError,
  ContainerCancelledError,
  OutputError,
  MissingOutputError,
  ConfigError,
  InvalidConfigError,
  InvalidRequestError
} from '../errors.js'

// -- instanceof chains -------------------------------------------------------

test('PathResolutionError is instanceof MountError and PodrunError', t => {
  const error = new PathResolutionError('/data/in.txt')
  t.true(error instanceof PathResolutionError)
  t.true(error instanceof MountError)
  t.true(error instanceof PodrunError)
  t.true(error instanceof Error)
})

test('ContainerExecutionError is instanceof EngineError and PodrunError', t => {
  const error = new ContainerExecutionError({exitCode: 1, commandArgs: ['false'], engineArgs: ['podman', 'run'], stdout: '', stderr: ''})
  t.true(error instanceof EngineError)
  t.true(error instanceof PodrunError)
})

test('MissingOutputError is instanceof OutputError', t => {
  t.true(new MissingOutputError('out.txt', '/scratch/out.txt') instanceof OutputError)
})

test('InvalidConfigError and InvalidRequestError are ConfigErrors', t => {
  t.true(new InvalidConfigError('bad') instanceof ConfigError)
  t.true(new InvalidRequestError('bad') instanceof ConfigError)
})

// -- codes -------------------------------------------------------------------

test('every error carries its code', t => {
  t.is(new PathResolutionError('/x').code, 'PATH_NOT_FOUND')
  t.is(new UnsupportedPathError('/x', 'reason').code, 'UNSUPPORTED_PATH')
  t.is(new ExecutableNotFoundError('podman').code, 'EXECUTABLE_NOT_FOUND')
  t.is(new ContainerTimeoutError(1000, []).code, 'CONTAINER_TIMEOUT')
  t.is(new ContainerCancelledError([]).code, 'CONTAINER_CANCELLED')
  t.is(new MissingOutputError('a', '/a').code, 'MISSING_OUTPUT')
  t.is(new InvalidConfigError('bad').code, 'INVALID_CONFIG')
  t.is(new InvalidRequestError('bad').code, 'INVALID_REQUEST')
})

test('name matches the class name', t => {
  t.is(new PathResolutionError('/x').name, 'PathResolutionError')
  t.is(new ContainerTimeoutError(1000, []).name, 'ContainerTimeoutError')
  t.is(new InvalidRequestError('bad').name, 'InvalidRequestError')
})

// -- transient ---------------------------------------------------------------

test('only ExecutableNotFoundError is transient', t => {
  t.true(new ExecutableNotFoundError('podman').transient)
  t.false(new PathResolutionError('/x').transient)
  t.false(new ContainerExecutionError({exitCode: 2, commandArgs: [], engineArgs: [], stdout: '', stderr: ''}).transient)
  t.false(new ContainerTimeoutError(10, []).transient)
  t.false(new InvalidConfigError('bad').transient)
})

// -- messages and fields -----------------------------------------------------

test('ContainerExecutionError message quotes both command lines', t => {
  const error = new ContainerExecutionError({
    exitCode: 3,
    commandArgs: ['sh', '-c', 'exit 3'],
    engineArgs: ['podman', 'run', '--rm', 'alpine:3.20', 'sh', '-c', 'exit 3'],
    stdout: 'out',
    stderr: 'err'
  })

  t.is(
    error.message,
    'Command failed with exit code 3: sh -c \'exit 3\'\n- Engine args: podman run --rm alpine:3.20 sh -c \'exit 3\''
  )
  t.is(error.exitCode, 3)
  t.deepEqual(error.commandArgs, ['sh', '-c', 'exit 3'])
  t.is(error.stdout, 'out')
  t.is(error.stderr, 'err')
})

test('cause is preserved', t => {
  const cause = new Error('ENOENT')
  const error = new PathResolutionError('/missing', {cause})
  t.is(error.cause, cause)
  t.is(error.path, '/missing')
  t.is(error.message, 'Input path not found: "/missing"')
})

test('ContainerTimeoutError exposes the timeout', t => {
  const error = new ContainerTimeoutError(250, ['podman'])
  t.is(error.timeoutMs, 250)
  t.is(error.message, 'Container exceeded timeout of 250ms')
})
