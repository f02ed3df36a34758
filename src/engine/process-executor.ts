import process from 'node:process'
import {constants} from 'node:os'
import {execa} from 'execa'
import {
  ContainerCancelledError,
  ContainerTimeoutError,
  ExecutableNotFoundError,
  InvalidConfigError
} from '../errors.js'
import {errorCode} from '../core/utils.js'
import type {ExecutionResult} from '../types.js'

/**
 * Log line from container execution.
 */
export type LogLine = {
  /** Output stream (stdout or stderr) */
  stream: 'stdout' | 'stderr';
  /** Log line content */
  line: string;
}

/**
 * Callback for receiving container output while it is produced.
 */
export type OnLogLine = (log: LogLine) => void

export type ProcessRunOptions = {
  /** Called for every output line. Output is captured either way. */
  onLogLine?: OnLogLine;
  /** Terminate the engine after this many milliseconds. */
  timeoutMs?: number;
  /** Terminate the engine when aborted. */
  signal?: AbortSignal;
}

/**
 * Abstract interface for running the container engine.
 *
 * Implementations:
 * - `EngineProcessExecutor`: spawns the engine CLI through execa
 * - Test doubles recording the argument vectors they receive
 *
 * `run` resolves with the exit code and the complete captured output, also
 * when the exit code is nonzero. Interpreting the exit code is up to the
 * caller.
 */
export abstract class ProcessExecutor {
  /**
   * Verifies that the engine can be started.
   * @returns First line of `<executable> --version`
   * @throws ExecutableNotFoundError
   */
  abstract check(executable: string): Promise<string>

  /**
   * Runs one engine command line to completion.
   * @param argv - Engine executable followed by its arguments
   * @throws ExecutableNotFoundError if the executable cannot be started
   * @throws ContainerTimeoutError when `timeoutMs` elapses
   * @throws ContainerCancelledError when `signal` is aborted
   */
  abstract run(argv: readonly string[], options?: ProcessRunOptions): Promise<ExecutionResult>
}

const engineEnvNames = new Set(['PATH', 'HOME', 'XDG_RUNTIME_DIR', 'TMPDIR'])
const engineEnvPrefixes = ['CONTAINERS_', 'APPTAINER_', 'SINGULARITY_']

/**
 * Build a minimal environment for the engine CLI process.
 * Only what podman and apptainer need to find their storage and runtime
 * directories is kept. The container environment is passed with explicit
 * flags and never inherited from this process.
 */
export function engineEnv(source: NodeJS.ProcessEnv = process.env): Record<string, string> {
  const env: Record<string, string> = {}
  for (const [key, value] of Object.entries(source)) {
    if (value !== undefined && (engineEnvNames.has(key) || engineEnvPrefixes.some(prefix => key.startsWith(prefix)))) {
      env[key] = value
    }
  }

  return env
}

function signalNumber(signal: string): number {
  const entry = Object.entries(constants.signals).find(([name]) => name === signal)
  return entry ? Number(entry[1]) : 0
}

export class EngineProcessExecutor extends ProcessExecutor {
  constructor(private readonly env: Record<string, string> = engineEnv()) {
    super()
  }

  async check(executable: string): Promise<string> {
    try {
      const {stdout} = await execa(executable, ['--version'], {env: this.env, extendEnv: false})
      return stdout.split('\n')[0].trim()
    } catch (error) {
      throw new ExecutableNotFoundError(executable, {cause: error})
    }
  }

  async run(argv: readonly string[], options: ProcessRunOptions = {}): Promise<ExecutionResult> {
    if (argv.length === 0) {
      throw new InvalidConfigError('Cannot run an empty command line')
    }

    const [executable, ...args] = argv
    const startedAt = Date.now()
    const proc = execa(executable, args, {
      env: this.env,
      extendEnv: false,
      reject: false,
      stdin: 'ignore',
      stripFinalNewline: false,
      timeout: options.timeoutMs,
      cancelSignal: options.signal
    })

    // Iteration also rejects when the subprocess itself fails; that failure
    // is reported from the result, anything else is rethrown below.
    let streamError: unknown
    const {onLogLine} = options
    if (onLogLine) {
      const stdoutDone = (async () => {
        for await (const line of proc.iterable({from: 'stdout'})) {
          onLogLine({stream: 'stdout', line: String(line)})
        }
      })()

      const stderrDone = (async () => {
        for await (const line of proc.iterable({from: 'stderr'})) {
          onLogLine({stream: 'stderr', line: String(line)})
        }
      })()

      const settled = await Promise.allSettled([stdoutDone, stderrDone])
      const rejected = settled.find(outcome => outcome.status === 'rejected')
      if (rejected?.status === 'rejected') {
        streamError = rejected.reason
      }
    }

    const result = await proc
    if (streamError !== undefined && !result.failed) {
      throw streamError
    }

    if (result.timedOut) {
      throw new ContainerTimeoutError(options.timeoutMs ?? 0, [...argv], {cause: result})
    }

    if (result.isCanceled) {
      throw new ContainerCancelledError([...argv], {cause: result})
    }

    let {exitCode} = result
    if (exitCode === undefined) {
      if (result.signal) {
        // Shell convention for a process killed by a signal
        exitCode = 128 + signalNumber(result.signal)
      } else {
        const code = errorCode(result)
        if (code === 'ENOENT' || code === 'EACCES') {
          throw new ExecutableNotFoundError(executable, {cause: result})
        }

        throw result
      }
    }

    return {
      exitCode,
      stdout: result.stdout,
      stderr: result.stderr,
      argv: [...argv],
      durationMs: Date.now() - startedAt
    }
  }
}
