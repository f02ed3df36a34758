import {mkdir, mkdtemp, realpath, writeFile} from 'node:fs/promises'
import {tmpdir} from 'node:os'
import {dirname, join} from 'node:path'
import pino from 'pino'
import {ProcessExecutor, type ProcessRunOptions} from '../engine/process-executor.js'
import type {Logger} from '../core/logger.js'
import type {ExecutionResult} from '../types.js'

/**
 * Creates a temporary directory for test isolation.
 * Each test should use its own tmpdir to avoid interference.
 * The returned path is canonical, like the host paths the mapper returns.
 */
export async function createTmpDir(): Promise<string> {
  return realpath(await mkdtemp(join(tmpdir(), 'podrun-test-')))
}

/**
 * Writes a file, creating its parent directories.
 */
export async function touch(path: string, content = ''): Promise<string> {
  await mkdir(dirname(path), {recursive: true})
  await writeFile(path, content)
  return path
}

/**
 * Logger that drops everything.
 */
export function silentLogger(): Logger {
  return pino({level: 'silent'})
}

/**
 * Logger that keeps every JSON log record for assertions.
 */
export function recordingLogger(): {logger: Logger; records: Array<Record<string, unknown>>} {
  const records: Array<Record<string, unknown>> = []
  const logger = pino({level: 'debug'}, {
    write(line: string) {
      const record: unknown = JSON.parse(line)
      if (typeof record === 'object' && record !== null) {
        records.push({...record})
      }
    }
  })

  return {logger, records}
}

export type RecordedRun = {
  argv: string[];
  options: ProcessRunOptions;
}

type FakeBehavior = {
  exitCode?: number;
  stdout?: string;
  stderr?: string;
  /** Runs before the result is returned, e.g. to write outputs. */
  effect?: (argv: string[]) => Promise<void>;
}

/**
 * Executor that records every command line and never spawns anything.
 */
export class FakeExecutor extends ProcessExecutor {
  readonly runs: RecordedRun[] = []
  readonly checks: string[] = []

  constructor(private readonly behavior: FakeBehavior = {}) {
    super()
  }

  async check(executable: string): Promise<string> {
    this.checks.push(executable)
    return 'fake version 1.0'
  }

  async run(argv: readonly string[], options: ProcessRunOptions = {}): Promise<ExecutionResult> {
    this.runs.push({argv: [...argv], options})
    await this.behavior.effect?.([...argv])

    const stdout = this.behavior.stdout ?? ''
    const stderr = this.behavior.stderr ?? ''
    for (const line of stdout.split('\n').filter(Boolean)) {
      options.onLogLine?.({stream: 'stdout', line})
    }

    for (const line of stderr.split('\n').filter(Boolean)) {
      options.onLogLine?.({stream: 'stderr', line})
    }

    return {
      exitCode: this.behavior.exitCode ?? 0,
      stdout,
      stderr,
      argv: [...argv],
      durationMs: 1
    }
  }
}
