import process from 'node:process'
import type {Command} from 'commander'
import {loadRunnerOptions, type RunnerOptions} from '../core/config.js'
import {createLogger, type Logger} from '../core/logger.js'
import {ContainerRunner} from '../core/runner.js'
import {InvalidConfigError} from '../errors.js'
import type {EngineKind} from '../types.js'

export type GlobalOptions = {
  config: string;
  engine?: EngineKind;
  enginePath?: string;
  dataDir?: string;
  imageOverride: string[];
  env: string[];
  envFile?: string;
  json?: boolean;
}

export function getGlobalOptions(cmd: Command): GlobalOptions {
  return cmd.optsWithGlobals<GlobalOptions>()
}

/** Commander collector for repeatable options. */
export function collect(value: string, previous: string[]): string[] {
  return [...previous, value]
}

/**
 * Parses `KEY=VALUE` pairs. The value may itself contain `=`.
 */
export function parseAssignments(pairs: readonly string[], option: string): Record<string, string> {
  const record: Record<string, string> = {}
  for (const pair of pairs) {
    const index = pair.indexOf('=')
    if (index <= 0) {
      throw new InvalidConfigError(`${option} expects KEY=VALUE, got '${pair}'`)
    }

    record[pair.slice(0, index)] = pair.slice(index + 1)
  }

  return record
}

/**
 * Merges the configuration file, environment fallbacks and command-line
 * flags. Flags win over the file, the file wins over the environment.
 */
export async function resolveCliOptions(global: GlobalOptions, env: NodeJS.ProcessEnv = process.env): Promise<RunnerOptions> {
  const fromFile = await loadRunnerOptions(global.config)
  return {
    ...fromFile,
    engine: global.engine ?? fromFile.engine,
    engineExecutablePath: global.enginePath ?? fromFile.engineExecutablePath ?? env.PODRUN_ENGINE_PATH,
    dataDir: global.dataDir ?? fromFile.dataDir ?? env.PODRUN_DATA_DIR,
    imageOverrides: {...fromFile.imageOverrides, ...parseAssignments(global.imageOverride, '--image-override')},
    environ: {...fromFile.environ, ...parseAssignments(global.env, '--env')},
    envFile: global.envFile ?? fromFile.envFile
  }
}

/**
 * Builds a runner from the global options. Under `--json` pino writes to
 * stdout at the configured level; otherwise only warnings reach the
 * terminal unless `LOG_LEVEL` says otherwise.
 */
export async function createCliRunner(cmd: Command): Promise<{runner: ContainerRunner; logger: Logger; json: boolean}> {
  const global = getGlobalOptions(cmd)
  const json = global.json ?? false
  const logger = json ? createLogger() : createLogger({level: process.env.LOG_LEVEL ?? 'warn'})
  const runner = await ContainerRunner.create(await resolveCliOptions(global), {logger})
  return {runner, logger, json}
}
