import {mkdir, mkdtemp, readFile, realpath} from 'node:fs/promises'
import {tmpdir} from 'node:os'
import {dirname, extname, join, resolve} from 'node:path'
import {parse as parseDotenv} from 'dotenv'
import {parse as parseYaml} from 'yaml'
import {InvalidConfigError} from '../errors.js'
import {assertApptainerEnv, inferEngine} from '../engine/command-assembler.js'
import type {EngineKind, EnvironmentSpec, ImageOverrideTable, UserMapping} from '../types.js'
import {errorCode} from './utils.js'

/**
 * Options accepted when constructing a runner. Every field is optional.
 */
export type RunnerOptions = {
  /** Command-line flavor. Inferred from the executable name when omitted. */
  engine?: EngineKind;
  /** Engine executable, looked up in PATH unless absolute. Default: `podman`. */
  engineExecutablePath?: string;
  /** Replacement image per logical image. */
  imageOverrides?: Record<string, string>;
  /** Host directory receiving outputs. Default: a fresh temporary directory. */
  dataDir?: string;
  /** Variables set in every container. */
  environ?: Record<string, string>;
  /** dotenv file merged under `environ`. */
  envFile?: string;
  /** Identity inside the container. Default: `host`. */
  userMapping?: UserMapping;
  /** Extra engine flags added to every invocation. */
  extraArgs?: string[];
  /** Give every invocation its own directory below `dataDir`. Default: false. */
  perRunDirectories?: boolean;
  /** Fail when a non-optional declared output is missing after a successful run. Default: false. */
  requireOutputs?: boolean;
  /** Default timeout of every invocation, in milliseconds. */
  timeoutMs?: number;
}

/**
 * Resolved, immutable runner configuration shared by all invocations.
 */
export type RunnerConfig = Readonly<{
  engine: EngineKind;
  engineExecutablePath: string;
  imageOverrides: ImageOverrideTable;
  dataDir: string;
  environ: EnvironmentSpec;
  userMapping: UserMapping;
  extraArgs: readonly string[];
  perRunDirectories: boolean;
  requireOutputs: boolean;
  timeoutMs?: number;
}>

const envName = /^[A-Za-z_]\w*$/
const engines: readonly EngineKind[] = ['podman', 'apptainer']
const userMappings: readonly UserMapping[] = ['host', 'root']

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function stringRecord(value: unknown, field: string): Record<string, string> {
  if (!isRecord(value)) {
    throw new InvalidConfigError(`${field} must be a mapping of strings`)
  }

  const record: Record<string, string> = {}
  for (const [key, entry] of Object.entries(value)) {
    if (typeof entry !== 'string') {
      throw new InvalidConfigError(`${field}.${key} must be a string`)
    }

    record[key] = entry
  }

  return record
}

function optionalString(raw: Record<string, unknown>, field: string): string | undefined {
  const value = raw[field]
  if (value === undefined) {
    return undefined
  }

  if (typeof value !== 'string' || value.length === 0) {
    throw new InvalidConfigError(`${field} must be a non-empty string`)
  }

  return value
}

function optionalBoolean(raw: Record<string, unknown>, field: string): boolean | undefined {
  const value = raw[field]
  if (value === undefined || typeof value === 'boolean') {
    return value
  }

  throw new InvalidConfigError(`${field} must be a boolean`)
}

function optionalNumber(raw: Record<string, unknown>, field: string): number | undefined {
  const value = raw[field]
  if (value === undefined || typeof value === 'number') {
    return value
  }

  throw new InvalidConfigError(`${field} must be a number`)
}

function optionalStringArray(raw: Record<string, unknown>, field: string): string[] | undefined {
  const value = raw[field]
  if (value === undefined) {
    return undefined
  }

  if (!Array.isArray(value)) {
    throw new InvalidConfigError(`${field} must be an array of strings`)
  }

  return value.map(entry => {
    if (typeof entry !== 'string') {
      throw new InvalidConfigError(`${field} must be an array of strings`)
    }

    return entry
  })
}

function validateEnviron(environ: Record<string, string>): void {
  for (const name of Object.keys(environ)) {
    if (!envName.test(name)) {
      throw new InvalidConfigError(`Invalid environment variable name: '${name}'`)
    }
  }
}

export function validateTimeout(timeoutMs: number | undefined): void {
  if (timeoutMs !== undefined && (!Number.isInteger(timeoutMs) || timeoutMs <= 0)) {
    throw new InvalidConfigError(`timeoutMs must be a positive integer, got ${timeoutMs}`)
  }
}

function parseEngine(value: string | undefined): EngineKind | undefined {
  if (value === undefined) {
    return undefined
  }

  const engine = engines.find(candidate => candidate === value)
  if (!engine) {
    throw new InvalidConfigError(`engine must be one of ${engines.join(', ')}, got '${value}'`)
  }

  return engine
}

function parseUserMapping(value: string | undefined): UserMapping | undefined {
  if (value === undefined) {
    return undefined
  }

  const mapping = userMappings.find(candidate => candidate === value)
  if (!mapping) {
    throw new InvalidConfigError(`userMapping must be one of ${userMappings.join(', ')}, got '${value}'`)
  }

  return mapping
}

/**
 * Reads a dotenv file into an environment map.
 */
export async function loadEnvFile(filePath: string): Promise<Record<string, string>> {
  const content = await readFile(filePath, 'utf8')
  return parseDotenv(content)
}

/**
 * Applies defaults, validates the options and freezes the result.
 *
 * Creates `dataDir` when it does not exist, or a fresh temporary directory
 * when it is omitted, and resolves it to its canonical path. Variables
 * from `envFile` are overridden by `environ`.
 */
export async function resolveRunnerConfig(options: RunnerOptions = {}): Promise<RunnerConfig> {
  const engineExecutablePath = options.engineExecutablePath ?? 'podman'
  if (engineExecutablePath.length === 0) {
    throw new InvalidConfigError('engineExecutablePath must not be empty')
  }

  const engine = parseEngine(options.engine) ?? inferEngine(engineExecutablePath)
  const userMapping = parseUserMapping(options.userMapping) ?? 'host'
  const imageOverrides = stringRecord(options.imageOverrides ?? {}, 'imageOverrides')

  const fileEnviron = options.envFile ? await loadEnvFile(options.envFile) : {}
  const environ = {...fileEnviron, ...stringRecord(options.environ ?? {}, 'environ')}
  validateEnviron(environ)
  if (engine === 'apptainer') {
    assertApptainerEnv(environ)
  }

  validateTimeout(options.timeoutMs)

  let dataDir: string
  if (options.dataDir) {
    dataDir = resolve(options.dataDir)
    await mkdir(dataDir, {recursive: true})
  } else {
    dataDir = await mkdtemp(join(tmpdir(), 'podrun-'))
  }

  // Host paths handed back must match the canonical paths of the mounts
  dataDir = await realpath(dataDir)

  return Object.freeze({
    engine,
    engineExecutablePath,
    imageOverrides: Object.freeze(imageOverrides),
    dataDir,
    environ: Object.freeze(environ),
    userMapping,
    extraArgs: Object.freeze([...(options.extraArgs ?? [])]),
    perRunDirectories: options.perRunDirectories ?? false,
    requireOutputs: options.requireOutputs ?? false,
    timeoutMs: options.timeoutMs
  })
}

export function parseConfigFile(content: string, filePath: string): unknown {
  const ext = extname(filePath).toLowerCase()
  if (ext === '.yaml' || ext === '.yml') {
    return parseYaml(content)
  }

  return JSON.parse(content)
}

/**
 * Validates raw runner options read from a file. Relative `dataDir` and
 * `envFile` paths are resolved against `baseDir`.
 */
export function parseRunnerOptions(raw: unknown, baseDir: string): RunnerOptions {
  if (raw === null || raw === undefined) {
    return {}
  }

  if (!isRecord(raw)) {
    throw new InvalidConfigError('Runner configuration must be a mapping')
  }

  const timeoutMs = optionalNumber(raw, 'timeoutMs')
  validateTimeout(timeoutMs)

  const dataDir = optionalString(raw, 'dataDir')
  const envFile = optionalString(raw, 'envFile')

  return {
    engine: parseEngine(optionalString(raw, 'engine')),
    engineExecutablePath: optionalString(raw, 'engineExecutablePath'),
    imageOverrides: raw.imageOverrides === undefined ? undefined : stringRecord(raw.imageOverrides, 'imageOverrides'),
    dataDir: dataDir === undefined ? undefined : resolve(baseDir, dataDir),
    environ: raw.environ === undefined ? undefined : stringRecord(raw.environ, 'environ'),
    envFile: envFile === undefined ? undefined : resolve(baseDir, envFile),
    userMapping: parseUserMapping(optionalString(raw, 'userMapping')),
    extraArgs: optionalStringArray(raw, 'extraArgs'),
    perRunDirectories: optionalBoolean(raw, 'perRunDirectories'),
    requireOutputs: optionalBoolean(raw, 'requireOutputs'),
    timeoutMs
  }
}

/**
 * Loads runner options from a YAML or JSON file.
 * Returns empty options when the file does not exist.
 */
export async function loadRunnerOptions(filePath: string): Promise<RunnerOptions> {
  let content: string
  try {
    content = await readFile(filePath, 'utf8')
  } catch (error: unknown) {
    if (errorCode(error) === 'ENOENT') {
      return {}
    }

    throw error
  }

  return parseRunnerOptions(parseConfigFile(content, filePath), dirname(resolve(filePath)))
}
