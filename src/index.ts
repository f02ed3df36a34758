/**
 * Runner adapter executing declarative tool invocations in podman or
 * apptainer containers.
 *
 * For CLI usage, see src/cli/index.ts
 *
 * @example
 * ```typescript
 * import {ContainerRunner} from 'podrun'
 *
 * const runner = await ContainerRunner.create({
 *   engineExecutablePath: 'podman',
 *   dataDir: '/scratch',
 *   imageOverrides: {'biocontainers/samtools:1.19': 'registry.local/samtools:1.19'}
 * })
 *
 * const {outputs} = await runner.execute({
 *   tool: 'samtools-sort',
 *   image: 'biocontainers/samtools:1.19',
 *   args: ['samtools', 'sort', '-o', {kind: 'output', template: 'sorted.bam'}, {kind: 'input', path: '/data/reads.bam'}]
 * })
 *
 * console.log(outputs['sorted.bam']) // /scratch/sorted.bam
 * ```
 */

export {
  ContainerRunner,
  type ExecuteOptions,
  type PreparedInvocation,
  type RunnerDependencies
} from './core/runner.js'
export {Execution, type ToolMetadata, type ExecutionRunOptions} from './core/execution.js'
export {
  resolveRunnerConfig,
  loadRunnerOptions,
  parseRunnerOptions,
  loadEnvFile,
  type RunnerOptions,
  type RunnerConfig
} from './core/config.js'
export {parseInvocationRequest, loadInvocationRequest} from './core/request.js'
export {createLogger, type Logger} from './core/logger.js'
export {quote, formatDuration} from './core/utils.js'

export {
  PathMapper,
  computeMounts,
  normalizeOutputTemplate,
  PathTranslationTable,
  resolveImage,
  assembleCommand,
  apptainerImage,
  inferEngine,
  ProcessExecutor,
  EngineProcessExecutor,
  engineEnv,
  type AssembleInput,
  type InputOptions,
  type MountPlan,
  type LogLine,
  type OnLogLine,
  type ProcessRunOptions
} from './engine/index.js'

export type {
  ArgToken,
  InputToken,
  OutputToken,
  OutputDeclaration,
  InvocationRequest,
  InvocationOutcome,
  ExecutionResult,
  MountEntry,
  MountMode,
  EngineKind,
  UserMapping,
  EnvironmentSpec,
  ImageOverrideTable
} from './types.js'

export {
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
  InvalidRequestError,
  type ContainerFailure
} from './errors.js'
