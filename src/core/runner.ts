import {access, rm} from 'node:fs/promises'
import {join, posix} from 'node:path'
import {
  ContainerExecutionError,
  InvalidConfigError,
  MissingOutputError,
  UnsupportedPathError
} from '../errors.js'
import {assembleCommand} from '../engine/command-assembler.js'
import {resolveImage} from '../engine/image-resolver.js'
import {computeMounts, type MountPlan} from '../engine/path-mapper.js'
import {EngineProcessExecutor, type OnLogLine, type ProcessExecutor} from '../engine/process-executor.js'
import type {InvocationOutcome, InvocationRequest} from '../types.js'
import {resolveRunnerConfig, validateTimeout, type RunnerConfig, type RunnerOptions} from './config.js'
import {Execution, type ToolMetadata} from './execution.js'
import {createLogger, type Logger} from './logger.js'
import {parseInvocationRequest} from './request.js'
import {errorCode, formatDuration, generateId, slugify} from './utils.js'

export type ExecuteOptions = {
  /** Receives container output line by line. Default: debug log lines. */
  onLogLine?: OnLogLine;
  /** Overrides the runner's default timeout. */
  timeoutMs?: number;
  /** Terminates the container run when aborted. */
  signal?: AbortSignal;
}

/**
 * Invocation whose paths are already mapped, ready to be assembled and run.
 */
export type PreparedInvocation = {
  tool: string;
  /** Package the tool belongs to, for logs. */
  package?: string;
  image: string;
  plan: MountPlan;
  /** Container-relative executable and arguments. */
  argv: string[];
  workdir?: string;
  /** Templates that may be absent after a successful run. */
  optionalOutputs?: ReadonlySet<string>;
}

export type RunnerDependencies = {
  executor?: ProcessExecutor;
  logger?: Logger;
}

/**
 * Runs tool invocations in podman or apptainer containers.
 *
 * Each `execute` call maps the request's host paths into bind mounts,
 * resolves the image, assembles the engine command line and runs it. On a
 * zero exit the declared outputs are translated back into host paths; a
 * nonzero exit raises `ContainerExecutionError`. Runs are never retried.
 *
 * Invocations share nothing but the frozen configuration, so one runner can
 * serve concurrent `execute` calls.
 *
 * @example
 * ```typescript
 * const runner = await ContainerRunner.create({dataDir: '/scratch'})
 * const {outputs} = await runner.execute({
 *   tool: 'wc',
 *   image: 'alpine:3.20',
 *   args: ['sh', '-c', 'wc -l < "$0" > "$1"', {kind: 'input', path: '/data/in.txt'}, {kind: 'output', template: 'out.txt'}]
 * })
 * outputs['out.txt'] // '/scratch/out.txt'
 * ```
 */
export class ContainerRunner {
  /**
   * Resolves the options and creates a runner.
   * @throws InvalidConfigError on invalid options
   */
  static async create(options: RunnerOptions = {}, dependencies: RunnerDependencies = {}): Promise<ContainerRunner> {
    const config = await resolveRunnerConfig(options)
    return new ContainerRunner(
      config,
      dependencies.executor ?? new EngineProcessExecutor(),
      dependencies.logger ?? createLogger()
    )
  }

  constructor(
    readonly config: RunnerConfig,
    private readonly executor: ProcessExecutor,
    private readonly logger: Logger
  ) {}

  /**
   * Verifies that the configured engine can be started.
   * @returns Engine version line
   */
  async check(): Promise<string> {
    return this.executor.check(this.config.engineExecutablePath)
  }

  /**
   * Runs one invocation to completion.
   * @returns Host path of every declared output
   * @throws PathResolutionError if an input is missing (before anything is spawned)
   * @throws ContainerExecutionError if the tool exits nonzero
   */
  async execute(request: InvocationRequest, options: ExecuteOptions = {}): Promise<InvocationOutcome> {
    const validated = parseInvocationRequest(request)
    validateTimeout(options.timeoutMs)

    const outputRoot = this.outputRootFor(validated.tool)
    let plan: MountPlan & {argv: string[]}
    try {
      plan = await computeMounts(validated, outputRoot)
    } catch (error) {
      // A per-run directory is created for this invocation only
      if (this.config.perRunDirectories) {
        await rm(outputRoot, {recursive: true, force: true})
      }

      throw error
    }

    const optionalOutputs = new Set(
      (validated.outputs ?? []).filter(output => output.optional).map(output => output.template)
    )

    return this.runPrepared({
      tool: validated.tool,
      image: validated.image,
      plan,
      argv: plan.argv,
      workdir: validated.workdir,
      optionalOutputs
    }, options)
  }

  /**
   * Opens a session for a tool whose inputs and outputs are registered one
   * at a time before it runs.
   * @throws InvalidConfigError if the metadata names no container image
   */
  startExecution(metadata: ToolMetadata): Execution {
    if (!metadata.containerImageTag) {
      throw new InvalidConfigError(`No container image specified for tool '${metadata.name}'`)
    }

    return new Execution(this, metadata, metadata.containerImageTag, this.outputRootFor(metadata.name))
  }

  /**
   * Assembles and runs an invocation whose paths are already mapped.
   */
  async runPrepared(invocation: PreparedInvocation, options: ExecuteOptions = {}): Promise<InvocationOutcome> {
    const {plan} = invocation
    validateTimeout(options.timeoutMs)

    const workdir = invocation.workdir ?? plan.outputRootPath
    if (!posix.isAbsolute(workdir)) {
      throw new UnsupportedPathError(workdir, 'working directory must be an absolute container path')
    }

    const image = resolveImage(invocation.image, this.config.imageOverrides)
    const engineArgs = assembleCommand({
      engine: this.config.engine,
      executable: this.config.engineExecutablePath,
      image,
      mounts: plan.mounts,
      env: this.config.environ,
      workdir,
      user: this.config.userMapping,
      extraArgs: this.config.extraArgs,
      argv: invocation.argv
    })

    const logger = this.logger.child({tool: invocation.tool})
    logger.debug({engineArgs}, 'running container')

    const result = await this.executor.run(engineArgs, {
      onLogLine: options.onLogLine ?? (({stream, line}) => {
        logger.debug({stream, line}, 'container output')
      }),
      timeoutMs: options.timeoutMs ?? this.config.timeoutMs,
      signal: options.signal
    })

    const label = invocation.package ? `${invocation.package} ${invocation.tool}` : invocation.tool
    logger.info(
      {package: invocation.package, exitCode: result.exitCode, durationMs: result.durationMs},
      `executed ${label} in ${formatDuration(result.durationMs)}`
    )

    if (result.exitCode !== 0) {
      throw new ContainerExecutionError({
        exitCode: result.exitCode,
        commandArgs: invocation.argv,
        engineArgs,
        stdout: result.stdout,
        stderr: result.stderr
      })
    }

    const outputs: Record<string, string> = {}
    for (const [template, containerPath] of plan.outputs) {
      const hostPath = plan.table.toHost(containerPath)
      if (hostPath === undefined) {
        throw new UnsupportedPathError(containerPath, 'output is not inside a mounted directory')
      }

      outputs[template] = hostPath
    }

    if (this.config.requireOutputs) {
      await verifyOutputs(outputs, invocation.optionalOutputs ?? new Set())
    }

    return {
      outputs,
      outputRoot: plan.table.toHost(plan.outputRootPath) ?? this.config.dataDir,
      result
    }
  }

  private outputRootFor(tool: string): string {
    if (!this.config.perRunDirectories) {
      return this.config.dataDir
    }

    return join(this.config.dataDir, `${generateId()}_${slugify(tool)}`)
  }
}

async function verifyOutputs(outputs: Record<string, string>, optional: ReadonlySet<string>): Promise<void> {
  for (const [template, hostPath] of Object.entries(outputs)) {
    if (optional.has(template)) {
      continue
    }

    try {
      await access(hostPath)
    } catch (error) {
      if (errorCode(error) === 'ENOENT') {
        throw new MissingOutputError(template, hostPath, {cause: error})
      }

      throw error
    }
  }
}
