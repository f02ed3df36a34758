import {join} from 'node:path'
import {normalizeOutputTemplate, PathMapper, type InputOptions} from '../engine/path-mapper.js'
import type {InvocationOutcome} from '../types.js'
import type {ContainerRunner} from './runner.js'

/**
 * Tool descriptor fields the runner needs.
 */
export type ToolMetadata = {
  name: string;
  package?: string;
  containerImageTag?: string;
}

export type ExecutionRunOptions = {
  onStdout?: (line: string) => void;
  onStderr?: (line: string) => void;
  timeoutMs?: number;
  signal?: AbortSignal;
}

/**
 * One tool run assembled step by step by a descriptor framework.
 *
 * Inputs are mapped when they are registered, so the value handed back is
 * already the container path. Outputs are registered by template and their
 * host path is returned; they are mapped when the run starts.
 */
export class Execution {
  private readonly mapper: PathMapper
  private readonly outputs = new Map<string, boolean>()

  constructor(
    private readonly runner: ContainerRunner,
    readonly metadata: ToolMetadata,
    readonly image: string,
    readonly outputRoot: string
  ) {
    this.mapper = new PathMapper(outputRoot)
  }

  /**
   * Mounts a host input.
   * @returns Container path to pass to the tool
   * @throws PathResolutionError if the input does not exist
   */
  async inputFile(hostPath: string, options: InputOptions = {}): Promise<string> {
    await this.mapper.mapOutputRoot()
    return this.mapper.mapInput(hostPath, options)
  }

  /**
   * Declares an output.
   * @param localFile - Path relative to the output root
   * @returns Host path the output will be written to
   */
  outputFile(localFile: string, options: {optional?: boolean} = {}): string {
    const normalized = normalizeOutputTemplate(localFile)
    this.outputs.set(localFile, options.optional ?? false)
    return join(this.outputRoot, normalized)
  }

  /** Parameters are passed to the tool unchanged. */
  params<T>(params: T): T {
    return params
  }

  /**
   * Maps the declared outputs and runs the tool.
   * @param cargs - Executable and arguments, with container paths already substituted
   */
  async run(cargs: string[], options: ExecutionRunOptions = {}): Promise<InvocationOutcome> {
    await this.mapper.mapOutputRoot()
    for (const template of this.outputs.keys()) {
      await this.mapper.mapOutput(template)
    }

    const plan = await this.mapper.plan()
    const {onStdout, onStderr} = options
    const optionalOutputs = new Set([...this.outputs].filter(([, optional]) => optional).map(([template]) => template))

    return this.runner.runPrepared({
      tool: this.metadata.name,
      package: this.metadata.package,
      image: this.image,
      plan,
      argv: cargs,
      optionalOutputs
    }, {
      onLogLine: onStdout || onStderr
        ? ({stream, line}) => {
          if (stream === 'stdout') {
            onStdout?.(line)
          } else {
            onStderr?.(line)
          }
        }
        : undefined,
      timeoutMs: options.timeoutMs,
      signal: options.signal
    })
  }
}
