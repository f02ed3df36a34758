import {mkdir, realpath, stat} from 'node:fs/promises'
import {basename, dirname, posix, resolve} from 'node:path'
import {PathResolutionError, UnsupportedPathError} from '../errors.js'
import {errorCode} from '../core/utils.js'
import type {ArgToken, InvocationRequest, MountEntry, MountMode} from '../types.js'
import {PathTranslationTable, relativeTo} from './translation-table.js'

/** Container path prefix of input mounts (`/mnt/in0`, `/mnt/in1`, ...). */
export const inputMountPrefix = '/mnt/in'

/** Container path prefix of output mounts (`/mnt/out0`, `/mnt/out1`, ...). */
export const outputMountPrefix = '/mnt/out'

const unmountableChars = /[:,\\]/

/**
 * Rejects paths that `-v host:container:mode` and `--bind a:b,c:d` syntax
 * cannot express.
 * @throws UnsupportedPathError
 */
export function assertMountable(path: string): void {
  if (unmountableChars.test(path)) {
    throw new UnsupportedPathError(path, 'bind mount paths cannot contain ":", "," or "\\"')
  }
}

export function normalizeOutputTemplate(template: string): string {
  if (typeof template !== 'string' || template.length === 0) {
    throw new UnsupportedPathError(String(template), 'output template must be a non-empty relative path')
  }

  if (posix.isAbsolute(template)) {
    throw new UnsupportedPathError(template, 'output template must be relative to the output root')
  }

  const normalized = posix.normalize(template)
  if (normalized === '.' || normalized === '..' || normalized.startsWith('../')) {
    throw new UnsupportedPathError(template, 'output template must stay inside the output root')
  }

  return normalized
}

export type InputOptions = {
  mutable?: boolean;
  resolveParent?: boolean;
}

/**
 * Mount set, translation table and output locations of one invocation.
 */
export type MountPlan = {
  /** Mounts sorted by container path. */
  mounts: MountEntry[];
  table: PathTranslationTable;
  /** Container path of every output template mapped so far. */
  outputs: Map<string, string>;
  /** Container path of the output root. */
  outputRootPath: string;
}

/**
 * Computes the bind mounts of a single invocation.
 *
 * Host paths are canonicalized before they are mounted, so every reference
 * to one physical directory shares one mount point. Files are exposed by
 * mounting their containing directory. Mount points are numbered in the
 * order paths are mapped, per mapper: create one mapper per invocation.
 *
 * The output root is always mounted read-write at `/mnt/out0`, and outputs
 * below it are written through that mount.
 *
 * @example
 * ```typescript
 * const mapper = new PathMapper('/scratch')
 * await mapper.mapInput('/data/in.txt')   // '/mnt/in0/in.txt'
 * await mapper.mapOutput('out.txt')       // '/mnt/out0/out.txt'
 * (await mapper.plan()).mounts
 * // [{hostPath: '/data', containerPath: '/mnt/in0', mode: 'ro'},
 * //  {hostPath: '/scratch', containerPath: '/mnt/out0', mode: 'rw'}]
 * ```
 */
export class PathMapper {
  private readonly byHostPath = new Map<string, MountEntry>()
  private readonly outputPaths = new Map<string, string>()
  private nextInputId = 0
  private nextOutputId = 0
  private outputRootMount?: MountEntry

  constructor(readonly outputRoot: string) {}

  /**
   * Creates the output root if needed and mounts it read-write.
   * @returns Container path of the output root
   */
  async mapOutputRoot(): Promise<string> {
    this.outputRootMount ??= await this.mountOutputDir(resolve(this.outputRoot))
    return this.outputRootMount.containerPath
  }

  /**
   * Mounts a host input and returns the path the tool should use for it.
   * @param hostPath - Host file or directory, absolute or relative to cwd
   * @throws PathResolutionError if the path (or its parent, with `resolveParent`) does not exist
   */
  async mapInput(hostPath: string, options: InputOptions = {}): Promise<string> {
    const absolute = resolve(hostPath)
    const mode: MountMode = options.mutable ? 'rw' : 'ro'

    if (options.resolveParent) {
      const parent = await this.canonicalize(dirname(absolute), hostPath)
      if (!(await stat(parent)).isDirectory()) {
        throw new PathResolutionError(hostPath)
      }

      const mount = this.register(parent, 'input', mode)
      return posix.join(mount.containerPath, basename(absolute))
    }

    const canonical = await this.canonicalize(absolute, hostPath)
    if ((await stat(canonical)).isDirectory()) {
      return this.register(canonical, 'input', mode).containerPath
    }

    const mount = this.register(dirname(canonical), 'input', mode)
    return posix.join(mount.containerPath, basename(canonical))
  }

  /**
   * Creates the containing directory of an output template under the output
   * root. Directories inside the root are reached through the root mount;
   * a directory that resolves elsewhere (through a symlink) gets its own
   * read-write mount.
   * @param template - Path relative to the output root
   * @returns Container path the tool writes the output to
   */
  async mapOutput(template: string): Promise<string> {
    const normalized = normalizeOutputTemplate(template)
    const rootPath = await this.mapOutputRoot()

    const hostPath = resolve(this.outputRoot, normalized)
    const dir = dirname(hostPath)
    await mkdir(dir, {recursive: true})
    const canonicalDir = await realpath(dir)

    const rest = this.outputRootMount ? relativeTo(this.outputRootMount.hostPath, canonicalDir) : undefined
    let containerDir: string
    if (rest === undefined) {
      containerDir = this.register(canonicalDir, 'output', 'rw').containerPath
    } else {
      containerDir = rest ? posix.join(rootPath, rest) : rootPath
    }

    const containerPath = posix.join(containerDir, basename(hostPath))
    this.outputPaths.set(template, containerPath)
    return containerPath
  }

  /**
   * Rewrites one argument token. Literal strings pass through unchanged.
   */
  async mapToken(token: ArgToken): Promise<string> {
    if (typeof token === 'string') {
      return token
    }

    if (token.kind === 'input') {
      return this.mapInput(token.path, {mutable: token.mutable, resolveParent: token.resolveParent})
    }

    return this.mapOutput(token.template)
  }

  /**
   * Snapshot of the mounts and lookup table built so far.
   */
  async plan(): Promise<MountPlan> {
    const outputRootPath = await this.mapOutputRoot()
    const mounts = [...this.byHostPath.values()]
      .map(mount => ({...mount}))
      .sort((a, b) => compareCodeUnits(a.containerPath, b.containerPath))

    return {
      mounts,
      table: new PathTranslationTable(mounts),
      outputs: new Map(this.outputPaths),
      outputRootPath
    }
  }

  private async mountOutputDir(dir: string): Promise<MountEntry> {
    await mkdir(dir, {recursive: true})
    return this.register(await realpath(dir), 'output', 'rw')
  }

  private async canonicalize(absolute: string, given: string): Promise<string> {
    try {
      return await realpath(absolute)
    } catch (error) {
      const code = errorCode(error)
      if (code === 'ENOENT' || code === 'ENOTDIR') {
        throw new PathResolutionError(given, {cause: error})
      }

      throw error
    }
  }

  /**
   * Returns the mount of a canonical host directory, creating it on first
   * use. A read-only mount is upgraded when read-write access is requested.
   */
  private register(hostPath: string, kind: 'input' | 'output', mode: MountMode): MountEntry {
    const existing = this.byHostPath.get(hostPath)
    if (existing) {
      if (mode === 'rw') {
        existing.mode = 'rw'
      }

      return existing
    }

    assertMountable(hostPath)
    const containerPath = kind === 'input'
      ? `${inputMountPrefix}${this.nextInputId++}`
      : `${outputMountPrefix}${this.nextOutputId++}`

    const entry: MountEntry = {hostPath, containerPath, mode}
    this.byHostPath.set(hostPath, entry)
    return entry
  }
}

export function compareCodeUnits(a: string, b: string): number {
  if (a === b) {
    return 0
  }

  return a < b ? -1 : 1
}

/**
 * Maps every path a request references and rewrites its arguments.
 *
 * Tokens are mapped in order, so mount numbering follows argument order.
 * Declared outputs not referenced by any argument are mapped last.
 */
export async function computeMounts(
  request: InvocationRequest,
  outputRoot: string
): Promise<MountPlan & {argv: string[]}> {
  const mapper = new PathMapper(outputRoot)
  await mapper.mapOutputRoot()

  const argv: string[] = []
  for (const token of request.args) {
    argv.push(await mapper.mapToken(token))
  }

  for (const output of request.outputs ?? []) {
    await mapper.mapOutput(output.template)
  }

  return {...(await mapper.plan()), argv}
}
