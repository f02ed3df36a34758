import {basename} from 'node:path'
import type {EngineKind, EnvironmentSpec, MountEntry, UserMapping} from '../types.js'
import {InvalidConfigError} from '../errors.js'
import {assertMountable, compareCodeUnits} from './path-mapper.js'

export type AssembleInput = {
  engine: EngineKind;
  /** Engine executable, a name looked up in PATH or an absolute path. */
  executable: string;
  /** Concrete image reference, after override resolution. */
  image: string;
  mounts: readonly MountEntry[];
  env: EnvironmentSpec;
  /** Absolute container working directory. */
  workdir: string;
  user: UserMapping;
  /** Extra engine flags, placed right after the subcommand. */
  extraArgs?: readonly string[];
  /** Tool executable and arguments, already container-relative. */
  argv: readonly string[];
}

const imageTransport = /^[a-z][\w+.-]*:\/\//i

/**
 * Picks the command-line flavor from the engine executable name.
 */
export function inferEngine(executable: string): EngineKind {
  const name = basename(executable)
  return name === 'apptainer' || name === 'singularity' ? 'apptainer' : 'podman'
}

/**
 * Apptainer needs an explicit transport for registry images; local images
 * (`.sif` files and paths) are passed through.
 */
export function apptainerImage(image: string): string {
  if (imageTransport.test(image) || image.endsWith('.sif') || image.startsWith('/') || image.startsWith('.')) {
    return image
  }

  return `docker://${image}`
}

/**
 * Apptainer splits `--env` values on commas, so such values cannot be passed.
 * @throws InvalidConfigError
 */
export function assertApptainerEnv(env: EnvironmentSpec): void {
  for (const [name, value] of Object.entries(env)) {
    if (value.includes(',')) {
      throw new InvalidConfigError(`Environment variable '${name}' contains a comma, which apptainer --env cannot pass`)
    }
  }
}

export function formatMount(mount: MountEntry): string {
  assertMountable(mount.hostPath)
  assertMountable(mount.containerPath)
  return `${mount.hostPath}:${mount.containerPath}:${mount.mode}`
}

function sortedMounts(mounts: readonly MountEntry[]): MountEntry[] {
  return [...mounts].sort((a, b) => compareCodeUnits(a.containerPath, b.containerPath))
}

function sortedEnv(env: EnvironmentSpec): Array<[string, string]> {
  return Object.entries(env).sort(([a], [b]) => compareCodeUnits(a, b))
}

function podmanArgs(input: AssembleInput): string[] {
  const args = [input.executable, 'run', '--rm', ...(input.extraArgs ?? [])]

  for (const mount of sortedMounts(input.mounts)) {
    args.push('-v', formatMount(mount))
  }

  for (const [key, value] of sortedEnv(input.env)) {
    args.push('-e', `${key}=${value}`)
  }

  // Rootless podman maps container root to the invoking user; keep-id maps
  // the invoking user to itself instead.
  if (input.user === 'host') {
    args.push('--userns=keep-id')
  }

  args.push('-w', input.workdir, input.image, ...input.argv)
  return args
}

function apptainerArgs(input: AssembleInput): string[] {
  assertApptainerEnv(input.env)
  const args = [input.executable, 'exec', '--containall', ...(input.extraArgs ?? [])]

  for (const mount of sortedMounts(input.mounts)) {
    args.push('--bind', formatMount(mount))
  }

  for (const [key, value] of sortedEnv(input.env)) {
    args.push('--env', `${key}=${value}`)
  }

  // Apptainer runs as the invoking user unless asked otherwise.
  if (input.user === 'root') {
    args.push('--fakeroot')
  }

  args.push('--pwd', input.workdir, apptainerImage(input.image), ...input.argv)
  return args
}

/**
 * Builds the full engine command line of one invocation.
 *
 * Mounts are ordered by container path and environment variables by name,
 * so identical inputs always give an identical argument vector.
 *
 * @example
 * ```typescript
 * assembleCommand({
 *   engine: 'podman',
 *   executable: 'podman',
 *   image: 'alpine:3.20',
 *   mounts: [{hostPath: '/data', containerPath: '/mnt/in0', mode: 'ro'}],
 *   env: {},
 *   workdir: '/mnt/out0',
 *   user: 'host',
 *   argv: ['wc', '-l', '/mnt/in0/in.txt']
 * })
 * // ['podman', 'run', '--rm', '-v', '/data:/mnt/in0:ro', '--userns=keep-id',
 * //  '-w', '/mnt/out0', 'alpine:3.20', 'wc', '-l', '/mnt/in0/in.txt']
 * ```
 */
export function assembleCommand(input: AssembleInput): string[] {
  return input.engine === 'apptainer' ? apptainerArgs(input) : podmanArgs(input)
}
