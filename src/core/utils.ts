import {randomUUID} from 'node:crypto'
import {deburr} from 'lodash-es'

const safeShellWord = /^[\w@%+=:,./-]+$/

/**
 * Quotes a single argument for a POSIX shell, leaving safe words bare.
 */
export function quoteArg(arg: string): string {
  if (arg.length === 0) {
    return '\'\''
  }

  if (safeShellWord.test(arg)) {
    return arg
  }

  return `'${arg.replaceAll('\'', '\'"\'"\'')}'`
}

/**
 * Joins an argument vector into a copy-pasteable shell command line.
 */
export function quote(args: readonly string[]): string {
  return args.map(arg => quoteArg(arg)).join(' ')
}

/**
 * Generates a unique, sortable identifier.
 * @returns ID in format: `{timestamp}-{uuid-prefix}`
 */
export function generateId(): string {
  return `${Date.now()}-${randomUUID().slice(0, 8)}`
}

/** Convert a free-form name into a string safe for a directory name. */
export function slugify(name: string): string {
  return deburr(name)
    .toLowerCase()
    .replaceAll(/[^\w.-]/g, '-')
    .replaceAll(/-{2,}/g, '-')
    .replace(/^-/, '')
    .replace(/-$/, '')
}

export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${ms}ms`
  }

  const seconds = ms / 1000
  if (seconds < 60) {
    return `${seconds.toFixed(1)}s`
  }

  const minutes = Math.floor(seconds / 60)
  const remainingSeconds = Math.round(seconds % 60)
  return `${minutes}m ${remainingSeconds}s`
}

/**
 * Node.js error code (`ENOENT`, `EACCES`, ...) carried by an error, if any.
 */
export function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code
  }

  return undefined
}
