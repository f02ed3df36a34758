import {posix} from 'node:path'
import type {MountEntry} from '../types.js'

/**
 * Returns the part of `path` below `root`, or undefined when `path` is not
 * `root` itself or inside it. Matches whole path segments only.
 */
export function relativeTo(root: string, path: string): string | undefined {
  if (path === root) {
    return ''
  }

  const prefix = root.endsWith('/') ? root : `${root}/`
  return path.startsWith(prefix) ? path.slice(prefix.length) : undefined
}

function longestMatch(
  entries: readonly MountEntry[],
  path: string,
  side: 'hostPath' | 'containerPath'
): {entry: MountEntry; rest: string} | undefined {
  let best: {entry: MountEntry; rest: string} | undefined
  for (const entry of entries) {
    const rest = relativeTo(entry[side], path)
    if (rest !== undefined && (!best || entry[side].length > best.entry[side].length)) {
      best = {entry, rest}
    }
  }

  return best
}

/**
 * Bidirectional host/container path lookup for one invocation.
 *
 * Built from the final mount set. Forward lookups rewrite host paths into
 * arguments the tool sees; reverse lookups turn the container paths of
 * declared outputs back into host paths. Both pick the longest matching
 * mount, so nested mounts resolve to the most specific one.
 */
export class PathTranslationTable {
  private readonly entries: readonly MountEntry[]

  constructor(mounts: readonly MountEntry[]) {
    this.entries = mounts.map(mount => ({...mount}))
  }

  /**
   * Translates a canonical host path into its container path.
   * @returns Container path, or undefined when no mount covers the host path
   */
  toContainer(hostPath: string): string | undefined {
    const match = longestMatch(this.entries, posix.normalize(hostPath), 'hostPath')
    if (!match) {
      return undefined
    }

    return match.rest ? posix.join(match.entry.containerPath, match.rest) : match.entry.containerPath
  }

  /**
   * Translates a container path back into a host path.
   * @returns Host path, or undefined when the container path is not mounted
   */
  toHost(containerPath: string): string | undefined {
    const match = longestMatch(this.entries, posix.normalize(containerPath), 'containerPath')
    if (!match) {
      return undefined
    }

    return match.rest ? posix.join(match.entry.hostPath, match.rest) : match.entry.hostPath
  }

  get size(): number {
    return this.entries.length
  }
}
