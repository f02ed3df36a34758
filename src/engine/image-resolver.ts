import type {ImageOverrideTable} from '../types.js'

/**
 * Resolves a logical image through the override table.
 * Pulling is left to the engine at run time.
 */
export function resolveImage(logicalImage: string, overrides: ImageOverrideTable): string {
  return Object.hasOwn(overrides, logicalImage) ? overrides[logicalImage] : logicalImage
}
