import {readFile} from 'node:fs/promises'
import {dirname, isAbsolute, posix, resolve} from 'node:path'
import {InvalidRequestError} from '../errors.js'
import type {ArgToken, InvocationRequest, OutputDeclaration} from '../types.js'
import {parseConfigFile} from './config.js'

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function requireString(value: unknown, context: string): string {
  if (typeof value !== 'string' || value.length === 0) {
    throw new InvalidRequestError(`Invalid request: ${context} must be a non-empty string`)
  }

  return value
}

function optionalFlag(value: unknown, context: string): boolean | undefined {
  if (value === undefined || typeof value === 'boolean') {
    return value
  }

  throw new InvalidRequestError(`Invalid request: ${context} must be a boolean`)
}

function parseToken(raw: unknown, index: number, baseDir?: string): ArgToken {
  if (typeof raw === 'string') {
    return raw
  }

  if (!isRecord(raw)) {
    throw new InvalidRequestError(`Invalid request: args[${index}] must be a string or a path reference`)
  }

  if (raw.kind === 'input') {
    const path = requireString(raw.path, `args[${index}].path`)
    return {
      kind: 'input',
      path: baseDir && !isAbsolute(path) ? resolve(baseDir, path) : path,
      mutable: optionalFlag(raw.mutable, `args[${index}].mutable`),
      resolveParent: optionalFlag(raw.resolveParent, `args[${index}].resolveParent`)
    }
  }

  if (raw.kind === 'output') {
    return {kind: 'output', template: requireString(raw.template, `args[${index}].template`)}
  }

  throw new InvalidRequestError(`Invalid request: args[${index}].kind must be 'input' or 'output'`)
}

function parseOutput(raw: unknown, index: number): OutputDeclaration {
  if (typeof raw === 'string') {
    return {template: requireString(raw, `outputs[${index}]`)}
  }

  if (!isRecord(raw)) {
    throw new InvalidRequestError(`Invalid request: outputs[${index}] must be a template or an object`)
  }

  return {
    template: requireString(raw.template, `outputs[${index}].template`),
    optional: optionalFlag(raw.optional, `outputs[${index}].optional`)
  }
}

/**
 * Validates an untrusted invocation request.
 *
 * Relative input paths are resolved against `baseDir` when given, which is
 * how request files refer to data next to them. Output templates accept the
 * `"out.txt"` shorthand for `{template: "out.txt"}`.
 */
export function parseInvocationRequest(raw: unknown, baseDir?: string): InvocationRequest {
  if (!isRecord(raw)) {
    throw new InvalidRequestError('Invalid request: must be an object')
  }

  const tool = requireString(raw.tool, 'tool')
  const image = requireString(raw.image, 'image')

  if (!Array.isArray(raw.args) || raw.args.length === 0) {
    throw new InvalidRequestError('Invalid request: args must be a non-empty array')
  }

  const args = raw.args.map((token, index) => parseToken(token, index, baseDir))
  if (typeof args[0] !== 'string') {
    throw new InvalidRequestError('Invalid request: args[0] must be the executable name')
  }

  let outputs: OutputDeclaration[] | undefined
  if (raw.outputs !== undefined) {
    if (!Array.isArray(raw.outputs)) {
      throw new InvalidRequestError('Invalid request: outputs must be an array')
    }

    outputs = raw.outputs.map((output, index) => parseOutput(output, index))
  }

  let workdir: string | undefined
  if (raw.workdir !== undefined) {
    workdir = requireString(raw.workdir, 'workdir')
    if (!posix.isAbsolute(workdir)) {
      throw new InvalidRequestError(`Invalid request: workdir '${workdir}' must be an absolute container path`)
    }
  }

  return {tool, image, args, outputs, workdir}
}

/**
 * Loads an invocation request from a YAML or JSON file.
 */
export async function loadInvocationRequest(filePath: string): Promise<InvocationRequest> {
  const content = await readFile(filePath, 'utf8')
  return parseInvocationRequest(parseConfigFile(content, filePath), dirname(resolve(filePath)))
}
