// ---------------------------------------------------------------------------
// Shared invocation domain types.
//
// The request types describe one tool invocation as handed over by the
// descriptor framework. The mount and result types are produced while the
// invocation runs and never outlive it.
// ---------------------------------------------------------------------------

// -- Request ----------------------------------------------------------------

/** Host file or directory the tool reads. Rewritten to its container path. */
export type InputToken = {
  kind: 'input';
  /** Host path, absolute or relative to the current directory. */
  path: string;
  /** Mount read-write instead of read-only. */
  mutable?: boolean;
  /**
   * Only the parent directory has to exist. Used for prefix-style inputs
   * where the tool derives file names from the given path.
   */
  resolveParent?: boolean;
}

/** Output path relative to the output root. Rewritten to its container path. */
export type OutputToken = {
  kind: 'output';
  template: string;
}

export type ArgToken = string | InputToken | OutputToken

/** Output the runner resolves to a host path once the tool exits. */
export type OutputDeclaration = {
  /** Path relative to the output root (e.g. `report/summary.html`). */
  template: string;
  /** When true, the output may legitimately be absent after a successful run. */
  optional?: boolean;
}

/**
 * One tool invocation. Immutable for the duration of the run.
 */
export type InvocationRequest = {
  /** Logical tool identifier, used in logs and run directory names. */
  tool: string;
  /** Logical image reference, subject to the runner's override table. */
  image: string;
  /** Executable followed by its arguments. */
  args: ArgToken[];
  /** Declared outputs. Templates referenced in `args` are declared implicitly. */
  outputs?: OutputDeclaration[];
  /** Absolute container path. Defaults to the container path of the output root. */
  workdir?: string;
}

// -- Mounts ------------------------------------------------------------------

export type MountMode = 'ro' | 'rw'

/** Bind mount of a canonical host directory into the container. */
export type MountEntry = {
  hostPath: string;
  containerPath: string;
  mode: MountMode;
}

// -- Engine ------------------------------------------------------------------

export type EngineKind = 'podman' | 'apptainer'

/**
 * Identity the tool runs as inside the container.
 *
 * - `host`: the invoking host user, so files written to read-write mounts
 *   belong to that user.
 * - `root`: the container's root user.
 */
export type UserMapping = 'host' | 'root'

export type EnvironmentSpec = Readonly<Record<string, string>>

export type ImageOverrideTable = Readonly<Record<string, string>>

// -- Results -----------------------------------------------------------------

export type ExecutionResult = {
  exitCode: number;
  stdout: string;
  stderr: string;
  /** Full engine command line, executable first. */
  argv: string[];
  durationMs: number;
}

/** What a successful invocation hands back to the caller. */
export type InvocationOutcome = {
  /** Host path of every declared output, keyed by template. */
  outputs: Record<string, string>;
  /** Host directory that received the outputs of this invocation. */
  outputRoot: string;
  result: ExecutionResult;
}
