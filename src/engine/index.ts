export {PathMapper, computeMounts, assertMountable, normalizeOutputTemplate, inputMountPrefix, outputMountPrefix, type InputOptions, type MountPlan} from './path-mapper.js'
export {PathTranslationTable} from './translation-table.js'
export {resolveImage} from './image-resolver.js'
export {assembleCommand, apptainerImage, assertApptainerEnv, formatMount, inferEngine, type AssembleInput} from './command-assembler.js'
export {
  ProcessExecutor,
  EngineProcessExecutor,
  engineEnv,
  type LogLine,
  type OnLogLine,
  type ProcessRunOptions
} from './process-executor.js'
