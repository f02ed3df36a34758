#!/usr/bin/env node
import 'dotenv/config'
import process from 'node:process'
import {Command} from 'commander'
import {registerCheckCommand} from './commands/check.js'
import {registerRunCommand} from './commands/run.js'
import {collect} from './utils.js'

async function main() {
  const program = new Command()

  program
    .name('podrun')
    .description('Run declarative tool invocations in podman or apptainer containers')
    .version('0.1.0')
    .option('--config <file>', 'Runner configuration file (JSON or YAML)', process.env.PODRUN_CONFIG ?? 'podrun.yaml')
    .option('--engine <kind>', 'Command-line flavor: podman or apptainer')
    .option('--engine-path <path>', 'Container engine executable')
    .option('--data-dir <path>', 'Directory receiving outputs')
    .option('--image-override <image=replacement>', 'Replace a logical image (repeatable)', collect, [])
    .option('--env <KEY=VALUE>', 'Variable set in the container (repeatable)', collect, [])
    .option('--env-file <path>', 'Load container variables from a dotenv file')
    .option('--json', 'Output structured JSON logs')

  registerCheckCommand(program)
  registerRunCommand(program)

  await program.parseAsync()
}

try {
  await main()
} catch (error: unknown) {
  console.error('Fatal error:', error)
  throw error
}
