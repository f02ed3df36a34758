import process from 'node:process'
import chalk from 'chalk'
import type {Command} from 'commander'
import {PodrunError} from '../../errors.js'
import {createCliRunner} from '../utils.js'

export function registerCheckCommand(program: Command): void {
  program
    .command('check')
    .description('Verify that the container engine can be started')
    .action(async (_options: Record<string, unknown>, cmd: Command) => {
      const {runner, logger, json} = await createCliRunner(cmd)
      const {engine, engineExecutablePath} = runner.config

      try {
        const version = await runner.check()
        if (json) {
          logger.info({engine, engineExecutablePath, version}, 'engine available')
        } else {
          console.log(`${chalk.green('✓')} ${chalk.bold(engine)} ${chalk.gray(`(${engineExecutablePath})`)} ${version}`)
        }
      } catch (error: unknown) {
        if (!(error instanceof PodrunError)) {
          throw error
        }

        if (json) {
          logger.error({engine, engineExecutablePath, code: error.code}, error.message)
        } else {
          console.error(`${chalk.red('✗')} ${error.message}`)
        }

        process.exitCode = 1
      }
    })
}
