import process from 'node:process'
import chalk from 'chalk'
import type {Command} from 'commander'
import {loadInvocationRequest} from '../../core/request.js'
import {formatDuration} from '../../core/utils.js'
import {ContainerExecutionError, PodrunError} from '../../errors.js'
import type {OnLogLine} from '../../engine/process-executor.js'
import {createCliRunner} from '../utils.js'

export function registerRunCommand(program: Command): void {
  program
    .command('run')
    .description('Run one tool invocation described by a request file')
    .argument('<request>', 'Invocation request file (JSON or YAML)')
    .option('-t, --timeout <ms>', 'Terminate the container after this many milliseconds', Number)
    .action(async (requestFile: string, options: {timeout?: number}, cmd: Command) => {
      const {runner, logger, json} = await createCliRunner(cmd)

      const controller = new AbortController()
      const onSignal = () => {
        controller.abort()
      }

      process.once('SIGINT', onSignal)
      process.once('SIGTERM', onSignal)

      // Under --json the runner logs container output itself
      const onLogLine: OnLogLine | undefined = json
        ? undefined
        : ({stream, line}) => {
          if (stream === 'stdout') {
            process.stdout.write(`${line}\n`)
          } else {
            process.stderr.write(`${chalk.gray(line)}\n`)
          }
        }

      try {
        const request = await loadInvocationRequest(requestFile)
        const {outputs, outputRoot, result} = await runner.execute(request, {
          onLogLine,
          timeoutMs: options.timeout,
          signal: controller.signal
        })

        if (json) {
          logger.info({tool: request.tool, outputs, outputRoot, durationMs: result.durationMs}, 'invocation succeeded')
          return
        }

        console.error(chalk.green(`✓ ${request.tool} ${chalk.gray(`(${formatDuration(result.durationMs)})`)}`))
        for (const [template, hostPath] of Object.entries(outputs)) {
          console.error(`  ${chalk.bold(template)} ${chalk.gray('→')} ${hostPath}`)
        }
      } catch (error: unknown) {
        if (!(error instanceof PodrunError)) {
          throw error
        }

        if (json) {
          logger.error({request: requestFile, code: error.code}, error.message)
        } else {
          console.error(chalk.red(`✗ ${error.message}`))
        }

        process.exitCode = error instanceof ContainerExecutionError ? error.exitCode : 1
      } finally {
        process.off('SIGINT', onSignal)
        process.off('SIGTERM', onSignal)
      }
    })
}
