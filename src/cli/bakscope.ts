#!/usr/bin/env node

import { CommandRegistry, defaultCommands } from '../commands'
import { ConfigLoader } from '../config/ConfigLoader'
import { CommandResult } from '../contracts'
import { BakscopeError, describeError } from '../errors'
import { ExplorerOverrides, createExplorer } from '../explorer'
import { Logger, createLogger } from '../logging'

export interface RunOptions extends ExplorerOverrides {
  configLoader?: ConfigLoader
  logger?: Logger
}

export async function run(argv: string[], options: RunOptions = {}): Promise<CommandResult> {
  const configLoader = options.configLoader ?? new ConfigLoader()
  const config = configLoader.getConfig()
  const logger = options.logger ?? createLogger(config)
  const registry = CommandRegistry.createWithDefaults(defaultCommands)

  const [name = 'help', ...args] = argv
  const command = registry.get(name)
  if (!command) {
    return {
      exitCode: 1,
      output: `Unknown command: ${name}\nRun "bakscope help" for the list of commands.`,
    }
  }

  const explorer = createExplorer(configLoader, logger, options)
  logger.debug('command_started', { command: command.name, args })
  try {
    const result = await command.execute({ explorer, config, registry }, args)
    logger.debug('command_finished', { command: command.name, exitCode: result.exitCode })
    return result
  } catch (error) {
    if (error instanceof BakscopeError) {
      logger.error('command_failed', { command: command.name, code: error.code, error: error.message })
      return { exitCode: 1, output: error.message }
    }
    logger.error('command_crashed', { command: command.name, error: describeError(error) })
    return { exitCode: 2, output: `Unexpected error: ${describeError(error)}` }
  }
}

// Only run if this is the main module
if (require.main === module) {
  ;(async () => {
    const result = await run(process.argv.slice(2))
    if (result.exitCode === 0) {
      process.stdout.write(result.output.endsWith('\n') ? result.output : `${result.output}\n`)
    } else {
      process.stderr.write(`${result.output}\n`)
    }
    process.exitCode = result.exitCode
  })().catch(error => {
    console.error('bakscope: failed to start:', error)
    process.exitCode = 2
  })
}
