import { Command } from './types'
import { CommandResult } from '../contracts'
import { ok } from './arguments'

export const HelpCommand: Command = {
  name: 'help',
  aliases: ['--help', '-h'],
  usage: 'help',
  description: 'Show available commands',
  execute: async (context): Promise<CommandResult> => {
    const commands = context.registry.getAll()
    const width = Math.max(...commands.map(command => command.usage.length))

    let message = 'Usage: bakscope <command> [args]\n\nCommands:\n'
    message += commands
      .map(command => `   ${command.usage.padEnd(width)}  ${command.description}`)
      .join('\n')
    return ok(message)
  }
}
