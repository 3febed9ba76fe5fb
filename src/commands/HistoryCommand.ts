import { Command } from './types'
import { CommandResult } from '../contracts'
import { ok, usageError } from './arguments'

export const HistoryCommand: Command = {
  name: 'history',
  usage: 'history <backup-path>',
  description: 'Show the meta tag history of a backup',
  execute: async (context, args): Promise<CommandResult> => {
    if (args.length !== 1) {
      return usageError(HistoryCommand)
    }

    const history = await context.explorer.viewHistory(args[0])
    return ok(history.length > 0 ? history.join('\n') : 'No metadata history available.')
  }
}
