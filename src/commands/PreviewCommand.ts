import { Command } from './types'
import { CommandResult } from '../contracts'
import { ok, usageError } from './arguments'

export const PreviewCommand: Command = {
  name: 'preview',
  aliases: ['cat'],
  usage: 'preview <backup-path>',
  description: 'Print the content of a backup',
  execute: async (context, args): Promise<CommandResult> => {
    if (args.length !== 1) {
      return usageError(PreviewCommand)
    }
    return ok(await context.explorer.previewVersion(args[0]))
  }
}
