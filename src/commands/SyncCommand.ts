import { Command } from './types'
import { CommandResult } from '../contracts'
import { ok, usageError, withBackupDirectory } from './arguments'

export const SyncCommand: Command = {
  name: 'sync',
  usage: 'sync [directory] <file>',
  description: 'Merge the tag history across every backup of a file',
  execute: async (context, args): Promise<CommandResult> => {
    const parsed = withBackupDirectory(args, context.config, 1)
    if (!parsed) {
      return usageError(SyncCommand)
    }

    const result = await context.explorer.syncHistory(parsed.directory, parsed.rest[0])
    if (result.files === 0) {
      return ok(`No backups found for: ${result.baseName}`)
    }
    return ok(`Synced ${result.entries} history entries across ${result.files} backups of ${result.baseName}`)
  }
}
