import path from 'path'
import { Command } from './types'
import { CommandResult } from '../contracts'
import { formatVersionTable } from '../formatting/TableFormatter'
import { ok, usageError, withBackupDirectory } from './arguments'

export const VersionsCommand: Command = {
  name: 'versions',
  aliases: ['ls'],
  usage: 'versions [directory] <file>',
  description: 'List the backups of a file with line changes and tags',
  execute: async (context, args): Promise<CommandResult> => {
    const parsed = withBackupDirectory(args, context.config, 1)
    if (!parsed) {
      return usageError(VersionsCommand)
    }

    const { directory, rest: [file] } = parsed
    const loaded = await context.explorer.loadVersions(directory, file)
    if (loaded.summaries.length === 0) {
      return ok(`No backups found for: ${loaded.baseName} in ${path.resolve(directory)}`)
    }

    let message = `Backups of ${loaded.baseName} (${loaded.summaries.length})\n\n`
    message += formatVersionTable(loaded.summaries)
    if (loaded.skipped.length > 0) {
      message += '\n\nSkipped:\n'
      message += loaded.skipped.map(entry => `   ${entry.path}: ${entry.reason}`).join('\n')
    }
    return ok(message)
  }
}
