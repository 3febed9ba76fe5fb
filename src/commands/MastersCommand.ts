import { Command } from './types'
import { CommandResult } from '../contracts'
import { formatMasterTable } from '../formatting/TableFormatter'
import { ok, usageError } from './arguments'

export const MastersCommand: Command = {
  name: 'masters',
  usage: 'masters [production-dir] [backup-dir]',
  description: 'List production files with their backup counts',
  execute: async (context, args): Promise<CommandResult> => {
    const productionDirectory = args[0] ?? context.config.productionDirectory
    const backupDirectory = args[1] ?? context.config.backupDirectory ?? productionDirectory
    if (!productionDirectory || !backupDirectory || args.length > 2) {
      return usageError(MastersCommand)
    }

    const documents = await context.explorer.listMasterDocuments(productionDirectory, backupDirectory)
    if (documents.length === 0) {
      return ok(`No files found in ${productionDirectory}`)
    }
    return ok(formatMasterTable(documents))
  }
}
