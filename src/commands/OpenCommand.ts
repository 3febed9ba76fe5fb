import { Command } from './types'
import { CommandResult } from '../contracts'
import { ok, usageError, withBackupDirectory } from './arguments'

const normalizeVersion = (value: string): string =>
  /^\d+$/.test(value) ? `V${value}` : value.toUpperCase()

export const OpenCommand: Command = {
  name: 'open',
  aliases: ['restore'],
  usage: 'open [directory] <file> <version>',
  description: 'Open a backup version in the configured editor',
  execute: async (context, args): Promise<CommandResult> => {
    const parsed = withBackupDirectory(args, context.config, 2)
    if (!parsed) {
      return usageError(OpenCommand)
    }

    const [file, requested] = parsed.rest
    const version = normalizeVersion(requested)
    const loaded = await context.explorer.loadVersions(parsed.directory, file)
    const summary = loaded.summaries.find(candidate => candidate.version === version)
    if (!summary) {
      return {
        exitCode: 1,
        output: `Version ${version} not found for ${loaded.baseName} (${loaded.summaries.length} available)`,
      }
    }

    return ok(await context.explorer.openVersion(summary))
  }
}
