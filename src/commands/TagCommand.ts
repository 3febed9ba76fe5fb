import path from 'path'
import { Command } from './types'
import { CommandResult } from '../contracts'
import { ok, usageError } from './arguments'

export const TagCommand: Command = {
  name: 'tag',
  usage: 'tag <backup-path> [text...]',
  description: 'Show or set the meta tag of a backup',
  execute: async (context, args): Promise<CommandResult> => {
    const [filePath, ...words] = args
    if (!filePath) {
      return usageError(TagCommand)
    }

    const name = path.basename(filePath)
    if (words.length === 0) {
      const current = await context.explorer.readTag(filePath)
      return ok(current.length > 0 ? current : `No meta tag set for ${name}`)
    }

    const stored = await context.explorer.editTag(filePath, words.join(' '))
    return ok(`Meta tag for ${name} set to: ${stored}`)
  }
}
