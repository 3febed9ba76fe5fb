import { Command } from './types'
import { CommandResult } from '../contracts'
import packageJson from '../../package.json'
import { ok } from './arguments'

export const VersionCommand: Command = {
  name: 'version',
  aliases: ['--version', '-v'],
  usage: 'version',
  description: 'Show bakscope version',
  execute: async (): Promise<CommandResult> => ok(`bakscope v${packageJson.version}`)
}
