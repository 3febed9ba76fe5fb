import { BakscopeConfig, CommandResult } from '../contracts'
import { BackupExplorer } from '../explorer'

export interface CommandContext {
  explorer: BackupExplorer
  config: BakscopeConfig
  registry: CommandRegistry
}

export interface Command {
  name: string
  aliases?: string[]
  usage: string
  description: string
  execute: (context: CommandContext, args: string[]) => Promise<CommandResult>
}

export interface CommandRegistry {
  register(command: Command): void
  get(name: string): Command | undefined
  getAll(): Command[]
}
