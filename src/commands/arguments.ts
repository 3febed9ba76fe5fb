import { BakscopeConfig, CommandResult } from '../contracts'
import { Command } from './types'

export const ok = (output: string): CommandResult => ({ exitCode: 0, output })

export const usageError = (command: Command): CommandResult => ({
  exitCode: 1,
  output: `Usage: bakscope ${command.usage}`,
})

/**
 * Split `[directory] <rest...>` where the directory may come from the
 * configured `backupDirectory`. Null when the arguments do not fit.
 */
export function withBackupDirectory(
  args: string[],
  config: BakscopeConfig,
  restCount: number
): { directory: string; rest: string[] } | null {
  if (args.length === restCount + 1) {
    return { directory: args[0], rest: args.slice(1) }
  }
  if (args.length === restCount && config.backupDirectory) {
    return { directory: config.backupDirectory, rest: args }
  }
  return null
}
