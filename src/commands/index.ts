export * from './types'
export { CommandRegistry } from './CommandRegistry'
export { VersionsCommand } from './VersionsCommand'
export { TagCommand } from './TagCommand'
export { HistoryCommand } from './HistoryCommand'
export { SyncCommand } from './SyncCommand'
export { MastersCommand } from './MastersCommand'
export { PreviewCommand } from './PreviewCommand'
export { OpenCommand } from './OpenCommand'
export { HelpCommand } from './HelpCommand'
export { VersionCommand } from './VersionCommand'

import { VersionsCommand } from './VersionsCommand'
import { TagCommand } from './TagCommand'
import { HistoryCommand } from './HistoryCommand'
import { SyncCommand } from './SyncCommand'
import { MastersCommand } from './MastersCommand'
import { PreviewCommand } from './PreviewCommand'
import { OpenCommand } from './OpenCommand'
import { HelpCommand } from './HelpCommand'
import { VersionCommand } from './VersionCommand'

export const defaultCommands = [
  VersionsCommand,
  TagCommand,
  HistoryCommand,
  SyncCommand,
  MastersCommand,
  PreviewCommand,
  OpenCommand,
  HelpCommand,
  VersionCommand,
]
