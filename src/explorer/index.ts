export { BackupExplorer } from './BackupExplorer'
export type { BackupExplorerDeps, SyncResult } from './BackupExplorer'
export { createExplorer } from './createExplorer'
export type { ExplorerOverrides } from './createExplorer'
