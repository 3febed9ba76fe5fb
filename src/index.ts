export * from './contracts'
export * from './errors'
export * from './logging'
export * from './metadata'
export { ConfigLoader, CONFIG_FILE_NAMES, DEFAULT_SHADOW_DIRECTORY } from './config/ConfigLoader'
export { baseName, isBackupName, backupTimestamp, BACKUP_EXTENSION } from './naming/NameNormalizer'
export { BackupSetResolver } from './backup/BackupSetResolver'
export { LineCounter } from './diff/LineCounter'
export type { LineChange } from './diff/LineCounter'
export { VersionDiffPipeline } from './diff/VersionDiffPipeline'
export {
  ProcessEditorLauncher,
  defaultEditorCommand,
  editorCommandFromConfig,
} from './editor/EditorLauncher'
export type { EditorLauncher, EditorCommand } from './editor/EditorLauncher'
export * from './explorer'
export { formatVersionTable, formatMasterTable, renderTable } from './formatting/TableFormatter'
export { formatAuditTimestamp, formatDisplayTime } from './formatting/time'
export * from './commands'
export { run } from './cli/bakscope'
