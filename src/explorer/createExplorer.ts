import { BackupSetResolver } from '../backup/BackupSetResolver'
import { ConfigLoader } from '../config/ConfigLoader'
import { LineCounter } from '../diff/LineCounter'
import { VersionDiffPipeline } from '../diff/VersionDiffPipeline'
import { EditorLauncher, ProcessEditorLauncher, editorCommandFromConfig } from '../editor/EditorLauncher'
import { Logger } from '../logging'
import { MetadataAuditMerger, MetadataChannel, createChannelStore } from '../metadata'
import { BackupExplorer } from './BackupExplorer'

export interface ExplorerOverrides {
  channel?: MetadataChannel
  editor?: EditorLauncher
  now?: () => Date
}

/**
 * Wire the pipeline from configuration. Tests swap the channel store and
 * the editor through `overrides`.
 */
export function createExplorer(
  configLoader: ConfigLoader,
  logger: Logger,
  overrides: ExplorerOverrides = {}
): BackupExplorer {
  const config = configLoader.getConfig()
  const lineCounter = new LineCounter()

  const channel = overrides.channel ?? createChannelStore({
    store: config.metadata.store,
    shadowDirectory: configLoader.getShadowDirectory(),
    logger,
  })
  const merger = new MetadataAuditMerger({
    channel,
    logger,
    maxAttempts: config.metadata.maxAttempts,
    tempDirectory: configLoader.getTempDirectory(),
    now: overrides.now,
  })

  return new BackupExplorer({
    resolver: new BackupSetResolver({ logger, timestampSource: config.timestampSource }),
    pipeline: new VersionDiffPipeline({ tags: merger, logger, lineCounter }),
    merger,
    editor: overrides.editor ?? new ProcessEditorLauncher(editorCommandFromConfig(config), logger),
    logger,
    lineCounter,
  })
}
