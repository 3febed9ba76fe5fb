import { promises as fs } from 'fs'
import path from 'path'
import {
  AuditEntry,
  LoadedVersions,
  MasterDocument,
  SkippedFile,
  VersionSummary,
} from '../contracts'
import { BackupSetResolver } from '../backup/BackupSetResolver'
import { VersionDiffPipeline } from '../diff/VersionDiffPipeline'
import { LineCounter } from '../diff/LineCounter'
import { EditorLauncher } from '../editor/EditorLauncher'
import { DirectoryUnavailableError, describeError } from '../errors'
import { formatDisplayTime } from '../formatting/time'
import { Logger } from '../logging'
import { MetadataAuditMerger } from '../metadata'
import { baseName } from '../naming/NameNormalizer'

export interface BackupExplorerDeps {
  resolver: BackupSetResolver
  pipeline: VersionDiffPipeline
  merger: MetadataAuditMerger
  editor: EditorLauncher
  logger: Logger
  lineCounter?: LineCounter
}

export interface SyncResult {
  baseName: string
  files: number
  entries: number
}

/**
 * What a UI shell calls: every operation recomputes from the current disk state.
 */
export class BackupExplorer {
  private resolver: BackupSetResolver
  private pipeline: VersionDiffPipeline
  private merger: MetadataAuditMerger
  private editor: EditorLauncher
  private logger: Logger
  private lineCounter: LineCounter

  constructor(deps: BackupExplorerDeps) {
    this.resolver = deps.resolver
    this.pipeline = deps.pipeline
    this.merger = deps.merger
    this.editor = deps.editor
    this.logger = deps.logger
    this.lineCounter = deps.lineCounter ?? new LineCounter()
  }

  /**
   * Resolve the backups of `referenceFile` (a live file or one of its
   * backups) in `directory`, merge their audit logs and summarize them.
   */
  async loadVersions(directory: string, referenceFile: string): Promise<LoadedVersions> {
    const base = baseName(path.basename(referenceFile))
    const skipped: SkippedFile[] = []

    const set = await this.resolver.resolve(directory, base, entry => skipped.push(entry))
    if (set.length === 0) {
      this.logger.info('no_backups_found', { directory, baseName: base })
      return { baseName: base, summaries: [], skipped }
    }

    await this.merger.syncAcrossSet(set)
    const summaries = await this.pipeline.summarize(set)

    this.logger.info('versions_loaded', { directory, baseName: base, count: summaries.length })
    return { baseName: base, summaries, skipped }
  }

  /**
   * Merge the audit logs of a backup set without summarizing it.
   */
  async syncHistory(directory: string, referenceFile: string): Promise<SyncResult> {
    const base = baseName(path.basename(referenceFile))
    const set = await this.resolver.resolve(directory, base)
    const entries = set.length === 0 ? 0 : await this.merger.syncAcrossSet(set)

    this.logger.info('history_synced', { directory, baseName: base, files: set.length, entries })
    return { baseName: base, files: set.length, entries }
  }

  /**
   * Re-read only the tag column of already loaded rows.
   */
  async refreshTags(summaries: VersionSummary[]): Promise<VersionSummary[]> {
    const refreshed: VersionSummary[] = []
    for (const summary of summaries) {
      refreshed.push({ ...summary, metaTag: await this.merger.readSource(summary.path) })
    }
    this.logger.info('tags_refreshed', { count: refreshed.length })
    return refreshed
  }

  readTag(filePath: string): Promise<string> {
    return this.merger.readSource(filePath)
  }

  async editTag(filePath: string, text: string): Promise<string> {
    await this.merger.writeSource(filePath, text)
    return this.merger.readSource(filePath)
  }

  viewHistory(filePath: string): Promise<AuditEntry[]> {
    return this.merger.readHistory(filePath)
  }

  /**
   * Regular files of a production directory with the number of backups each
   * has in `backupDirectory`, most recently modified first. Entries that
   * cannot be stat'ed are logged and left out.
   */
  async listMasterDocuments(productionDirectory: string, backupDirectory: string): Promise<MasterDocument[]> {
    let names: string[]
    try {
      names = await fs.readdir(productionDirectory)
    } catch (error) {
      this.logger.error('directory_unavailable', { directory: productionDirectory, error: describeError(error) })
      throw new DirectoryUnavailableError(productionDirectory, error)
    }

    const documents: MasterDocument[] = []
    for (const name of names.sort()) {
      const filePath = path.resolve(productionDirectory, name)
      let modifiedAt: Date
      try {
        const stats = await fs.stat(filePath)
        if (!stats.isFile()) {
          continue
        }
        modifiedAt = stats.mtime
      } catch (error) {
        // Only entries known to be regular files are listed
        this.logger.warn('master_skipped', { path: filePath, error: describeError(error) })
        continue
      }

      documents.push({
        name,
        path: filePath,
        modifiedAt,
        displayTime: formatDisplayTime(modifiedAt),
        backupCount: await this.resolver.count(backupDirectory, baseName(name)),
      })
    }

    documents.sort((a, b) => b.modifiedAt.getTime() - a.modifiedAt.getTime())
    this.logger.info('master_documents_loaded', { directory: productionDirectory, count: documents.length })
    return documents
  }

  /**
   * Backup content for a read-only preview.
   */
  previewVersion(filePath: string): Promise<string> {
    return this.lineCounter.readText(filePath)
  }

  async openVersion(summary: Pick<VersionSummary, 'path' | 'version' | 'name'>): Promise<string> {
    await this.editor.open(summary.path)
    this.logger.info('version_opened', { path: summary.path, version: summary.version })
    return `Restored from ${summary.version}: ${summary.name}`
  }
}
