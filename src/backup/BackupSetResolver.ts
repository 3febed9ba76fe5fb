import { promises as fs, Stats } from 'fs'
import path from 'path'
import { BackupFile, BackupSet, SkippedFile, TimestampSource } from '../contracts'
import { DirectoryUnavailableError, FileAccessError } from '../errors'
import { Logger } from '../logging'
import { BACKUP_EXTENSION } from '../naming/NameNormalizer'

export interface BackupSetResolverOptions {
  logger: Logger
  timestampSource?: TimestampSource
}

export type SkipHandler = (skipped: SkippedFile) => void

/**
 * Finds the backups of one logical file in a directory.
 */
export class BackupSetResolver {
  private logger: Logger
  private timestampSource: TimestampSource

  constructor(options: BackupSetResolverOptions) {
    this.logger = options.logger
    this.timestampSource = options.timestampSource ?? 'birthtime'
  }

  /**
   * List the `.bak` files of `directory` whose name starts with `baseName`,
   * newest first. A file whose timestamp cannot be read is reported through
   * `onSkip` and left out; an unavailable directory fails the whole call.
   */
  async resolve(directory: string, baseName: string, onSkip?: SkipHandler): Promise<BackupSet> {
    const names = await this.listCandidates(directory, baseName)
    const files: BackupFile[] = []

    for (const name of names) {
      const filePath = path.resolve(directory, name)
      try {
        const stats = await this.statFile(filePath)
        files.push({
          path: filePath,
          name,
          baseName,
          createdAt: this.creationTime(stats),
        })
      } catch (error) {
        const accessError = error instanceof FileAccessError ? error : new FileAccessError(filePath, error)
        this.logger.error('backup_skipped', { path: filePath, error: accessError.message })
        onSkip?.({ path: filePath, reason: accessError.message })
      }
    }

    // Array#sort is stable, so equal timestamps keep name order
    files.sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime())

    this.logger.info('backups_resolved', {
      directory,
      baseName,
      count: files.length,
      skipped: names.length - files.length,
    })
    return files
  }

  /**
   * Number of backups sharing `baseName`; 0 when the directory is unavailable.
   */
  async count(directory: string, baseName: string): Promise<number> {
    try {
      return (await this.listCandidates(directory, baseName)).length
    } catch (error) {
      if (error instanceof DirectoryUnavailableError) {
        return 0
      }
      throw error
    }
  }

  private async listCandidates(directory: string, baseName: string): Promise<string[]> {
    let entries: string[]
    try {
      entries = await fs.readdir(directory)
    } catch (error) {
      const unavailable = new DirectoryUnavailableError(directory, error)
      this.logger.error('directory_unavailable', { directory, error: String(error) })
      throw unavailable
    }

    return entries
      .filter(name => name.startsWith(baseName) && name.endsWith(BACKUP_EXTENSION))
      .sort()
  }

  private async statFile(filePath: string): Promise<Stats> {
    const stats = await fs.stat(filePath)
    if (!stats.isFile()) {
      throw new FileAccessError(filePath, new Error('not a regular file'))
    }
    return stats
  }

  private creationTime(stats: Stats): Date {
    if (this.timestampSource === 'mtime') {
      return stats.mtime
    }
    // Some filesystems report no birth time; fall back to modification time
    return stats.birthtimeMs > 0 ? stats.birthtime : stats.mtime
  }
}
