import {
  BackupSet,
  ERROR_SENTINEL,
  ErrorSentinel,
  NOT_APPLICABLE,
  VersionSummary,
} from '../contracts'
import { FileAccessError, describeError } from '../errors'
import { formatDisplayTime } from '../formatting/time'
import { Logger } from '../logging'
import { MetadataAuditMerger } from '../metadata'
import { LineChange, LineCounter } from './LineCounter'

export type SourceReader = Pick<MetadataAuditMerger, 'readSource'>

export interface VersionDiffPipelineOptions {
  tags: SourceReader
  logger: Logger
  lineCounter?: LineCounter
}

/**
 * Turns a newest-first backup set into table rows: version label, line count
 * and the change against the next older copy.
 */
export class VersionDiffPipeline {
  private tags: SourceReader
  private logger: Logger
  private lineCounter: LineCounter

  constructor(options: VersionDiffPipelineOptions) {
    this.tags = options.tags
    this.logger = options.logger
    this.lineCounter = options.lineCounter ?? new LineCounter()
  }

  async summarize(orderedSet: BackupSet): Promise<VersionSummary[]> {
    // Each file is read once; null marks a file that could not be read
    const contents: Array<string | null> = []
    for (const file of orderedSet) {
      contents.push(await this.readContent(file.path))
    }

    const total = orderedSet.length
    const summaries: VersionSummary[] = []

    for (let i = 0; i < total; i++) {
      const file = orderedSet[i]
      const content = contents[i]

      summaries.push({
        path: file.path,
        name: file.name,
        timestamp: file.createdAt,
        displayTime: formatDisplayTime(file.createdAt),
        baseName: file.baseName,
        version: `V${total - i}`,
        change: i === total - 1 ? NOT_APPLICABLE : this.changeAgainstOlder(orderedSet, contents, i),
        totalLines: content === null ? ERROR_SENTINEL : this.lineCounter.countLines(content),
        metaTag: await this.tags.readSource(file.path),
      })
    }

    this.logger.debug('versions_summarized', { count: summaries.length })
    return summaries
  }

  /**
   * `+5 lines` when the newer copy grew, `-2 lines` when it shrank, `4 lines`
   * when the line count is unchanged.
   */
  static formatChange(change: LineChange): string {
    let sign = ''
    if (change.linesAfter > change.linesBefore) {
      sign = '+'
    } else if (change.linesAfter < change.linesBefore) {
      sign = '-'
    }
    return `${sign}${change.changedLines} lines`
  }

  private changeAgainstOlder(
    orderedSet: BackupSet,
    contents: Array<string | null>,
    index: number
  ): string | ErrorSentinel {
    const current = contents[index]
    const older = contents[index + 1]
    const currentPath = orderedSet[index].path
    const olderPath = orderedSet[index + 1].path

    if (current === null || older === null) {
      this.logger.error('compare_skipped', { path: currentPath, older: olderPath, reason: 'unreadable file' })
      return ERROR_SENTINEL
    }

    try {
      return VersionDiffPipeline.formatChange(this.lineCounter.compare(older, current))
    } catch (error) {
      this.logger.error('compare_failed', { path: currentPath, older: olderPath, error: describeError(error) })
      return ERROR_SENTINEL
    }
  }

  private async readContent(filePath: string): Promise<string | null> {
    try {
      return await this.lineCounter.readText(filePath)
    } catch (error) {
      this.logger.error('read_failed', { error: new FileAccessError(filePath, error).message })
      return null
    }
  }
}
