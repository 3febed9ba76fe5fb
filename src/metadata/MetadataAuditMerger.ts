import { promises as fs } from 'fs'
import path from 'path'
import os from 'os'
import { v4 as uuidv4 } from 'uuid'
import { AuditEntry, BackupSet } from '../contracts'
import {
  ChannelUnavailableError,
  TransientChannelError,
} from '../errors'
import { formatAuditTimestamp } from '../formatting/time'
import { Logger } from '../logging'
import { MetadataChannel, auditAddress, sourceAddress } from './MetadataChannel'

export interface MetadataAuditMergerOptions {
  channel: MetadataChannel
  logger: Logger
  maxAttempts?: number
  tempDirectory?: string
  now?: () => Date
}

/**
 * Owns the two sidecar channels of a tracked file: `:source` holds the
 * current tag and is overwritten, `:meta_audit` records every tag ever written
 * and is only appended to. Channel failures are logged and degrade to empty
 * results; nothing here aborts a batch.
 */
export class MetadataAuditMerger {
  private static readonly DEFAULT_MAX_ATTEMPTS = 3

  private channel: MetadataChannel
  private logger: Logger
  private maxAttempts: number
  private tempDirectory: string
  private now: () => Date

  constructor(options: MetadataAuditMergerOptions) {
    this.channel = options.channel
    this.logger = options.logger
    this.maxAttempts = Math.max(1, options.maxAttempts ?? MetadataAuditMerger.DEFAULT_MAX_ATTEMPTS)
    this.tempDirectory = options.tempDirectory ?? os.tmpdir()
    this.now = options.now ?? (() => new Date())
  }

  /**
   * Current tag of a file, trimmed; empty when there is none or it cannot be read.
   */
  async readSource(filePath: string): Promise<string> {
    const address = sourceAddress(filePath)
    try {
      const content = await this.channel.readAll(address)
      return content === null ? '' : content.trim()
    } catch (error) {
      this.logger.warn('source_read_failed', {
        error: new ChannelUnavailableError(address, error).message,
      })
      return ''
    }
  }

  /**
   * Replace the tag of a file and record the new value in its audit log.
   * Throws when the tag itself cannot be written; an audit failure is only logged.
   */
  async writeSource(filePath: string, text: string): Promise<void> {
    const address = sourceAddress(filePath)
    const content = text.trim()

    try {
      await this.channel.overwrite(address, content)
    } catch (error) {
      const channelError = new ChannelUnavailableError(address, error)
      this.logger.error('source_write_failed', { error: channelError.message })
      throw channelError
    }
    this.logger.info('source_written', { path: filePath })

    // One audit record per line; a multi-line tag is folded onto one
    const record = `[${formatAuditTimestamp(this.now())}] ${content.replace(/\s*\r?\n\s*/g, ' ')}`
    await this.appendEntries(filePath, [record], true)
  }

  /**
   * Non-blank audit lines in stored order (oldest first).
   */
  async readAudit(filePath: string): Promise<AuditEntry[]> {
    const content = await this.readAuditContent(filePath)
    return content === null ? [] : MetadataAuditMerger.parseEntries(content)
  }

  /**
   * Append the entries not yet stored for a file. The key is the exact
   * trimmed text, so re-submitting stored lines is a no-op. Nothing is
   * appended while the stored entries cannot be read.
   *
   * @returns how many lines were appended
   */
  appendAudit(filePath: string, entries: AuditEntry[]): Promise<number> {
    return this.appendEntries(filePath, entries, false)
  }

  /**
   * Give every file of a set the union of the set's audit entries, so the
   * history follows a document across its renamed copies.
   *
   * @returns number of distinct entries across the set
   */
  async syncAcrossSet(orderedSet: BackupSet): Promise<number> {
    const union: AuditEntry[] = []
    const seen = new Set<AuditEntry>()

    for (const file of orderedSet) {
      const entries = await this.readAudit(file.path)
      if (entries.length === 0) {
        this.logger.debug('audit_empty', { path: file.path })
      }
      for (const entry of entries) {
        if (!seen.has(entry)) {
          seen.add(entry)
          union.push(entry)
        }
      }
    }

    if (union.length === 0) {
      return 0
    }

    for (const file of orderedSet) {
      await this.appendAudit(file.path, union)
    }
    return union.length
  }

  /**
   * Audit log for display: repeated lines collapse onto their last occurrence.
   */
  async readHistory(filePath: string): Promise<AuditEntry[]> {
    const raw = await this.readAudit(filePath)
    const seen = new Set<AuditEntry>()
    const history: AuditEntry[] = []

    for (let i = raw.length - 1; i >= 0; i--) {
      if (!seen.has(raw[i])) {
        seen.add(raw[i])
        history.push(raw[i])
      }
    }
    history.reverse()

    if (history.length !== raw.length) {
      this.logger.info('history_deduplicated', {
        path: filePath,
        before: raw.length,
        after: history.length,
      })
    }
    return history
  }

  /**
   * `appendWhenUnreadable` is for records of a fresh write, which are new by
   * construction; merged entries from other files are never appended blind.
   */
  private async appendEntries(
    filePath: string,
    entries: AuditEntry[],
    appendWhenUnreadable: boolean
  ): Promise<number> {
    if (entries.length === 0) {
      return 0
    }

    const address = auditAddress(filePath)
    const content = await this.readAuditContent(filePath)
    if (content === null && !appendWhenUnreadable) {
      this.logger.error('audit_append_skipped', { path: filePath, reason: 'existing entries unreadable' })
      return 0
    }
    if (content === null) {
      this.logger.warn('audit_dedup_skipped', { path: filePath, reason: 'existing entries unreadable' })
    }

    const known = new Set(content === null ? [] : MetadataAuditMerger.parseEntries(content))
    const novel: AuditEntry[] = []
    for (const entry of entries) {
      const trimmed = entry.trim()
      if (trimmed.length === 0 || known.has(trimmed)) {
        continue
      }
      known.add(trimmed)
      novel.push(trimmed)
    }

    if (novel.length === 0) {
      this.logger.debug('audit_up_to_date', { path: filePath })
      return 0
    }

    // An unread log may lack its trailing newline; a blank line is dropped on read
    const separator = content === null || (content.length > 0 && !content.endsWith('\n')) ? '\n' : ''
    const payload = separator + novel.map(entry => `${entry}\n`).join('')

    const written = await this.withRetry(
      address,
      'append',
      () => this.channel.append(address, payload),
      () => this.appendThroughTempFile(address, payload)
    )
    if (!written.ok) {
      return 0
    }

    this.logger.info('audit_appended', { path: filePath, count: novel.length })
    return novel.length
  }

  static parseEntries(content: string): AuditEntry[] {
    return content
      .split(/\r?\n/)
      .map(line => line.trim())
      .filter(line => line.length > 0)
  }

  /**
   * Raw audit channel content: '' when the channel does not exist yet, null
   * when every attempt and the fallback failed.
   */
  private async readAuditContent(filePath: string): Promise<string | null> {
    const address = auditAddress(filePath)
    const result = await this.withRetry(
      address,
      'read',
      async () => (await this.channel.readAll(address)) ?? '',
      () => this.readThroughTempFile(address)
    )
    return result.ok ? result.value : null
  }

  private async withRetry<T>(
    address: string,
    operation: 'read' | 'append',
    attempt: () => Promise<T>,
    fallback: () => Promise<T>
  ): Promise<{ ok: true; value: T } | { ok: false }> {
    for (let i = 1; i <= this.maxAttempts; i++) {
      try {
        return { ok: true, value: await attempt() }
      } catch (error) {
        this.logger.error(`audit_${operation}_failed`, {
          error: new TransientChannelError(address, i, error).message,
          attempt: i,
          maxAttempts: this.maxAttempts,
        })
      }
    }

    try {
      const value = await fallback()
      this.logger.info(`audit_${operation}_via_temp_file`, { address })
      return { ok: true, value }
    } catch (error) {
      this.logger.error(`audit_${operation}_fallback_failed`, {
        error: new ChannelUnavailableError(address, error).message,
      })
      return { ok: false }
    }
  }

  private tempPath(): string {
    return path.join(this.tempDirectory, `bakscope-audit-${uuidv4()}.tmp`)
  }

  private async readThroughTempFile(address: string): Promise<string> {
    const location = this.channel.locate(address)
    if (location === null) {
      throw new Error('channel has no on-disk location')
    }

    if (!(await this.exists(location))) {
      return ''
    }

    const tempPath = this.tempPath()
    try {
      await fs.copyFile(location, tempPath)
      return await fs.readFile(tempPath, 'utf8')
    } finally {
      await fs.rm(tempPath, { force: true })
    }
  }

  private async appendThroughTempFile(address: string, payload: string): Promise<void> {
    const tempPath = this.tempPath()
    try {
      await fs.writeFile(tempPath, payload, 'utf8')
      await this.channel.append(address, await fs.readFile(tempPath, 'utf8'))
    } finally {
      await fs.rm(tempPath, { force: true })
    }
  }

  private async exists(filePath: string): Promise<boolean> {
    try {
      await fs.access(filePath)
      return true
    } catch {
      return false
    }
  }
}
