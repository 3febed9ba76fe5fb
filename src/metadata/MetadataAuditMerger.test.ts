import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest'
import fs from 'fs'
import path from 'path'
import os from 'os'
import { MetadataAuditMerger } from './MetadataAuditMerger'
import { MemoryChannelStore } from './MemoryChannelStore'
import { ShadowChannelStore } from './ShadowChannelStore'
import { MemoryLogger } from '../logging'
import { ChannelUnavailableError } from '../errors'
import { BackupFile } from '../contracts'

const backup = (filePath: string): BackupFile => ({
  path: filePath,
  name: path.basename(filePath),
  baseName: 'notes.md',
  createdAt: new Date(2024, 0, 1),
})

describe('MetadataAuditMerger', () => {
  let store: MemoryChannelStore
  let logger: MemoryLogger
  let clock: Date
  let merger: MetadataAuditMerger

  beforeEach(() => {
    store = new MemoryChannelStore()
    logger = new MemoryLogger()
    clock = new Date(2024, 0, 2, 10, 0, 0)
    merger = new MetadataAuditMerger({ channel: store, logger, now: () => clock })
  })

  afterEach(() => {
    vi.restoreAllMocks()
  })

  describe('readSource', () => {
    it('should return the trimmed tag', async () => {
      await store.overwrite('/b/a.bak:source', '  draft for review \n')

      expect(await merger.readSource('/b/a.bak')).toBe('draft for review')
    })

    it('should return an empty string when the channel is absent', async () => {
      expect(await merger.readSource('/b/missing.bak')).toBe('')
    })

    it('should log and return an empty string when the channel fails', async () => {
      vi.spyOn(store, 'readAll').mockRejectedValue(new Error('EIO'))

      expect(await merger.readSource('/b/a.bak')).toBe('')
      expect(logger.events('warn')).toEqual(['source_read_failed'])
    })
  })

  describe('writeSource', () => {
    it('should overwrite the tag and append one audit record', async () => {
      await merger.writeSource('/b/a.bak', 'first')
      clock = new Date(2024, 0, 2, 11, 30, 15)
      await merger.writeSource('/b/a.bak', '  second  ')

      expect(await store.readAll('/b/a.bak:source')).toBe('second')
      expect(await merger.readAudit('/b/a.bak')).toEqual([
        '[2024-01-02 10:00:00] first',
        '[2024-01-02 11:30:15] second',
      ])
    })

    it('should append a new record when a previous value is written again', async () => {
      await merger.writeSource('/b/a.bak', 'approved')
      clock = new Date(2024, 0, 3, 8, 0, 0)
      await merger.writeSource('/b/a.bak', 'rework')
      clock = new Date(2024, 0, 4, 8, 0, 0)
      await merger.writeSource('/b/a.bak', 'approved')

      expect(await merger.readAudit('/b/a.bak')).toEqual([
        '[2024-01-02 10:00:00] approved',
        '[2024-01-03 08:00:00] rework',
        '[2024-01-04 08:00:00] approved',
      ])
    })

    it('should not duplicate an identical record', async () => {
      await merger.writeSource('/b/a.bak', 'same')
      await merger.writeSource('/b/a.bak', 'same')

      expect(await merger.readAudit('/b/a.bak')).toEqual(['[2024-01-02 10:00:00] same'])
    })

    it('should fold a multi-line tag into one audit record', async () => {
      await merger.writeSource('/b/a.bak', 'line one\n  line two')

      expect(await store.readAll('/b/a.bak:source')).toBe('line one\n  line two')
      expect(await merger.readAudit('/b/a.bak')).toEqual(['[2024-01-02 10:00:00] line one line two'])
    })

    it('should keep the tag when the audit append fails', async () => {
      vi.spyOn(store, 'append').mockRejectedValue(new Error('disk full'))

      await merger.writeSource('/b/a.bak', 'kept')

      expect(await merger.readSource('/b/a.bak')).toBe('kept')
      expect(await merger.readAudit('/b/a.bak')).toEqual([])
      expect(logger.events('error')).toContain('audit_append_fallback_failed')
    })

    it('should record the write even when the stored log cannot be read', async () => {
      const readAll = vi.spyOn(store, 'readAll').mockRejectedValue(new Error('locked'))

      await merger.writeSource('/b/a.bak', 'urgent')
      readAll.mockRestore()

      expect(await store.readAll('/b/a.bak:meta_audit')).toBe('\n[2024-01-02 10:00:00] urgent\n')
      expect(await merger.readAudit('/b/a.bak')).toEqual(['[2024-01-02 10:00:00] urgent'])
      expect(logger.events('warn')).toEqual(['audit_dedup_skipped'])
    })

    it('should throw when the tag cannot be written', async () => {
      vi.spyOn(store, 'overwrite').mockRejectedValue(new Error('read-only'))

      await expect(merger.writeSource('/b/a.bak', 'lost')).rejects.toBeInstanceOf(ChannelUnavailableError)
      expect(await merger.readAudit('/b/a.bak')).toEqual([])
    })
  })

  describe('readAudit', () => {
    it('should return non-blank trimmed lines in stored order', async () => {
      await store.append('/b/a.bak:meta_audit', '[2024-01-01 09:00:00] one\n\n  \n[2024-01-02 09:00:00] two  \n')

      expect(await merger.readAudit('/b/a.bak')).toEqual([
        '[2024-01-01 09:00:00] one',
        '[2024-01-02 09:00:00] two',
      ])
    })

    it('should retry transient failures', async () => {
      await store.append('/b/a.bak:meta_audit', 'entry\n')
      const readAll = vi.spyOn(store, 'readAll')
        .mockRejectedValueOnce(new Error('busy'))
        .mockRejectedValueOnce(new Error('busy'))

      expect(await merger.readAudit('/b/a.bak')).toEqual(['entry'])
      expect(readAll).toHaveBeenCalledTimes(3)
      expect(logger.events('error')).toEqual(['audit_read_failed', 'audit_read_failed'])
    })

    it('should give up with an empty list after every attempt and the fallback fail', async () => {
      const readAll = vi.spyOn(store, 'readAll').mockRejectedValue(new Error('busy'))

      expect(await merger.readAudit('/b/a.bak')).toEqual([])
      expect(readAll).toHaveBeenCalledTimes(3)
      expect(logger.events('error')).toEqual([
        'audit_read_failed',
        'audit_read_failed',
        'audit_read_failed',
        'audit_read_fallback_failed',
      ])
    })

    it('should honour a configured attempt count', async () => {
      const readAll = vi.spyOn(store, 'readAll').mockRejectedValue(new Error('busy'))
      merger = new MetadataAuditMerger({ channel: store, logger, maxAttempts: 1 })

      await merger.readAudit('/b/a.bak')

      expect(readAll).toHaveBeenCalledTimes(1)
    })
  })

  describe('appendAudit', () => {
    it('should append only entries not already stored', async () => {
      await store.append('/b/a.bak:meta_audit', 'a\nb\n')

      const appended = await merger.appendAudit('/b/a.bak', ['b', ' c ', 'a', 'c', ''])

      expect(appended).toBe(1)
      expect(await store.readAll('/b/a.bak:meta_audit')).toBe('a\nb\nc\n')
    })

    it('should be idempotent', async () => {
      expect(await merger.appendAudit('/b/a.bak', ['x', 'y'])).toBe(2)
      const afterFirst = await store.readAll('/b/a.bak:meta_audit')

      expect(await merger.appendAudit('/b/a.bak', ['x', 'y'])).toBe(0)
      expect(await store.readAll('/b/a.bak:meta_audit')).toBe(afterFirst)
    })

    it('should start a new line when the stored log lacks a trailing newline', async () => {
      await store.append('/b/a.bak:meta_audit', 'a')

      await merger.appendAudit('/b/a.bak', ['b'])

      expect(await store.readAll('/b/a.bak:meta_audit')).toBe('a\nb\n')
    })

    it('should fall back to a temporary file after repeated append failures', async () => {
      const append = vi.spyOn(store, 'append')
        .mockRejectedValueOnce(new Error('busy'))
        .mockRejectedValueOnce(new Error('busy'))
        .mockRejectedValueOnce(new Error('busy'))

      expect(await merger.appendAudit('/b/a.bak', ['late'])).toBe(1)
      expect(append).toHaveBeenCalledTimes(4)
      expect(await store.readAll('/b/a.bak:meta_audit')).toBe('late\n')
      expect(logger.events('info')).toContain('audit_append_via_temp_file')
    })

    it('should not append when the stored entries cannot be read', async () => {
      vi.spyOn(store, 'readAll').mockRejectedValue(new Error('busy'))
      const append = vi.spyOn(store, 'append')

      expect(await merger.appendAudit('/b/a.bak', ['x'])).toBe(0)
      expect(append).not.toHaveBeenCalled()
      expect(logger.events('error')).toContain('audit_append_skipped')
    })
  })

  describe('syncAcrossSet', () => {
    it('should give every file the union of the set', async () => {
      await store.append('/b/n1.bak:meta_audit', 'e1\ne2\n')
      await store.append('/b/n2.bak:meta_audit', 'e2\ne3\n')
      const set = [backup('/b/n1.bak'), backup('/b/n2.bak'), backup('/b/n3.bak')]

      expect(await merger.syncAcrossSet(set)).toBe(3)

      for (const file of set) {
        expect(new Set(await merger.readAudit(file.path))).toEqual(new Set(['e1', 'e2', 'e3']))
      }
      expect(await merger.readAudit('/b/n2.bak')).toEqual(['e2', 'e3', 'e1'])
    })

    it('should leave a converged set untouched', async () => {
      await store.append('/b/n1.bak:meta_audit', 'e1\n')
      const set = [backup('/b/n1.bak'), backup('/b/n2.bak')]
      await merger.syncAcrossSet(set)
      const append = vi.spyOn(store, 'append')

      await merger.syncAcrossSet(set)

      expect(append).not.toHaveBeenCalled()
    })

    it('should write nothing when no file has an audit log', async () => {
      const append = vi.spyOn(store, 'append')

      expect(await merger.syncAcrossSet([backup('/b/n1.bak'), backup('/b/n2.bak')])).toBe(0)
      expect(append).not.toHaveBeenCalled()
    })

    it('should keep syncing the other files when one channel fails', async () => {
      await store.append('/b/n1.bak:meta_audit', 'e1\n')
      const original = store.readAll.bind(store)
      vi.spyOn(store, 'readAll').mockImplementation(async (address: string) => {
        if (address === '/b/bad.bak:meta_audit') {
          throw new Error('locked')
        }
        return original(address)
      })

      await merger.syncAcrossSet([backup('/b/n1.bak'), backup('/b/bad.bak'), backup('/b/n3.bak')])

      expect(await merger.readAudit('/b/n3.bak')).toEqual(['e1'])
    })
  })

  describe('readHistory', () => {
    it('should keep the last occurrence of repeated lines', async () => {
      await store.append('/b/a.bak:meta_audit', 'a\nb\na\nc\nb\n')

      expect(await merger.readHistory('/b/a.bak')).toEqual(['a', 'c', 'b'])
      expect(logger.events('info')).toEqual(['history_deduplicated'])
    })

    it('should return an empty list without a log', async () => {
      expect(await merger.readHistory('/b/a.bak')).toEqual([])
    })
  })

  describe('with a shadow store', () => {
    let tempDir: string
    let shadow: ShadowChannelStore

    beforeEach(() => {
      tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'merger-test-'))
      shadow = new ShadowChannelStore(path.join(tempDir, 'channels'))
      merger = new MetadataAuditMerger({
        channel: shadow,
        logger,
        tempDirectory: tempDir,
        now: () => clock,
      })
    })

    afterEach(() => {
      fs.rmSync(tempDir, { recursive: true, force: true })
    })

    it('should read through a temporary copy when direct reads keep failing', async () => {
      await shadow.append('/b/a.bak:meta_audit', 'kept\n')
      vi.spyOn(shadow, 'readAll').mockRejectedValue(new Error('sharing violation'))

      expect(await merger.readAudit('/b/a.bak')).toEqual(['kept'])
      expect(logger.events('info')).toContain('audit_read_via_temp_file')
      expect(fs.readdirSync(tempDir)).toEqual(['channels'])
    })

    it('should store each entry once whatever else sits in the store directory', async () => {
      fs.mkdirSync(path.join(tempDir, 'channels', 'index.json'), { recursive: true })

      expect(await merger.appendAudit('/b/a.bak', ['[2024-01-01 09:00:00] entry'])).toBe(1)
      await merger.writeSource('/b/a.bak', 'tag')

      expect(await merger.readSource('/b/a.bak')).toBe('tag')
      expect(await merger.readAudit('/b/a.bak')).toEqual([
        '[2024-01-01 09:00:00] entry',
        '[2024-01-02 10:00:00] tag',
      ])
      expect(logger.events('error')).toEqual([])
    })

    it('should treat a missing channel file as empty in the fallback', async () => {
      vi.spyOn(shadow, 'readAll').mockRejectedValue(new Error('sharing violation'))

      expect(await merger.readAudit('/b/never-written.bak')).toEqual([])
      expect(logger.events('info')).toContain('audit_read_via_temp_file')
    })
  })
})
