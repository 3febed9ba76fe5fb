import { z } from 'zod'
import {
  BakscopeConfigSchema,
  ChannelStoreKindSchema,
  TimestampSourceSchema,
} from './schemas'

export type BakscopeConfig = z.infer<typeof BakscopeConfigSchema>
export type ChannelStoreKind = z.infer<typeof ChannelStoreKindSchema>
export type TimestampSource = z.infer<typeof TimestampSourceSchema>

/**
 * One backup copy on disk. Immutable once resolved.
 */
export interface BackupFile {
  path: string
  name: string
  baseName: string
  createdAt: Date
}

/** Backups sharing one base name, newest first. */
export type BackupSet = BackupFile[]

export const NOT_APPLICABLE = 'N/A'
export const ERROR_SENTINEL = 'Error'

export type ErrorSentinel = typeof ERROR_SENTINEL

export interface VersionSummary {
  path: string
  name: string
  timestamp: Date
  displayTime: string
  baseName: string
  version: string
  change: string
  totalLines: number | ErrorSentinel
  metaTag: string
}

/** `[YYYY-MM-DD HH:MM:SS] <text>`, identified by its exact trimmed text */
export type AuditEntry = string

export interface SkippedFile {
  path: string
  reason: string
}

export interface LoadedVersions {
  baseName: string
  summaries: VersionSummary[]
  skipped: SkippedFile[]
}

export interface MasterDocument {
  name: string
  path: string
  modifiedAt: Date
  displayTime: string
  backupCount: number
}

export interface CommandResult {
  exitCode: number
  output: string
}
