/**
 * Sidecar storage bound to a tracked file.
 *
 * A channel is addressed by the owning file's path plus a fixed suffix
 * (`/docs/a.txt.2024-01-02_100000.bak:source`). Stores differ only in where
 * the bytes live.
 */
export interface MetadataChannel {
  /** Whole channel content, or null when the channel does not exist yet. */
  readAll(address: string): Promise<string | null>
  overwrite(address: string, content: string): Promise<void>
  append(address: string, content: string): Promise<void>
  /** On-disk location of the channel, null for stores that keep nothing on disk. */
  locate(address: string): string | null
}

export const SOURCE_SUFFIX = ':source'
export const AUDIT_SUFFIX = ':meta_audit'

export const sourceAddress = (filePath: string): string => `${filePath}${SOURCE_SUFFIX}`
export const auditAddress = (filePath: string): string => `${filePath}${AUDIT_SUFFIX}`
