import { promises as fs } from 'fs'
import path from 'path'
import crypto from 'crypto'
import { isNotFound } from '../errors'
import { MetadataChannel } from './MetadataChannel'

/**
 * Keeps every channel as a plain file in a side directory, for filesystems
 * without alternate data streams. File names are the SHA-256 of the channel
 * address, and each write touches only that one file.
 */
export class ShadowChannelStore implements MetadataChannel {
  private static readonly CHANNEL_EXTENSION = '.channel'

  constructor(private rootDir: string) {}

  async ensureDir(): Promise<void> {
    await fs.mkdir(this.rootDir, { recursive: true })
  }

  locate(address: string): string {
    const hash = ShadowChannelStore.hashAddress(address)
    return path.join(this.rootDir, `${hash}${ShadowChannelStore.CHANNEL_EXTENSION}`)
  }

  async readAll(address: string): Promise<string | null> {
    try {
      return await fs.readFile(this.locate(address), 'utf8')
    } catch (error) {
      if (isNotFound(error)) {
        return null
      }
      throw error
    }
  }

  async overwrite(address: string, content: string): Promise<void> {
    await this.ensureDir()
    await fs.writeFile(this.locate(address), content, 'utf8')
  }

  async append(address: string, content: string): Promise<void> {
    await this.ensureDir()
    await fs.appendFile(this.locate(address), content, 'utf8')
  }

  static hashAddress(address: string): string {
    return crypto.createHash('sha256').update(address).digest('hex')
  }
}
