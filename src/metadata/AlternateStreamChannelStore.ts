import { promises as fs } from 'fs'
import { isNotFound } from '../errors'
import { MetadataChannel } from './MetadataChannel'

/**
 * Reads and writes the channel address as a path. On NTFS `file.txt:source`
 * names an alternate data stream of `file.txt`, so the metadata travels with
 * the file itself.
 */
export class AlternateStreamChannelStore implements MetadataChannel {
  async readAll(address: string): Promise<string | null> {
    try {
      return await fs.readFile(address, 'utf8')
    } catch (error) {
      if (isNotFound(error)) {
        return null
      }
      throw error
    }
  }

  async overwrite(address: string, content: string): Promise<void> {
    await fs.writeFile(address, content, 'utf8')
  }

  async append(address: string, content: string): Promise<void> {
    await fs.appendFile(address, content, 'utf8')
  }

  locate(address: string): string {
    return address
  }
}
