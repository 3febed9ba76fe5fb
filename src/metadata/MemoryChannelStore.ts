import { MetadataChannel } from './MetadataChannel'

export class MemoryChannelStore implements MetadataChannel {
  private channels: Map<string, string> = new Map()

  async readAll(address: string): Promise<string | null> {
    return this.channels.get(address) ?? null
  }

  async overwrite(address: string, content: string): Promise<void> {
    this.channels.set(address, content)
  }

  async append(address: string, content: string): Promise<void> {
    this.channels.set(address, (this.channels.get(address) ?? '') + content)
  }

  locate(): string | null {
    return null
  }
}
