import { ChannelStoreKind } from '../contracts'
import { Logger } from '../logging'
import { AlternateStreamChannelStore } from './AlternateStreamChannelStore'
import { MetadataChannel } from './MetadataChannel'
import { ShadowChannelStore } from './ShadowChannelStore'

export interface ChannelStoreOptions {
  store: ChannelStoreKind
  shadowDirectory: string
  logger?: Logger
  platform?: NodeJS.Platform
}

export function resolveStoreKind(store: ChannelStoreKind, platform: NodeJS.Platform): 'ads' | 'shadow' {
  if (store !== 'auto') {
    return store
  }
  return platform === 'win32' ? 'ads' : 'shadow'
}

export function createChannelStore(options: ChannelStoreOptions): MetadataChannel {
  const kind = resolveStoreKind(options.store, options.platform ?? process.platform)
  options.logger?.debug('channel_store_selected', { store: kind })

  return kind === 'ads'
    ? new AlternateStreamChannelStore()
    : new ShadowChannelStore(options.shadowDirectory)
}
