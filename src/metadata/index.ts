export * from './MetadataChannel'
export { MemoryChannelStore } from './MemoryChannelStore'
export { ShadowChannelStore } from './ShadowChannelStore'
export { AlternateStreamChannelStore } from './AlternateStreamChannelStore'
export { createChannelStore, resolveStoreKind } from './createChannelStore'
export { MetadataAuditMerger } from './MetadataAuditMerger'
export type { MetadataAuditMergerOptions } from './MetadataAuditMerger'
