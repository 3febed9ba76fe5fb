export * from './Logger'
export { createLogger } from './createLogger'
