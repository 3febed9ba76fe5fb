import { BakscopeConfig } from '../contracts'
import { CompositeLogger, ConsoleLogger, DEFAULT_LOG_PATH, FileLogger, Logger, isDebugEnv } from './Logger'

export function createLogger(
  config: BakscopeConfig,
  env: NodeJS.ProcessEnv = process.env
): Logger {
  const level = isDebugEnv(env) ? 'debug' : config.log.level
  return new CompositeLogger([
    new FileLogger(config.log.file ?? DEFAULT_LOG_PATH, level),
    new ConsoleLogger(),
  ])
}
