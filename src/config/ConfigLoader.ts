import fs from 'fs'
import path from 'path'
import os from 'os'
import { z } from 'zod'
import { BakscopeConfig, BakscopeConfigSchema } from '../contracts'
import { ConfigError, describeError } from '../errors'
import { Logger } from '../logging'

export const CONFIG_FILE_NAMES = ['.bakscope.config.json', 'bakscope.config.json']

export const DEFAULT_SHADOW_DIRECTORY = path.join(os.homedir(), '.bakscope', 'channels')

export class ConfigLoader {
  private static DEFAULT_CONFIG: BakscopeConfig = BakscopeConfigSchema.parse({})

  private config: BakscopeConfig
  private loadedFrom: string | null = null

  constructor(
    private configPath?: string,
    private logger?: Logger,
    private startDir: string = process.cwd()
  ) {
    this.config = this.loadConfig()
  }

  private findConfigFile(): string | null {
    // Start from the working directory and walk up
    let currentDir = path.resolve(this.startDir)

    while (true) {
      for (const configName of CONFIG_FILE_NAMES) {
        const candidate = path.join(currentDir, configName)
        if (fs.existsSync(candidate)) {
          return candidate
        }
      }
      const parent = path.dirname(currentDir)
      if (parent === currentDir) {
        return null
      }
      currentDir = parent
    }
  }

  private loadConfig(): BakscopeConfig {
    const configPath = this.configPath ?? this.findConfigFile()

    if (!configPath || !fs.existsSync(configPath)) {
      this.loadedFrom = null
      return ConfigLoader.DEFAULT_CONFIG
    }

    try {
      const rawConfig = fs.readFileSync(configPath, 'utf-8')
      const parsedConfig: unknown = JSON.parse(rawConfig)
      const validated = BakscopeConfigSchema.parse(parsedConfig)
      this.loadedFrom = configPath
      return this.resolvePaths(validated, path.dirname(configPath))
    } catch (error) {
      let detail: string
      if (error instanceof z.ZodError) {
        detail = error.errors.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; ')
      } else if (error instanceof SyntaxError) {
        detail = 'invalid JSON'
      } else {
        detail = describeError(error)
      }
      const configError = new ConfigError(configPath, detail)
      if (this.logger) {
        this.logger.error('config_invalid', { file: configPath, error: configError.message })
      } else {
        console.error(configError.message)
      }

      this.loadedFrom = null
      return ConfigLoader.DEFAULT_CONFIG
    }
  }

  /**
   * Relative directories in a config file are taken relative to that file.
   */
  private resolvePaths(config: BakscopeConfig, baseDir: string): BakscopeConfig {
    const resolve = (value: string | undefined): string | undefined =>
      value === undefined ? undefined : path.resolve(baseDir, value)

    return {
      ...config,
      backupDirectory: resolve(config.backupDirectory),
      productionDirectory: resolve(config.productionDirectory),
      metadata: {
        ...config.metadata,
        shadowDirectory: resolve(config.metadata.shadowDirectory),
        tempDirectory: resolve(config.metadata.tempDirectory),
      },
      log: {
        ...config.log,
        file: resolve(config.log.file),
      },
    }
  }

  getConfig(): BakscopeConfig {
    return this.config
  }

  getConfigPath(): string | null {
    return this.loadedFrom
  }

  getShadowDirectory(): string {
    return this.config.metadata.shadowDirectory ?? DEFAULT_SHADOW_DIRECTORY
  }

  getTempDirectory(): string {
    return this.config.metadata.tempDirectory ?? os.tmpdir()
  }

  reloadConfig(): void {
    this.config = this.loadConfig()
  }
}
