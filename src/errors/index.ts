export type ErrorCode =
  | 'DIRECTORY_UNAVAILABLE'
  | 'FILE_ACCESS'
  | 'CHANNEL_UNAVAILABLE'
  | 'CHANNEL_TRANSIENT'
  | 'EDITOR_LAUNCH'
  | 'CONFIG'

export class BakscopeError extends Error {
  constructor(
    readonly code: ErrorCode,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options)
    this.name = new.target.name
  }
}

/**
 * The directory to scan does not exist or cannot be listed.
 * Fatal for the operation that hit it.
 */
export class DirectoryUnavailableError extends BakscopeError {
  constructor(readonly directory: string, cause?: unknown) {
    super('DIRECTORY_UNAVAILABLE', `Directory unavailable: ${directory}`, { cause })
  }
}

export class FileAccessError extends BakscopeError {
  constructor(readonly filePath: string, cause?: unknown) {
    super('FILE_ACCESS', `Failed to access ${filePath}: ${describeError(cause)}`, { cause })
  }
}

export class ChannelUnavailableError extends BakscopeError {
  constructor(readonly address: string, cause?: unknown) {
    super('CHANNEL_UNAVAILABLE', `Metadata channel unavailable: ${address}: ${describeError(cause)}`, { cause })
  }
}

export class TransientChannelError extends BakscopeError {
  constructor(
    readonly address: string,
    readonly attempt: number,
    cause?: unknown
  ) {
    super('CHANNEL_TRANSIENT', `Metadata channel ${address} failed (attempt ${attempt}): ${describeError(cause)}`, { cause })
  }
}

export class EditorLaunchError extends BakscopeError {
  constructor(readonly command: string, cause?: unknown) {
    super('EDITOR_LAUNCH', `Failed to launch editor "${command}": ${describeError(cause)}`, { cause })
  }
}

export class ConfigError extends BakscopeError {
  constructor(readonly configPath: string, detail: string) {
    super('CONFIG', `Invalid config at ${configPath}: ${detail}`)
  }
}

export const describeError = (error: unknown): string =>
  error instanceof Error ? error.message : String(error)

export const isNotFound = (error: unknown): boolean =>
  error instanceof Error && 'code' in error && error.code === 'ENOENT'
