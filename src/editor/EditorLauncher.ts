import { spawn, SpawnOptions } from 'child_process'
import { EventEmitter } from 'events'
import { BakscopeConfig } from '../contracts'
import { EditorLaunchError } from '../errors'
import { Logger } from '../logging'

export interface EditorLauncher {
  open(filePath: string): Promise<void>
}

export type SpawnedProcess = EventEmitter & { unref(): void }

export type Spawner = (command: string, args: string[], options: SpawnOptions) => SpawnedProcess

export interface EditorCommand {
  command: string
  args: string[]
  /** Wait for the editor to exit (terminal editors) instead of detaching. */
  wait: boolean
}

const NOTEPAD_PLUS_PLUS = 'C:\\Program Files\\Notepad++\\notepad++.exe'

export function defaultEditorCommand(
  platform: NodeJS.Platform = process.platform,
  env: NodeJS.ProcessEnv = process.env
): EditorCommand {
  if (platform === 'win32') {
    return { command: NOTEPAD_PLUS_PLUS, args: [], wait: false }
  }
  return { command: env.VISUAL ?? env.EDITOR ?? 'vi', args: [], wait: true }
}

export function editorCommandFromConfig(config: BakscopeConfig): EditorCommand {
  if (!config.editor) {
    return defaultEditorCommand()
  }
  return { command: config.editor.command, args: config.editor.args, wait: config.editor.wait }
}

/**
 * Opens a file in an external editor process. `{filepath}` in the configured
 * arguments is replaced by the file; otherwise the file is passed last.
 */
export class ProcessEditorLauncher implements EditorLauncher {
  constructor(
    private editor: EditorCommand,
    private logger: Logger,
    private spawner: Spawner = (command, args, options) => spawn(command, args, options)
  ) {}

  open(filePath: string): Promise<void> {
    const args = this.editor.args.includes('{filepath}')
      ? this.editor.args.map(arg => (arg === '{filepath}' ? filePath : arg))
      : [...this.editor.args, filePath]

    return new Promise((resolve, reject) => {
      const child = this.editor.wait
        ? this.spawner(this.editor.command, args, { stdio: 'inherit' })
        : this.spawner(this.editor.command, args, { detached: true, stdio: 'ignore' })

      child.once('error', (error: Error) => {
        this.logger.error('editor_launch_failed', { command: this.editor.command, error: error.message })
        reject(new EditorLaunchError(this.editor.command, error))
      })

      if (this.editor.wait) {
        child.once('exit', (code: number | null) => {
          this.logger.info('editor_closed', { path: filePath, code })
          resolve()
        })
        return
      }

      child.once('spawn', () => {
        child.unref()
        this.logger.info('editor_launched', { path: filePath, command: this.editor.command })
        resolve()
      })
    })
  }
}
