import { Command, CommandRegistry as ICommandRegistry } from './types'

export class CommandRegistry implements ICommandRegistry {
  private commands: Map<string, Command> = new Map()
  private ordered: Command[] = []

  /**
   * Names and aliases share one case-insensitive namespace; a clash is a
   * programming error.
   */
  register(command: Command): void {
    const keys = [command.name, ...(command.aliases ?? [])].map(key => key.toLowerCase())
    for (const key of keys) {
      const existing = this.commands.get(key)
      if (existing && existing !== command) {
        throw new Error(`Command "${key}" is already registered by ${existing.name}`)
      }
    }

    for (const key of keys) {
      this.commands.set(key, command)
    }
    if (!this.ordered.includes(command)) {
      this.ordered.push(command)
    }
  }

  get(name: string): Command | undefined {
    return this.commands.get(name.toLowerCase())
  }

  // Registration order, each command once
  getAll(): Command[] {
    return [...this.ordered]
  }

  static createWithDefaults(commands: Command[]): CommandRegistry {
    const registry = new CommandRegistry()
    for (const command of commands) {
      registry.register(command)
    }
    return registry
  }
}
