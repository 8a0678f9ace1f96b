import type { Command } from "./command";

export class CommandRegistry {
  /**
   * Maps command name → Command instance
   */
  private commands = new Map<string, Command>();

  /**
   * Registers a command at startup
   * Must throw on duplicate names
   */
  register(command: Command): this {
    const commandName = command.name.toUpperCase();
    if (this.commands.has(commandName)) throw new Error(`Command '${commandName}' is already registered`);
    this.commands.set(commandName, command);
    return this;
  }

  /**
   * Resolves a command by name, case-insensitively
   * Returns null if not found
   */
  get(name: string): Command | null {
    return this.commands.get(name.toUpperCase()) ?? null;
  }

  /**
   * Returns all registered commands
   * Used for introspection / help
   */
  list(): Command[] {
    return Array.from(this.commands.values());
  }
}
