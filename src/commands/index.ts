import { CommandRegistry } from "./registry";
import { ExitCommand } from "./handlers/connection";
import { CreateCommand, DropCommand, UseCommand } from "./handlers/database";
import { DelCommand, GetCommand, SetCommand } from "./handlers/string";

export { Command } from "./command";
export type { CommandSyntax } from "./command";
export { CommandDispatcher } from "./dispatcher";
export type { DispatcherOptions } from "./dispatcher";
export * from "./errors";
export { CommandParser, tokenize } from "./parser";
export type { ParsedCommand, RawCommand } from "./parser";
export { CommandRegistry } from "./registry";
export type { Reply, ReplyOf } from "./reply";
export { Session } from "./session";
export { parseTtl } from "./ttl";

/**
 * Registry with every built-in command
 */
export function createCommandRegistry(): CommandRegistry {
  return new CommandRegistry()
    .register(new CreateCommand())
    .register(new UseCommand())
    .register(new DropCommand())
    .register(new SetCommand())
    .register(new GetCommand())
    .register(new DelCommand())
    .register(new ExitCommand());
}
