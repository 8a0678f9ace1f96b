import type { Engine } from "../engine";
import type { Reply } from "./reply";
import type { Session } from "./session";

/**
 * "call": NAME("arg","arg")
 * "words": name arg arg
 */
export type CommandSyntax = "call" | "words";

export abstract class Command<TArgs = unknown, TResult extends Reply = Reply> {
  /**
   * Canonical command name (e.g. SET, GET, CREATE)
   */
  abstract readonly name: string;

  abstract readonly syntax: CommandSyntax;

  /**
   * Shown in parse errors
   */
  abstract readonly usage: string;

  /**
   * Minimum and maximum arity
   * Example: GET("key") -> min=1, max=1
   */
  abstract readonly arity: {
    min: number;
    max: number;
  };

  /**
   * Whether this command mutates state
   * Key writes trigger a snapshot flush
   */
  abstract readonly isWrite: boolean;

  /**
   * Key commands need a selected database
   */
  readonly requiresDatabase: boolean = false;

  /**
   * Counted towards the session's failed-auth limit
   */
  readonly checksCredentials: boolean = false;

  /**
   * Execute command logic.
   * Key commands stay synchronous; registry commands await
   * hashing and persistence.
   */
  abstract execute(
    engine: Engine,
    session: Session,
    args: TArgs
  ): TResult | Promise<TResult>;

  /**
   * Argument normalization / validation hook
   * Throws a ParseError on invalid input, never touches state
   */
  abstract parse(rawArgs: string[]): TArgs;
}
