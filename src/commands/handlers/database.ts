import type { Credentials, Engine } from "../../engine";
import { DATABASE_NAME_PATTERN } from "../../persistence/snapshot";
import { Command } from "../command";
import { ArityError, InvalidArgumentError } from "../errors";
import type { ReplyOf } from "../reply";
import type { Session } from "../session";

interface DatabaseCommandArgs {
  name: string;
  credentials?: Credentials;
}

/**
 * <name> or <name> <user> <pass>
 */
function parseDatabaseArgs(command: string, rawArgs: string[]): DatabaseCommandArgs {
  if (rawArgs.length === 2) {
    throw new ArityError(command, { expected: "1 or 3", actual: rawArgs.length });
  }
  const [name, username, password] = rawArgs;
  if (!DATABASE_NAME_PATTERN.test(name)) {
    throw new InvalidArgumentError(
      `Invalid database name '${name}': use letters, digits, '_' or '-'`,
      { command, token: name }
    );
  }
  if (rawArgs.length === 1) return { name };
  return { name, credentials: { username, password } };
}

export class CreateCommand extends Command<DatabaseCommandArgs, ReplyOf<"created">> {
  readonly name = "create";
  readonly syntax = "words";
  readonly usage = "create <name> [<user> <pass>]";
  readonly arity = { min: 1, max: 3 };
  readonly isWrite = true;

  parse(rawArgs: string[]): DatabaseCommandArgs {
    return parseDatabaseArgs(this.name, rawArgs);
  }

  /**
   * The new database becomes the session's selection
   */
  async execute(engine: Engine, session: Session, args: DatabaseCommandArgs): Promise<ReplyOf<"created">> {
    const grant = await engine.create(args.name, args.credentials);
    session.select(grant);
    return { type: "created", database: grant.name };
  }
}

export class UseCommand extends Command<DatabaseCommandArgs, ReplyOf<"selected">> {
  readonly name = "use";
  readonly syntax = "words";
  readonly usage = "use <name> [<user> <pass>]";
  readonly arity = { min: 1, max: 3 };
  readonly isWrite = false;
  override readonly checksCredentials = true;

  parse(rawArgs: string[]): DatabaseCommandArgs {
    return parseDatabaseArgs(this.name, rawArgs);
  }

  /**
   * Replaces the selection on success, leaves it alone on failure
   */
  async execute(engine: Engine, session: Session, args: DatabaseCommandArgs): Promise<ReplyOf<"selected">> {
    const grant = await engine.select(args.name, args.credentials);
    session.select(grant);
    return { type: "selected", database: grant.name, requiresAuth: grant.requiresAuth };
  }
}

export class DropCommand extends Command<DatabaseCommandArgs, ReplyOf<"dropped">> {
  readonly name = "drop";
  readonly syntax = "words";
  readonly usage = "drop <name> [<user> <pass>]";
  readonly arity = { min: 1, max: 3 };
  readonly isWrite = true;
  override readonly checksCredentials = true;

  parse(rawArgs: string[]): DatabaseCommandArgs {
    return parseDatabaseArgs(this.name, rawArgs);
  }

  /**
   * Re-authenticates even if this session already selected the database
   */
  async execute(engine: Engine, session: Session, args: DatabaseCommandArgs): Promise<ReplyOf<"dropped">> {
    await engine.drop(args.name, args.credentials);
    if (session.database === args.name) session.deselect();
    return { type: "dropped", database: args.name };
  }
}
