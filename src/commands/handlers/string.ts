import type { Engine } from "../../engine";
import { Command } from "../command";
import { InvalidArgumentError, NoDatabaseSelectedError } from "../errors";
import type { ReplyOf } from "../reply";
import type { Session } from "../session";
import { parseTtl } from "../ttl";

interface SetCommandArgs {
  key: string;
  value: string;
  ttlMs?: number;
}

interface KeyCommandArgs {
  key: string;
}

function requireKey(command: string, key: string): string {
  if (!key) {
    throw new InvalidArgumentError(`${command} key must not be empty`, { command, token: key });
  }
  return key;
}

/**
 * Also checked by the dispatcher before execute
 */
function selectedDatabase(session: Session, command: string) {
  const grant = session.grant;
  if (!grant) throw new NoDatabaseSelectedError(command);
  return grant.database;
}

export class SetCommand extends Command<SetCommandArgs, ReplyOf<"ok">> {
  readonly name = "SET";
  readonly syntax = "call";
  readonly usage = "SET(\"key\",\"value\") or SET(\"key\",\"value\",\"<n>s|m|d\")";

  readonly arity = {
    min: 2,
    max: 3,
  };

  readonly isWrite = true;
  override readonly requiresDatabase = true;

  /**
   * Parse raw args into structured form.
   * - Validate key
   * - Convert optional TTL to ms
   */
  parse(rawArgs: string[]): SetCommandArgs {
    const [key, value] = rawArgs;
    return {
      key: requireKey(this.name, key),
      value,
      ttlMs: rawArgs.length > 2 ? parseTtl(rawArgs[2]) : undefined,
    };
  }

  /**
   * Execute SET semantics.
   * - Overwrite value and TTL if key exists
   */
  execute(_engine: Engine, session: Session, args: SetCommandArgs): ReplyOf<"ok"> {
    selectedDatabase(session, this.name).set(args.key, args.value, args.ttlMs);
    return { type: "ok" };
  }
}

export class GetCommand extends Command<KeyCommandArgs, ReplyOf<"value">> {
  readonly name = "GET";
  readonly syntax = "call";
  readonly usage = "GET(\"key\")";
  readonly arity = { min: 1, max: 1 };
  readonly isWrite = false;
  override readonly requiresDatabase = true;

  parse(rawArgs: string[]): KeyCommandArgs {
    return { key: requireKey(this.name, rawArgs[0]) };
  }

  /**
   * Expired keys read as absent
   */
  execute(_engine: Engine, session: Session, args: KeyCommandArgs): ReplyOf<"value"> {
    return { type: "value", value: selectedDatabase(session, this.name).get(args.key) };
  }
}

export class DelCommand extends Command<KeyCommandArgs, ReplyOf<"deleted">> {
  readonly name = "DEL";
  readonly syntax = "call";
  readonly usage = "DEL(\"key\")";
  readonly arity = { min: 1, max: 1 };
  readonly isWrite = true;
  override readonly requiresDatabase = true;

  parse(rawArgs: string[]): KeyCommandArgs {
    return { key: requireKey(this.name, rawArgs[0]) };
  }

  execute(_engine: Engine, session: Session, args: KeyCommandArgs): ReplyOf<"deleted"> {
    return { type: "deleted", removed: selectedDatabase(session, this.name).delete(args.key) };
  }
}
